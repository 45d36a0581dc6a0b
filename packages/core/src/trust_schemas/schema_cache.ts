import Ajv from "ajv";
import type { ValidateFunction } from "ajv";
import addFormats from "ajv-formats";

import PublicKeySchema from "./public_key_schema.json";
import TargetSchema from "./target_schema.json";
import TargetMetaSchema from "./target_meta_schema.json";
import DelegationEditSchema from "./delegation_edit_schema.json";
import RoleKeyEditSchema from "./role_key_edit_schema.json";
import TrustConfigSchema from "./trust_config_schema.json";
import StoredKeySchema from "./stored_key_schema.json";
import StoredChangeSchema from "./stored_change_schema.json";
import WireTargetSchema from "./wire_target_schema.json";
import WireSignatureSchema from "./wire_signature_schema.json";
import WirePublicKeySchema from "./wire_public_key_schema.json";
import WireRoleSchema from "./wire_role_schema.json";
import WireDelegationRoleSchema from "./wire_delegation_role_schema.json";
import WireChangeSchema from "./wire_change_schema.json";

export const Schemas = {
  PublicKey: PublicKeySchema,
  Target: TargetSchema,
  TargetMeta: TargetMetaSchema,
  DelegationEdit: DelegationEditSchema,
  RoleKeyEdit: RoleKeyEditSchema,
  TrustConfig: TrustConfigSchema,
  StoredKey: StoredKeySchema,
  StoredChange: StoredChangeSchema,
  WireTarget: WireTargetSchema,
  WireSignature: WireSignatureSchema,
  WirePublicKey: WirePublicKeySchema,
  WireRole: WireRoleSchema,
  WireDelegationRole: WireDelegationRoleSchema,
  WireChange: WireChangeSchema,
} as const;

export type SchemaName = keyof typeof Schemas;

/**
 * Singleton cache of compiled validators. Every schema is registered under
 * its `$id` up front so `$ref`s between them resolve.
 */
export class SchemaValidationCache {
  private static validators = new Map<SchemaName, ValidateFunction>();
  private static ajv: Ajv | null = null;

  private static getAjv(): Ajv {
    if (!this.ajv) {
      const ajv = new Ajv({ allErrors: true });
      addFormats(ajv);
      for (const schema of Object.values(Schemas)) {
        ajv.addSchema(schema);
      }
      this.ajv = ajv;
    }
    return this.ajv;
  }

  /**
   * Gets or compiles the validator for a named schema.
   */
  static getValidator<T = unknown>(name: SchemaName): ValidateFunction<T> {
    let validator = this.validators.get(name);
    if (!validator) {
      const compiled = this.getAjv().getSchema(Schemas[name].$id);
      if (!compiled) {
        throw new Error(`Schema ${name} is not registered`);
      }
      validator = compiled;
      this.validators.set(name, validator);
    }
    return validator as ValidateFunction<T>;
  }
}
