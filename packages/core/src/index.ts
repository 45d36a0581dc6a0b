// Domain model
export * as Types from "./trust_types";
export * as Errors from "./trust_errors";
export * as Logger from "./logger";
export * as Validation from "./validation";
export * as Schemas from "./trust_schemas";

// Keys and signing
export * as Crypto from "./crypto";
export * as CryptoService from "./crypto_service";
export * as KeyProvider from "./key_provider";
export * as SignedMetadata from "./signed_metadata";

// Persistence
export * as Store from "./record_store";
export * as Changelist from "./changelist";
export * as Config from "./config_manager";
export * as ConfigStore from "./config_store";

// Trust model
export * as RoleRegistry from "./role_registry";
export * as DelegationResolver from "./delegation_resolver";
export * as TargetCatalog from "./target_catalog";
export * as Session from "./trust_session";

// Integration
export * as EventBus from "./event_bus";
export * as RemoteAuthority from "./remote_authority";
export * as Transport from "./transport";
