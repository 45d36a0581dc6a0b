import type { BaseRole, GUN, RoleName, Signature } from '../trust_types';
import { BaseRoles, TOP_LEVEL_ROLES } from '../trust_types';
import type { CryptoService } from '../crypto_service/crypto_service.types';
import type { RemoteAuthority } from '../remote_authority/remote_authority';
import type { MetadataPayload, SignedMetadata } from '../signed_metadata/signed_metadata.types';
import {
  buildRootPayload,
  buildSnapshotPayload,
  buildTargetsPayload,
  buildTimestampPayload,
  payloadBytes,
} from '../signed_metadata/signed_metadata';
import { NotFoundError, ThresholdNotMetError, UnimplementedError } from '../trust_errors';
import type { Logger } from '../logger';
import type { FoldResult } from './change_folder';
import type { TrustState } from './trust_state';

export interface MetadataSignerDependencies {
  gun: GUN;
  crypto: CryptoService;
  remote?: RemoteAuthority;
  logger: Logger;
}

/**
 * Re-signs the metadata of every touched role of a candidate state and
 * checks each against its threshold. Snapshot and timestamp are signed
 * last, over the metadata they pin.
 */
export class MetadataSigner {
  private readonly gun: GUN;
  private readonly crypto: CryptoService;
  private readonly remote: RemoteAuthority | undefined;
  private readonly logger: Logger;

  constructor(dependencies: MetadataSignerDependencies) {
    this.gun = dependencies.gun;
    this.crypto = dependencies.crypto;
    this.remote = dependencies.remote;
    this.logger = dependencies.logger;
  }

  /**
   * @returns the roles signed, in signing order
   * @throws ThresholdNotMetError
   */
  async signTouched(state: TrustState, fold: FoldResult): Promise<RoleName[]> {
    const order = [
      ...state.resolver.priorityOrder().filter(role => fold.touched.has(role)),
      ...(fold.touched.has(BaseRoles.Root) ? [BaseRoles.Root] : []),
      BaseRoles.Snapshot,
      BaseRoles.Timestamp,
    ];

    for (const name of order) {
      const role = state.baseRoleOf(name);
      const signingRoles = name === BaseRoles.Root && fold.previousRoot ? [fold.previousRoot, role] : [role];
      const version = state.versionOf(name) + 1;
      const metadata = await this.signRole(state, name, this.buildPayload(state, name, version), signingRoles);
      state.metadata.set(name, metadata);
      state.registry.setSignatures(name, metadata.signatures);
    }
    return order;
  }

  private buildPayload(state: TrustState, name: RoleName, version: number): MetadataPayload {
    switch (name) {
      case BaseRoles.Root:
        return buildRootPayload(this.gun, version, TOP_LEVEL_ROLES.map(role => state.registry.getBaseRole(role)));
      case BaseRoles.Snapshot: {
        const pinned = state.pinnedRoles().flatMap(role => {
          const entry = state.metadata.get(role);
          return entry ? [entry] : [];
        });
        return buildSnapshotPayload(this.gun, version, pinned);
      }
      case BaseRoles.Timestamp: {
        const snapshot = state.metadata.get(BaseRoles.Snapshot);
        if (!snapshot) {
          throw new NotFoundError('role', BaseRoles.Snapshot);
        }
        return buildTimestampPayload(this.gun, version, snapshot);
      }
      default:
        return buildTargetsPayload(
          this.gun,
          name,
          version,
          state.catalog.targetsOf(name),
          state.resolver.childrenOf(name)
        );
    }
  }

  private async signRole(
    state: TrustState,
    name: RoleName,
    payload: MetadataPayload,
    signingRoles: BaseRole[]
  ): Promise<SignedMetadata> {
    const bytes = payloadBytes(payload);
    const keyIds = Array.from(new Set(signingRoles.flatMap(role => Object.keys(role.keys))));
    const signed = await this.collectSignatures(state, name, keyIds, bytes);

    const checked = signingRoles.map(role => state.registry.checkSignatures(role, signed, bytes));
    for (const role of signingRoles) {
      const valid = state.registry.countValidSignatures(role, signed, bytes);
      if (valid < role.threshold) {
        throw new ThresholdNotMetError(name, role.threshold, valid, Object.keys(role.keys));
      }
    }

    const signatures = signed.map((signature, index) => ({
      ...signature,
      isValid: checked.some(results => results[index]?.isValid === true),
    }));
    this.logger.debug(`Signed ${name} v${payload.version} with ${signatures.length} signature(s)`);
    return { role: name, payload, signatures };
  }

  private async collectSignatures(
    state: TrustState,
    name: RoleName,
    keyIds: string[],
    bytes: Uint8Array
  ): Promise<Signature[]> {
    if (state.registry.isServerManaged(name)) {
      if (!this.remote) {
        throw new UnimplementedError(`signing ${name}`, 'no remote authority is configured');
      }
      return this.remote.sign(this.gun, name, keyIds, bytes);
    }

    const signatures: Signature[] = [];
    for (const keyId of keyIds) {
      if (await this.crypto.getKey(keyId)) {
        signatures.push(await this.crypto.sign(keyId, bytes));
      }
    }
    return signatures;
  }
}
