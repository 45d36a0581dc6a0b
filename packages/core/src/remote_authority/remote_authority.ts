/**
 * RemoteAuthority Interface
 *
 * The server side of a GUN: holds keys for server-managed roles, signs
 * with them, and accepts published generations. Failures surface as
 * TransportError and are passed through unchanged by the session.
 */

import type { GUN, PublicKey, RoleName, Signature } from '../trust_types';
import type { Generation } from '../signed_metadata/signed_metadata.types';

export interface RemoteAuthority {
  /**
   * Current key of a server-managed role, created on first request.
   */
  getRoleKey(gun: GUN, role: RoleName): Promise<PublicKey>;

  /**
   * Creates a new key for a server-managed role and returns it. Older keys
   * stay available for signing until a generation without them is published.
   */
  rotateRoleKey(gun: GUN, role: RoleName): Promise<PublicKey>;

  /**
   * Signs payload with every listed key the authority holds for the role.
   */
  sign(gun: GUN, role: RoleName, keyIds: string[], payload: Uint8Array): Promise<Signature[]>;

  publish(generation: Generation): Promise<void>;

  deleteTrustData(gun: GUN): Promise<void>;
}
