/**
 * Filesystem-backed trust session
 *
 * Layout under the project root:
 *   .trustline/config.json          TrustConfig
 *   .trustline/private/<keyId>.key  private keys (0600)
 *   .trustline/changelist/<gun>/    one JSON file per staged change
 */

import * as path from 'path';
import type { RemoteAuthority } from '../../remote_authority/remote_authority';
import type { IEventStream } from '../../event_bus/event_bus';
import type { ResolvedTrustConfig } from '../../config_manager/config_manager.types';
import { FsKeyProvider } from '../../key_provider/fs/fs_key_provider';
import { KeyStoreCryptoService } from '../../crypto_service/crypto_service';
import { createFsChangelist } from '../../changelist/fs/fs_changelist';
import { createConfigManager, TRUSTLINE_DIR } from '../../config_store/fs/fs_config_store';
import { NotFoundError } from '../../trust_errors';
import { createLogger } from '../../logger';
import { TrustSession } from '../trust_session';

export interface FsTrustSessionOptions {
  remote?: RemoteAuthority;
  eventBus?: IEventStream;
}

export interface FsTrustSessionContext {
  session: TrustSession;
  config: ResolvedTrustConfig;
}

export function getKeysDir(root: string): string {
  return path.join(root, TRUSTLINE_DIR, 'private');
}

export function getChangelistRoot(root: string): string {
  return path.join(root, TRUSTLINE_DIR, 'changelist');
}

/**
 * Opens the session described by `<root>/.trustline/config.json`.
 *
 * @throws NotFoundError when there is no valid configuration
 */
export async function createFsTrustSession(root: string, options: FsTrustSessionOptions = {}): Promise<FsTrustSessionContext> {
  const configManager = createConfigManager(root);
  const config = await configManager.resolveConfig();
  if (!config) {
    throw new NotFoundError('config', path.join(root, TRUSTLINE_DIR, 'config.json'));
  }

  const crypto = new KeyStoreCryptoService({
    keyProvider: new FsKeyProvider({ keysDir: getKeysDir(root) }),
    logger: createLogger('[CryptoService] ', config.logLevel),
  });
  const session = new TrustSession({
    gun: config.gun,
    crypto,
    changelist: createFsChangelist(getChangelistRoot(root), config.gun),
    keyAlgorithm: config.keyAlgorithm,
    logger: createLogger('[TrustSession] ', config.logLevel),
    ...(options.remote ? { remote: options.remote } : {}),
    ...(options.eventBus ? { eventBus: options.eventBus } : {}),
  });
  return { session, config };
}
