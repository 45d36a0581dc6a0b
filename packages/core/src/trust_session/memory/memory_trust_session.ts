import type { GUN, KeyAlgorithm } from '../../trust_types';
import type { KeyProvider } from '../../key_provider/key_provider';
import type { RemoteAuthority } from '../../remote_authority/remote_authority';
import type { IEventStream } from '../../event_bus/event_bus';
import type { Logger } from '../../logger';
import { MockKeyProvider } from '../../key_provider/memory/mock_key_provider';
import { KeyStoreCryptoService } from '../../crypto_service/crypto_service';
import { createMemoryChangelist } from '../../changelist/memory/memory_changelist';
import { TrustSession } from '../trust_session';

export interface MemoryTrustSessionOptions {
  gun: GUN;
  /** Defaults to an empty MockKeyProvider */
  keyProvider?: KeyProvider;
  remote?: RemoteAuthority;
  eventBus?: IEventStream;
  keyAlgorithm?: KeyAlgorithm;
  logger?: Logger;
}

/**
 * Session with in-memory key custody and changelist.
 *
 * @example
 * ```typescript
 * const session = createMemoryTrustSession({ gun: 'example.com/app' });
 * const rootKey = await session.getCryptoService().create('root', session.getGun(), 'ed25519');
 * await session.initialize([rootKey.keyId]);
 * ```
 */
export function createMemoryTrustSession(options: MemoryTrustSessionOptions): TrustSession {
  const crypto = new KeyStoreCryptoService({
    keyProvider: options.keyProvider ?? new MockKeyProvider(),
    ...(options.logger ? { logger: options.logger } : {}),
  });
  return new TrustSession({
    gun: options.gun,
    crypto,
    changelist: createMemoryChangelist(options.gun),
    ...(options.remote ? { remote: options.remote } : {}),
    ...(options.eventBus ? { eventBus: options.eventBus } : {}),
    ...(options.keyAlgorithm ? { keyAlgorithm: options.keyAlgorithm } : {}),
    ...(options.logger ? { logger: options.logger } : {}),
  });
}
