export { KeyStoreCryptoService } from './crypto_service';
export type { CryptoService, KeyStoreCryptoServiceDependencies } from './crypto_service.types';
