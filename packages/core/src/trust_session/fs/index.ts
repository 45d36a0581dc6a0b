export { createFsTrustSession, getKeysDir, getChangelistRoot } from './fs_trust_session';
export type { FsTrustSessionOptions, FsTrustSessionContext } from './fs_trust_session';
