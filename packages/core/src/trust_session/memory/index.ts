export { createMemoryTrustSession } from './memory_trust_session';
export type { MemoryTrustSessionOptions } from './memory_trust_session';
