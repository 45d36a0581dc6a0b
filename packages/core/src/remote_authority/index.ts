export type { RemoteAuthority } from './remote_authority';

// NOTE: The in-memory stand-in is exported via @trustline/core/memory
