export { TrustSession } from './trust_session';
export { TrustState } from './trust_state';
export { FoldResult, applyChange, foldChanges } from './change_folder';
export { MetadataSigner } from './metadata_signer';
export type {
  ITrustSession,
  TrustSessionDependencies,
  PublishOptions,
  PublishResult,
  SessionState,
} from './trust_session.types';
