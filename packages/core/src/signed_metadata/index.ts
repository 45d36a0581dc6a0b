export {
  buildRootPayload,
  buildTargetsPayload,
  buildSnapshotPayload,
  buildTimestampPayload,
  metaEntryOf,
  payloadBytes,
} from './signed_metadata';
export type {
  RootPayload,
  TargetsPayload,
  SnapshotPayload,
  TimestampPayload,
  MetadataPayload,
  DelegationEntry,
  MetaEntry,
  SignedMetadata,
  Generation,
} from './signed_metadata.types';
