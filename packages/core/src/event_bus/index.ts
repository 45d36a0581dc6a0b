export { EventBus } from './event_bus';
export type { IEventStream } from './event_bus';
export type {
  BaseEvent,
  TrustEvent,
  TrustEventType,
  TrustEventOf,
  EventHandler,
  EventSubscription,
  SessionInitializedEvent,
  ChangeStagedEvent,
  PublishStartedEvent,
  PublishSucceededEvent,
  PublishFailedEvent,
  KeyRotationStagedEvent,
  TrustDataDeletedEvent,
} from './types';
