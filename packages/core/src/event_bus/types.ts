/**
 * Event Bus types for trust session events
 */

import type { ChangeAction, GUN, RoleName } from '../trust_types';

/**
 * Base event structure
 */
export type BaseEvent = {
  /** Event type identifier */
  type: string;
  /** Event timestamp */
  timestamp: number;
  /** Event payload */
  payload: unknown;
  /** Source that emitted the event */
  source: string;
};

export type SessionInitializedEvent = BaseEvent & {
  type: 'trust.session.initialized';
  payload: {
    gun: GUN;
    generation: number;
    rootKeyIds: string[];
    serverManagedRoles: RoleName[];
  };
};

export type ChangeStagedEvent = BaseEvent & {
  type: 'trust.change.staged';
  payload: {
    gun: GUN;
    action: ChangeAction;
    scope: RoleName;
    changeType: string;
    path: string;
  };
};

export type PublishStartedEvent = BaseEvent & {
  type: 'trust.publish.started';
  payload: {
    gun: GUN;
    changeCount: number;
  };
};

export type PublishSucceededEvent = BaseEvent & {
  type: 'trust.publish.succeeded';
  payload: {
    gun: GUN;
    generation: number;
    touchedRoles: RoleName[];
  };
};

export type PublishFailedEvent = BaseEvent & {
  type: 'trust.publish.failed';
  payload: {
    gun: GUN;
    message: string;
    code?: string;
  };
};

export type KeyRotationStagedEvent = BaseEvent & {
  type: 'trust.key.rotation_staged';
  payload: {
    gun: GUN;
    role: RoleName;
    keyIds: string[];
    serverManaged: boolean;
  };
};

export type TrustDataDeletedEvent = BaseEvent & {
  type: 'trust.data.deleted';
  payload: {
    gun: GUN;
    remote: boolean;
  };
};

export type TrustEvent =
  | SessionInitializedEvent
  | ChangeStagedEvent
  | PublishStartedEvent
  | PublishSucceededEvent
  | PublishFailedEvent
  | KeyRotationStagedEvent
  | TrustDataDeletedEvent;

export type TrustEventType = TrustEvent['type'];

export type TrustEventOf<K extends TrustEventType> = Extract<TrustEvent, { type: K }>;

/**
 * Event handler function type
 */
export type EventHandler<T extends BaseEvent = TrustEvent> = (event: T) => void | Promise<void>;

/**
 * Event subscription
 */
export type EventSubscription = {
  /** Unique subscription ID */
  id: string;
  /** Event type being subscribed to ('*' for all) */
  eventType: TrustEventType | '*';
  metadata: {
    createdAt: number;
  };
};
