import type { Change, ChangeAction, RoleName } from '../trust_types';

/**
 * Ordered, append-only log of staged changes for one GUN.
 */
export interface Changelist {
  /**
   * Appends a change. Only malformed changes are rejected.
   */
  add(change: Change): Promise<void>;

  /**
   * Changes in append order.
   */
  list(): Promise<Change[]>;

  clear(): Promise<void>;

  /**
   * Where the changelist lives (a directory, or a label for in-memory lists).
   */
  location(): string;
}

/**
 * Persisted form of a Change; content bytes are base64.
 */
export type StoredChange = {
  action: ChangeAction;
  scope: RoleName;
  type: string;
  path: string;
  content: string;
};
