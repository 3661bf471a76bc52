import type { SessionIdentity, SessionRecord } from "../../types/session.js";

export interface SessionStorePort {
  find(identity: SessionIdentity): Promise<SessionRecord | undefined>;
  /** Inserts the record, or replaces the one held for the same identity. */
  save(record: SessionRecord): Promise<SessionRecord>;
  list(): Promise<ReadonlyArray<SessionRecord>>;
  /** Runs the task while holding the lock for this identity. */
  runExclusive<T>(identity: SessionIdentity, task: () => Promise<T>): Promise<T>;
  clear?(): Promise<void>;
}
