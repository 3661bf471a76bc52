import { sessionKey, type SessionIdentity, type SessionRecord, type SessionStorePort } from "@appliance-rest/contracts";

const cloneRecord = (record: SessionRecord): SessionRecord => ({
  ...record,
  identity: { ...record.identity },
});

/**
 * Keeps sessions in a map keyed by identity for the life of the process.
 *
 * Records are never evicted. `runExclusive` chains tasks per identity, so a
 * lookup followed by a login cannot interleave with another caller's for the
 * same host and credentials.
 */
export class MemorySessionStore implements SessionStorePort {
  private readonly records = new Map<string, SessionRecord>();
  private readonly locks = new Map<string, Promise<void>>();

  async find(identity: SessionIdentity): Promise<SessionRecord | undefined> {
    const record = this.records.get(sessionKey(identity));
    return record ? cloneRecord(record) : undefined;
  }

  async save(record: SessionRecord): Promise<SessionRecord> {
    const stored = cloneRecord(record);
    this.records.set(sessionKey(record.identity), stored);
    return cloneRecord(stored);
  }

  async list(): Promise<ReadonlyArray<SessionRecord>> {
    return Array.from(this.records.values(), cloneRecord);
  }

  async runExclusive<T>(identity: SessionIdentity, task: () => Promise<T>): Promise<T> {
    const key = sessionKey(identity);
    const previous = this.locks.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.locks.set(key, tail);

    await previous;
    try {
      return await task();
    } finally {
      release();
      if (this.locks.get(key) === tail) {
        this.locks.delete(key);
      }
    }
  }

  async clear(): Promise<void> {
    this.records.clear();
  }
}

export const createMemorySessionStore = (): MemorySessionStore => new MemorySessionStore();

/** Shared by every client that is not handed a store of its own. */
export const defaultSessionStore: SessionStorePort = createMemorySessionStore();
