import type { MenuKey, MenuRecord } from "../../shared/schemas";
import { compareRecords, matchesQuery, type MenuStore, type StoreQuery } from "./store";

const keyId = (key: MenuKey) => `${key.providerId}|${key.servingDate}|${key.mealSlot}`;

/**
 * Process-local store for tests and for running without Redis.
 */
export class MemoryMenuStore implements MenuStore {
  private records = new Map<string, MenuRecord>();

  async get(key: MenuKey): Promise<MenuRecord | null> {
    const record = this.records.get(keyId(key));
    return record ? structuredClone(record) : null;
  }

  async compareAndSet(record: MenuRecord, expectedVersion: number | null): Promise<boolean> {
    const id = keyId(record);
    const current = this.records.get(id);
    if ((current?.version ?? null) !== expectedVersion) return false;
    this.records.set(id, structuredClone(record));
    return true;
  }

  async list(query: StoreQuery): Promise<MenuRecord[]> {
    return [...this.records.values()]
      .filter((record) => matchesQuery(record, query))
      .sort(compareRecords)
      .slice(0, query.limit)
      .map((record) => structuredClone(record));
  }

  get size(): number {
    return this.records.size;
  }
}
