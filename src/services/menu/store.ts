import { MEAL_SLOTS, type MealSlot, type MenuKey, type MenuRecord, type SortKey } from "../../shared/schemas";

export interface StoreQuery {
  providerId?: string;
  from?: string;
  to?: string;
  mealSlot?: MealSlot;
  // Exclusive lower bound in sort order
  after?: SortKey;
  limit: number;
}

/**
 * Durable home of the current MenuRecord per key. Writes are compare-and-set on
 * `version` so concurrent writers to the same key never overwrite each other.
 */
export interface MenuStore {
  get(key: MenuKey): Promise<MenuRecord | null>;
  /**
   * Writes `record` only if the stored version is `expectedVersion`
   * (`null`: no record may exist yet). Resolves false on a version conflict.
   */
  compareAndSet(record: MenuRecord, expectedVersion: number | null): Promise<boolean>;
  /** Records matching the query, in sort order, at most `limit` of them. */
  list(query: StoreQuery): Promise<MenuRecord[]>;
}

// --- Sort Order ---
// servingDate, then providerId, then breakfast/lunch/dinner/other

export function slotRank(slot: MealSlot): number {
  return MEAL_SLOTS.indexOf(slot);
}

export function sortKeyOf(key: MenuKey): SortKey {
  return [key.servingDate, key.providerId, key.mealSlot];
}

export function compareSortKeys(a: SortKey, b: SortKey): number {
  if (a[0] !== b[0]) return a[0] < b[0] ? -1 : 1;
  if (a[1] !== b[1]) return a[1] < b[1] ? -1 : 1;
  return slotRank(a[2]) - slotRank(b[2]);
}

export function compareRecords(a: MenuKey, b: MenuKey): number {
  return compareSortKeys(sortKeyOf(a), sortKeyOf(b));
}

export function matchesQuery(record: MenuRecord, query: Omit<StoreQuery, "limit">): boolean {
  if (query.providerId && record.providerId !== query.providerId) return false;
  if (query.mealSlot && record.mealSlot !== query.mealSlot) return false;
  if (query.from && record.servingDate < query.from) return false;
  if (query.to && record.servingDate > query.to) return false;
  if (query.after && compareSortKeys(sortKeyOf(record), query.after) <= 0) return false;
  return true;
}
