import { scopedLogger } from "../../infra/logger";
import { daysBetween, todayIn } from "../../shared/dates";
import { InvalidFilter, StoreUnavailable, describeError } from "../../shared/errors";
import {
  MenuFilterSchema,
  SortKeySchema,
  type MealSlot,
  type MenuFilter,
  type MenuPage,
  type MenuRecord,
  type SortKey,
} from "../../shared/schemas";
import { ALL_PROVIDERS, buildSnapshot, type CacheKey, type MenuCache } from "./cache";
import { compareRecords, matchesQuery, slotRank, sortKeyOf, type MenuStore } from "./store";

const log = scopedLogger("SERVICE", "QUERY");

// Upper bound on records loaded into one cached snapshot
const SNAPSHOT_LIMIT = 5000;
const LATEST_BATCH = 500;

export type LatestFilter = Pick<Partial<MenuFilter>, "providerId" | "mealSlot" | "from" | "to">;

export interface QueryServiceOptions {
  timeZone: string;
  defaultPageSize: number;
  maxPageSize: number;
  // Date ranges up to this many days are answered from cached snapshots
  maxCachedSpanDays: number;
  snapshotLimit?: number;
  now?: () => Date;
}

interface ResolvedFilter {
  providerId?: string;
  from?: string;
  to?: string;
  mealSlot?: MealSlot;
  after?: SortKey;
  pageSize: number;
}

// --- Page Tokens ---

export function encodePageToken(key: SortKey): string {
  return Buffer.from(JSON.stringify(key), "utf8").toString("base64url");
}

export function decodePageToken(token: string): SortKey {
  let json: unknown;
  try {
    json = JSON.parse(Buffer.from(token, "base64url").toString("utf8"));
  } catch {
    throw new InvalidFilter("pageToken", "Malformed page token");
  }
  const parsed = SortKeySchema.safeParse(json);
  if (!parsed.success) {
    throw new InvalidFilter("pageToken", "Malformed page token");
  }
  return parsed.data;
}

/**
 * Read side: cache first for narrow date ranges, store otherwise. Crawl failures never
 * surface here; when the store is down an expired snapshot is served and flagged stale.
 */
export class QueryService {
  private readonly now: () => Date;

  constructor(
    private readonly store: MenuStore,
    private readonly cache: MenuCache,
    private readonly options: QueryServiceOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async listMenus(input: Partial<MenuFilter> = {}): Promise<MenuPage> {
    const filter = this.resolve(input);

    const page =
      filter.from && filter.to && daysBetween(filter.from, filter.to) < this.options.maxCachedSpanDays
        ? await this.fromSnapshot(filter, { providerId: filter.providerId ?? ALL_PROVIDERS, from: filter.from, to: filter.to })
        : await this.fromStore(filter);

    log.debug({ filter, returned: page.items.length, stale: page.stale }, "Listed menus");
    return page;
  }

  /** "What is being served today", optionally for one provider. */
  async todayMenus(providerId?: string, pageToken?: string): Promise<MenuPage> {
    return this.listMenus({ providerId, from: "today", to: "today", pageToken });
  }

  /**
   * Most recent menu per provider and meal slot, optionally bounded by date. Ordered by
   * provider, then slot.
   */
  async latestMenus(input: LatestFilter = {}): Promise<MenuRecord[]> {
    const { providerId, mealSlot, from, to } = this.resolve(input);
    const latest = new Map<string, MenuRecord>();

    let after: SortKey | undefined;
    for (;;) {
      const batch = await this.store.list({ providerId, mealSlot, from, to, after, limit: LATEST_BATCH });
      // Ascending date order: later records replace earlier ones
      for (const record of batch) latest.set(`${record.providerId}|${record.mealSlot}`, record);

      const last = batch[batch.length - 1];
      if (batch.length < LATEST_BATCH || !last) break;
      after = sortKeyOf(last);
    }

    return [...latest.values()].sort(
      (a, b) => (a.providerId < b.providerId ? -1 : a.providerId > b.providerId ? 1 : slotRank(a.mealSlot) - slotRank(b.mealSlot))
    );
  }

  private resolve(input: Partial<MenuFilter>): ResolvedFilter {
    const parsed = MenuFilterSchema.safeParse(input);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new InvalidFilter(issue?.path.join(".") || "filter", issue?.message ?? "Invalid filter");
    }

    const today = todayIn(this.options.timeZone, this.now());
    const resolveDate = (value: string | undefined) => (value === "today" ? today : value);

    const { providerId, mealSlot, pageToken, pageSize } = parsed.data;
    const from = resolveDate(parsed.data.from);
    const to = resolveDate(parsed.data.to);
    if (from && to && from > to) {
      throw new InvalidFilter("from", `from (${from}) is after to (${to})`);
    }
    if (pageSize !== undefined && pageSize > this.options.maxPageSize) {
      throw new InvalidFilter("pageSize", `pageSize must be at most ${this.options.maxPageSize}`);
    }

    return {
      providerId,
      mealSlot,
      from,
      to,
      after: pageToken ? decodePageToken(pageToken) : undefined,
      pageSize: pageSize ?? this.options.defaultPageSize,
    };
  }

  private async fromStore(filter: ResolvedFilter): Promise<MenuPage> {
    // One extra record tells us whether another page exists
    const records = await this.store.list({ ...filter, limit: filter.pageSize + 1 });
    return toPage(records, filter.pageSize, false);
  }

  private async fromSnapshot(filter: ResolvedFilter, key: CacheKey): Promise<MenuPage> {
    const cached = this.cache.get(key);
    let records: MenuRecord[];
    let stale = false;

    if (cached.status === "fresh") {
      records = cached.snapshot.records;
    } else {
      const limit = this.options.snapshotLimit ?? SNAPSHOT_LIMIT;
      try {
        records = await this.store.list({ providerId: filter.providerId, from: key.from, to: key.to, limit });
      } catch (error) {
        if (cached.status !== "expired" || !(error instanceof StoreUnavailable)) throw error;
        log.warn(
          { key, builtAt: cached.snapshot.builtAt, error: describeError(error) },
          "Store unreachable, serving stale snapshot"
        );
        records = cached.snapshot.records;
        stale = true;
      }

      if (!stale) {
        // A full batch may be truncated: page the store directly instead
        if (records.length >= limit) {
          log.warn({ key, limit }, "Range too large for a snapshot, reading from store");
          return this.fromStore(filter);
        }
        this.cache.put(key, buildSnapshot(records, this.now()));
      }
    }

    const matching = records.filter((record) => matchesQuery(record, filter)).sort(compareRecords);
    return toPage(matching, filter.pageSize, stale);
  }
}

function toPage(records: MenuRecord[], pageSize: number, stale: boolean): MenuPage {
  const items = records.slice(0, pageSize);
  const last = items[items.length - 1];
  const nextPageToken = records.length > pageSize && last ? encodePageToken(sortKeyOf(last)) : null;
  return { items, nextPageToken, stale };
}
