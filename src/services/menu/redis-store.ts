import type Redis from "ioredis";

import { scopedLogger } from "../../infra/logger";
import { StoreUnavailable, describeError } from "../../shared/errors";
import { MEAL_SLOTS, MenuRecordSchema, type MenuKey, type MenuRecord, type SortKey } from "../../shared/schemas";
import { matchesQuery, slotRank, sortKeyOf, type MenuStore, type StoreQuery } from "./store";

const log = scopedLogger("SERVICE", "MENU-STORE");

const KEY_PREFIX = "meal:menu";
const INDEX_KEY = `${KEY_PREFIX}:index`;
const SCAN_BATCH = 200;

// KEYS[1] record, KEYS[2] index; ARGV[1] record JSON, ARGV[2] expected version (-1: absent), ARGV[3] index member
const COMPARE_AND_SET = `
local current = redis.call('GET', KEYS[1])
local expected = tonumber(ARGV[2])
if current then
  if cjson.decode(current).version ~= expected then return 0 end
elseif expected ~= -1 then
  return 0
end
redis.call('SET', KEYS[1], ARGV[1])
redis.call('ZADD', KEYS[2], 0, ARGV[3])
return 1
`;

export function recordKey(key: MenuKey): string {
  return `${KEY_PREFIX}:${key.providerId}:${key.servingDate}:${key.mealSlot}`;
}

/**
 * Index members sort bytewise in menu order: the space separator sorts below every
 * character a provider id may contain, so "P1" sorts before "P10".
 */
export function indexMember(key: SortKey): string {
  return `${key[0]} ${key[1]} ${slotRank(key[2])}`;
}

function keyFromMember(member: string): MenuKey | null {
  const [servingDate, providerId, rank] = member.split(" ");
  const mealSlot = MEAL_SLOTS[Number(rank)];
  if (!servingDate || !providerId || !mealSlot) return null;
  return { servingDate, providerId, mealSlot };
}

function decodeRecord(raw: string | null): MenuRecord | null {
  if (raw === null) return null;
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    log.warn("Ignoring stored record that is not JSON");
    return null;
  }
  const parsed = MenuRecordSchema.safeParse(json);
  if (!parsed.success) {
    log.warn({ issues: parsed.error.issues }, "Ignoring malformed stored record");
    return null;
  }
  return parsed.data;
}

export class RedisMenuStore implements MenuStore {
  constructor(private readonly redis: Redis) {}

  async get(key: MenuKey): Promise<MenuRecord | null> {
    const raw = await this.call("get", () => this.redis.get(recordKey(key)));
    return decodeRecord(raw);
  }

  async compareAndSet(record: MenuRecord, expectedVersion: number | null): Promise<boolean> {
    const result = await this.call("compareAndSet", () =>
      this.redis.eval(
        COMPARE_AND_SET,
        2,
        recordKey(record),
        INDEX_KEY,
        JSON.stringify(record),
        String(expectedVersion ?? -1),
        indexMember(sortKeyOf(record))
      )
    );
    return result === 1;
  }

  async list(query: StoreQuery): Promise<MenuRecord[]> {
    const results: MenuRecord[] = [];
    let min = this.lowerBound(query);
    const max = query.to ? `(${query.to}!` : "+";

    while (results.length < query.limit) {
      const members = await this.call("list", () =>
        this.redis.zrangebylex(INDEX_KEY, min, max, "LIMIT", 0, SCAN_BATCH)
      );
      if (members.length === 0) break;

      const keys = members.map(keyFromMember).filter((key): key is MenuKey => key !== null);
      const candidates = keys.filter((key) => !query.providerId || key.providerId === query.providerId);
      if (candidates.length > 0) {
        const raws = await this.call("list", () => this.redis.mget(candidates.map(recordKey)));
        for (const raw of raws) {
          const record = decodeRecord(raw);
          if (record && matchesQuery(record, query)) results.push(record);
          if (results.length === query.limit) break;
        }
      }

      if (members.length < SCAN_BATCH) break;
      min = `(${members[members.length - 1]}`;
    }

    return results;
  }

  private lowerBound(query: StoreQuery): string {
    if (query.after && (!query.from || query.after[0] >= query.from)) {
      return `(${indexMember(query.after)}`;
    }
    return query.from ? `[${query.from}` : "-";
  }

  private async call<T>(operation: string, command: () => Promise<T>): Promise<T> {
    try {
      return await command();
    } catch (error) {
      throw new StoreUnavailable(`Redis ${operation} failed: ${describeError(error)}`, { cause: error });
    }
  }
}
