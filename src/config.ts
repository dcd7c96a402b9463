import "dotenv/config";
import { readFile } from "fs/promises";
import path from "path";
import { z } from "zod";

import { isTimeZone } from "./shared/dates";
import { ConfigError } from "./shared/errors";
import { MealSlotSchema, ProviderIdSchema, VENDOR_PROVIDER_PREFIX } from "./shared/schemas";

// --- Environment ---

const Milliseconds = z.coerce.number().int().positive();
const Flag = z.enum(["true", "false"]).transform((value) => value === "true");

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  REDIS_URL: z.string().url().optional(),
  TIMEZONE: z.string().refine(isTimeZone, { message: "Unknown IANA time zone" }).default("Asia/Seoul"),
  TARGETS_FILE: z.string().default("config/targets.json"),
  CRAWL_INTERVAL_MS: Milliseconds.default(60 * 60 * 1000),
  CRAWL_ON_START: Flag.default("true"),
  CRAWL_RUN_DEADLINE_MS: Milliseconds.default(2 * 60 * 1000),
  FETCH_TIMEOUT_MS: Milliseconds.default(10_000),
  CACHE_TTL_MS: Milliseconds.default(60_000),
  CACHE_STALE_GRACE_MS: z.coerce.number().int().nonnegative().default(10 * 60 * 1000),
  CACHE_MAX_ENTRIES: z.coerce.number().int().positive().default(500),
  CACHE_MAX_SPAN_DAYS: z.coerce.number().int().positive().default(7),
  PAGE_SIZE_DEFAULT: z.coerce.number().int().positive().default(50),
  PAGE_SIZE_MAX: z.coerce.number().int().positive().default(100),
  VENDOR_API_TOKEN: z.string().min(1).optional(),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  LOG_PRETTY: Flag.default("false"),
});

export type AppConfig = z.infer<typeof EnvSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // Treat empty strings from .env files as unset
  const defined = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== ""));
  const parsed = EnvSchema.safeParse(defined);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new ConfigError(`Invalid environment: ${issues}`);
  }
  if (parsed.data.PAGE_SIZE_DEFAULT > parsed.data.PAGE_SIZE_MAX) {
    throw new ConfigError("PAGE_SIZE_DEFAULT must not exceed PAGE_SIZE_MAX");
  }
  return parsed.data;
}

// --- Crawl Targets ---

// Meal slots are resolved from labels first, then from the first HH:MM found in the label
export const SlotRulesSchema = z.object({
  labels: z.record(z.string().min(1), MealSlotSchema).default({}),
  hours: z
    .array(
      z.object({
        from: z.number().min(0).max(24),
        to: z.number().min(0).max(24),
        slot: MealSlotSchema,
      })
    )
    .default([]),
});

export type SlotRules = z.infer<typeof SlotRulesSchema>;

const CrawlProviderId = ProviderIdSchema.refine((id) => !id.startsWith(VENDOR_PROVIDER_PREFIX), {
  message: `Crawled provider ids must not use the ${VENDOR_PROVIDER_PREFIX} namespace`,
});

const IbookSectionSchema = z
  .object({
    providerId: CrawlProviderId,
    label: z.string().min(1), // e.g. "중식" or "Lunch 11:30-13:30"
    rows: z.tuple([z.number().int().positive(), z.number().int().positive()]), // 1-based, inclusive
  })
  .refine((section) => section.rows[0] <= section.rows[1], { message: "Row range is reversed" });

export const IbookTargetSchema = z.object({
  type: z.literal("ibook"),
  id: z.string().min(1),
  viewerUrl: z.string().url(),
  fileListUrl: z.string().url(),
  libraryKey: z.string().min(1).default("kpu"),
  sheet: z.number().int().positive().default(1), // 1-based worksheet index
  dateRow: z.number().int().positive(),
  dayColumns: z.array(z.number().int().positive()).nonempty(),
  sections: z.array(IbookSectionSchema).nonempty(),
  ignoreItems: z.array(z.string()).default([]),
  slotRules: SlotRulesSchema.default({}),
});

export type IbookTarget = z.infer<typeof IbookTargetSchema>;

export const JsonFeedTargetSchema = z.object({
  type: z.literal("json-feed"),
  id: z.string().min(1),
  url: z.string().url(),
  providerIds: z.array(CrawlProviderId).nonempty(),
  slotRules: SlotRulesSchema.default({}),
});

export type JsonFeedTarget = z.infer<typeof JsonFeedTargetSchema>;

export const CrawlTargetSchema = z.discriminatedUnion("type", [IbookTargetSchema, JsonFeedTargetSchema]);

export type CrawlTarget = z.infer<typeof CrawlTargetSchema>;

export function targetProviderIds(target: CrawlTarget): string[] {
  switch (target.type) {
    case "ibook":
      return [...new Set(target.sections.map((s) => s.providerId))];
    case "json-feed":
      return [...target.providerIds];
  }
}

export function parseTargets(input: unknown): CrawlTarget[] {
  const parsed = z.array(CrawlTargetSchema).safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new ConfigError(`Invalid crawl targets: ${issues}`);
  }

  // Targets must own disjoint providers so their writes never touch the same key
  const owners = new Map<string, string>();
  const ids = new Set<string>();
  for (const target of parsed.data) {
    if (ids.has(target.id)) {
      throw new ConfigError(`Duplicate crawl target id "${target.id}"`);
    }
    ids.add(target.id);
    for (const providerId of targetProviderIds(target)) {
      const owner = owners.get(providerId);
      if (owner) {
        throw new ConfigError(`Provider "${providerId}" is claimed by both "${owner}" and "${target.id}"`);
      }
      owners.set(providerId, target.id);
    }
  }
  return parsed.data;
}

export async function loadTargets(file: string): Promise<CrawlTarget[]> {
  const fullPath = path.resolve(process.cwd(), file);
  let raw: string;
  try {
    raw = await readFile(fullPath, "utf8");
  } catch (error) {
    throw new ConfigError(`Cannot read crawl targets from ${fullPath}: ${String(error)}`);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`Crawl targets file ${fullPath} is not valid JSON: ${String(error)}`);
  }
  return parseTargets(json);
}
