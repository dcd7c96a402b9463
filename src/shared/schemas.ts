import { z } from "zod";

import { isCalendarDate } from "./dates";

// --- Date Utilities ---
// Serving dates are plain calendar dates, never timestamps
export const CalendarDateString = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, { message: "Expected a YYYY-MM-DD date" })
  .refine(isCalendarDate, { message: "Not a calendar date" });

const IsoDateTimeString = z.string().datetime({ message: "Invalid ISO 8601 date string" });

// Provider ids are compared bytewise by the store index, so keep them to plain ASCII
export const ProviderIdSchema = z
  .string()
  .regex(/^[A-Za-z0-9][A-Za-z0-9_.:-]*$/, { message: "Invalid provider id" })
  .max(64);

export const VENDOR_PROVIDER_PREFIX = "vendor:";

// --- Menu Schemas ---

export const MEAL_SLOTS = ["breakfast", "lunch", "dinner", "other"] as const;

export const MealSlotSchema = z.enum(MEAL_SLOTS);

export type MealSlot = z.infer<typeof MealSlotSchema>;

export const MenuItemSchema = z.object({
  name: z.string().min(1, "Dish name is required"),
  price: z.number().nonnegative().optional(), // In the provider's currency, e.g. 5500 (KRW)
  tags: z.array(z.string().min(1)).optional(), // Dietary tags, e.g. "vegan", "halal"
});

export type MenuItem = z.infer<typeof MenuItemSchema>;

export const MenuSourceSchema = z.enum(["crawled", "vendor-submitted"]);

export type MenuSource = z.infer<typeof MenuSourceSchema>;

// A parsed, not yet reconciled menu for one (provider, date, slot)
export const MenuDraftSchema = z.object({
  providerId: ProviderIdSchema,
  servingDate: CalendarDateString,
  mealSlot: MealSlotSchema,
  items: z.array(MenuItemSchema),
});

export type MenuDraft = z.infer<typeof MenuDraftSchema>;

export const MenuRecordSchema = MenuDraftSchema.extend({
  source: MenuSourceSchema,
  contentHash: z.string().length(64),
  lastUpdatedAt: IsoDateTimeString,
  version: z.number().int().positive(),
});

export type MenuRecord = z.infer<typeof MenuRecordSchema>;

export interface MenuKey {
  providerId: string;
  servingDate: string;
  mealSlot: MealSlot;
}

// --- Crawl Run Schemas ---

export const CrawlReasonSchema = z.enum(["scheduled", "on-demand", "startup"]);

export type CrawlReason = z.infer<typeof CrawlReasonSchema>;

export const CrawlOutcomeSchema = z.enum(["success", "partial", "failure"]);

export type CrawlOutcome = z.infer<typeof CrawlOutcomeSchema>;

export const TargetOutcomeSchema = z.object({
  targetId: z.string(),
  ok: z.boolean(),
  recordsSeen: z.number().int().nonnegative(),
  recordsChanged: z.number().int().nonnegative(),
  recordsDropped: z.number().int().nonnegative(),
  recordErrors: z.number().int().nonnegative(),
  error: z.string().optional(),
});

export type TargetOutcome = z.infer<typeof TargetOutcomeSchema>;

export const CrawlRunSchema = z.object({
  id: z.string().min(1),
  reason: CrawlReasonSchema,
  status: z.enum(["running", "finished"]),
  startedAt: IsoDateTimeString,
  finishedAt: IsoDateTimeString.optional(),
  outcome: CrawlOutcomeSchema.optional(),
  recordsSeen: z.number().int().nonnegative(),
  recordsChanged: z.number().int().nonnegative(),
  recordsSkipped: z.number().int().nonnegative(),
  recordsDropped: z.number().int().nonnegative(),
  targets: z.array(TargetOutcomeSchema),
  errorDetail: z.string().optional(),
});

export type CrawlRun = z.infer<typeof CrawlRunSchema>;

// --- Query Schemas ---

// "today" is resolved against the service timezone by the query layer
const QueryDate = z.union([CalendarDateString, z.literal("today")]);

export const MenuFilterSchema = z.object({
  providerId: ProviderIdSchema.optional(),
  from: QueryDate.optional(),
  to: QueryDate.optional(),
  mealSlot: MealSlotSchema.optional(),
  pageToken: z.string().min(1).optional(),
  pageSize: z.coerce.number().int().positive().optional(),
});

export type MenuFilter = z.infer<typeof MenuFilterSchema>;

// Last-seen sort key carried in a page token
export const SortKeySchema = z.tuple([CalendarDateString, ProviderIdSchema, MealSlotSchema]);

export type SortKey = z.infer<typeof SortKeySchema>;

export interface MenuPage {
  items: MenuRecord[];
  nextPageToken: string | null;
  stale: boolean;
}

// --- Vendor Submission Schemas ---

export const VendorSubmissionSchema = z.object({
  servingDate: CalendarDateString,
  mealSlot: MealSlotSchema,
  items: z.array(MenuItemSchema).nonempty("A menu must have at least one item"),
});

export type VendorSubmission = z.infer<typeof VendorSubmissionSchema>;
