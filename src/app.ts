import cors from "cors";
import express, { type NextFunction, type Request, type Response } from "express";
import { z } from "zod";

import { scopedLogger } from "./infra/logger";
import { InvalidFilter, MenuServiceError, OwnershipError, StoreUnavailable, describeError } from "./shared/errors";
import { MealSlotSchema, VendorSubmissionSchema, type MenuFilter } from "./shared/schemas";
import type { CrawlScheduler } from "./services/crawler/scheduler";
import type { QueryService } from "./services/menu/query";
import type { VendorMenuService } from "./services/menu/vendor";

const log = scopedLogger("API");

export interface AppDeps {
  query: QueryService;
  scheduler: CrawlScheduler;
  vendors: VendorMenuService;
  vendorToken?: string;
}

const MenuQuerySchema = z.object({
  provider: z.string().optional(),
  from: z.string().optional(),
  to: z.string().optional(),
  date: z.string().optional(), // Shorthand for from = to = date
  meal: MealSlotSchema.optional(),
  pageToken: z.string().optional(),
  pageSize: z.coerce.number().int().positive().optional(),
});

function toMenuFilter(query: unknown): Partial<MenuFilter> {
  const parsed = MenuQuerySchema.safeParse(query);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new InvalidFilter(issue?.path.join(".") || "query", issue?.message ?? "Invalid query");
  }
  const { provider, from, to, date, meal, pageToken, pageSize } = parsed.data;
  if (date && (from || to)) {
    throw new InvalidFilter("date", "Use either date or from/to");
  }
  return {
    providerId: provider,
    from: date ?? from,
    to: date ?? to,
    mealSlot: meal,
    pageToken,
    pageSize,
  };
}

// Express 4 does not forward rejected promises to the error handler
const handle =
  (fn: (req: Request, res: Response) => Promise<void>) =>
  (req: Request, res: Response, next: NextFunction): void => {
    fn(req, res).catch(next);
  };

export function createApp(deps: AppDeps): express.Express {
  const app = express();
  app.use(cors({ origin: true, allowedHeaders: ["Content-Type", "Authorization"] }));
  app.use(express.json({ limit: "256kb" }));

  app.get("/", (_req, res) => {
    res.json({
      status: "online",
      service: "Campus Meal Service",
      endpoints: ["/menus", "/menus/today", "/menus/latest", "/crawl-runs", "/vendors/:vendorId/menus"],
      crawler: deps.scheduler.state,
      timestamp: new Date().toISOString(),
    });
  });

  app.get(
    "/menus",
    handle(async (req, res) => {
      log.debug({ query: req.query }, "GET /menus");
      res.json(await deps.query.listMenus(toMenuFilter(req.query)));
    })
  );

  app.get(
    "/menus/today",
    handle(async (req, res) => {
      const { providerId, pageToken } = toMenuFilter({ provider: req.query.provider, pageToken: req.query.pageToken });
      res.json(await deps.query.todayMenus(providerId, pageToken));
    })
  );

  app.get(
    "/menus/latest",
    handle(async (req, res) => {
      const { providerId, mealSlot, from, to } = toMenuFilter(req.query);
      res.json({ items: await deps.query.latestMenus({ providerId, mealSlot, from, to }) });
    })
  );

  app.post("/crawl-runs", (_req, res) => {
    const { runId, coalesced } = deps.scheduler.trigger("on-demand");
    log.info(`POST /crawl-runs -> ${runId}${coalesced ? " (already running)" : ""}`);
    res.status(202).json({ runId, coalesced });
  });

  app.get(
    "/crawl-runs",
    handle(async (_req, res) => {
      res.json({ runs: await deps.scheduler.recentRuns() });
    })
  );

  app.get(
    "/crawl-runs/:id",
    handle(async (req, res) => {
      const run = await deps.scheduler.getRun(req.params.id);
      if (!run) {
        res.status(404).json({ error: "Crawl run not found" });
        return;
      }
      res.json(run);
    })
  );

  app.put(
    "/vendors/:vendorId/menus",
    handle(async (req, res) => {
      if (!deps.vendorToken) {
        res.status(404).json({ error: "Vendor submissions are disabled" });
        return;
      }
      if (req.get("authorization") !== `Bearer ${deps.vendorToken}`) {
        res.status(401).json({ error: "Unauthorized" });
        return;
      }

      const body = VendorSubmissionSchema.safeParse(req.body);
      if (!body.success) {
        res.status(400).json({ error: "Invalid menu", details: body.error.issues });
        return;
      }

      const { record, changed } = await deps.vendors.submit(req.params.vendorId, body.data);
      res.json({ record, changed });
    })
  );

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof InvalidFilter) {
      res.status(400).json({ error: err.message, code: err.code, field: err.field });
      return;
    }
    if (err instanceof OwnershipError) {
      res.status(403).json({ error: err.message, code: err.code });
      return;
    }
    if (err instanceof StoreUnavailable) {
      log.error({ path: req.path }, err.message);
      res.status(503).json({ error: "Menu store unavailable", code: err.code });
      return;
    }

    log.error({ path: req.path, code: err instanceof MenuServiceError ? err.code : undefined }, describeError(err));
    res.status(500).json({ error: "Internal error", code: "INTERNAL_ERROR" });
  });

  return app;
}
