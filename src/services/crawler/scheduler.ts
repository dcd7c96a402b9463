import { randomUUID } from "crypto";

import type { CrawlTarget } from "../../config";
import { scopedLogger } from "../../infra/logger";
import { todayIn } from "../../shared/dates";
import { MenuServiceError, describeError } from "../../shared/errors";
import type { CrawlOutcome, CrawlReason, CrawlRun, MenuKey, TargetOutcome } from "../../shared/schemas";
import { collectTarget, type SourceRegistry } from "../discovery/sources";
import type { CacheInvalidator, Reconciler } from "../menu/reconciler";
import type { CrawlRunStore } from "./runs";

const log = scopedLogger("SERVICE", "SCHEDULER");

export interface CrawlSchedulerOptions {
  targets: CrawlTarget[];
  sources: SourceRegistry;
  reconciler: Reconciler;
  runs: CrawlRunStore;
  cache: CacheInvalidator;
  intervalMs: number;
  runDeadlineMs: number;
  timeZone: string;
  now?: () => Date;
  newRunId?: () => string;
}

export interface TriggerAck {
  runId: string;
  // True when the trigger joined a run that was already in flight
  coalesced: boolean;
  // Resolves with the finalized run; never rejects
  completion: Promise<CrawlRun>;
}

interface TargetResult {
  outcome: TargetOutcome;
  skipped: number;
  touched: MenuKey[];
}

export function aggregateOutcome(targetCount: number, outcomes: TargetOutcome[]): CrawlOutcome {
  const failed = outcomes.filter((o) => !o.ok).length;
  if (targetCount > 0 && failed === targetCount) return "failure";
  if (failed > 0 || outcomes.some((o) => o.recordErrors > 0)) return "partial";
  return "success";
}

function describeFailures(outcomes: TargetOutcome[]): string | undefined {
  const lines = outcomes.flatMap((o) => {
    if (!o.ok) return [`${o.targetId}: ${o.error ?? "failed"}`];
    if (o.recordErrors > 0) return [`${o.targetId}: ${o.recordErrors} record(s) failed to write`];
    return [];
  });
  return lines.length > 0 ? lines.join("; ") : undefined;
}

/**
 * Owns the crawl cadence. At most one run is in flight: the in-flight token is checked
 * and set synchronously in `trigger`, so concurrent triggers join the same run instead
 * of queueing another.
 */
export class CrawlScheduler {
  private timer: NodeJS.Timeout | null = null;
  private inFlight: { runId: string; completion: Promise<CrawlRun> } | null = null;
  private readonly now: () => Date;
  private readonly newRunId: () => string;

  constructor(private readonly options: CrawlSchedulerOptions) {
    this.now = options.now ?? (() => new Date());
    this.newRunId = options.newRunId ?? randomUUID;
  }

  public start({ immediate = false }: { immediate?: boolean } = {}): void {
    if (this.timer) return;
    log.info(`Crawling ${this.options.targets.length} target(s) every ${this.options.intervalMs}ms`);
    this.timer = setInterval(() => {
      this.trigger("scheduled");
    }, this.options.intervalMs);
    if (immediate) this.trigger("startup");
  }

  public stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      log.info("Stopped");
    }
  }

  public get state(): "idle" | "running" {
    return this.inFlight ? "running" : "idle";
  }

  public get currentRunId(): string | null {
    return this.inFlight?.runId ?? null;
  }

  public trigger(reason: CrawlReason = "on-demand"): TriggerAck {
    if (this.inFlight) {
      log.info(`Trigger (${reason}) coalesced into run ${this.inFlight.runId}`);
      return { ...this.inFlight, coalesced: true };
    }

    const runId = this.newRunId();
    const completion = this.execute(runId, reason).finally(() => {
      this.inFlight = null;
    });
    this.inFlight = { runId, completion };
    return { runId, completion, coalesced: false };
  }

  /** Resolves once no run is in flight. */
  public async whenIdle(): Promise<void> {
    while (this.inFlight) {
      await this.inFlight.completion;
    }
  }

  public getRun(id: string): Promise<CrawlRun | null> {
    return this.options.runs.get(id);
  }

  public recentRuns(limit = 20): Promise<CrawlRun[]> {
    return this.options.runs.recent(limit);
  }

  private async execute(runId: string, reason: CrawlReason): Promise<CrawlRun> {
    const { targets } = this.options;
    const run: CrawlRun = {
      id: runId,
      reason,
      status: "running",
      startedAt: this.now().toISOString(),
      recordsSeen: 0,
      recordsChanged: 0,
      recordsSkipped: 0,
      recordsDropped: 0,
      targets: [],
    };
    log.info(`Starting run ${runId} (${reason}) across ${targets.length} target(s)`);
    await this.saveRun(run);

    const controller = new AbortController();
    const deadline = setTimeout(() => controller.abort(), this.options.runDeadlineMs);
    const deadlineReached = new Promise<void>((resolve) => {
      controller.signal.addEventListener("abort", () => resolve(), { once: true });
    });

    // Targets own disjoint providers, so they run side by side
    const results = new Map<string, TargetResult>();
    const work = Promise.all(
      targets.map(async (target) => {
        results.set(target.id, await this.crawlTarget(target, runId, controller.signal));
      })
    );
    await Promise.race([work, deadlineReached]);
    clearTimeout(deadline);
    if (controller.signal.aborted) {
      // Fetches and writes still in flight see the aborted signal and stop
      log.warn(`Run ${runId} hit its ${this.options.runDeadlineMs}ms deadline`);
    }

    const finished = targets.map((target): TargetResult => {
      const result = results.get(target.id);
      if (result) return result;
      return {
        outcome: {
          targetId: target.id,
          ok: false,
          recordsSeen: 0,
          recordsChanged: 0,
          recordsDropped: 0,
          recordErrors: 0,
          error: `deadline of ${this.options.runDeadlineMs}ms exceeded`,
        },
        skipped: 0,
        touched: [],
      };
    });
    const outcomes = finished.map((r) => r.outcome);
    const outcome = aggregateOutcome(targets.length, outcomes);
    const final: CrawlRun = {
      ...run,
      status: "finished",
      finishedAt: this.now().toISOString(),
      outcome,
      recordsSeen: outcomes.reduce((sum, o) => sum + o.recordsSeen, 0),
      recordsChanged: outcomes.reduce((sum, o) => sum + o.recordsChanged, 0),
      recordsSkipped: finished.reduce((sum, r) => sum + r.skipped, 0),
      recordsDropped: outcomes.reduce((sum, o) => sum + o.recordsDropped, 0),
      targets: outcomes,
      ...(outcome === "success" ? {} : { errorDetail: describeFailures(outcomes) }),
    };
    await this.saveRun(final);

    // Second pass over everything this run wrote, on top of the per-record invalidation
    for (const key of finished.flatMap((r) => r.touched)) {
      this.options.cache.invalidate(key.providerId, key.servingDate);
    }

    const summary = `Run ${runId} finished: ${outcome} (seen ${final.recordsSeen}, changed ${final.recordsChanged})`;
    if (outcome === "success") log.info(summary);
    else log.warn({ errorDetail: final.errorDetail }, summary);
    return final;
  }

  private async crawlTarget(target: CrawlTarget, runId: string, signal: AbortSignal): Promise<TargetResult> {
    const base = { targetId: target.id, recordsSeen: 0, recordsChanged: 0, recordsDropped: 0, recordErrors: 0 };
    try {
      const context = { referenceDate: todayIn(this.options.timeZone, this.now()) };
      const parsed = await collectTarget(this.options.sources, target, context, { signal });
      for (const dropped of parsed.dropped) {
        log.info({ runId, targetId: target.id, section: dropped.section }, `Dropped draft: ${dropped.reason}`);
      }
      if (parsed.drafts.length === 0) {
        log.info({ runId, targetId: target.id }, "No menus published");
      }

      const reconciled = await this.options.reconciler.reconcile(parsed.drafts, { runId, signal });
      return {
        outcome: {
          ...base,
          ok: true,
          recordsSeen: reconciled.seen,
          recordsChanged: reconciled.changed,
          recordsDropped: parsed.dropped.length,
          recordErrors: reconciled.errors.length,
        },
        skipped: reconciled.skipped,
        touched: reconciled.touched,
      };
    } catch (error) {
      const code = error instanceof MenuServiceError ? error.code : "UNEXPECTED";
      log.error({ runId, targetId: target.id, code }, `Target failed: ${describeError(error)}`);
      return { outcome: { ...base, ok: false, error: describeError(error) }, skipped: 0, touched: [] };
    }
  }

  private async saveRun(run: CrawlRun): Promise<void> {
    try {
      await this.options.runs.save(run);
    } catch (error) {
      // The crawl itself still runs; only its history entry is lost
      log.error({ runId: run.id }, `Could not record run: ${describeError(error)}`);
    }
  }
}
