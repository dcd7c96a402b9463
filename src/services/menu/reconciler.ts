import { scopedLogger } from "../../infra/logger";
import { MenuServiceError, ReconcileError, describeError } from "../../shared/errors";
import type { MenuDraft, MenuKey, MenuRecord } from "../../shared/schemas";
import { contentHash, describeKey, menuKeyOf, normalizeDraft, normalizeItems } from "../discovery/normalize";
import type { MenuStore } from "./store";

const log = scopedLogger("SERVICE", "RECONCILER");

export interface CacheInvalidator {
  invalidate(providerId: string, servingDate: string): void;
}

export interface ReconcileResult {
  seen: number;
  changed: number;
  skipped: number;
  errors: ReconcileError[];
  touched: MenuKey[];
}

export interface ReconcileOptions {
  runId: string;
  // Writes stop once aborted; drafts not yet written count as errors
  signal?: AbortSignal;
}

type Decision =
  | { action: "insert"; record: MenuRecord; expected: null }
  | { action: "update"; record: MenuRecord; expected: number }
  | { action: "skip"; reason: "unchanged" | "vendor-owned" };

// Drafts sharing a key within one batch describe one menu
function mergeByKey(drafts: MenuDraft[]): MenuDraft[] {
  const byKey = new Map<string, MenuDraft>();
  for (const draft of drafts) {
    const id = describeKey(draft);
    const existing = byKey.get(id);
    byKey.set(id, existing ? { ...existing, items: normalizeItems([...existing.items, ...draft.items]) } : normalizeDraft(draft));
  }
  return [...byKey.values()];
}

/**
 * Merges crawled drafts into the store. Vendor submissions always win their key and
 * unchanged content never produces a new version.
 */
export class Reconciler {
  constructor(
    private readonly store: MenuStore,
    private readonly cache: CacheInvalidator,
    private readonly now: () => Date = () => new Date()
  ) {}

  async reconcile(drafts: MenuDraft[], options: ReconcileOptions): Promise<ReconcileResult> {
    const result: ReconcileResult = { seen: 0, changed: 0, skipped: 0, errors: [], touched: [] };

    for (const draft of mergeByKey(drafts)) {
      const key = menuKeyOf(draft);
      result.seen++;

      if (options.signal?.aborted) {
        result.errors.push(new ReconcileError(`Run ${options.runId} aborted before ${describeKey(key)}`, key));
        continue;
      }

      try {
        const outcome = await this.apply(draft);
        if (outcome === "changed") {
          result.changed++;
          result.touched.push(key);
          this.cache.invalidate(key.providerId, key.servingDate);
        } else {
          result.skipped++;
        }
      } catch (error) {
        const failure =
          error instanceof ReconcileError
            ? error
            : new ReconcileError(`Writing ${describeKey(key)} failed: ${describeError(error)}`, key, { cause: error });
        log.warn({ runId: options.runId, key, code: error instanceof MenuServiceError ? error.code : undefined }, failure.message);
        result.errors.push(failure);
      }
    }

    log.info(
      { runId: options.runId, seen: result.seen, changed: result.changed, skipped: result.skipped, errors: result.errors.length },
      "Reconciled drafts"
    );
    return result;
  }

  // One optimistic retry: a conflict means someone wrote the key between our read and write
  private async apply(draft: MenuDraft): Promise<"changed" | "skipped"> {
    for (let attempt = 1; attempt <= 2; attempt++) {
      const decision = this.decide(draft, await this.store.get(draft));
      if (decision.action === "skip") {
        log.debug({ key: menuKeyOf(draft), reason: decision.reason }, "Skipped draft");
        return "skipped";
      }
      if (await this.store.compareAndSet(decision.record, decision.expected)) {
        return "changed";
      }
      log.debug({ key: menuKeyOf(draft), attempt }, "Version conflict");
    }
    throw new ReconcileError(`Version conflict persisted for ${describeKey(draft)}`, menuKeyOf(draft));
  }

  private decide(draft: MenuDraft, current: MenuRecord | null): Decision {
    const hash = contentHash(draft);
    const stamp = this.now().toISOString();

    if (!current) {
      return {
        action: "insert",
        expected: null,
        record: { ...draft, source: "crawled", contentHash: hash, lastUpdatedAt: stamp, version: 1 },
      };
    }
    if (current.source === "vendor-submitted") return { action: "skip", reason: "vendor-owned" };
    if (current.contentHash === hash) return { action: "skip", reason: "unchanged" };

    return {
      action: "update",
      expected: current.version,
      record: { ...current, items: draft.items, contentHash: hash, lastUpdatedAt: stamp, version: current.version + 1 },
    };
  }
}
