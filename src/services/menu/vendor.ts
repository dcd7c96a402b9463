import { scopedLogger } from "../../infra/logger";
import { OwnershipError, ReconcileError } from "../../shared/errors";
import {
  ProviderIdSchema,
  VENDOR_PROVIDER_PREFIX,
  VendorSubmissionSchema,
  type MenuRecord,
  type VendorSubmission,
} from "../../shared/schemas";
import { contentHash, describeKey, normalizeDraft } from "../discovery/normalize";
import type { CacheInvalidator } from "./reconciler";
import type { MenuStore } from "./store";

const log = scopedLogger("SERVICE", "VENDOR");

export function vendorProviderId(vendorId: string): string {
  return `${VENDOR_PROVIDER_PREFIX}${vendorId}`;
}

export interface VendorSubmitResult {
  record: MenuRecord;
  changed: boolean;
}

/**
 * Write path for vendor-managed menus. Vendors only ever write under their own
 * `vendor:` provider id, which no crawl target may claim.
 */
export class VendorMenuService {
  constructor(
    private readonly store: MenuStore,
    private readonly cache: CacheInvalidator,
    private readonly now: () => Date = () => new Date()
  ) {}

  async submit(vendorId: string, submission: VendorSubmission): Promise<VendorSubmitResult> {
    const providerId = vendorProviderId(vendorId);
    if (!ProviderIdSchema.safeParse(providerId).success) {
      throw new OwnershipError(`"${vendorId}" is not a valid vendor id`);
    }
    const draft = normalizeDraft({ providerId, ...VendorSubmissionSchema.parse(submission) });
    const hash = contentHash(draft);

    for (let attempt = 1; attempt <= 2; attempt++) {
      const current = await this.store.get(draft);
      if (current && current.source !== "vendor-submitted") {
        throw new OwnershipError(`${describeKey(draft)} is owned by the crawler`);
      }
      if (current && current.contentHash === hash) {
        return { record: current, changed: false };
      }

      const record: MenuRecord = {
        ...draft,
        source: "vendor-submitted",
        contentHash: hash,
        lastUpdatedAt: this.now().toISOString(),
        version: (current?.version ?? 0) + 1,
      };
      if (await this.store.compareAndSet(record, current?.version ?? null)) {
        this.cache.invalidate(providerId, draft.servingDate);
        log.info({ key: describeKey(draft), version: record.version }, "Vendor menu saved");
        return { record, changed: true };
      }
    }

    throw new ReconcileError(`Version conflict persisted for ${describeKey(draft)}`, draft);
  }
}
