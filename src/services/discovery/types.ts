import type { CrawlTarget } from "../../config";
import type { MenuDraft } from "../../shared/schemas";

/** Raw bytes of one fetched document; `body.byteLength === 0` means "no menu published". */
export interface RawContent {
  url: string;
  contentType: string | null;
  body: ArrayBuffer;
  fetchedAt: string;
}

export interface ParseContext {
  // Calendar date the crawl runs on, used to place month/day-only dates in a year
  referenceDate: string;
}

export interface DroppedDraft {
  section: string;
  reason: string;
}

export interface ParseResult {
  drafts: MenuDraft[];
  dropped: DroppedDraft[];
}

export interface FetchOptions {
  signal?: AbortSignal;
}

/**
 * One source format. `fetch` does I/O and nothing else, `parse` does no I/O at all.
 */
export interface MenuSource<T extends CrawlTarget = CrawlTarget> {
  readonly type: T["type"];
  fetch(target: T, options?: FetchOptions): Promise<RawContent>;
  parse(raw: RawContent, target: T, context: ParseContext): Promise<ParseResult>;
}
