import type { CrawlTarget, IbookTarget, JsonFeedTarget } from "../../config";
import { IbookSource } from "./ibook";
import { JsonFeedSource } from "./json-feed";
import type { FetchOptions, MenuSource, ParseContext, ParseResult } from "./types";

export interface SourceRegistry {
  ibook: MenuSource<IbookTarget>;
  "json-feed": MenuSource<JsonFeedTarget>;
}

export function createSourceRegistry(fetchTimeoutMs: number): SourceRegistry {
  return {
    ibook: new IbookSource(fetchTimeoutMs),
    "json-feed": new JsonFeedSource(fetchTimeoutMs),
  };
}

/**
 * Fetch then parse one target with the source its `type` selects.
 */
export async function collectTarget(
  registry: SourceRegistry,
  target: CrawlTarget,
  context: ParseContext,
  options: FetchOptions = {}
): Promise<ParseResult> {
  switch (target.type) {
    case "ibook": {
      const raw = await registry.ibook.fetch(target, options);
      return registry.ibook.parse(raw, target, context);
    }
    case "json-feed": {
      const raw = await registry["json-feed"].fetch(target, options);
      return registry["json-feed"].parse(raw, target, context);
    }
  }
}
