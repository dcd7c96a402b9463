import { load } from "cheerio";
import ExcelJS from "exceljs";

import type { IbookTarget } from "../../config";
import { ParseError, SourceUnavailable, describeError } from "../../shared/errors";
import { resolveServingDate } from "../../shared/dates";
import type { MenuDraft } from "../../shared/schemas";
import { decodeText, fetchRaw } from "./http";
import { normalizeDishName, resolveMealSlot } from "./normalize";
import type { DroppedDraft, FetchOptions, MenuSource, ParseContext, ParseResult, RawContent } from "./types";

const SPREADSHEET_TYPES = [
  "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet",
  "application/octet-stream",
  "application/zip",
];

const BOOKCODE_PATTERN = /var\s+bookcode\s*=\s*['"]([^'"]+)['"]/;

// --- Fetch Helpers (viewer page -> file list -> spreadsheet) ---

export function extractBookcode(viewerHtml: string): string | null {
  return BOOKCODE_PATTERN.exec(viewerHtml)?.[1] ?? null;
}

/**
 * Picks the first published file from the file-list XML. Files without an explicit
 * `file_url` live under the content host's bookcode-derived path.
 */
export function resolveFileUrl(fileListXml: string): string | null {
  const $ = load(fileListXml, { xml: true });
  const file = $("file").first();
  if (file.length === 0) return null;

  const explicit = file.attr("file_url");
  if (explicit) return explicit;

  const name = file.attr("name");
  const host = file.attr("host");
  const bookcode = file.parent().attr("bookcode");
  if (!name || !host || !bookcode) return null;
  return `https://${host}/contents/${bookcode[0]}/${bookcode.slice(0, 3)}/${bookcode}/raw/${name}`;
}

export class IbookSource implements MenuSource<IbookTarget> {
  public readonly type = "ibook" as const;

  constructor(private readonly timeoutMs: number) {}

  async fetch(target: IbookTarget, options: FetchOptions = {}): Promise<RawContent> {
    const common = { targetId: target.id, timeoutMs: this.timeoutMs, signal: options.signal };

    const viewer = await fetchRaw({ ...common, url: target.viewerUrl, accept: ["text/html"] });
    const bookcode = extractBookcode(decodeText(viewer));
    if (!bookcode) {
      throw new SourceUnavailable(`No bookcode on viewer page ${target.viewerUrl}`, target.id, target.viewerUrl);
    }

    const fileList = await fetchRaw({
      ...common,
      url: target.fileListUrl,
      method: "POST",
      form: { key: target.libraryKey, bookcode, base64: "N" },
      headers: {
        Origin: new URL(target.viewerUrl).origin,
        Referer: target.viewerUrl,
        "X-Requested-With": "XMLHttpRequest",
      },
    });
    const fileUrl = resolveFileUrl(decodeText(fileList));
    if (!fileUrl) {
      throw new SourceUnavailable(`No menu file listed for bookcode ${bookcode}`, target.id, target.fileListUrl);
    }

    return fetchRaw({ ...common, url: fileUrl, accept: SPREADSHEET_TYPES });
  }

  async parse(raw: RawContent, target: IbookTarget, context: ParseContext): Promise<ParseResult> {
    if (raw.body.byteLength === 0) return { drafts: [], dropped: [] };

    const workbook = new ExcelJS.Workbook();
    try {
      await workbook.xlsx.load(raw.body);
    } catch (error) {
      throw new ParseError("workbook", "an .xlsx spreadsheet", describeError(error));
    }

    const sheet = workbook.worksheets[target.sheet - 1];
    if (!sheet) {
      throw new ParseError(`sheet ${target.sheet}`, "a worksheet", `workbook has ${workbook.worksheets.length}`);
    }

    const cellText = (row: number, column: number): string => {
      const cell = sheet.getRow(row).getCell(column);
      // Date cells carry no zone: their UTC parts are the calendar date
      if (cell.value instanceof Date) return cell.value.toISOString().slice(0, 10);
      return cell.text.trim();
    };

    const headers = target.dayColumns.map((column) => ({ column, text: cellText(target.dateRow, column) }));
    if (headers.every((header) => header.text === "")) {
      throw new ParseError(
        `date row ${target.dateRow}`,
        `date headers in columns ${target.dayColumns.join(", ")}`
      );
    }

    const drafts: MenuDraft[] = [];
    const dropped: DroppedDraft[] = [];
    const ignored = new Set(target.ignoreItems.map(normalizeDishName));

    for (const { column, text } of headers) {
      if (text === "") continue; // Weekday without a published menu

      const servingDate = resolveServingDate(text, context.referenceDate);
      if (!servingDate) {
        dropped.push({ section: `column ${column}`, reason: `unresolvable date "${text}"` });
        continue;
      }

      for (const section of target.sections) {
        const items: string[] = [];
        for (let row = section.rows[0]; row <= section.rows[1]; row++) {
          // One cell can hold several dishes on separate lines
          for (const line of cellText(row, column).split(/\r?\n/)) {
            const name = normalizeDishName(line);
            if (name && !ignored.has(name)) items.push(name);
          }
        }

        if (items.length === 0) {
          dropped.push({
            section: `${section.providerId} ${section.label} ${servingDate}`,
            reason: "no items listed",
          });
          continue;
        }

        drafts.push({
          providerId: section.providerId,
          servingDate,
          mealSlot: resolveMealSlot(section.label, target.slotRules),
          items: items.map((name) => ({ name })),
        });
      }
    }

    return { drafts, dropped };
  }
}
