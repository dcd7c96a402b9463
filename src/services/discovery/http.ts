import { SourceUnavailable, describeError } from "../../shared/errors";
import type { RawContent } from "./types";

const USER_AGENT = "campus-meal-service/0.1 (+menu crawler)";

export interface HttpRequest {
  targetId: string;
  url: string;
  method?: "GET" | "POST";
  headers?: Record<string, string>;
  form?: Record<string, string>;
  // Content-type prefixes accepted for the response; any type when omitted
  accept?: string[];
  timeoutMs: number;
  signal?: AbortSignal;
}

/**
 * Single bounded request. Never retries: the next scheduled cycle is the retry.
 */
export async function fetchRaw(request: HttpRequest): Promise<RawContent> {
  const timeout = AbortSignal.timeout(request.timeoutMs);
  const signal = request.signal ? AbortSignal.any([request.signal, timeout]) : timeout;

  let response: Response;
  try {
    response = await fetch(request.url, {
      method: request.method ?? "GET",
      headers: {
        "User-Agent": USER_AGENT,
        ...(request.form ? { "Content-Type": "application/x-www-form-urlencoded; charset=UTF-8" } : {}),
        ...request.headers,
      },
      body: request.form ? new URLSearchParams(request.form).toString() : undefined,
      signal,
    });
  } catch (error) {
    const reason = timeout.aborted ? `timed out after ${request.timeoutMs}ms` : describeError(error);
    throw new SourceUnavailable(`Request to ${request.url} failed: ${reason}`, request.targetId, request.url, {
      cause: error,
    });
  }

  if (!response.ok) {
    throw new SourceUnavailable(
      `HTTP ${response.status} ${response.statusText} for ${request.url}`,
      request.targetId,
      request.url,
      { status: response.status }
    );
  }

  const contentType = response.headers.get("content-type");
  if (request.accept && contentType) {
    const type = contentType.toLowerCase();
    if (!request.accept.some((prefix) => type.startsWith(prefix))) {
      throw new SourceUnavailable(
        `Unexpected content type "${contentType}" for ${request.url}`,
        request.targetId,
        request.url,
        { status: response.status }
      );
    }
  }

  let body: ArrayBuffer;
  try {
    body = await response.arrayBuffer();
  } catch (error) {
    throw new SourceUnavailable(`Reading ${request.url} failed: ${describeError(error)}`, request.targetId, request.url, {
      cause: error,
    });
  }

  return { url: request.url, contentType, body, fetchedAt: new Date().toISOString() };
}

export function decodeText(raw: RawContent): string {
  return new TextDecoder("utf-8").decode(raw.body);
}
