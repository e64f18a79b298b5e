/** Default request timeout for the HTTP adapters, in milliseconds. */
export const DEFAULT_TIMEOUT_MS = 30000;

/** A fully read HTTP response. */
export interface TextResponse {
  readonly ok: boolean;
  readonly status: number;
  readonly headers: Headers;
  readonly body: string;
}

/**
 * `fetch` with an abort-on-timeout. The timer covers the response body as well
 * as the headers. Rejects with the underlying `AbortError` (or network error)
 * so adapters can map it to their own error type.
 */
export async function fetchWithTimeout(
  url: string,
  headers: Readonly<Record<string, string>>,
  timeoutMs: number,
): Promise<TextResponse> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => {
    controller.abort();
  }, timeoutMs);

  try {
    const response = await fetch(url, { headers, signal: controller.signal });
    const body = await response.text();
    return { ok: response.ok, status: response.status, headers: response.headers, body };
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Whether an RFC 8288 `Link` header carries the given relation.
 *
 * Handles several links in one header and space-separated relation lists
 * (`rel="next last"`).
 */
export function hasLinkRelation(header: string | null, relation: string): boolean {
  if (!header) return false;

  for (const link of header.split(/,(?=\s*<)/)) {
    const relMatch = /;\s*rel\s*=\s*(?:"([^"]*)"|([^\s;,]+))/i.exec(link);
    const value = relMatch?.[1] ?? relMatch?.[2];
    if (value === undefined) continue;

    const relations = value.trim().toLowerCase().split(/\s+/);
    if (relations.includes(relation.toLowerCase())) return true;
  }

  return false;
}
