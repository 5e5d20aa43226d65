/**
 * Outgoing HTTP
 *
 * Requests to user-supplied hosts go through node-fetch with an
 * ssrf-req-filter agent. Callers depend on the narrow {@link HttpFetch}
 * shape so tests can hand in an in-process fake.
 */

import fetch from "node-fetch";
import ssrfFilter from "ssrf-req-filter";

export const USER_AGENT = "SiteAudit/1.0 (+technical SEO audit)";

export interface HttpResponse {
  ok: boolean;
  status: number;
  text(): Promise<string>;
}

export interface HttpRequestInit {
  headers?: Record<string, string>;
  signal?: AbortSignal;
}

export type HttpFetch = (url: string, init?: HttpRequestInit) => Promise<HttpResponse>;

/**
 * Fetch with SSRF protection, following redirects.
 */
export const safeFetch: HttpFetch = (url, init = {}) => {
  const agent = ssrfFilter(url);
  return fetch(url, {
    headers: init.headers,
    signal: init.signal,
    redirect: "follow",
    agent,
  });
};

/**
 * Fetch for fixed, trusted API hosts.
 */
export const apiFetch: HttpFetch = (url, init = {}) =>
  fetch(url, { headers: init.headers, signal: init.signal });

/**
 * GET a URL as text, aborting after `timeoutMs`. Resolves to `null` for
 * non-2xx responses.
 */
export async function fetchText(
  httpFetch: HttpFetch,
  url: string,
  timeoutMs: number,
  headers: Record<string, string> = {}
): Promise<string | null> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await httpFetch(url, {
      headers: { "User-Agent": USER_AGENT, ...headers },
      signal: controller.signal,
    });
    if (!response.ok) {
      return null;
    }
    return await response.text();
  } finally {
    clearTimeout(timeoutId);
  }
}
