/**
 * URL Validation
 *
 * Uses validator.js for URL validation.
 * SSRF protection is handled by ssrf-req-filter at the network layer.
 */

import validator from "validator";
import { ValidationError } from "./errors.js";

export interface UrlValidationResult {
  valid: boolean;
  error?: string;
  normalizedUrl?: string;
}

const URL_OPTIONS: validator.IsURLOptions = {
  protocols: ["http", "https"],
  require_protocol: false,
  require_host: true,
  require_valid_protocol: true,
  allow_underscores: false,
  allow_protocol_relative_urls: false,
};

const MAX_URL_LENGTH = 2048;

/**
 * Validate and normalize a URL for the audit
 */
export function validateUrl(urlString: string): UrlValidationResult {
  const trimmed = urlString.trim();

  if (!trimmed) {
    return { valid: false, error: "URL is required" };
  }

  if (trimmed.length > MAX_URL_LENGTH) {
    return { valid: false, error: "URL is too long (max 2048 characters)" };
  }

  if (/\/\/[^/]*:[^/]*@/.test(trimmed)) {
    return { valid: false, error: "URLs with credentials are not allowed" };
  }

  const hasProtocol = /^[a-zA-Z][a-zA-Z0-9+.-]*:\/\//.test(trimmed);
  const normalizedUrl = hasProtocol ? trimmed : `https://${trimmed}`;

  if (!validator.isURL(normalizedUrl, URL_OPTIONS)) {
    return { valid: false, error: "Invalid URL format" };
  }

  return { valid: true, normalizedUrl };
}

/**
 * Validate and normalize a URL, throwing an error if invalid
 */
export function validateUrlOrThrow(urlString: string): string {
  const result = validateUrl(urlString);
  if (!result.valid || !result.normalizedUrl) {
    throw new ValidationError(result.error ?? "Invalid URL");
  }
  return result.normalizedUrl;
}

/**
 * `https://example.com/a/b?q=1` -> `https://example.com`
 */
export function originOf(url: string): string {
  return new URL(url).origin;
}

/**
 * The origin's root page, with a trailing slash.
 */
export function rootUrlOf(url: string): string {
  return `${originOf(url)}/`;
}

/**
 * Canonical form used to compare page URLs: no fragment, lowercase host,
 * bare origins get a trailing slash. Returns null for unparsable or
 * non-HTTP input.
 */
export function normalizePageUrl(raw: string, base?: string): string | null {
  let parsed: URL;
  try {
    parsed = new URL(raw.trim(), base);
  } catch {
    return null;
  }
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    return null;
  }
  parsed.hash = "";
  return parsed.href;
}

/**
 * Host without a leading `www.`, plus any explicit port. Sitemaps often list
 * the `www.` host or the other scheme of the site being audited.
 */
export function siteKeyOf(url: string): string {
  const parsed = new URL(url);
  const host = parsed.hostname.replace(/^www\./, "");
  return parsed.port ? `${host}:${parsed.port}` : host;
}

/**
 * Same site regardless of scheme and a leading `www.`.
 */
export function isSameSite(url: string, other: string): boolean {
  try {
    return siteKeyOf(url) === siteKeyOf(other);
  } catch {
    return false;
  }
}

/**
 * Identity of a page within its site: `http://www.example.com/a?b` and
 * `https://example.com/a?b` share one key.
 */
export function pageKeyOf(url: string): string {
  const parsed = new URL(url);
  return `${siteKeyOf(url)}${parsed.pathname}${parsed.search}`;
}

/**
 * Target string for the upstream audit API, which takes URLs without a
 * scheme: the bare host for root pages, host + path (+ query) otherwise.
 */
export function toAuditTarget(url: string): string {
  const parsed = new URL(url);
  const path = parsed.pathname === "/" ? "" : parsed.pathname;
  return `${parsed.host}${path}${parsed.search}`;
}
