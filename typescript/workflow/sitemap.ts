/**
 * Sitemap discovery
 *
 * Tries a short list of conventional sitemap locations on the site's origin
 * and returns the page URLs of the first one that parses to a non-empty
 * list. Sitemap indexes are followed a bounded number of levels.
 */

import * as cheerio from "cheerio";
import { fetchText, safeFetch, type HttpFetch } from "../shared/http.js";
import { Logger, silentLogger } from "../shared/logger.js";
import { errorMessage } from "../shared/errors.js";

export const SITEMAP_PATHS = ["/sitemap.xml", "/sitemap_index.xml", "/sitemap/sitemap.xml"];

const MAX_INDEX_DEPTH = 2;
const MAX_CHILD_SITEMAPS = 10;
const MAX_SITEMAP_URLS = 1000;

export interface SitemapFetcher {
  /**
   * Page URLs listed for `origin`, in document order, or null when no
   * conventional location yields any.
   */
  fetch(origin: string): Promise<string[] | null>;
}

export interface ParsedSitemap {
  pages: string[];
  sitemaps: string[];
}

/**
 * Parse a `<urlset>` or `<sitemapindex>` document. Anything that is neither
 * parses to two empty lists.
 */
export function parseSitemap(xml: string): ParsedSitemap {
  const $ = cheerio.load(xml, { xmlMode: true });
  const collect = (selector: string) =>
    $(selector)
      .toArray()
      .map((elem) => $(elem).text().trim())
      .filter((loc) => loc.length > 0);

  return {
    pages: collect("urlset > url > loc"),
    sitemaps: collect("sitemapindex > sitemap > loc"),
  };
}

export interface HttpSitemapFetcherOptions {
  timeoutMs?: number;
  httpFetch?: HttpFetch;
  logger?: Logger;
}

export class HttpSitemapFetcher implements SitemapFetcher {
  private readonly timeoutMs: number;
  private readonly httpFetch: HttpFetch;
  private readonly logger: Logger;

  constructor(options: HttpSitemapFetcherOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.httpFetch = options.httpFetch ?? safeFetch;
    this.logger = options.logger ?? silentLogger;
  }

  async fetch(origin: string): Promise<string[] | null> {
    for (const path of SITEMAP_PATHS) {
      const sitemapUrl = new URL(path, origin).href;
      const pages = await this.collect(sitemapUrl, 0);
      if (pages.length > 0) {
        this.logger.info(`Found ${pages.length} URLs in ${sitemapUrl}`);
        return pages.slice(0, MAX_SITEMAP_URLS);
      }
    }
    return null;
  }

  private async collect(sitemapUrl: string, depth: number): Promise<string[]> {
    let xml: string | null;
    try {
      xml = await fetchText(this.httpFetch, sitemapUrl, this.timeoutMs, {
        Accept: "application/xml,text/xml;q=0.9,*/*;q=0.8",
      });
    } catch (error) {
      this.logger.debug(`Sitemap unavailable at ${sitemapUrl}: ${errorMessage(error)}`);
      return [];
    }
    if (xml === null) {
      this.logger.debug(`Sitemap unavailable at ${sitemapUrl}`);
      return [];
    }

    const { pages, sitemaps } = parseSitemap(xml);
    const urls = [...pages];

    if (depth < MAX_INDEX_DEPTH) {
      for (const child of sitemaps.slice(0, MAX_CHILD_SITEMAPS)) {
        if (urls.length >= MAX_SITEMAP_URLS) {
          break;
        }
        urls.push(...(await this.collect(child, depth + 1)));
      }
    }

    return urls;
  }
}
