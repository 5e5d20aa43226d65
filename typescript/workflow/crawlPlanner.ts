/**
 * Crawl planning
 *
 * Turns an audit request into the ordered, capped list of pages to audit.
 */

import type { AuditMode } from "../shared/schemas.js";
import { Logger, silentLogger } from "../shared/logger.js";
import { errorMessage } from "../shared/errors.js";
import { isSameSite, normalizePageUrl, originOf, pageKeyOf, rootUrlOf } from "../shared/urlValidator.js";
import type { SitemapFetcher } from "./sitemap.js";

/**
 * Path fragments of the pages most worth auditing when a sitemap has more
 * URLs than the cap allows.
 */
export const PRIORITY_PATHS = [
  "/about",
  "/services",
  "/products",
  "/pricing",
  "/features",
  "/solutions",
  "/contact",
  "/blog",
];

export const DEFAULT_MAX_PAGES = 15;

export interface CrawlPlan {
  readonly targetUrl: string;
  readonly mode: AuditMode;
  readonly urls: readonly string[];
  /** Full mode fell back to the target URL because no sitemap was usable. */
  readonly sitemapFallback: boolean;
}

export interface PageSelection {
  urls: string[];
  /** Sitemap entries skipped because they belong to another site. */
  offSite: number;
}

export interface CrawlPlanner {
  plan(targetUrl: string, mode: AuditMode): Promise<CrawlPlan>;
}

export interface SiteCrawlPlannerOptions {
  maxPages?: number;
  priorityPaths?: readonly string[];
  logger?: Logger;
}

export class SiteCrawlPlanner implements CrawlPlanner {
  private readonly maxPages: number;
  private readonly priorityPaths: readonly string[];
  private readonly logger: Logger;

  constructor(
    private readonly sitemaps: SitemapFetcher,
    options: SiteCrawlPlannerOptions = {}
  ) {
    this.maxPages = Math.max(1, options.maxPages ?? DEFAULT_MAX_PAGES);
    this.priorityPaths = options.priorityPaths ?? PRIORITY_PATHS;
    this.logger = options.logger ?? silentLogger;
  }

  async plan(targetUrl: string, mode: AuditMode): Promise<CrawlPlan> {
    const single = (sitemapFallback: boolean): CrawlPlan =>
      Object.freeze({ targetUrl, mode, urls: Object.freeze([targetUrl]), sitemapFallback });

    if (mode === "single") {
      return single(false);
    }

    let listed: string[] | null;
    try {
      listed = await this.sitemaps.fetch(originOf(targetUrl));
    } catch (error) {
      this.logger.warn(`Sitemap discovery failed for ${targetUrl}: ${errorMessage(error)}`);
      listed = null;
    }

    if (listed === null) {
      this.logger.warn(`No sitemap found for ${targetUrl}, auditing the target page only`);
      return single(true);
    }

    const { urls, offSite } = this.selectPages(targetUrl, listed);
    // Sitemap resolved, but only for some other site
    const sitemapFallback = urls.length === 1 && offSite > 0;
    if (sitemapFallback) {
      this.logger.warn(
        `Sitemap for ${targetUrl} lists ${offSite} URL(s), none on this site; auditing the root page only`
      );
    } else {
      this.logger.info(`Planned ${urls.length} of ${listed.length} sitemap URLs`, { targetUrl });
    }
    return Object.freeze({ targetUrl, mode, urls: Object.freeze(urls), sitemapFallback });
  }

  /**
   * Origin root first, then priority pages, then everything else, each group
   * in sitemap order. Entries count as the same site whatever their scheme
   * or leading `www.`, and are planned as the sitemap lists them.
   *
   * The root is always planned and counts toward the cap, so a sitemap of M
   * pages that leaves the root out yields min(M + 1, cap) pages.
   */
  selectPages(targetUrl: string, listed: readonly string[]): PageSelection {
    const root = rootUrlOf(targetUrl);
    const seen = new Set<string>([pageKeyOf(root)]);
    const priority: string[] = [];
    const rest: string[] = [];
    let offSite = 0;

    for (const raw of listed) {
      const url = normalizePageUrl(raw);
      if (!url) {
        continue;
      }
      if (!isSameSite(url, root)) {
        offSite++;
        continue;
      }
      const key = pageKeyOf(url);
      if (seen.has(key)) {
        continue;
      }
      seen.add(key);
      const path = new URL(url).pathname.toLowerCase();
      if (this.priorityPaths.some((fragment) => path.includes(fragment))) {
        priority.push(url);
      } else {
        rest.push(url);
      }
    }

    return { urls: [root, ...priority, ...rest].slice(0, this.maxPages), offSite };
  }
}
