/**
 * Site audit aggregation
 *
 * Plans the crawl, audits the planned pages under a local concurrency bound
 * and merges the page results into one summary. The concurrency bound is
 * separate from the upstream rate limit: it caps open work per audit, while
 * the gateway caps upstream calls across the whole process.
 */

import pLimit from "p-limit";
import type { AuditMode } from "../shared/schemas.js";
import { AuditFailedError, errorMessage } from "../shared/errors.js";
import { Logger, silentLogger } from "../shared/logger.js";
import {
  CHECK_KINDS,
  type CheckKind,
  type PageAuditResult,
  type PageStatus,
  type Severity,
} from "./checks.js";
import type { CrawlPlan, CrawlPlanner } from "./crawlPlanner.js";
import type { PageAuditor } from "./pageAudit.js";

export const DEFAULT_PAGE_CONCURRENCY = 5;
export const MAX_COMMON_ISSUES = 10;

export interface AuditRequest {
  readonly targetUrl: string;
  readonly mode: AuditMode;
}

export type AuditPhase = "planning" | "auditing" | "aggregating" | "done" | "failed";

export interface CommonIssue {
  type: string;
  severity: Severity;
  count: number;
  example_page: string;
  recommendation: string;
}

export interface DegradedPage {
  url: string;
  status: "error" | "timeout";
  error_message: string;
}

export interface AggregateMetrics {
  /** Mean over pages whose performance check succeeded; null when none did. */
  average_performance_score: number | null;
  performance_pages_scored: number;
  total_issues: number;
  high_issues: number;
  medium_issues: number;
  low_issues: number;
  bots_checked: number;
  bots_allowed: number;
  bots_blocked: number;
}

export interface SiteAuditSummary {
  url: string;
  mode: AuditMode;
  total_pages_planned: number;
  total_pages_audited: number;
  sitemap_fallback: boolean;
  status_counts: Record<PageStatus, number>;
  aggregate_metrics: AggregateMetrics;
  top_common_issues: CommonIssue[];
  /** Pages whose check of the given kind errored or timed out. */
  degraded: Record<CheckKind, DegradedPage[]>;
  per_page_results: PageAuditResult[];
}

export interface SiteAuditAggregatorOptions {
  pageConcurrency?: number;
  logger?: Logger;
  onPhaseChange?: (phase: AuditPhase, request: AuditRequest) => void;
}

export class SiteAuditAggregator {
  private readonly pageConcurrency: number;
  private readonly logger: Logger;
  private readonly onPhaseChange?: (phase: AuditPhase, request: AuditRequest) => void;

  constructor(
    private readonly planner: CrawlPlanner,
    private readonly pages: PageAuditor,
    options: SiteAuditAggregatorOptions = {}
  ) {
    this.pageConcurrency = Math.max(1, options.pageConcurrency ?? DEFAULT_PAGE_CONCURRENCY);
    this.logger = options.logger ?? silentLogger;
    this.onPhaseChange = options.onPhaseChange;
  }

  /**
   * Audit every planned page and summarize. Rejects with AuditFailedError
   * when no page produced a result.
   */
  async auditSite(request: AuditRequest): Promise<SiteAuditSummary> {
    this.enter("planning", request);
    let plan: CrawlPlan;
    try {
      plan = await this.planner.plan(request.targetUrl, request.mode);
    } catch (error) {
      this.enter("failed", request);
      throw error;
    }

    this.enter("auditing", request);
    this.logger.info(`Auditing ${plan.urls.length} page(s) for ${request.targetUrl}`, {
      pageConcurrency: this.pageConcurrency,
    });
    const limit = pLimit(this.pageConcurrency);
    const settled = await Promise.allSettled(
      plan.urls.map((url) => limit(() => this.pages.auditPage(url)))
    );

    const results: PageAuditResult[] = [];
    settled.forEach((result, index) => {
      if (result.status === "fulfilled") {
        results.push(result.value);
      } else {
        this.logger.error(`Dropping ${plan.urls[index]}: ${errorMessage(result.reason)}`);
      }
    });

    if (results.length === 0) {
      this.enter("failed", request);
      throw new AuditFailedError(plan.urls.length);
    }

    this.enter("aggregating", request);
    const summary = summarizePages(request, plan.urls.length, results, plan.sitemapFallback);
    this.enter("done", request);
    this.logger.info(
      `Audit of ${request.targetUrl} done: ${summary.total_pages_audited}/${summary.total_pages_planned} pages`
    );
    return summary;
  }

  private enter(phase: AuditPhase, request: AuditRequest): void {
    this.logger.debug(`Audit ${request.targetUrl} -> ${phase}`);
    this.onPhaseChange?.(phase, request);
  }
}

/**
 * Merge page results, given in plan order, into the site summary.
 */
export function summarizePages(
  request: AuditRequest,
  pagesPlanned: number,
  results: PageAuditResult[],
  sitemapFallback = false
): SiteAuditSummary {
  const statusCounts: Record<PageStatus, number> = { success: 0, partial: 0, failed: 0 };
  const degraded: Record<CheckKind, DegradedPage[]> = {
    structural: [],
    performance: [],
    bot_access: [],
  };
  const metrics: AggregateMetrics = {
    average_performance_score: null,
    performance_pages_scored: 0,
    total_issues: 0,
    high_issues: 0,
    medium_issues: 0,
    low_issues: 0,
    bots_checked: 0,
    bots_allowed: 0,
    bots_blocked: 0,
  };
  const issueTally = new Map<string, CommonIssue>();
  let scoreTotal = 0;
  let botsCounted = false;

  for (const page of results) {
    statusCounts[page.status]++;

    for (const kind of CHECK_KINDS) {
      const outcome = page.outcomes[kind];
      if (outcome.status !== "success") {
        degraded[kind].push({
          url: page.url,
          status: outcome.status,
          error_message: outcome.error_message,
        });
      }
    }

    const { performance, structural, bot_access: botAccess } = page.outcomes;

    if (performance.status === "success") {
      scoreTotal += performance.payload.score;
      metrics.performance_pages_scored++;
    }

    if (structural.status === "success") {
      const counts = structural.payload.summary;
      metrics.total_issues += counts.total_issues;
      metrics.high_issues += counts.high;
      metrics.medium_issues += counts.medium;
      metrics.low_issues += counts.low;

      for (const issue of structural.payload.issues) {
        const seen = issueTally.get(issue.type);
        if (seen) {
          seen.count++;
        } else {
          issueTally.set(issue.type, {
            type: issue.type,
            severity: issue.severity,
            count: 1,
            example_page: page.url,
            recommendation: issue.recommendation,
          });
        }
      }
    }

    // Bot access is a site-wide property: the first successful check wins.
    if (!botsCounted && botAccess.status === "success") {
      metrics.bots_checked = botAccess.payload.bots.length;
      metrics.bots_allowed = botAccess.payload.allowed_count;
      metrics.bots_blocked = botAccess.payload.blocked_count;
      botsCounted = true;
    }
  }

  if (metrics.performance_pages_scored > 0) {
    metrics.average_performance_score =
      Math.round((scoreTotal / metrics.performance_pages_scored) * 10) / 10;
  }

  // Array.prototype.sort is stable, so ties keep first-seen order.
  const topCommonIssues = [...issueTally.values()]
    .sort((a, b) => b.count - a.count)
    .slice(0, MAX_COMMON_ISSUES);

  return {
    url: request.targetUrl,
    mode: request.mode,
    total_pages_planned: pagesPlanned,
    total_pages_audited: results.length,
    sitemap_fallback: sitemapFallback,
    status_counts: statusCounts,
    aggregate_metrics: metrics,
    top_common_issues: topCommonIssues,
    degraded,
    per_page_results: results,
  };
}
