/**
 * Site Audit Workflow
 *
 * Wires the crawl planner, the page pipeline and the aggregator around one
 * process-wide rate-limited gateway, and exposes `runAudit`, the single
 * caller-facing operation.
 */

import { loadConfig, type AppConfig } from "../shared/config.js";
import { AuditFailedError } from "../shared/errors.js";
import { Logger } from "../shared/logger.js";
import type { AuditMode } from "../shared/schemas.js";
import type { PageChecker } from "./checks.js";
import { SiteCrawlPlanner } from "./crawlPlanner.js";
import { PageAuditPipeline, type PageAuditor } from "./pageAudit.js";
import { RapidApiPageChecker } from "./rapidApiChecker.js";
import { RateLimitedGateway } from "./rateLimitedGateway.js";
import { HttpSitemapFetcher, type SitemapFetcher } from "./sitemap.js";
import {
  SiteAuditAggregator,
  type AuditPhase,
  type AuditRequest,
  type SiteAuditSummary,
} from "./siteAudit.js";

export type AuditOutcome =
  | { success: true; summary: SiteAuditSummary }
  | { success: false; error: string; pages_planned: number };

export interface AuditDependencies {
  config?: AppConfig;
  logger?: Logger;
  gateway?: RateLimitedGateway;
  checker?: PageChecker;
  sitemapFetcher?: SitemapFetcher;
  /** Replaces the per-page pipeline; `gateway` and `checker` then go unused. */
  pages?: PageAuditor;
  onPhaseChange?: (phase: AuditPhase, request: AuditRequest) => void;
}

export interface AuditOverrides {
  maxPages?: number;
  pageConcurrency?: number;
}

let sharedGateway: RateLimitedGateway | undefined;

/**
 * The gateway every audit in this process goes through. The first caller's
 * settings win.
 */
export function getSharedGateway(config: AppConfig = loadConfig(), logger?: Logger): RateLimitedGateway {
  if (!sharedGateway) {
    const log = logger ?? new Logger(config.logLevel);
    sharedGateway = new RateLimitedGateway({
      maxRequestsPerMinute: config.maxRequestsPerMinute,
      logger: log.child("gateway"),
    });
    log.info(`Initialized rate-limited gateway: ${config.maxRequestsPerMinute} requests/minute`);
  }
  return sharedGateway;
}

export function createSiteAuditor(
  deps: AuditDependencies = {},
  overrides: AuditOverrides = {}
): SiteAuditAggregator {
  const config = deps.config ?? loadConfig();
  const logger = deps.logger ?? new Logger(config.logLevel);

  const sitemapFetcher =
    deps.sitemapFetcher ??
    new HttpSitemapFetcher({ timeoutMs: config.sitemapTimeoutMs, logger: logger.child("sitemap") });

  const planner = new SiteCrawlPlanner(sitemapFetcher, {
    maxPages: overrides.maxPages ?? config.maxPages,
    logger: logger.child("planner"),
  });
  const pages = deps.pages ?? createPagePipeline(config, logger, deps);

  return new SiteAuditAggregator(planner, pages, {
    pageConcurrency: overrides.pageConcurrency ?? config.pageConcurrency,
    logger: logger.child("audit"),
    onPhaseChange: deps.onPhaseChange,
  });
}

function createPagePipeline(config: AppConfig, logger: Logger, deps: AuditDependencies): PageAuditor {
  const gateway = deps.gateway ?? getSharedGateway(config, logger);
  const checker =
    deps.checker ??
    new RapidApiPageChecker({
      apiKey: config.rapidApi.key,
      host: config.rapidApi.host,
      logger: logger.child("checker"),
    });
  return new PageAuditPipeline(checker, gateway, {
    timeoutsMs: config.checkTimeoutsMs,
    logger: logger.child("page"),
  });
}

/**
 * Audit `targetUrl` (already validated). Resolves to a failure only when no
 * page could be audited; other errors reject.
 */
export async function runAudit(
  targetUrl: string,
  mode: AuditMode,
  deps: AuditDependencies = {},
  overrides: AuditOverrides = {}
): Promise<AuditOutcome> {
  const auditor = createSiteAuditor(deps, overrides);
  try {
    const summary = await auditor.auditSite({ targetUrl, mode });
    return { success: true, summary };
  } catch (error) {
    if (error instanceof AuditFailedError) {
      return { success: false, error: error.message, pages_planned: error.pagesPlanned };
    }
    throw error;
  }
}

export type { AuditPhase, AuditRequest, SiteAuditSummary } from "./siteAudit.js";
export type { CheckKind, CheckOutcome, PageAuditResult, PageChecker } from "./checks.js";
