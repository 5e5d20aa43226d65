import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { loadConfig } from "../shared/config.js";
import { silentLogger } from "../shared/logger.js";
import type { PageChecker } from "./checks.js";
import { getSharedGateway, runAudit, type AuditDependencies } from "./index.js";
import { RateLimitedGateway } from "./rateLimitedGateway.js";

function dependencies(checker: PageChecker, listed: string[] | null = null): AuditDependencies {
  return {
    config: loadConfig({}),
    logger: silentLogger,
    gateway: new RateLimitedGateway({ maxRequestsPerMinute: 100 }),
    checker,
    sitemapFetcher: { fetch: vi.fn(async () => listed) },
  };
}

const workingChecker: PageChecker = {
  checkStructural: async () => ({ issues: [], summary: { total_issues: 0, high: 0, medium: 0, low: 0 } }),
  checkPerformance: async () => ({ score: 64, core_web_vitals: [] }),
  checkBotAccess: async () => ({ bots: [], allowed_count: 0, blocked_count: 0 }),
};

describe("runAudit", () => {
  it("audits a single page", async () => {
    const outcome = await runAudit("https://example.com/pricing", "single", dependencies(workingChecker));

    expect(outcome.success).toBe(true);
    if (outcome.success) {
      expect(outcome.summary.url).toBe("https://example.com/pricing");
      expect(outcome.summary.total_pages_audited).toBe(1);
      expect(outcome.summary.aggregate_metrics.average_performance_score).toBe(64);
    }
  });

  it("applies the page cap override to full audits", async () => {
    const listed = Array.from({ length: 8 }, (_, i) => `https://example.com/post-${i}`);
    const outcome = await runAudit(
      "https://example.com/",
      "full",
      dependencies(workingChecker, listed),
      { maxPages: 3, pageConcurrency: 2 }
    );

    expect(outcome.success && outcome.summary.per_page_results.map((p) => p.url)).toEqual([
      "https://example.com/",
      "https://example.com/post-0",
      "https://example.com/post-1",
    ]);
  });

  it("falls back to the target page when no sitemap is found", async () => {
    const outcome = await runAudit("https://example.com/", "full", dependencies(workingChecker, null));

    expect(outcome.success && outcome.summary.sitemap_fallback).toBe(true);
  });

  it("still summarizes pages whose checks all failed", async () => {
    const failing: PageChecker = {
      checkStructural: async () => {
        throw new Error("down");
      },
      checkPerformance: async () => {
        throw new Error("down");
      },
      checkBotAccess: async () => {
        throw new Error("down");
      },
    };

    const outcome = await runAudit("https://example.com/", "single", dependencies(failing));

    expect(outcome.success && outcome.summary.status_counts).toEqual({ success: 0, partial: 0, failed: 1 });
  });

  it("reports a failure when every page audit crashed", async () => {
    const listed = ["https://example.com/about", "https://example.com/blog"];
    const outcome = await runAudit("https://example.com/", "full", {
      ...dependencies(workingChecker, listed),
      pages: {
        auditPage: async () => {
          throw new Error("worker crashed");
        },
      },
    });

    expect(outcome).toEqual({ success: false, error: "No pages could be audited", pages_planned: 3 });
  });

  it("rethrows other errors", async () => {
    const deps: AuditDependencies = {
      ...dependencies(workingChecker),
      onPhaseChange: (phase) => {
        if (phase === "planning") throw new Error("listener broke");
      },
    };

    await expect(runAudit("https://example.com/", "single", deps)).rejects.toThrow("listener broke");
  });
});

describe("shared gateway", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("puts concurrent audits under one upstream budget", async () => {
    const config = loadConfig({ AUDIT_MAX_REQUESTS_PER_MINUTE: "4" });
    const start = Date.now();
    const calledAt: number[] = [];
    const recorded = <T>(value: T) => async () => {
      calledAt.push(Date.now() - start);
      return value;
    };
    const checker: PageChecker = {
      checkStructural: recorded({ issues: [], summary: { total_issues: 0, high: 0, medium: 0, low: 0 } }),
      checkPerformance: recorded({ score: 70, core_web_vitals: [] }),
      checkBotAccess: recorded({ bots: [], allowed_count: 0, blocked_count: 0 }),
    };
    const deps: AuditDependencies = {
      config,
      logger: silentLogger,
      checker,
      sitemapFetcher: { fetch: async () => null },
    };

    const both = Promise.all([
      runAudit("https://example.com/", "single", deps),
      runAudit("https://example.org/", "single", deps),
    ]);
    await vi.advanceTimersByTimeAsync(0);
    expect(calledAt).toHaveLength(4);

    await vi.advanceTimersByTimeAsync(60_000);
    const outcomes = await both;

    expect(outcomes.every((o) => o.success)).toBe(true);
    expect(calledAt).toEqual([0, 0, 0, 0, 60_000, 60_000]);
    const gateway = getSharedGateway(config);
    expect(getSharedGateway()).toBe(gateway);
    expect(gateway.maxRequestsPerMinute).toBe(4);
    expect(gateway.currentRate()).toBe(2);
  });
});
