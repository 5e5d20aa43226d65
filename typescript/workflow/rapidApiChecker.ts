/**
 * RapidAPI page checker
 *
 * Calls the "website analyze and SEO audit" API once per check and turns its
 * loosely-shaped JSON into the check payloads. Response bodies are validated
 * with zod; anything the parsers do not understand is an UpstreamError.
 */

import { z } from "zod";
import { apiFetch, type HttpFetch } from "../shared/http.js";
import { ConfigError, UpstreamError } from "../shared/errors.js";
import { Logger, silentLogger } from "../shared/logger.js";
import { toAuditTarget } from "../shared/urlValidator.js";
import type {
  BotAccessEntry,
  BotAccessReport,
  IssueCounts,
  PageChecker,
  PerformanceMetric,
  PerformanceReport,
  Rating,
  StructuralIssue,
  StructuralReport,
} from "./checks.js";

const count = z.coerce.number().catch(0);

const StructuralResponseSchema = z
  .object({
    webtitle: z
      .object({
        title: z.string().catch(""),
        length: count,
      })
      .partial()
      .nullish(),
    metadescription: z
      .object({
        description: z.string().nullable(),
        length: count,
        suggestion: z.string(),
      })
      .partial()
      .nullish(),
    headings: z
      .object({
        h1: z.object({ count }).partial(),
        h2: z.object({ count }).partial(),
      })
      .partial()
      .nullish(),
    images: z
      .object({
        count,
        suggestion: z.string(),
      })
      .partial()
      .nullish(),
    links: z.object({ suggestion: z.string() }).partial().nullish(),
    sitemap_robots: z.array(z.string()).nullish(),
  })
  .passthrough();

const PerformanceResponseSchema = z
  .object({
    speed: z.object({ score: z.coerce.number() }),
    audit: z
      .array(
        z
          .object({
            title: z.string(),
            score: z.coerce.number().nullable().catch(null),
            displayValue: z.string().nullish(),
          })
          .passthrough()
      )
      .default([]),
  })
  .passthrough();

const BotAccessResponseSchema = z
  .object({
    ai_bots: z
      .record(z.object({ status: z.string().optional() }).passthrough())
      .nullish(),
    robots_txt: z
      .object({ disallowed_user_agents: z.array(z.string()).default([]) })
      .passthrough()
      .nullish(),
  })
  .passthrough();

export type StructuralResponse = z.infer<typeof StructuralResponseSchema>;
export type PerformanceResponse = z.infer<typeof PerformanceResponseSchema>;
export type BotAccessResponse = z.infer<typeof BotAccessResponseSchema>;

export const AI_BOTS: ReadonlyArray<Omit<BotAccessEntry, "status">> = [
  { bot_name: "GPTBot (ChatGPT)", user_agent: "GPTBot", purpose: "OpenAI ChatGPT web crawler" },
  { bot_name: "Claude-Web (Anthropic)", user_agent: "Claude-Web", purpose: "Anthropic Claude web crawler" },
  { bot_name: "PerplexityBot", user_agent: "PerplexityBot", purpose: "Perplexity AI search crawler" },
  { bot_name: "Google-Extended", user_agent: "Google-Extended", purpose: "Google Gemini crawler" },
  { bot_name: "Amazonbot", user_agent: "Amazonbot", purpose: "Amazon Alexa crawler" },
  { bot_name: "Applebot-Extended", user_agent: "Applebot-Extended", purpose: "Apple AI/Siri crawler" },
  { bot_name: "anthropic-ai", user_agent: "anthropic-ai", purpose: "Anthropic AI training" },
  { bot_name: "Bytespider", user_agent: "Bytespider", purpose: "TikTok/ByteDance crawler" },
  { bot_name: "CCBot", user_agent: "CCBot", purpose: "Common Crawl bot" },
  { bot_name: "Diffbot", user_agent: "Diffbot", purpose: "Diffbot AI crawler" },
];

const CORE_WEB_VITALS: Record<string, { name: string; description: string }> = {
  "First Contentful Paint": {
    name: "First Contentful Paint (FCP)",
    description: "Time until first text or image is painted",
  },
  "Largest Contentful Paint": {
    name: "Largest Contentful Paint (LCP)",
    description: "Time until largest text or image is painted",
  },
  "Cumulative Layout Shift": {
    name: "Cumulative Layout Shift (CLS)",
    description: "Visual stability - measures unexpected layout shifts",
  },
  "Total Blocking Time": {
    name: "Total Blocking Time (TBT)",
    description: "Time the main thread is blocked from responding",
  },
  "Speed Index": {
    name: "Speed Index",
    description: "How quickly content is visually displayed",
  },
  "Time to Interactive": {
    name: "Time to Interactive (TTI)",
    description: "Time until page is fully interactive",
  },
  "Max Potential First Input Delay": {
    name: "First Input Delay (FID)",
    description: "Maximum time to respond to user input",
  },
};

export function ratingFor(score: number): Rating {
  if (score >= 90) return "Good";
  if (score >= 50) return "Needs Improvement";
  return "Poor";
}

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.substring(0, max)}...` : text;
}

/**
 * Derive structural issues for one page from an onpagepro response.
 */
export function parseStructuralReport(data: StructuralResponse, pageUrl: string): StructuralReport {
  const page = new URL(pageUrl).pathname;
  const issues: StructuralIssue[] = [];
  const add = (issue: Omit<StructuralIssue, "page">, onPage = page) =>
    issues.push({ ...issue, page: onPage });

  const title = data.webtitle;
  if (title) {
    const length = title.length ?? 0;
    const text = title.title ?? "";
    if (length > 60) {
      add({
        type: "Title Too Long",
        severity: "medium",
        element: `<title>${truncate(text, 50)}</title>`,
        description: `Title is ${length} characters (recommended: 50-60)`,
        recommendation: "Shorten title to 50-60 characters",
      });
    } else if (length < 30) {
      add({
        type: "Title Too Short",
        severity: "medium",
        element: `<title>${text}</title>`,
        description: `Title is only ${length} characters (recommended: 50-60)`,
        recommendation: "Expand title to 50-60 characters",
      });
    }
  }

  const meta = data.metadescription;
  if (meta) {
    const length = meta.length ?? 0;
    if (!meta.description) {
      add({
        type: "Missing Meta Description",
        severity: "high",
        element: "<meta name='description'>",
        description: "Page lacks meta description for search results",
        recommendation: "Add unique 150-160 character meta description",
      });
    } else if (length < 120) {
      add({
        type: "Meta Description Too Short",
        severity: "medium",
        element: `<meta name='description' content='${truncate(meta.description, 50)}'>`,
        description: `Meta description is ${length} characters (recommended: 120-160)`,
        recommendation: meta.suggestion || "Expand to 120-160 characters",
      });
    } else if (length > 160) {
      add({
        type: "Meta Description Too Long",
        severity: "low",
        element: "<meta name='description'>",
        description: `Meta description is ${length} characters (recommended: 120-160)`,
        recommendation: "Shorten to 120-160 characters",
      });
    }
  }

  const headings = data.headings;
  if (headings) {
    const h1Count = headings.h1?.count ?? 0;
    const h2Count = headings.h2?.count ?? 0;
    if (h1Count === 0) {
      add({
        type: "Missing H1",
        severity: "high",
        element: "<h1>",
        description: "Page has no H1 heading tag",
        recommendation: "Add descriptive H1 tag with primary keyword",
      });
    } else if (h1Count > 1) {
      add({
        type: "Multiple H1 Tags",
        severity: "medium",
        element: `${h1Count} <h1> tags found`,
        description: "Page has multiple H1 tags (confuses search engines)",
        recommendation: "Use only one H1 tag per page",
      });
    }
    if (h2Count === 0) {
      add({
        type: "Missing H2 Headings",
        severity: "medium",
        element: "<h2>",
        description: "No H2 headings found for content structure",
        recommendation: "Add sub-headings (H2) to organize content",
      });
    }
  }

  const imageCount = data.images?.count ?? 0;
  if (imageCount > 30) {
    add({
      type: "Too Many Images",
      severity: "low",
      element: `${imageCount} images`,
      description: `Page has ${imageCount} images (may affect load speed)`,
      recommendation: data.images?.suggestion || "Optimize and compress images",
    });
  }

  const linkSuggestion = data.links?.suggestion ?? "";
  if (linkSuggestion.toLowerCase().includes("broken")) {
    add({
      type: "Broken Links",
      severity: "medium",
      element: "<a> links",
      description: "Page contains broken or empty links",
      recommendation: linkSuggestion,
    });
  }

  // Site-level files; reported against their own paths.
  const files = data.sitemap_robots;
  if (files) {
    if (!files.includes("sitemap.xml")) {
      add(
        {
          type: "Missing Sitemap",
          severity: "high",
          element: "sitemap.xml",
          description: "No XML sitemap found",
          recommendation: "Create and submit sitemap.xml to search engines",
        },
        "/sitemap.xml"
      );
    }
    if (!files.includes("robots.txt")) {
      add(
        {
          type: "Missing Robots.txt",
          severity: "medium",
          element: "robots.txt",
          description: "No robots.txt file found",
          recommendation: "Create robots.txt to control crawler access",
        },
        "/robots.txt"
      );
    }
  }

  const summary: IssueCounts = { total_issues: issues.length, high: 0, medium: 0, low: 0 };
  for (const issue of issues) {
    summary[issue.severity]++;
  }
  return { issues, summary };
}

/**
 * Overall score plus the Core Web Vitals entries of a speed response.
 * Per-audit scores arrive as 0-1 fractions and are scaled to 0-100.
 */
export function parsePerformanceReport(data: PerformanceResponse): PerformanceReport {
  const metrics: PerformanceMetric[] = [];

  for (const item of data.audit) {
    const known = CORE_WEB_VITALS[item.title];
    if (!known) continue;
    const raw = item.score ?? 0;
    const score = raw <= 1 ? Math.round(raw * 100) : raw;
    metrics.push({
      metric_name: known.name,
      value: item.displayValue || "N/A",
      score,
      rating: ratingFor(score),
      description: known.description,
    });
  }

  return { score: data.speed.score, core_web_vitals: metrics };
}

export function parseBotAccessReport(data: BotAccessResponse): BotAccessReport {
  const disallowed = new Set(
    (data.robots_txt?.disallowed_user_agents ?? []).map((agent) => agent.toLowerCase())
  );
  const perBot = data.ai_bots ?? {};

  const bots: BotAccessEntry[] = AI_BOTS.map((bot) => {
    const reported = perBot[bot.user_agent]?.status?.toLowerCase();
    const blocked =
      disallowed.has(bot.user_agent.toLowerCase()) ||
      reported === "blocked" ||
      reported === "disallowed";
    return { ...bot, status: blocked ? "Blocked" : "Allowed" };
  });

  const blockedCount = bots.filter((b) => b.status === "Blocked").length;
  return { bots, allowed_count: bots.length - blockedCount, blocked_count: blockedCount };
}

export interface RapidApiPageCheckerOptions {
  apiKey?: string;
  host: string;
  httpFetch?: HttpFetch;
  logger?: Logger;
}

export class RapidApiPageChecker implements PageChecker {
  private readonly apiKey?: string;
  private readonly host: string;
  private readonly httpFetch: HttpFetch;
  private readonly logger: Logger;

  constructor(options: RapidApiPageCheckerOptions) {
    this.apiKey = options.apiKey;
    this.host = options.host;
    this.httpFetch = options.httpFetch ?? apiFetch;
    this.logger = options.logger ?? silentLogger;
  }

  get configured(): boolean {
    return Boolean(this.apiKey);
  }

  async checkStructural(url: string, signal?: AbortSignal): Promise<StructuralReport> {
    const data = await this.request("onpagepro.php", { website: toAuditTarget(url) }, signal);
    const report = parseStructuralReport(this.validate(StructuralResponseSchema, data, "onpagepro"), url);
    this.logger.info(
      `Found ${report.summary.total_issues} issues: ${report.summary.high} high, ${report.summary.medium} medium, ${report.summary.low} low`,
      { url }
    );
    return report;
  }

  async checkPerformance(url: string, signal?: AbortSignal): Promise<PerformanceReport> {
    const data = await this.request("speed.php", { website: toAuditTarget(url) }, signal);
    const report = parsePerformanceReport(this.validate(PerformanceResponseSchema, data, "speed"));
    this.logger.info(`Performance score ${report.score}`, { url });
    return report;
  }

  async checkBotAccess(url: string, signal?: AbortSignal): Promise<BotAccessReport> {
    const data = await this.request("aiseo.php", { url: toAuditTarget(url) }, signal);
    const report = parseBotAccessReport(this.validate(BotAccessResponseSchema, data, "aiseo"));
    this.logger.info(`${report.allowed_count}/${report.bots.length} AI bots allowed`, { url });
    return report;
  }

  private async request(
    endpoint: string,
    params: Record<string, string>,
    signal?: AbortSignal
  ): Promise<unknown> {
    if (!this.apiKey) {
      throw new ConfigError("RAPIDAPI_KEY not configured");
    }

    const query = new URLSearchParams(params).toString();
    const response = await this.httpFetch(`https://${this.host}/${endpoint}?${query}`, {
      headers: {
        "x-rapidapi-host": this.host,
        "x-rapidapi-key": this.apiKey,
      },
      signal,
    });

    if (!response.ok) {
      throw new UpstreamError(`${endpoint} returned HTTP ${response.status}`, response.status);
    }

    const body = await response.text();
    try {
      return JSON.parse(body);
    } catch {
      throw new UpstreamError(`${endpoint} returned invalid JSON`, response.status);
    }
  }

  private validate<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown, endpoint: string): T {
    const result = schema.safeParse(data);
    if (!result.success) {
      const details = result.error.issues
        .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
        .join("; ");
      throw new UpstreamError(`${endpoint} returned an unexpected payload: ${details}`);
    }
    return result.data;
  }
}
