/**
 * Runtime configuration
 *
 * Read from environment variables (entry points load `.env` through
 * `dotenv/config` before calling {@link loadConfig}).
 */

import { z } from "zod";
import { ConfigError } from "./errors.js";

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const EnvSchema = z.object({
  RAPIDAPI_KEY: z.string().trim().optional(),
  RAPIDAPI_HOST: z
    .string()
    .trim()
    .min(1)
    .default("website-analyze-and-seo-audit-pro.p.rapidapi.com"),
  AUDIT_MAX_REQUESTS_PER_MINUTE: positiveInt(50),
  AUDIT_MAX_PAGES: positiveInt(15).pipe(z.number().max(100)),
  AUDIT_PAGE_CONCURRENCY: positiveInt(5).pipe(z.number().max(50)),
  AUDIT_STRUCTURAL_TIMEOUT_MS: positiveInt(30_000),
  AUDIT_PERFORMANCE_TIMEOUT_MS: positiveInt(60_000),
  AUDIT_BOT_ACCESS_TIMEOUT_MS: positiveInt(15_000),
  SITEMAP_TIMEOUT_MS: positiveInt(10_000),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
  PORT: positiveInt(5001),
  FRONTEND_URL: z.string().trim().optional(),
});

export interface CheckTimeouts {
  structural: number;
  performance: number;
  bot_access: number;
}

export interface AppConfig {
  rapidApi: {
    key?: string;
    host: string;
  };
  maxRequestsPerMinute: number;
  maxPages: number;
  pageConcurrency: number;
  checkTimeoutsMs: CheckTimeouts;
  sitemapTimeoutMs: number;
  logLevel: z.infer<typeof EnvSchema>["LOG_LEVEL"];
  port: number;
  frontendUrl?: string;
}

// Empty strings in .env files mean "unset"
function withoutBlanks(env: NodeJS.ProcessEnv): Record<string, string> {
  const entries = Object.entries(env).filter(
    (entry): entry is [string, string] => typeof entry[1] === "string" && entry[1].trim() !== ""
  );
  return Object.fromEntries(entries);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = EnvSchema.safeParse(withoutBlanks(env));
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${details}`);
  }
  const parsed = result.data;

  return {
    rapidApi: {
      key: parsed.RAPIDAPI_KEY,
      host: parsed.RAPIDAPI_HOST,
    },
    maxRequestsPerMinute: parsed.AUDIT_MAX_REQUESTS_PER_MINUTE,
    maxPages: parsed.AUDIT_MAX_PAGES,
    pageConcurrency: parsed.AUDIT_PAGE_CONCURRENCY,
    checkTimeoutsMs: {
      structural: parsed.AUDIT_STRUCTURAL_TIMEOUT_MS,
      performance: parsed.AUDIT_PERFORMANCE_TIMEOUT_MS,
      bot_access: parsed.AUDIT_BOT_ACCESS_TIMEOUT_MS,
    },
    sitemapTimeoutMs: parsed.SITEMAP_TIMEOUT_MS,
    logLevel: parsed.LOG_LEVEL,
    port: parsed.PORT,
    frontendUrl: parsed.FRONTEND_URL,
  };
}
