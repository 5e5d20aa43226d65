/**
 * Site Audit API
 *
 * Express app for starting audits and polling their status.
 */

import cors from "cors";
import express, { type Express, type NextFunction, type Request, type Response } from "express";
import rateLimit from "express-rate-limit";
import helmet from "helmet";
import type { AppConfig } from "../shared/config.js";
import { ValidationError, errorMessage } from "../shared/errors.js";
import { Logger } from "../shared/logger.js";
import { AuditRequestSchema, validateRequest } from "../shared/schemas.js";
import { validateUrlOrThrow } from "../shared/urlValidator.js";
import type { RateLimitedGateway } from "../workflow/rateLimitedGateway.js";
import type { AuditJobRegistry } from "./auditJobs.js";

export interface AppDependencies {
  config: AppConfig;
  jobs: AuditJobRegistry;
  gateway: RateLimitedGateway;
  logger: Logger;
}

export function createApp({ config, jobs, gateway, logger }: AppDependencies): Express {
  const app = express();

  // Security headers - configured for API use (allow cross-origin requests)
  app.use(
    helmet({
      crossOriginResourcePolicy: { policy: "cross-origin" },
      contentSecurityPolicy: false,
    })
  );

  const corsOptions: cors.CorsOptions = {
    origin: config.frontendUrl
      ? [config.frontendUrl, "http://localhost:5173", "http://localhost:3000"]
      : true,
    methods: ["GET", "POST"],
    allowedHeaders: ["Content-Type", "Authorization"],
  };
  app.use(cors(corsOptions));
  app.use(express.json());

  // Audits fan out into many upstream calls; keep clients well under the shared budget
  const auditRateLimiter = rateLimit({
    windowMs: 60 * 1000,
    max: 10,
    message: { error: "Too many audit requests, please try again later" },
    standardHeaders: true,
    legacyHeaders: false,
  });

  const generalRateLimiter = rateLimit({
    windowMs: 60 * 1000,
    max: 100,
    message: { error: "Too many requests, please try again later" },
    standardHeaders: true,
    legacyHeaders: false,
  });

  app.use(generalRateLimiter);

  app.get("/", (_req, res) => {
    res.json({ status: "healthy", service: "site-audit-api" });
  });

  app.get("/health", (_req, res) => {
    res.json({ status: "healthy" });
  });

  // Start a new audit
  app.post("/audit", auditRateLimiter, (req, res) => {
    const validation = validateRequest(AuditRequestSchema, req.body);
    if (!validation.success) {
      return res.status(400).json({ error: validation.error });
    }
    const { url, mode, max_pages: maxPages } = validation.data;

    const targetUrl = validateUrlOrThrow(url);

    const { job } = jobs.start({ targetUrl, mode, maxPages });
    logger.info(`Accepted ${mode} audit ${job.id} for ${job.url}`);

    return res.status(202).json({
      audit_id: job.id,
      status: job.status,
      url: job.url,
      mode: job.mode,
    });
  });

  // Get audit status, and the summary once done
  app.get("/audit/:auditId", (req, res) => {
    const job = jobs.get(req.params.auditId);
    if (!job) {
      return res.status(404).json({ error: "Audit not found" });
    }
    return res.json(job);
  });

  // Upstream budget and configuration
  app.get("/status", (_req, res) => {
    res.json({
      api: "ok",
      upstream_configured: Boolean(config.rapidApi.key),
      max_requests_per_minute: gateway.maxRequestsPerMinute,
      current_rate: gateway.currentRate(),
      available_capacity: gateway.availableCapacity(),
      waiting_requests: gateway.waitingCount(),
      tracked_audits: jobs.size,
      message: config.rapidApi.key
        ? null
        : "RAPIDAPI_KEY not configured. Set it in your environment variables.",
    });
  });

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof ValidationError) {
      return res.status(400).json({ error: error.message });
    }
    // Malformed JSON bodies from express.json()
    if (error instanceof SyntaxError) {
      return res.status(400).json({ error: "Request body must be valid JSON" });
    }
    logger.error(`Unhandled API error: ${errorMessage(error)}`);
    return res.status(500).json({ error: errorMessage(error, "Internal server error") });
  });

  return app;
}
