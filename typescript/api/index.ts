/**
 * Site Audit API server entry point
 */

import "dotenv/config";
import { loadConfig } from "../shared/config.js";
import { Logger } from "../shared/logger.js";
import { getSharedGateway, runAudit } from "../workflow/index.js";
import { createApp } from "./app.js";
import { AuditJobRegistry } from "./auditJobs.js";

const config = loadConfig();
const logger = new Logger(config.logLevel);
const gateway = getSharedGateway(config, logger);

const jobs = new AuditJobRegistry(
  (request, onPhaseChange) =>
    runAudit(
      request.targetUrl,
      request.mode,
      { config, logger, gateway, onPhaseChange: (phase) => onPhaseChange(phase) },
      { maxPages: request.maxPages }
    ),
  { logger: logger.child("jobs") }
);

if (!config.rapidApi.key) {
  logger.warn("RAPIDAPI_KEY not configured; every upstream check will fail");
}

const app = createApp({ config, jobs, gateway, logger: logger.child("api") });

app.listen(config.port, () => {
  logger.info(`Site Audit API listening on port ${config.port}`);
});
