#!/usr/bin/env node
import "dotenv/config";
import { Command } from "commander";
import { loadConfig } from "./shared/config.js";
import { ValidationError, errorMessage } from "./shared/errors.js";
import { Logger } from "./shared/logger.js";
import { CliOptionsSchema, validateRequest } from "./shared/schemas.js";
import { validateUrlOrThrow } from "./shared/urlValidator.js";
import { runAudit } from "./workflow/index.js";

const program = new Command();

program
  .name("seo-audit")
  .description("Run a technical SEO audit of one page or a whole site")
  .version("1.0.0")
  .argument("<url>", "The page or site to audit")
  .option("--mode <mode>", "single (one page) or full (sitemap pages)", "single")
  .option("--max-pages <number>", "Maximum number of pages in a full audit")
  .option("--concurrency <number>", "Pages audited at the same time")
  .action(async (url: string, rawOptions: Record<string, string | undefined>) => {
    try {
      const parsed = validateRequest(CliOptionsSchema, rawOptions);
      if (!parsed.success) {
        throw new ValidationError(parsed.error);
      }
      const options = parsed.data;
      const targetUrl = validateUrlOrThrow(url);

      const config = loadConfig();
      // stdout carries the JSON result
      const logger = new Logger(config.logLevel === "debug" ? "debug" : "warn");

      const outcome = await runAudit(
        targetUrl,
        options.mode,
        { config, logger },
        { maxPages: options.maxPages, pageConcurrency: options.concurrency }
      );

      if (!outcome.success) {
        console.error(
          JSON.stringify({ error: true, message: outcome.error, pages_planned: outcome.pages_planned }, null, 2)
        );
        process.exit(1);
      }

      console.log(JSON.stringify(outcome.summary, null, 2));
      process.exit(0);
    } catch (error) {
      console.error(
        JSON.stringify({ error: true, message: errorMessage(error, "Unknown error occurred") }, null, 2)
      );
      process.exit(1);
    }
  });

program.parseAsync().catch((error: unknown) => {
  console.error(errorMessage(error));
  process.exit(1);
});
