/**
 * Page audit pipeline
 *
 * Runs the three checks for one page at the same time. Each check waits for
 * its own gateway admission, then races its own timeout; a failing or slow
 * check never cancels its siblings. The result always carries one outcome
 * per check kind.
 */

import type { CheckTimeouts } from "../shared/config.js";
import { CheckTimeoutError, errorMessage } from "../shared/errors.js";
import { Logger, silentLogger } from "../shared/logger.js";
import {
  deriveStatus,
  type CheckKind,
  type CheckOutcome,
  type CheckPayloads,
  type PageAuditResult,
  type PageChecker,
} from "./checks.js";
import type { RateLimitedGateway } from "./rateLimitedGateway.js";

export const DEFAULT_CHECK_TIMEOUTS: CheckTimeouts = {
  structural: 30_000,
  performance: 60_000,
  bot_access: 15_000,
};

export interface PageAuditor {
  auditPage(url: string): Promise<PageAuditResult>;
}

/**
 * Run `task` with an AbortSignal that fires after `timeoutMs`; rejects with
 * CheckTimeoutError at that point even if the task ignores the signal.
 */
export async function runWithTimeout<T>(
  timeoutMs: number,
  task: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  let timeoutId: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      const error = new CheckTimeoutError(timeoutMs);
      reject(error);
      controller.abort(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([task(controller.signal), timeout]);
  } finally {
    clearTimeout(timeoutId);
  }
}

export interface PageAuditPipelineOptions {
  timeoutsMs?: Partial<CheckTimeouts>;
  logger?: Logger;
}

export class PageAuditPipeline implements PageAuditor {
  private readonly timeoutsMs: CheckTimeouts;
  private readonly logger: Logger;

  constructor(
    private readonly checker: PageChecker,
    private readonly gateway: RateLimitedGateway,
    options: PageAuditPipelineOptions = {}
  ) {
    this.timeoutsMs = { ...DEFAULT_CHECK_TIMEOUTS, ...options.timeoutsMs };
    this.logger = options.logger ?? silentLogger;
  }

  async auditPage(url: string): Promise<PageAuditResult> {
    const [structural, performance, botAccess] = await Promise.all([
      this.runCheck("structural", url, (signal) => this.checker.checkStructural(url, signal)),
      this.runCheck("performance", url, (signal) => this.checker.checkPerformance(url, signal)),
      this.runCheck("bot_access", url, (signal) => this.checker.checkBotAccess(url, signal)),
    ]);

    const outcomes = { structural, performance, bot_access: botAccess };
    const status = deriveStatus([structural, performance, botAccess]);
    this.logger.info(`Audited ${url}: ${status}`, {
      structural: structural.status,
      performance: performance.status,
      bot_access: botAccess.status,
    });

    return { url, outcomes, status };
  }

  /**
   * Never rejects: errors and timeouts become outcomes.
   */
  private async runCheck<K extends CheckKind>(
    kind: K,
    url: string,
    check: (signal: AbortSignal) => Promise<CheckPayloads[K]>
  ): Promise<CheckOutcome<K>> {
    const timeoutMs = this.timeoutsMs[kind];
    try {
      const payload = await this.gateway.execute(() => runWithTimeout(timeoutMs, check));
      return { kind, status: "success", payload };
    } catch (error) {
      if (error instanceof CheckTimeoutError) {
        this.logger.warn(`${kind} check timed out for ${url}`, { timeoutMs });
        return { kind, status: "timeout", error_message: error.message };
      }
      const message = errorMessage(error);
      this.logger.warn(`${kind} check failed for ${url}: ${message}`);
      return { kind, status: "error", error_message: message };
    }
  }
}
