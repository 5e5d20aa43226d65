/**
 * Audit jobs
 *
 * Audits take minutes, so the API starts them in the background and lets
 * clients poll. Jobs live in an LRU cache with a TTL; nothing is persisted.
 */

import { randomUUID } from "node:crypto";
import { LRUCache } from "lru-cache";
import { errorMessage } from "../shared/errors.js";
import { Logger, silentLogger } from "../shared/logger.js";
import type { AuditMode } from "../shared/schemas.js";
import type { AuditOutcome, AuditPhase, SiteAuditSummary } from "../workflow/index.js";

export type AuditJobStatus = "queued" | AuditPhase;

export interface AuditJobRequest {
  targetUrl: string;
  mode: AuditMode;
  maxPages?: number;
}

export interface AuditJob {
  id: string;
  url: string;
  mode: AuditMode;
  status: AuditJobStatus;
  created_at: string;
  completed_at?: string;
  summary?: SiteAuditSummary;
  error?: string;
}

export type AuditRunner = (
  request: AuditJobRequest,
  onPhaseChange: (phase: AuditPhase) => void
) => Promise<AuditOutcome>;

export interface AuditJobRegistryOptions {
  maxJobs?: number;
  ttlMs?: number;
  logger?: Logger;
}

export class AuditJobRegistry {
  private readonly jobs: LRUCache<string, AuditJob>;
  private readonly logger: Logger;

  constructor(
    private readonly runner: AuditRunner,
    options: AuditJobRegistryOptions = {}
  ) {
    this.jobs = new LRUCache<string, AuditJob>({
      max: options.maxJobs ?? 1000,
      ttl: options.ttlMs ?? 1000 * 60 * 60,
    });
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Register a job and start it. `completion` resolves with the final job
   * and never rejects.
   */
  start(request: AuditJobRequest): { job: AuditJob; completion: Promise<AuditJob> } {
    const job: AuditJob = {
      id: randomUUID(),
      url: request.targetUrl,
      mode: request.mode,
      status: "queued",
      created_at: new Date().toISOString(),
    };
    this.jobs.set(job.id, job);
    this.logger.info(`Started audit job ${job.id}`, { url: job.url, mode: job.mode });

    const snapshot = { ...job };
    const completion = this.run(job, request);
    return { job: snapshot, completion };
  }

  get(id: string): AuditJob | undefined {
    const job = this.jobs.get(id);
    return job ? { ...job } : undefined;
  }

  get size(): number {
    return this.jobs.size;
  }

  private async run(job: AuditJob, request: AuditJobRequest): Promise<AuditJob> {
    const update = (changes: Partial<AuditJob>) => {
      Object.assign(job, changes);
      // Evicted jobs stay evicted
      if (this.jobs.has(job.id)) {
        this.jobs.set(job.id, job);
      }
    };

    try {
      const outcome = await this.runner(request, (phase) => update({ status: phase }));
      if (outcome.success) {
        update({ status: "done", summary: outcome.summary });
      } else {
        update({ status: "failed", error: outcome.error });
      }
    } catch (error) {
      this.logger.error(`Audit job ${job.id} crashed: ${errorMessage(error)}`);
      update({ status: "failed", error: errorMessage(error, "Audit failed") });
    }

    update({ completed_at: new Date().toISOString() });
    this.logger.info(`Audit job ${job.id} ${job.status}`);
    return { ...job };
  }
}
