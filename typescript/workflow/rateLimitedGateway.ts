/**
 * Rate-limited gateway for the upstream audit API
 *
 * Every audit in the process shares one API key, so every upstream call
 * shares one sliding-window budget. Callers are admitted in arrival order;
 * the bookkeeping runs in a one-slot p-limit queue and the operation itself
 * runs after the slot is released, so a slow upstream call never holds up
 * admissions for other callers.
 */

import pLimit from "p-limit";
import { Logger, silentLogger } from "../shared/logger.js";

export interface RateLimitedGatewayOptions {
  maxRequestsPerMinute?: number;
  windowMs?: number;
  logger?: Logger;
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export class RateLimitedGateway {
  readonly maxRequestsPerMinute: number;
  readonly windowMs: number;

  private readonly admissions: number[] = [];
  private readonly admissionQueue = pLimit(1);
  private readonly logger: Logger;

  constructor(options: RateLimitedGatewayOptions = {}) {
    this.maxRequestsPerMinute = options.maxRequestsPerMinute ?? 50;
    this.windowMs = options.windowMs ?? 60_000;
    this.logger = options.logger ?? silentLogger;

    if (!Number.isInteger(this.maxRequestsPerMinute) || this.maxRequestsPerMinute < 1) {
      throw new RangeError("maxRequestsPerMinute must be a positive integer");
    }
    if (!(this.windowMs > 0)) {
      throw new RangeError("windowMs must be positive");
    }
  }

  /**
   * Wait for an admission, then run `operation`. Its result or rejection is
   * passed through untouched; a rejected operation still used its admission.
   */
  async execute<T>(operation: () => Promise<T>): Promise<T> {
    await this.admissionQueue(() => this.admit());
    return operation();
  }

  /**
   * Admissions within the current window.
   */
  currentRate(): number {
    this.prune(Date.now());
    return this.admissions.length;
  }

  availableCapacity(): number {
    return Math.max(0, this.maxRequestsPerMinute - this.currentRate());
  }

  /**
   * Number of callers waiting for an admission, including one sleeping on
   * a full window.
   */
  waitingCount(): number {
    return this.admissionQueue.activeCount + this.admissionQueue.pendingCount;
  }

  private async admit(): Promise<void> {
    this.prune(Date.now());

    while (this.admissions.length >= this.maxRequestsPerMinute) {
      const waitMs = this.admissions[0] + this.windowMs - Date.now();
      this.logger.warn(`Rate limit reached, waiting ${(waitMs / 1000).toFixed(1)}s`, {
        maxRequestsPerMinute: this.maxRequestsPerMinute,
        waiting: this.admissionQueue.pendingCount,
      });
      await sleep(Math.max(waitMs, 0));
      this.prune(Date.now());
    }

    this.admissions.push(Date.now());
    this.logger.debug(
      `Admitted upstream request (${this.admissions.length}/${this.maxRequestsPerMinute} in window)`
    );
  }

  // An admission leaves the window once it is windowMs old.
  private prune(now: number): void {
    const cutoff = now - this.windowMs;
    let expired = 0;
    while (expired < this.admissions.length && this.admissions[expired] <= cutoff) {
      expired++;
    }
    if (expired > 0) {
      this.admissions.splice(0, expired);
    }
  }
}
