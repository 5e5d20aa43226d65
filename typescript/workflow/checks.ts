/**
 * Audit check types
 *
 * Every page is audited along three independent dimensions. Each check
 * produces a tagged {@link CheckOutcome} so the aggregator can reason about
 * status uniformly and only look at payloads of successful checks.
 */

export const CHECK_KINDS = ["structural", "performance", "bot_access"] as const;

export type CheckKind = (typeof CHECK_KINDS)[number];

export type Severity = "high" | "medium" | "low";

export interface StructuralIssue {
  type: string;
  severity: Severity;
  page: string;
  element: string;
  description: string;
  recommendation: string;
}

export interface IssueCounts {
  total_issues: number;
  high: number;
  medium: number;
  low: number;
}

export interface StructuralReport {
  issues: StructuralIssue[];
  summary: IssueCounts;
}

export type Rating = "Good" | "Needs Improvement" | "Poor";

export interface PerformanceMetric {
  metric_name: string;
  value: string;
  score: number;
  rating: Rating;
  description: string;
}

export interface PerformanceReport {
  score: number;
  core_web_vitals: PerformanceMetric[];
}

export interface BotAccessEntry {
  bot_name: string;
  user_agent: string;
  status: "Allowed" | "Blocked";
  purpose: string;
}

export interface BotAccessReport {
  bots: BotAccessEntry[];
  allowed_count: number;
  blocked_count: number;
}

export interface CheckPayloads {
  structural: StructuralReport;
  performance: PerformanceReport;
  bot_access: BotAccessReport;
}

export type CheckStatus = "success" | "error" | "timeout";

export interface SuccessfulCheck<K extends CheckKind> {
  kind: K;
  status: "success";
  payload: CheckPayloads[K];
}

export interface UnsuccessfulCheck<K extends CheckKind> {
  kind: K;
  status: "error" | "timeout";
  error_message: string;
}

/**
 * Outcome of one check for one page; narrowing on `status` exposes the
 * payload of kind `K`.
 */
export type CheckOutcome<K extends CheckKind = CheckKind> = SuccessfulCheck<K> | UnsuccessfulCheck<K>;

export type PageStatus = "success" | "partial" | "failed";

export interface PageAuditResult {
  url: string;
  outcomes: {
    [K in CheckKind]: CheckOutcome<K>;
  };
  status: PageStatus;
}

/**
 * The upstream audit capability. Implementations make exactly one upstream
 * call per method and should stop work when `signal` aborts.
 */
export interface PageChecker {
  checkStructural(url: string, signal?: AbortSignal): Promise<StructuralReport>;
  checkPerformance(url: string, signal?: AbortSignal): Promise<PerformanceReport>;
  checkBotAccess(url: string, signal?: AbortSignal): Promise<BotAccessReport>;
}

/**
 * success iff every check succeeded, failed iff none did, partial otherwise.
 */
export function deriveStatus(outcomes: ReadonlyArray<{ status: CheckStatus }>): PageStatus {
  const succeeded = outcomes.filter((o) => o.status === "success").length;
  if (succeeded === outcomes.length) {
    return "success";
  }
  if (succeeded === 0) {
    return "failed";
  }
  return "partial";
}
