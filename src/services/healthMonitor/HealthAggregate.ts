import {
  HEALTH_SCORE_WEIGHTS,
  HEALTH_STATUSES,
  HISTORY_CAPACITY,
  MONITOR_DEFAULTS,
  RESPONSE_TIME_TIERS,
  SLOW_RESPONSE_SCORE,
  UPTIME_THRESHOLDS,
  type HealthStatus,
  type Target,
} from '../../config/index.js';
import type { HealthCheck } from '../prober/index.js';

/**
 * Read-only copy of a target's rolling health state
 */
export interface HealthSnapshot {
  name: string;
  url: string;
  status: HealthStatus;
  consecutiveFailures: number;
  totalChecks: number;
  successfulChecks: number;
  /** null until the first check */
  uptimePercentage: number | null;
  avgResponseTimeMs: number | null;
  minResponseTimeMs: number | null;
  maxResponseTimeMs: number | null;
  lastCheck: Date | null;
  /** Always within [0, 1] */
  healthScore: number;
  /** Oldest first */
  recentChecks: readonly HealthCheck[];
}

export interface HealthAggregateOptions {
  historyCapacity?: number;
  /** Failure streak at which the target is unhealthy (default 3) */
  unhealthyAfterFailures?: number;
}

/**
 * Classify a target from its failure streak and uptime
 */
export function classifyStatus(
  consecutiveFailures: number,
  uptimePercentage: number,
  unhealthyAfterFailures: number = MONITOR_DEFAULTS.MAX_CONSECUTIVE_FAILURES
): HealthStatus {
  if (consecutiveFailures === 0) {
    if (uptimePercentage >= UPTIME_THRESHOLDS.HEALTHY) return HEALTH_STATUSES.HEALTHY;
    if (uptimePercentage >= UPTIME_THRESHOLDS.DEGRADED) return HEALTH_STATUSES.DEGRADED;
    return HEALTH_STATUSES.UNHEALTHY;
  }
  if (consecutiveFailures >= unhealthyAfterFailures) {
    return HEALTH_STATUSES.UNHEALTHY;
  }
  return HEALTH_STATUSES.DEGRADED;
}

/**
 * Step score for an average response time, tiered on whole milliseconds
 */
export function responseTimeScore(avgResponseTimeMs: number): number {
  const wholeMs = Math.floor(avgResponseTimeMs);
  for (const tier of RESPONSE_TIME_TIERS) {
    if (wholeMs <= tier.maxMs) {
      return tier.score;
    }
  }
  return SLOW_RESPONSE_SCORE;
}

/**
 * Weighted composite of uptime ratio and response-time tier, clamped to [0, 1]
 */
export function computeHealthScore(uptimePercentage: number, avgResponseTimeMs: number): number {
  const score =
    HEALTH_SCORE_WEIGHTS.UPTIME * (uptimePercentage / 100) +
    HEALTH_SCORE_WEIGHTS.RESPONSE_TIME * responseTimeScore(avgResponseTimeMs);
  return Math.min(1, Math.max(0, score));
}

/**
 * Rolling health state of one target.
 *
 * Owned by that target's poll loop, which is the only caller of update().
 * Everyone else reads through snapshot(), which returns a copy. The average
 * response time is kept as an exact running sum and divided on read.
 */
export class HealthAggregate {
  readonly name: string;
  readonly url: string;

  private readonly historyCapacity: number;
  private readonly unhealthyAfterFailures: number;

  private status: HealthStatus = HEALTH_STATUSES.UNKNOWN;
  private consecutiveFailures = 0;
  private totalChecks = 0;
  private successfulChecks = 0;
  private responseTimeSumMs = 0;
  private minResponseTimeMs: number | null = null;
  private maxResponseTimeMs: number | null = null;
  private lastCheck: Date | null = null;
  private healthScore = 1;
  private history: HealthCheck[] = [];

  constructor(target: Pick<Target, 'name' | 'url'>, options: HealthAggregateOptions = {}) {
    this.name = target.name;
    this.url = target.url;
    this.historyCapacity = options.historyCapacity ?? HISTORY_CAPACITY;
    this.unhealthyAfterFailures = options.unhealthyAfterFailures ?? MONITOR_DEFAULTS.MAX_CONSECUTIVE_FAILURES;
  }

  /**
   * Fold one probe outcome into the aggregate and return the updated view
   */
  update(check: HealthCheck): HealthSnapshot {
    this.totalChecks++;
    this.lastCheck = check.timestamp;

    if (check.success) {
      this.successfulChecks++;
      this.consecutiveFailures = 0;
    } else {
      this.consecutiveFailures++;
    }

    const elapsed = check.responseTimeMs;
    if (this.minResponseTimeMs === null || elapsed < this.minResponseTimeMs) {
      this.minResponseTimeMs = elapsed;
    }
    if (this.maxResponseTimeMs === null || elapsed > this.maxResponseTimeMs) {
      this.maxResponseTimeMs = elapsed;
    }
    this.responseTimeSumMs += elapsed;

    const uptime = this.uptimePercentage() ?? 0;
    const average = this.averageResponseTimeMs() ?? 0;

    this.status = classifyStatus(this.consecutiveFailures, uptime, this.unhealthyAfterFailures);
    this.healthScore = computeHealthScore(uptime, average);

    this.history.push(check);
    if (this.history.length > this.historyCapacity) {
      this.history.shift();
    }

    return this.snapshot();
  }

  /**
   * Copy of the current state
   */
  snapshot(): HealthSnapshot {
    return {
      name: this.name,
      url: this.url,
      status: this.status,
      consecutiveFailures: this.consecutiveFailures,
      totalChecks: this.totalChecks,
      successfulChecks: this.successfulChecks,
      uptimePercentage: this.uptimePercentage(),
      avgResponseTimeMs: this.averageResponseTimeMs(),
      minResponseTimeMs: this.minResponseTimeMs,
      maxResponseTimeMs: this.maxResponseTimeMs,
      lastCheck: this.lastCheck,
      healthScore: this.healthScore,
      recentChecks: [...this.history],
    };
  }

  get currentStatus(): HealthStatus {
    return this.status;
  }

  get historySize(): number {
    return this.history.length;
  }

  private uptimePercentage(): number | null {
    if (this.totalChecks === 0) return null;
    return (100 * this.successfulChecks) / this.totalChecks;
  }

  private averageResponseTimeMs(): number | null {
    if (this.totalChecks === 0) return null;
    return this.responseTimeSumMs / this.totalChecks;
  }
}
