/**
 * Outcome of one probe. Created by the Prober, never mutated afterwards.
 */
export interface HealthCheck {
  readonly target: string;
  readonly timestamp: Date;
  readonly success: boolean;
  /** Absent when no HTTP response arrived */
  readonly statusCode?: number;
  readonly responseTimeMs: number;
  readonly error?: string;
  /** Absent when unknown */
  readonly certExpiresDays?: number;
}

/**
 * Freeze a probe outcome
 */
export function createHealthCheck(check: HealthCheck): HealthCheck {
  return Object.freeze({ ...check });
}
