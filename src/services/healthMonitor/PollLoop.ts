import type { HealthStatus, Target } from '../../config/index.js';
import { logger, type Logger } from '../../utils/logger.js';
import { recordCheck, updateTargetHealth } from '../../utils/metrics.js';
import { sleep, type ClockFn } from '../../utils/time.js';
import type { AlertEvaluator } from '../alerting/index.js';
import type { HealthCheck, Prober } from '../prober/index.js';
import type { HealthAggregate, HealthSnapshot } from './HealthAggregate.js';

/**
 * Poll loop collaborators
 */
export interface PollLoopConfig {
  target: Target;
  /** Owned exclusively by this loop */
  aggregate: HealthAggregate;
  prober: Pick<Prober, 'probe'>;
  alerts?: Pick<AlertEvaluator, 'evaluate'>;
  clock?: ClockFn;
  /** Called after the aggregate update and alert evaluation */
  onCheck?: (check: HealthCheck, snapshot: HealthSnapshot) => void;
  onStatusChange?: (from: HealthStatus, to: HealthStatus, snapshot: HealthSnapshot) => void;
}

export type PollLoopState = 'idle' | 'running' | 'stopped';

/**
 * Probes one target on its interval, strictly sequentially: iteration k+1
 * never starts before iteration k's update, alert evaluation and output.
 *
 * Cancellation is observed before each request and before each sleep. An
 * in-flight probe is not interrupted; it ends within the target's timeout.
 * Unexpected exceptions propagate to the caller, which supervises the loop.
 */
export class PollLoop {
  private readonly config: PollLoopConfig;
  private readonly clock: ClockFn;
  private readonly log: Logger;
  private state: PollLoopState = 'idle';
  private iterations = 0;

  constructor(config: PollLoopConfig) {
    this.config = config;
    this.clock = config.clock ?? Date.now;
    this.log = logger('PollLoop').child({ component: config.target.name });
  }

  /**
   * Run until the signal aborts
   */
  async run(signal: AbortSignal): Promise<void> {
    const { target } = this.config;
    this.state = 'running';
    this.log.debug('Poll loop started', { intervalMs: target.intervalMs });

    try {
      while (!signal.aborted) {
        const startedAt = this.clock();
        await this.runOnce();

        if (signal.aborted) break;

        // Schedule relative to the iteration start, not its end
        const elapsed = this.clock() - startedAt;
        await sleep(Math.max(0, target.intervalMs - elapsed), signal);
      }
    } finally {
      this.state = 'stopped';
      this.log.debug('Poll loop stopped', { iterations: this.iterations });
    }
  }

  /**
   * One iteration: probe, update, publish, evaluate alerts, emit
   */
  async runOnce(): Promise<{ check: HealthCheck; snapshot: HealthSnapshot }> {
    const { target, aggregate, prober, alerts } = this.config;

    const check = await prober.probe(target);

    const previous = aggregate.currentStatus;
    const snapshot = aggregate.update(check);
    this.iterations++;

    recordCheck(target.name, check.success, check.responseTimeMs);
    updateTargetHealth(target.name, snapshot);

    if (snapshot.status !== previous) {
      this.config.onStatusChange?.(previous, snapshot.status, snapshot);
    }

    alerts?.evaluate(target, check, snapshot);
    this.config.onCheck?.(check, snapshot);

    return { check, snapshot };
  }

  get currentState(): PollLoopState {
    return this.state;
  }

  get completedIterations(): number {
    return this.iterations;
  }
}
