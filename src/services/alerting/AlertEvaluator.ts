import { TRIGGER_TYPES, type AlertRule, type AlertTrigger, type Target } from '../../config/index.js';
import { logger, errorMessage, type Logger } from '../../utils/logger.js';
import { recordAlert } from '../../utils/metrics.js';
import type { ClockFn } from '../../utils/time.js';
import type { HealthSnapshot } from '../healthMonitor/HealthAggregate.js';
import type { HealthCheck } from '../prober/index.js';
import { CooldownLedger } from './CooldownLedger.js';
import type { AlertDecision, AlertNotification, AlertNotifier } from './types.js';

/**
 * Alert evaluator configuration
 */
export interface AlertEvaluatorConfig {
  rules: readonly AlertRule[];
  notifier: AlertNotifier;
  ledger?: CooldownLedger;
  clock?: ClockFn;
}

/**
 * Whether one trigger matches a check and the target's post-update state
 */
export function evaluateTrigger(trigger: AlertTrigger, check: HealthCheck, snapshot: HealthSnapshot): boolean {
  switch (trigger.type) {
    case TRIGGER_TYPES.RESPONSE_TIME_MS:
      return Math.floor(check.responseTimeMs) > trigger.thresholdMs;
    case TRIGGER_TYPES.CERT_EXPIRING_DAYS:
      return check.certExpiresDays !== undefined && check.certExpiresDays <= trigger.days;
    case TRIGGER_TYPES.CONSECUTIVE_FAILURES:
      return snapshot.consecutiveFailures >= trigger.count;
    case TRIGGER_TYPES.HEALTH_SCORE_BELOW:
      return snapshot.healthScore < trigger.score;
  }
}

/**
 * Triggers of a rule that match (a rule fires when any one does)
 */
export function matchingTriggers(rule: AlertRule, check: HealthCheck, snapshot: HealthSnapshot): AlertTrigger[] {
  return rule.triggers.filter((trigger) => evaluateTrigger(trigger, check, snapshot));
}

/**
 * Matches every rule against each fresh check and dispatches webhook
 * notifications, at most once per (rule, target) within the rule's cooldown.
 *
 * Dispatch is fire-and-forget: evaluate() never waits on delivery and never
 * throws because of it. Failed deliveries are not retried.
 */
export class AlertEvaluator {
  private readonly rules: readonly AlertRule[];
  private readonly notifier: AlertNotifier;
  private readonly ledger: CooldownLedger;
  private readonly clock: ClockFn;
  private readonly log: Logger;
  private readonly inFlight: Set<Promise<void>> = new Set();

  constructor(config: AlertEvaluatorConfig) {
    this.rules = config.rules;
    this.notifier = config.notifier;
    this.ledger = config.ledger ?? new CooldownLedger();
    this.clock = config.clock ?? Date.now;
    this.log = logger('AlertEvaluator');
  }

  /**
   * Evaluate all rules for one check. Returns a decision per rule that fired.
   */
  evaluate(target: Target, check: HealthCheck, snapshot: HealthSnapshot): AlertDecision[] {
    const decisions: AlertDecision[] = [];

    for (const rule of this.rules) {
      const triggers = matchingTriggers(rule, check, snapshot);
      if (triggers.length === 0) {
        continue;
      }

      const now = this.clock();
      if (!this.ledger.tryClaim(rule.name, target.name, rule.cooldownMs, now)) {
        recordAlert(rule.name, target.name, 'suppressed');
        decisions.push({ ruleName: rule.name, targetName: target.name, triggers, outcome: 'suppressed' });
        continue;
      }

      this.log.warn('Alert triggered', {
        rule: rule.name,
        target: target.name,
        triggers: triggers.map((t) => t.type),
      });

      this.dispatch({ rule, target, check, snapshot, triggers, timestamp: new Date(now) });
      decisions.push({ ruleName: rule.name, targetName: target.name, triggers, outcome: 'dispatched' });
    }

    return decisions;
  }

  /**
   * Wait for deliveries still in flight (used at shutdown and in tests)
   */
  async drain(): Promise<void> {
    await Promise.all([...this.inFlight]);
  }

  get pendingDeliveries(): number {
    return this.inFlight.size;
  }

  get cooldowns(): CooldownLedger {
    return this.ledger;
  }

  private dispatch(notification: AlertNotification): void {
    const ruleName = notification.rule.name;
    const targetName = notification.target.name;

    const task: Promise<void> = this.deliver(notification)
      .then(() => {
        recordAlert(ruleName, targetName, 'sent');
      })
      .catch((error: unknown) => {
        recordAlert(ruleName, targetName, 'failed');
        this.log.debug('Webhook delivery failed', { rule: ruleName, target: targetName, error: errorMessage(error) });
      })
      .finally(() => {
        this.inFlight.delete(task);
      });

    this.inFlight.add(task);
  }

  private async deliver(notification: AlertNotification): Promise<void> {
    // A notifier that throws synchronously is handled like a failed delivery
    await this.notifier.send(notification);
  }
}
