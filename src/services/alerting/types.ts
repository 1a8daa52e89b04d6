import type { AlertRule, AlertTrigger, Target } from '../../config/index.js';
import type { HealthSnapshot } from '../healthMonitor/HealthAggregate.js';
import type { HealthCheck } from '../prober/index.js';

/**
 * Everything a notifier needs to describe one alert
 */
export interface AlertNotification {
  rule: AlertRule;
  target: Target;
  check: HealthCheck;
  snapshot: HealthSnapshot;
  /** Triggers of the rule that matched */
  triggers: AlertTrigger[];
  timestamp: Date;
}

/**
 * Delivers alert notifications. May reject; callers treat delivery as
 * fire-and-forget.
 */
export interface AlertNotifier {
  send(notification: AlertNotification): Promise<void>;
}

/**
 * Result of evaluating one rule against one check
 */
export interface AlertDecision {
  ruleName: string;
  targetName: string;
  triggers: AlertTrigger[];
  outcome: 'dispatched' | 'suppressed';
}
