/**
 * Alerting Module
 *
 * - AlertEvaluator: matches rules against each check, applies cooldowns
 * - CooldownLedger: last dispatch per (rule, target)
 * - WebhookNotifier: JSON webhook delivery
 */

export { AlertEvaluator, evaluateTrigger, matchingTriggers } from './AlertEvaluator.js';
export type { AlertEvaluatorConfig } from './AlertEvaluator.js';
export { CooldownLedger } from './CooldownLedger.js';
export { WebhookNotifier, buildWebhookPayload } from './WebhookNotifier.js';
export type { WebhookPayload } from './WebhookNotifier.js';
export type { AlertDecision, AlertNotification, AlertNotifier } from './types.js';
