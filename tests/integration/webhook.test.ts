import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { AlertEvaluator, WebhookNotifier, type AlertNotification } from '../../src/services/alerting/index.js';
import { HealthAggregate } from '../../src/services/healthMonitor/index.js';
import { MockHttpServer } from '../mocks/httpServer.js';
import { createCheck, createRule, createTarget } from '../fixtures/targets.js';

function notificationFor(webhookUrl: string): AlertNotification {
  const target = createTarget({ name: 'api', url: 'https://api.example.com/health' });
  const check = createCheck({ statusCode: 200, responseTimeMs: 6200 });
  const snapshot = new HealthAggregate(target).update(check);

  return {
    rule: createRule({ name: 'Slack Alerts', webhookUrl }),
    target,
    check,
    snapshot,
    triggers: [{ type: 'response_time_ms', thresholdMs: 5000 }],
    timestamp: new Date(0),
  };
}

describe('WebhookNotifier', () => {
  let server: MockHttpServer;

  beforeAll(async () => {
    server = new MockHttpServer();
    await server.start();
  });

  afterAll(async () => {
    await server.stop();
  });

  it('should POST the JSON payload to the rule webhook', async () => {
    server.route('/hook', { status: 200, body: 'ok' });
    const notifier = new WebhookNotifier({ timeoutMs: 1000 });

    await notifier.send(notificationFor(server.url('/hook')));

    const request = server.requests.at(-1);
    expect(request?.method).toBe('POST');
    expect(request?.headers['content-type']).toContain('application/json');
    expect(JSON.parse(request?.body ?? '')).toEqual({
      text: '🚨 Alert: Slack Alerts - api',
      attachments: [
        {
          color: 'danger',
          fields: [
            { title: 'Target', value: 'api', short: true },
            { title: 'URL', value: 'https://api.example.com/health', short: true },
            { title: 'Status', value: '200', short: true },
            { title: 'Response Time', value: '6200ms', short: true },
            { title: 'Error', value: 'N/A', short: false },
          ],
        },
      ],
    });
  });

  it('should reject on a non-2xx answer', async () => {
    server.route('/broken', { status: 500 });
    const notifier = new WebhookNotifier({ timeoutMs: 1000 });

    await expect(notifier.send(notificationFor(server.url('/broken')))).rejects.toThrow();
  });

  it('should leave the evaluator unaffected by a failing webhook', async () => {
    server.route('/broken', { status: 500 });
    const url = server.url('/broken');
    const evaluator = new AlertEvaluator({
      rules: [createRule({ webhookUrl: url })],
      notifier: new WebhookNotifier({ timeoutMs: 1000 }),
    });
    const { target, check, snapshot } = notificationFor(url);

    const decisions = evaluator.evaluate(target, check, snapshot);
    await evaluator.drain();

    expect(decisions.map((d) => d.outcome)).toEqual(['dispatched']);
    expect(evaluator.pendingDeliveries).toBe(0);
  });
});
