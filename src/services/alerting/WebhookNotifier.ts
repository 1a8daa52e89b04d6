import axios, { type AxiosInstance } from 'axios';
import type { AlertNotification, AlertNotifier } from './types.js';

/**
 * Chat-webhook message body
 */
export interface WebhookPayload {
  text: string;
  attachments: Array<{
    color: 'danger';
    fields: Array<{ title: string; value: string; short: boolean }>;
  }>;
}

/**
 * Build the webhook body for an alert
 */
export function buildWebhookPayload(notification: AlertNotification): WebhookPayload {
  const { rule, target, check } = notification;

  return {
    text: `🚨 Alert: ${rule.name} - ${target.name}`,
    attachments: [
      {
        color: 'danger',
        fields: [
          { title: 'Target', value: target.name, short: true },
          { title: 'URL', value: target.url, short: true },
          { title: 'Status', value: check.statusCode !== undefined ? String(check.statusCode) : 'Error', short: true },
          { title: 'Response Time', value: `${Math.floor(check.responseTimeMs)}ms`, short: true },
          { title: 'Error', value: check.error ?? 'N/A', short: false },
        ],
      },
    ],
  };
}

/**
 * POSTs alert payloads to the rule's webhook URL
 */
export class WebhookNotifier implements AlertNotifier {
  private readonly http: AxiosInstance;
  private readonly timeoutMs: number;

  constructor(options: { http?: AxiosInstance; timeoutMs?: number } = {}) {
    this.http = options.http ?? axios.create();
    this.timeoutMs = options.timeoutMs ?? 10000;
  }

  async send(notification: AlertNotification): Promise<void> {
    await this.http.post(notification.rule.webhookUrl, buildWebhookPayload(notification), {
      timeout: this.timeoutMs,
      headers: { 'Content-Type': 'application/json' },
    });
  }
}
