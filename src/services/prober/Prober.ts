import axios, { type AxiosInstance, type AxiosResponse } from 'axios';
import type { Readable } from 'stream';
import type { Target } from '../../config/index.js';
import { logger, errorMessage, type Logger } from '../../utils/logger.js';
import type { ClockFn } from '../../utils/time.js';
import { UnknownCertificateInspector, type CertificateInspector } from './certificates.js';
import { createHealthCheck, type HealthCheck } from './types.js';
import { hasUserAgent, randomUserAgent } from './userAgents.js';

const MAX_REDIRECTS = 10;

/**
 * Prober dependencies
 */
export interface ProberOptions {
  /** Shared HTTP client; a fresh axios instance when omitted */
  http?: AxiosInstance;
  certificates?: CertificateInspector;
  userAgent?: () => string;
  clock?: ClockFn;
}

/**
 * Whether a status code satisfies the target. Empty list means any 2xx.
 */
export function isExpectedStatus(statusCode: number, expected: readonly number[]): boolean {
  if (expected.length === 0) {
    return statusCode >= 200 && statusCode < 300;
  }
  return expected.includes(statusCode);
}

function hostOf(url: string): string {
  try {
    return new URL(url).hostname;
  } catch {
    return url;
  }
}

/**
 * Describe a request that produced no HTTP response
 */
export function describeProbeError(error: unknown, target: Target): string {
  if (axios.isAxiosError(error)) {
    switch (error.code) {
      case 'ECONNABORTED':
      case 'ETIMEDOUT':
        return `Request timed out after ${target.timeoutMs}ms`;
      case 'ECONNREFUSED':
        return `Connection refused (${target.url})`;
      case 'ENOTFOUND':
      case 'EAI_AGAIN':
        return `DNS lookup failed for ${hostOf(target.url)}`;
      case 'ECONNRESET':
        return 'Connection reset';
      case 'ERR_FR_TOO_MANY_REDIRECTS':
        return 'Too many redirects';
    }
    return error.message || error.code || 'Request failed';
  }
  return errorMessage(error);
}

/**
 * Drain a response stream into text, bounded by a deadline
 */
async function readBody(stream: Readable, deadlineMs: number): Promise<string> {
  const timer = setTimeout(() => {
    stream.destroy(new Error(`body not received within ${deadlineMs}ms`));
  }, deadlineMs);

  try {
    const chunks: Buffer[] = [];
    for await (const chunk of stream) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
    }
    return Buffer.concat(chunks).toString('utf8');
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Performs one HTTP request/response cycle for a target and classifies it.
 *
 * Never throws for network or HTTP problems: every outcome, including
 * timeouts, refused connections and DNS failures, comes back as a
 * HealthCheck with success=false and a descriptive error.
 */
export class Prober {
  private readonly http: AxiosInstance;
  private readonly certificates: CertificateInspector;
  private readonly userAgent: () => string;
  private readonly clock: ClockFn;
  private readonly log: Logger;

  constructor(options: ProberOptions = {}) {
    this.http = options.http ?? axios.create();
    this.certificates = options.certificates ?? new UnknownCertificateInspector();
    this.userAgent = options.userAgent ?? (() => randomUserAgent());
    this.clock = options.clock ?? Date.now;
    this.log = logger('Prober');
  }

  /**
   * Issue exactly one request for the target
   */
  async probe(target: Target): Promise<HealthCheck> {
    const startTime = this.clock();

    let response: AxiosResponse<Readable>;
    try {
      response = await this.http.request<Readable>({
        url: target.url,
        method: target.method,
        headers: this.buildHeaders(target),
        timeout: target.timeoutMs,
        responseType: 'stream',
        maxRedirects: target.followRedirects ? MAX_REDIRECTS : 0,
        // Every status is classified here, not by axios
        validateStatus: () => true,
      });
    } catch (error) {
      const description = describeProbeError(error, target);
      this.log.debug('Probe failed without response', { target: target.name, error: description });

      return createHealthCheck({
        target: target.name,
        timestamp: new Date(this.clock()),
        success: false,
        responseTimeMs: this.clock() - startTime,
        error: description,
      });
    }

    const responseTimeMs = this.clock() - startTime;
    const statusCode = response.status;
    const statusOk = isExpectedStatus(statusCode, target.expectedStatus);

    let contentOk = true;
    let error: string | undefined;

    if (!statusOk) {
      // Body is not read for a rejected status
      response.data.destroy();
    } else if (target.expectedContent !== undefined) {
      try {
        const body = await readBody(response.data, Math.max(1, target.timeoutMs - responseTimeMs));
        contentOk = body.includes(target.expectedContent);
        if (!contentOk) {
          error = `Expected content '${target.expectedContent}' not found in response`;
        }
      } catch (readError) {
        contentOk = false;
        error = `Failed to read response body: ${errorMessage(readError)}`;
      }
    } else {
      // Body is not needed
      response.data.destroy();
    }

    const certExpiresDays = target.url.toLowerCase().startsWith('https://')
      ? await this.certificates.daysUntilExpiry(target.url)
      : undefined;

    return createHealthCheck({
      target: target.name,
      timestamp: new Date(this.clock()),
      success: statusOk && contentOk,
      statusCode,
      responseTimeMs,
      error,
      certExpiresDays,
    });
  }

  private buildHeaders(target: Target): Record<string, string> {
    const headers: Record<string, string> = { ...target.headers };
    if (!hasUserAgent(headers)) {
      headers['User-Agent'] = this.userAgent();
    }
    return headers;
  }
}
