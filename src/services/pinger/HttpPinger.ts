import type { HttpMethod, Target } from '../../config/index.js';
import { logger, type Logger } from '../../utils/logger.js';
import { sleep, type ClockFn } from '../../utils/time.js';
import { Prober } from '../prober/index.js';
import { consoleOutput, displayMs, paint, statusCodeTone, type OutputWriter, type Tone } from '../reporter/index.js';

/**
 * Options of a ping session
 */
export interface PingOptions {
  url: string;
  /** Stop after this many requests; unlimited when omitted */
  count?: number;
  intervalMs: number;
  timeoutMs: number;
  method: HttpMethod;
  headers: Record<string, string>;
  userAgent?: string;
  quiet: boolean;
  statsOnly: boolean;
  verbose: boolean;
  json: boolean;
  colors: boolean;
}

export interface PingResult {
  sequence: number;
  url: string;
  statusCode?: number;
  responseTimeMs: number;
  success: boolean;
  error?: string;
  timestamp: Date;
}

export interface PingStatistics {
  totalRequests: number;
  successfulRequests: number;
  failedRequests: number;
  /** Percent of requests that succeeded */
  successRate: number;
  /** Round-trip figures over successful requests only */
  minResponseTimeMs: number | null;
  avgResponseTimeMs: number | null;
  maxResponseTimeMs: number | null;
  totalTimeMs: number;
}

export interface HttpPingerDeps {
  prober?: Pick<Prober, 'probe'>;
  output?: OutputWriter;
  clock?: ClockFn;
}

/**
 * Parse repeated `Name: value` header arguments. Entries without a colon
 * are skipped.
 */
export function parseHeaderArgs(values: readonly string[]): { headers: Record<string, string>; invalid: string[] } {
  const headers: Record<string, string> = {};
  const invalid: string[] = [];

  for (const value of values) {
    const separator = value.indexOf(':');
    const name = separator > 0 ? value.slice(0, separator).trim() : '';
    if (name === '') {
      invalid.push(value);
      continue;
    }
    headers[name] = value.slice(separator + 1).trim();
  }

  return { headers, invalid };
}

function pingTimeTone(ms: number): Tone {
  if (ms <= 50) return 'info';
  if (ms <= 200) return 'warn';
  return 'error';
}

/**
 * Repeatedly requests a single URL and reports per-request lines and
 * summary statistics. Any 2xx counts as success; redirects are followed.
 */
export class HttpPinger {
  private readonly options: PingOptions;
  private readonly prober: Pick<Prober, 'probe'>;
  private readonly output: OutputWriter;
  private readonly clock: ClockFn;
  private readonly log: Logger;
  private readonly target: Target;

  private sequence = 0;
  private total = 0;
  private successful = 0;
  private successTimeSumMs = 0;
  private minMs: number | null = null;
  private maxMs: number | null = null;
  private startedAt: number | null = null;
  private finishedAt: number | null = null;

  constructor(options: PingOptions, deps: HttpPingerDeps = {}) {
    this.options = options;
    this.prober = deps.prober ?? new Prober();
    this.output = deps.output ?? consoleOutput;
    this.clock = deps.clock ?? Date.now;
    this.log = logger('HttpPinger');

    const headers: Record<string, string> = { ...options.headers };
    if (options.userAgent !== undefined) {
      headers['User-Agent'] = options.userAgent;
    }

    this.target = {
      name: options.url,
      url: options.url,
      method: options.method,
      headers,
      expectedStatus: [],
      timeoutMs: options.timeoutMs,
      intervalMs: options.intervalMs,
      followRedirects: true,
    };
  }

  /**
   * Ping until the count is reached or the signal aborts, then print statistics
   */
  async run(signal?: AbortSignal): Promise<PingStatistics> {
    const { count, intervalMs } = this.options;
    this.startedAt = this.clock();
    this.log.debug('Ping session started', { url: this.options.url, count, intervalMs });

    while (!signal?.aborted) {
      if (count !== undefined && this.total >= count) break;

      const result = await this.pingOnce();
      this.printResult(result);

      const done = count !== undefined && this.total >= count;
      if (done || signal?.aborted) break;
      await sleep(intervalMs, signal);
    }

    this.finishedAt = this.clock();
    const stats = this.statistics();
    this.printStatistics(stats);
    return stats;
  }

  /**
   * Issue one request and fold it into the statistics
   */
  async pingOnce(): Promise<PingResult> {
    const sequence = ++this.sequence;
    const check = await this.prober.probe(this.target);

    const result: PingResult = {
      sequence,
      url: this.options.url,
      statusCode: check.statusCode,
      responseTimeMs: check.responseTimeMs,
      success: check.success,
      error: check.error,
      timestamp: check.timestamp,
    };

    this.total++;
    if (result.success) {
      this.successful++;
      this.successTimeSumMs += result.responseTimeMs;
      if (this.minMs === null || result.responseTimeMs < this.minMs) this.minMs = result.responseTimeMs;
      if (this.maxMs === null || result.responseTimeMs > this.maxMs) this.maxMs = result.responseTimeMs;
    }

    return result;
  }

  statistics(): PingStatistics {
    const end = this.finishedAt ?? this.clock();
    return {
      totalRequests: this.total,
      successfulRequests: this.successful,
      failedRequests: this.total - this.successful,
      successRate: this.total > 0 ? (this.successful / this.total) * 100 : 0,
      minResponseTimeMs: this.minMs,
      avgResponseTimeMs: this.successful > 0 ? this.successTimeSumMs / this.successful : null,
      maxResponseTimeMs: this.maxMs,
      totalTimeMs: this.startedAt !== null ? end - this.startedAt : 0,
    };
  }

  private printResult(result: PingResult): void {
    const { json, statsOnly, quiet, verbose, colors } = this.options;

    if (json) {
      this.output(
        JSON.stringify({
          sequence: result.sequence,
          url: result.url,
          status_code: result.statusCode ?? null,
          response_time_ms: displayMs(result.responseTimeMs),
          success: result.success,
          error: result.error ?? null,
          timestamp: result.timestamp.toISOString(),
        })
      );
      return;
    }

    if (statsOnly) return;

    const mark = result.success ? paint('✓', 'info', colors) : paint('✗', 'error', colors);
    const status =
      result.statusCode !== undefined
        ? paint(String(result.statusCode), statusCodeTone(result.statusCode), colors)
        : paint('TIMEOUT/ERROR', 'error', colors);
    const ms = displayMs(result.responseTimeMs);
    const time = paint(`${ms}ms`, pingTimeTone(ms), colors);

    if (quiet) {
      this.output(`${mark} ${status} ${time}`);
      return;
    }

    this.output(`PING ${result.url} [${mark}]: seq=${result.sequence} status=${status} time=${time}`);
    if (verbose && result.error !== undefined) {
      this.output(`  Error: ${result.error}`);
    }
  }

  private printStatistics(stats: PingStatistics): void {
    if (this.options.json) {
      this.output(
        JSON.stringify({
          total_requests: stats.totalRequests,
          successful_requests: stats.successfulRequests,
          failed_requests: stats.failedRequests,
          success_rate: stats.successRate,
          min_response_time_ms: stats.minResponseTimeMs !== null ? displayMs(stats.minResponseTimeMs) : null,
          avg_response_time_ms: stats.avgResponseTimeMs !== null ? displayMs(stats.avgResponseTimeMs) : null,
          max_response_time_ms: stats.maxResponseTimeMs !== null ? displayMs(stats.maxResponseTimeMs) : null,
          total_time_ms: stats.totalTimeMs,
        })
      );
      return;
    }

    const loss = stats.totalRequests > 0 ? 100 - stats.successRate : 0;

    this.output('');
    this.output(`--- ${this.options.url} ping statistics ---`);
    this.output(
      `${stats.totalRequests} requests transmitted, ${stats.successfulRequests} received, ${loss.toFixed(1)}% loss`
    );

    if (stats.minResponseTimeMs !== null && stats.avgResponseTimeMs !== null && stats.maxResponseTimeMs !== null) {
      this.output(
        `round-trip min/avg/max = ${displayMs(stats.minResponseTimeMs)}/${displayMs(stats.avgResponseTimeMs)}/${displayMs(stats.maxResponseTimeMs)} ms`
      );
    }
  }
}
