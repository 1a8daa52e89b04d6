/**
 * Monitor Service
 *
 * Orchestrates endpoint monitoring: one supervised poll loop per target,
 * the alert evaluator and the periodic status reporter.
 *
 * Each target's HealthAggregate is owned by its own loop. The reporter and
 * the status API only ever see copies via snapshots().
 */

import { EventEmitter } from 'events';
import { OUTPUT_FORMATS, type HealthStatus, type MonitorConfig, type Target } from '../../config/index.js';
import { errorMessage, logger } from '../../utils/logger.js';
import * as metrics from '../../utils/metrics.js';
import { sleep, type ClockFn } from '../../utils/time.js';
import { AlertEvaluator, WebhookNotifier, type AlertNotifier } from '../alerting/index.js';
import {
  Prober,
  TlsCertificateInspector,
  UnknownCertificateInspector,
  type HealthCheck,
} from '../prober/index.js';
import { CSV_HEADER, StatusReporter, consoleOutput, renderCheck, type OutputWriter } from '../reporter/index.js';
import { HealthAggregate, type HealthSnapshot } from './HealthAggregate.js';
import { PollLoop } from './PollLoop.js';

const log = logger('MonitorService');

/**
 * Monitor service dependencies. Everything but the config has a default.
 */
export interface MonitorServiceOptions {
  config: MonitorConfig;
  prober?: Pick<Prober, 'probe'>;
  notifier?: AlertNotifier;
  output?: OutputWriter;
  clock?: ClockFn;
}

/**
 * Monitor service events
 */
export interface MonitorServiceEvents {
  check: (target: Target, check: HealthCheck, snapshot: HealthSnapshot) => void;
  statusChange: (target: Target, from: HealthStatus, to: HealthStatus) => void;
  loopError: (target: Target, error: unknown) => void;
}

interface MonitoredTarget {
  target: Target;
  aggregate: HealthAggregate;
  loop: PollLoop;
}

/**
 * Monitor Service
 */
export class MonitorService extends EventEmitter {
  private readonly config: MonitorConfig;
  private readonly output: OutputWriter;
  private readonly evaluator: AlertEvaluator;
  private readonly reporter: StatusReporter;
  // Registry order follows the monitor file
  private readonly monitored: Map<string, MonitoredTarget> = new Map();
  private isRunning: boolean = false;
  private hasRun: boolean = false;

  constructor(options: MonitorServiceOptions) {
    super();
    const { config } = options;
    const { settings } = config;

    this.config = config;
    this.output = options.output ?? consoleOutput;

    const prober =
      options.prober ??
      new Prober({
        certificates: settings.checkCertificates ? new TlsCertificateInspector() : new UnknownCertificateInspector(),
      });

    this.evaluator = new AlertEvaluator({
      rules: config.alerts,
      notifier: options.notifier ?? new WebhookNotifier({ timeoutMs: settings.webhookTimeoutMs }),
      clock: options.clock,
    });

    this.reporter = new StatusReporter({
      snapshots: () => this.snapshots(),
      output: this.output,
      intervalMs: settings.reportIntervalMs,
      colors: settings.enableColors,
    });

    for (const target of config.targets) {
      const aggregate = new HealthAggregate(target, { unhealthyAfterFailures: settings.unhealthyAfterFailures });
      const loop = new PollLoop({
        target,
        aggregate,
        prober,
        alerts: this.evaluator,
        clock: options.clock,
        onCheck: (check, snapshot) => this.handleCheck(target, check, snapshot),
        onStatusChange: (from, to) => this.handleStatusChange(target, from, to),
      });
      this.monitored.set(target.name, { target, aggregate, loop });
    }
  }

  /**
   * Monitor every target until the signal aborts. Resolves once all loops
   * have stopped and pending alerts settled, after printing the final summary.
   */
  async run(signal: AbortSignal): Promise<void> {
    if (this.hasRun) {
      throw new Error('Monitor service can only run once');
    }
    this.hasRun = true;
    this.isRunning = true;

    log.info('Starting monitor', {
      targets: this.monitored.size,
      alertRules: this.config.alerts.length,
      outputFormat: this.config.settings.outputFormat,
    });

    if (this.config.settings.outputFormat === OUTPUT_FORMATS.CSV) {
      this.output(CSV_HEADER);
    }

    this.reporter.start();

    try {
      await Promise.all([...this.monitored.values()].map((entry) => this.supervise(entry, signal)));
    } finally {
      this.reporter.stop();
      await this.evaluator.drain();
      this.isRunning = false;
    }

    this.reporter.printFinalSummary();
    log.info('Monitor stopped');
  }

  /**
   * Copies of every target's health, in configuration order
   */
  snapshots(): HealthSnapshot[] {
    return [...this.monitored.values()].map((entry) => entry.aggregate.snapshot());
  }

  snapshot(targetName: string): HealthSnapshot | undefined {
    return this.monitored.get(targetName)?.aggregate.snapshot();
  }

  isMonitoring(): boolean {
    return this.isRunning;
  }

  /**
   * Keep a target's loop alive: a loop that throws is logged and restarted
   * after its interval. Other targets are unaffected.
   */
  private async supervise(entry: MonitoredTarget, signal: AbortSignal): Promise<void> {
    const { target, loop } = entry;

    while (!signal.aborted) {
      try {
        await loop.run(signal);
      } catch (error) {
        log.error('Poll loop failed, restarting', { target: target.name, error: errorMessage(error) });
        metrics.loopRestarts.labels(target.name).inc();
        this.emit('loopError', target, error);
        await sleep(target.intervalMs, signal);
      }
    }
  }

  private handleCheck(target: Target, check: HealthCheck, snapshot: HealthSnapshot): void {
    const { outputFormat, enableColors } = this.config.settings;
    for (const line of renderCheck(outputFormat, check, { colors: enableColors })) {
      this.output(line);
    }
    this.emit('check', target, check, snapshot);
  }

  private handleStatusChange(target: Target, from: HealthStatus, to: HealthStatus): void {
    log.info('Target status changed', { target: target.name, from, to });
    this.emit('statusChange', target, from, to);
  }
}
