import { logger, type Logger } from '../../utils/logger.js';
import type { HealthSnapshot } from '../healthMonitor/HealthAggregate.js';
import type { OutputWriter } from './output.js';
import { FINAL_SUMMARY_TITLE, STATUS_SUMMARY_TITLE, renderStatusTable } from './renderers.js';

/**
 * Status reporter configuration
 */
export interface StatusReporterConfig {
  /** Read-only snapshot source; must not block */
  snapshots: () => readonly HealthSnapshot[];
  output: OutputWriter;
  intervalMs: number;
  colors: boolean;
}

/**
 * Prints the status table on a fixed cadence. Never mutates health state.
 */
export class StatusReporter {
  private readonly config: StatusReporterConfig;
  private readonly log: Logger;
  private timer: NodeJS.Timeout | null = null;
  private finalPrinted = false;

  constructor(config: StatusReporterConfig) {
    this.config = config;
    this.log = logger('StatusReporter');
  }

  start(): void {
    if (this.timer) {
      this.log.warn('Status reporter already running');
      return;
    }

    this.timer = setInterval(() => {
      this.printSummary();
    }, this.config.intervalMs);

    this.log.debug('Status reporter started', { intervalMs: this.config.intervalMs });
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
    this.log.debug('Status reporter stopped');
  }

  get isRunning(): boolean {
    return this.timer !== null;
  }

  /**
   * Print the periodic table now
   */
  printSummary(): void {
    this.print(STATUS_SUMMARY_TITLE);
  }

  /**
   * Print the shutdown table. Only the first call prints.
   */
  printFinalSummary(): boolean {
    if (this.finalPrinted) return false;
    this.finalPrinted = true;
    this.print(FINAL_SUMMARY_TITLE);
    return true;
  }

  private print(title: string): void {
    const lines = renderStatusTable(this.config.snapshots(), { title, colors: this.config.colors });
    for (const line of lines) {
      this.config.output(line);
    }
  }
}
