import { Command } from 'commander';
import { writeFile } from 'fs/promises';
import type { Server } from 'http';
import { stringify as stringifyYaml } from 'yaml';
import { z } from 'zod';
import { startApiServer, stopApiServer } from './api/server.js';
import {
  ConfigError,
  HTTP_METHODS,
  LogLevelSchema,
  exampleMonitorConfig,
  formatIssues,
  getConfig,
  loadMonitorConfig,
  secondsToMs,
} from './config/index.js';
import { MonitorService } from './services/healthMonitor/index.js';
import { HttpPinger, parseHeaderArgs } from './services/pinger/index.js';
import { consoleOutput, type OutputWriter } from './services/reporter/index.js';
import { closeFileLogging, initializeFileLogging } from './utils/fileLogger.js';
import { configureLogger, logger } from './utils/logger.js';

const log = logger('CLI');

export const DEFAULT_INIT_PATH = 'monitor.yml';

/**
 * Program dependencies, replaced in tests
 */
export interface ProgramDeps {
  output?: OutputWriter;
  /** Stops `monitor` and `ping` in addition to SIGINT/SIGTERM */
  signal?: AbortSignal;
}

const MonitorCliSchema = z.object({
  config: z.string().min(1).optional(),
});

const InitCliSchema = z.object({
  output: z.string().min(1).default(DEFAULT_INIT_PATH),
  force: z.boolean().default(false),
});

const PingCliSchema = z.object({
  count: z.coerce.number().int().positive().optional(),
  interval: z.coerce.number().positive().default(1),
  timeout: z.coerce.number().positive().default(10),
  method: z
    .string()
    .default('GET')
    .transform((method) => method.toUpperCase())
    .pipe(z.enum(HTTP_METHODS)),
  header: z.array(z.string()).default([]),
  userAgent: z.string().min(1).optional(),
  quiet: z.boolean().default(false),
  statsOnly: z.boolean().default(false),
  verbose: z.boolean().default(false),
  json: z.boolean().default(false),
  color: z.boolean().default(true),
});

function parseOptions<T extends z.ZodTypeAny>(schema: T, values: unknown, what: string): z.output<T> {
  const result = schema.safeParse(values);
  if (!result.success) {
    throw new ConfigError(`Invalid ${what} options`, formatIssues(result.error));
  }
  return result.data;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Abort on SIGINT/SIGTERM or when the caller's signal aborts. Returns the
 * signal and a function that removes the process listeners.
 */
function shutdownSignal(external?: AbortSignal): { signal: AbortSignal; release: () => void } {
  const controller = new AbortController();

  const onSignal = (name: NodeJS.Signals): void => {
    log.info(`Received ${name}, shutting down...`);
    controller.abort();
  };
  const onExternalAbort = (): void => controller.abort();

  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);
  if (external?.aborted) {
    controller.abort();
  } else {
    external?.addEventListener('abort', onExternalAbort, { once: true });
  }

  return {
    signal: controller.signal,
    release: () => {
      process.off('SIGINT', onSignal);
      process.off('SIGTERM', onSignal);
      external?.removeEventListener('abort', onExternalAbort);
    },
  };
}

function isAlreadyExists(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EEXIST';
}

async function runMonitor(options: z.output<typeof MonitorCliSchema>, deps: ProgramDeps): Promise<void> {
  const output = deps.output ?? consoleOutput;
  const env = getConfig();
  const path = options.config ?? env.monitorConfigPath;

  const config = await loadMonitorConfig(path);
  configureLogger({ colors: config.settings.enableColors });
  if (config.settings.logFile !== undefined) {
    initializeFileLogging({ filePath: config.settings.logFile });
  }

  log.info('Monitor configuration loaded', { path, targets: config.targets.length, alerts: config.alerts.length });

  const service = new MonitorService({ config, output });
  const { signal, release } = shutdownSignal(deps.signal);

  let server: Server | null = null;
  try {
    if (env.api.enabled) {
      server = await startApiServer(env.api.port, { snapshots: () => service.snapshots() });
    }
    await service.run(signal);
  } finally {
    release();
    if (server) {
      await stopApiServer(server);
    }
    closeFileLogging();
  }
}

async function runInit(options: z.output<typeof InitCliSchema>, deps: ProgramDeps): Promise<void> {
  const output = deps.output ?? consoleOutput;
  const content = stringifyYaml(exampleMonitorConfig());

  try {
    await writeFile(options.output, content, { encoding: 'utf8', flag: options.force ? 'w' : 'wx' });
  } catch (error) {
    if (isAlreadyExists(error)) {
      throw new ConfigError(`Refusing to overwrite existing file '${options.output}' (use --force)`);
    }
    throw error;
  }

  output(`✅ Example configuration written to: ${options.output}`);
  output(`📝 Edit the file and run: http-monitor monitor -c ${options.output}`);
}

async function runPing(url: string, options: z.output<typeof PingCliSchema>, deps: ProgramDeps): Promise<void> {
  const parsedUrl = z.string().url().safeParse(url);
  if (!parsedUrl.success) {
    throw new ConfigError(`Invalid URL '${url}'`);
  }

  const { headers, invalid } = parseHeaderArgs(options.header);
  for (const header of invalid) {
    log.warn('Ignoring malformed header, expected "Name: value"', { header });
  }

  const pinger = new HttpPinger(
    {
      url: parsedUrl.data,
      count: options.count,
      intervalMs: secondsToMs(options.interval),
      timeoutMs: secondsToMs(options.timeout),
      method: options.method,
      headers,
      userAgent: options.userAgent,
      quiet: options.quiet,
      statsOnly: options.statsOnly,
      verbose: options.verbose,
      json: options.json,
      colors: options.color,
    },
    { output: deps.output }
  );

  const { signal, release } = shutdownSignal(deps.signal);
  try {
    await pinger.run(signal);
  } finally {
    release();
  }
}

/**
 * Build the command-line program
 */
export function createProgram(deps: ProgramDeps = {}): Command {
  const program = new Command();

  program
    .name('http-monitor')
    .description('Monitor HTTP endpoints, alert on failures and ping single URLs')
    .option('--log-level <level>', 'Log level (error, warn, info, http, verbose, debug, silly)')
    .hook('preAction', (thisCommand) => {
      const level = parseOptions(
        z.object({ logLevel: LogLevelSchema.optional() }),
        thisCommand.opts(),
        'global'
      ).logLevel;
      if (level) {
        configureLogger({ level });
      }
    });

  program
    .command('monitor')
    .description('Monitor every target in a monitor file until interrupted')
    .option('-c, --config <path>', 'Monitor file, YAML or JSON (default: MONITOR_CONFIG_PATH or monitor.yml)')
    .action(async (options: unknown) => {
      await runMonitor(parseOptions(MonitorCliSchema, options, 'monitor'), deps);
    });

  program
    .command('init')
    .description('Write an example monitor file')
    .option('-o, --output <path>', 'Where to write the file', DEFAULT_INIT_PATH)
    .option('-f, --force', 'Overwrite an existing file', false)
    .action(async (options: unknown) => {
      await runInit(parseOptions(InitCliSchema, options, 'init'), deps);
    });

  // `http-monitor <url> [options]` without a subcommand pings
  program
    .command('ping', { isDefault: true })
    .description('Request a single URL repeatedly and print statistics')
    .argument('<url>', 'URL to ping')
    .option('-c, --count <n>', 'Number of requests (default: until interrupted)')
    .option('-i, --interval <seconds>', 'Seconds between requests', '1')
    .option('-t, --timeout <seconds>', 'Request timeout in seconds', '10')
    .option('-m, --method <method>', 'HTTP method', 'GET')
    .option('-H, --header <header>', 'Extra header "Name: value" (repeatable)', collect, [])
    .option('-u, --user-agent <agent>', 'User-Agent (default: random browser)')
    .option('-q, --quiet', 'Compact output', false)
    .option('-s, --stats-only', 'Only print the final statistics', false)
    .option('-v, --verbose', 'Print error details', false)
    .option('--json', 'JSON output', false)
    .option('--no-color', 'Disable colors')
    .action(async (url: string, options: unknown) => {
      await runPing(url, parseOptions(PingCliSchema, options, 'ping'), deps);
    });

  return program;
}
