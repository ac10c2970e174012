/**
 * Structured logging on pino
 *
 * JSON lines on stderr, one child per component, so stdout carries nothing
 * but the CLI's tables. `LOG_LEVEL` and `LOG_PRETTY` are read at start-up;
 * the CLI calls configureLogger() again with the validated values.
 */

import pino, { type Logger as PinoLogger } from 'pino';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/**
 * Fields attached to an entry; scrape code mostly sets provider, url and attempt
 */
export interface LogContext {
  provider?: string;
  url?: string;
  attempt?: number;
  durationMs?: number;
  [key: string]: unknown;
}

export interface LoggerConfig {
  level: LogLevel;
  prettyPrint: boolean;
}

const LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

function levelFromEnv(): LogLevel {
  return LEVELS.find((level) => level === process.env.LOG_LEVEL) ?? 'info';
}

const startupConfig: LoggerConfig = {
  level: levelFromEnv(),
  prettyPrint: process.env.LOG_PRETTY === 'true',
};

// Provider pages hand out session cookies; keep them out of the logs
const REDACT_PATHS = ['*.cookie', '*.set-cookie', 'headers.cookie', 'headers["set-cookie"]'];

function createRoot(config: LoggerConfig): PinoLogger {
  const options = {
    level: config.level,
    base: { service: 'broadband-scout' },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: { level: (label: string) => ({ level: label }) },
    redact: { paths: REDACT_PATHS, censor: '[REDACTED]' },
  };

  if (config.prettyPrint) {
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: { colorize: true, translateTime: 'SYS:standard', ignore: 'service', destination: 2 },
      },
    });
  }
  return pino(options, process.stderr);
}

let root = createRoot(startupConfig);

export function configureLogger(config: Partial<LoggerConfig>): void {
  root = createRoot({ ...startupConfig, ...config });
}

/**
 * Component logger. Bindings are applied to the current root at call time,
 * so loggers created at import still follow configureLogger().
 */
export class Logger {
  constructor(
    private readonly component: string,
    private readonly bindings: LogContext = {}
  ) {}

  private get target(): PinoLogger {
    return root.child({ component: this.component, ...this.bindings });
  }

  child(context: LogContext): Logger {
    return new Logger(this.component, { ...this.bindings, ...context });
  }

  debug(message: string, context: LogContext = {}): void {
    this.target.debug(context, message);
  }

  info(message: string, context: LogContext = {}): void {
    this.target.info(context, message);
  }

  warn(message: string, context: LogContext = {}): void {
    this.target.warn(context, message);
  }

  /**
   * `error` may be anything a catch block hands over
   */
  error(message: string, context: LogContext & { error?: unknown } = {}): void {
    const { error, ...rest } = context;
    if (error === undefined) {
      this.target.error(rest, message);
      return;
    }
    const err =
      error instanceof Error
        ? { name: error.name, message: error.message, stack: error.stack }
        : { message: String(error) };
    this.target.error({ ...rest, err }, message);
  }

  timed(message: string, startTime: number, context: LogContext = {}): void {
    this.info(message, { ...context, durationMs: Date.now() - startTime });
  }
}

export const logger = {
  browser: new Logger('BrowserManager'),
  robots: new Logger('RobotsGate'),
  driver: new Logger('NavigationDriver'),
  wizard: new Logger('WizardStateMachine'),
  recovery: new Logger('SessionRecovery'),
  session: new Logger('ScrapeSession'),
  orchestrator: new Logger('ScrapeOrchestrator'),
  cache: new Logger('OfferCache'),
  retry: new Logger('Retry'),
  cli: new Logger('Cli'),

  create: (component: string) => new Logger(component),
};

export default logger;
