/**
 * Structured Logger using Pino
 *
 * All log output goes to stderr: stdout is reserved for the JSON task
 * result so the CLI can be piped into other tools.
 */

import pino, { Logger as PinoLogger, LoggerOptions } from 'pino';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/**
 * Log context metadata
 */
export interface LogContext {
  component?: string;
  site?: string;
  url?: string;
  tabId?: string;
  logicalName?: string;
  strategy?: string;
  action?: string;
  durationMs?: number;
  [key: string]: unknown;
}

export interface LoggerConfig {
  level: LogLevel;
  prettyPrint: boolean;
}

function envLevel(): LogLevel {
  const raw = process.env.LOG_LEVEL;
  switch (raw) {
    case 'debug':
    case 'info':
    case 'warn':
    case 'error':
    case 'silent':
      return raw;
    default:
      return 'info';
  }
}

const DEFAULT_CONFIG: LoggerConfig = {
  level: envLevel(),
  prettyPrint: process.env.LOG_PRETTY === 'true',
};

/**
 * Paths to redact so session state and credentials never reach the logs.
 */
const REDACT_PATHS = [
  '*.authorization',
  '*.Authorization',
  '*.cookie',
  '*.Cookie',
  '*.cookies',
  '*.cookieJar',
  '*.password',
  '*.token',
  '*.storageState',
  '*.origins',
  'headers.authorization',
  'headers.cookie',
  'state.cookies',
  'state.cookieJar',
  'state.origins',
];

function createBaseLogger(config: LoggerConfig = DEFAULT_CONFIG): PinoLogger {
  const options: LoggerOptions = {
    level: config.level,
    base: {
      pid: process.pid,
      service: 'mendscrape',
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
    redact: {
      paths: REDACT_PATHS,
      censor: '[REDACTED]',
    },
  };

  if (config.prettyPrint) {
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname,service',
          destination: 2,
        },
      },
    });
  }

  return pino(options, process.stderr);
}

let baseLogger = createBaseLogger();

/**
 * Reconfigure the logger (the CLI calls this once the config file is read)
 */
export function configureLogger(config: Partial<LoggerConfig>): void {
  baseLogger = createBaseLogger({ ...DEFAULT_CONFIG, ...config });
}

/**
 * Component-specific logger wrapper
 *
 * Resolves the base logger lazily so configureLogger() also affects
 * loggers created at module load time.
 */
export class Logger {
  private bound: { base: PinoLogger; logger: PinoLogger } | null = null;

  constructor(private readonly component: string) {}

  private get logger(): PinoLogger {
    const bound = this.bound;
    if (bound && bound.base === baseLogger) {
      return bound.logger;
    }
    const logger = baseLogger.child({ component: this.component });
    this.bound = { base: baseLogger, logger };
    return logger;
  }

  debug(message: string, context?: LogContext): void {
    this.logger.debug(context || {}, message);
  }

  info(message: string, context?: LogContext): void {
    this.logger.info(context || {}, message);
  }

  warn(message: string, context?: LogContext): void {
    this.logger.warn(context || {}, message);
  }

  /**
   * Accepts unknown for `error` since catch blocks provide unknown
   */
  error(message: string, context?: LogContext & { error?: unknown }): void {
    if (context?.error) {
      const err = context.error instanceof Error
        ? {
            message: context.error.message,
            name: context.error.name,
            stack: context.error.stack,
          }
        : { message: String(context.error) };

      this.logger.error({ ...context, err }, message);
    } else {
      this.logger.error(context || {}, message);
    }
  }

  timed(message: string, startTime: number, context?: LogContext): void {
    const durationMs = Date.now() - startTime;
    this.info(message, { ...context, durationMs });
  }
}

/**
 * Pre-configured loggers for each component
 */
export const logger = {
  browser: new Logger('BrowserManager'),
  staticPages: new Logger('StaticPageProvider'),
  pool: new Logger('PagePool'),
  orchestrator: new Logger('TabOrchestrator'),
  resolver: new Logger('SelectorResolver'),
  cache: new Logger('SelectorCache'),
  extractor: new Logger('ContentExtractor'),
  streaming: new Logger('StreamingExtractor'),
  network: new Logger('NetworkMonitor'),
  session: new Logger('SessionManager'),
  executor: new Logger('TaskExecutor'),
  config: new Logger('ConfigLoader'),
  store: new Logger('PersistentStore'),
  cli: new Logger('Cli'),

  create: (component: string) => new Logger(component),
};

export default logger;
