import { v4 as uuidv4 } from 'uuid';
import type { LogLevel } from '../config/appConfig';

export type { LogLevel } from '../config/appConfig';

const LOG_LEVELS: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };
let currentLogLevel: LogLevel = 'info';

interface LogMeta {
  correlationId?: string;
  chatId?: string;
  intent?: string;
  strategy?: string;
  duration?: number;
  error?: string;
  stack?: string;
  [key: string]: unknown;
}

/**
 * Set the minimum level written to the console. Called once by entry points
 * with the value from AppConfig.
 */
export function setLogLevel(level: LogLevel): void {
  currentLogLevel = level;
}

export function generateCorrelationId(): string {
  return uuidv4().substring(0, 8);
}

function write(level: LogLevel, context: string, message: string, meta?: LogMeta): void {
  if (LOG_LEVELS[level] < LOG_LEVELS[currentLogLevel]) return;

  const correlationPrefix = meta?.correlationId ? `[${meta.correlationId}] ` : '';
  const rest = meta ? Object.fromEntries(Object.entries(meta).filter(([key, value]) => key !== 'correlationId' && value !== undefined)) : {};
  const metaStr = Object.keys(rest).length > 0 ? ` ${JSON.stringify(rest)}` : '';
  const line = `[${context}] ${correlationPrefix}${message}${metaStr}`;

  switch (level) {
    case 'error':
      console.error(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    default:
      console.log(line);
  }
}

export type Logger = {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, err?: unknown, meta?: LogMeta): void;
};

function errorMeta(err: unknown): Partial<LogMeta> {
  if (err instanceof Error) {
    return { error: err.message, stack: err.stack };
  }
  if (err !== undefined) {
    return { error: String(err) };
  }
  return {};
}

/**
 * Console logger with a bracketed context prefix, e.g. `[Vocabulary] refreshed`.
 */
export function createLogger(context: string): Logger {
  return {
    debug: (message, meta) => write('debug', context, message, meta),
    info: (message, meta) => write('info', context, message, meta),
    warn: (message, meta) => write('warn', context, message, meta),
    error: (message, err, meta) => write('error', context, message, { ...errorMeta(err), ...meta }),
  };
}

/**
 * Per-request logger that stamps every line with a correlation id, the
 * conversation id and the elapsed time.
 */
export class RequestLogger {
  private correlationId: string;
  private startTime: number;
  private chatId?: string;
  private logger: Logger;
  private stages: Map<string, number> = new Map();

  constructor(context: string, chatId?: string) {
    this.correlationId = generateCorrelationId();
    this.startTime = Date.now();
    this.chatId = chatId;
    this.logger = createLogger(context);
  }

  private getMeta(extra?: Partial<LogMeta>): LogMeta {
    return {
      correlationId: this.correlationId,
      chatId: this.chatId,
      duration: Date.now() - this.startTime,
      ...extra,
    };
  }

  startStage(name: string): void {
    this.stages.set(name, Date.now());
  }

  endStage(name: string): number {
    const start = this.stages.get(name);
    if (start === undefined) return 0;
    const duration = Date.now() - start;
    this.stages.delete(name);
    return duration;
  }

  info(message: string, extra?: Partial<LogMeta>): void {
    this.logger.info(message, this.getMeta(extra));
  }

  error(message: string, err?: unknown, extra?: Partial<LogMeta>): void {
    this.logger.error(message, err, this.getMeta(extra));
  }

  warn(message: string, extra?: Partial<LogMeta>): void {
    this.logger.warn(message, this.getMeta(extra));
  }

  debug(message: string, extra?: Partial<LogMeta>): void {
    this.logger.debug(message, this.getMeta(extra));
  }
}
