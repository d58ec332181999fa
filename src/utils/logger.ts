import { Logger, LogLevel } from '../types/index.js';
import { ENV_VARS } from '../constants/index.js';

const LEVEL_ORDER: readonly LogLevel[] = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];

const PREFIXES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: '🐛 [DEBUG]',
  [LogLevel.INFO]: 'ℹ️  [INFO] ',
  [LogLevel.WARN]: '⚠️  [WARN] ',
  [LogLevel.ERROR]: '❌ [ERROR]'
};

/** Where formatted lines go; the console unless a test substitutes one */
export type LogSink = (level: LogLevel, line: string) => void;

const consoleSink: LogSink = (level, line) => {
  switch (level) {
    case LogLevel.DEBUG:
      console.debug(line);
      break;
    case LogLevel.INFO:
      console.info(line);
      break;
    case LogLevel.WARN:
      console.warn(line);
      break;
    case LogLevel.ERROR:
      console.error(line);
      break;
  }
};

// Shared by a logger and every module logger derived from it
interface LevelState {
  level: LogLevel;
}

/**
 * Console logger with level filtering. Module loggers tag each line with the
 * module being installed, since concurrent installs interleave their output.
 */
export class ConsoleLogger implements Logger {
  constructor(
    private readonly state: LevelState,
    private readonly scope = '',
    private readonly sink: LogSink = consoleSink
  ) {}

  /**
   * Logger for one module. It follows later `setLevel` calls on this logger.
   */
  forModule(name: string): ConsoleLogger {
    return new ConsoleLogger(this.state, name || '.', this.sink);
  }

  setLevel(level: LogLevel): void {
    this.state.level = level;
  }

  debug(message: string, meta?: unknown): void {
    this.log(LogLevel.DEBUG, message, meta);
  }

  info(message: string, meta?: unknown): void {
    this.log(LogLevel.INFO, message, meta);
  }

  warn(message: string, meta?: unknown): void {
    this.log(LogLevel.WARN, message, meta);
  }

  error(message: string, meta?: unknown): void {
    this.log(LogLevel.ERROR, message, meta);
  }

  private log(level: LogLevel, message: string, meta: unknown): void {
    if (LEVEL_ORDER.indexOf(level) < LEVEL_ORDER.indexOf(this.state.level)) {
      return;
    }
    this.sink(level, `${new Date().toISOString()} ${this.formatMessage(level, message, meta)}`);
  }

  /**
   * Everything after the timestamp.
   */
  formatMessage(level: LogLevel, message: string, meta?: unknown): string {
    const scope = this.scope ? ` [${this.scope}]` : '';
    let formatted = `${PREFIXES[level]}${scope} ${message}`;

    if (meta && typeof meta === 'object') {
      // JSON.stringify(new Error()) is {}
      const metaToLog = meta instanceof Error
        ? { name: meta.name, message: meta.message, stack: meta.stack }
        : meta;
      formatted += `\n${JSON.stringify(metaToLog, null, 2)}`;
    } else if (meta !== undefined && meta !== null && meta !== '') {
      formatted += ` ${String(meta)}`;
    }

    return formatted;
  }
}

export function levelFromEnv(env: NodeJS.ProcessEnv): LogLevel {
  if (env[ENV_VARS.VERBOSE] === '1') {
    return LogLevel.DEBUG;
  }
  return env.NODE_ENV === 'development' ? LogLevel.INFO : LogLevel.ERROR;
}

export function createLogger(level: LogLevel, sink?: LogSink): ConsoleLogger {
  return new ConsoleLogger({ level }, '', sink);
}

export const logger = createLogger(levelFromEnv(process.env));
