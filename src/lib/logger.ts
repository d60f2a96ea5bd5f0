import { APP_CONFIG } from './config';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFields = Record<string, unknown>;

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  component?: string;
  message: string;
  fields?: LogFields;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * JSON-line logger. Each engine holds a scoped instance, so every entry names
 * the component that wrote it; dataset names, row counts and cache keys travel
 * in `fields`.
 */
export class Logger {
  constructor(
    private readonly minLevel: LogLevel,
    private readonly component?: string,
  ) {}

  scoped(component: string): Logger {
    return new Logger(this.minLevel, component);
  }

  enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.minLevel];
  }

  private emit(level: LogLevel, message: string, fields?: LogFields): void {
    if (!this.enabled(level)) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      ...(this.component ? { component: this.component } : {}),
      message,
      ...(fields && Object.keys(fields).length > 0 ? { fields } : {}),
    };
    const line = JSON.stringify(entry);

    if (level === 'error') {
      console.error(line);
    } else if (level === 'warn') {
      console.warn(line);
    } else {
      console.log(line);
    }
  }

  debug(message: string, fields?: LogFields): void {
    this.emit('debug', message, fields);
  }

  info(message: string, fields?: LogFields): void {
    this.emit('info', message, fields);
  }

  warn(message: string, fields?: LogFields): void {
    this.emit('warn', message, fields);
  }

  /** Written right before a `FatalConfigurationError` is thrown. */
  error(message: string, fields?: LogFields): void {
    this.emit('error', message, fields);
  }
}

const GLOBAL_LOGGER_KEY = '__dashboardLogger__';

function rootLogger(): Logger {
  const g = globalThis as unknown as Record<string, Logger | undefined>;
  const existing = g[GLOBAL_LOGGER_KEY];
  if (existing) return existing;
  const created = new Logger(APP_CONFIG.logLevel);
  g[GLOBAL_LOGGER_KEY] = created;
  return created;
}

/** The process-wide logger, or a view of it scoped to `component`. */
export function getLogger(component?: string): Logger {
  const root = rootLogger();
  return component ? root.scoped(component) : root;
}
