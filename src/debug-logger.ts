/**
 * Debug logging for the derivation engine.
 * Controlled by environment variables:
 * - DEBUG_DERIVE=true to enable debug logging
 * - DEBUG_DERIVE_LEVEL=TRACE|DEBUG|INFO (default: DEBUG)
 * - DEBUG_DERIVE_FILTER=SEARCH,UNIFY,... (comma-separated components)
 */

export enum LogLevel {
  TRACE = 0,
  DEBUG = 1,
  INFO = 2,
}

export enum LogComponent {
  SEARCH = 'SEARCH',
  UNIFY = 'UNIFY',
  RENAME = 'RENAME',
  RENDER = 'RENDER',
}

export type LoggerOptions = {
  enabled: boolean;
  level: LogLevel;
  /** Components to log, or null for all of them. */
  components: Set<string> | null;
  sink: (line: string) => void;
};

function parseLevel(levelStr: string | undefined): LogLevel {
  switch (levelStr?.toUpperCase()) {
    case 'TRACE':
      return LogLevel.TRACE;
    case 'INFO':
      return LogLevel.INFO;
    default:
      return LogLevel.DEBUG;
  }
}

/**
 * Reads logger options from the environment.
 */
export function optionsFromEnv(env: NodeJS.ProcessEnv): LoggerOptions {
  const filterStr = env.DEBUG_DERIVE_FILTER;
  return {
    enabled: env.DEBUG_DERIVE === 'true',
    level: parseLevel(env.DEBUG_DERIVE_LEVEL),
    components: filterStr
      ? new Set(filterStr.split(',').map((s) => s.trim()))
      : null,
    sink: (line) => console.log(line),
  };
}

export class DebugLogger {
  private opts: LoggerOptions;

  constructor(opts: LoggerOptions) {
    this.opts = opts;
  }

  /**
   * Replaces some of the options in place, e.g. to capture output in tests.
   */
  configure(opts: Partial<LoggerOptions>): void {
    this.opts = { ...this.opts, ...opts };
  }

  shouldLog(level: LogLevel, component: LogComponent): boolean {
    if (!this.opts.enabled) return false;
    if (level < this.opts.level) return false;
    if (this.opts.components && !this.opts.components.has(component))
      return false;
    return true;
  }

  private formatMessage(
    level: LogLevel,
    component: LogComponent,
    message: string
  ): string {
    const timestamp = new Date().toISOString();
    const levelStr = LogLevel[level];
    return `[${timestamp}] [${levelStr}] [${component}] ${message}`;
  }

  private log(level: LogLevel, component: LogComponent, message: string): void {
    if (this.shouldLog(level, component)) {
      this.opts.sink(this.formatMessage(level, component, message));
    }
  }

  trace(component: LogComponent, message: string): void {
    this.log(LogLevel.TRACE, component, message);
  }

  debug(component: LogComponent, message: string): void {
    this.log(LogLevel.DEBUG, component, message);
  }

  info(component: LogComponent, message: string): void {
    this.log(LogLevel.INFO, component, message);
  }

  /**
   * Logs a lazily rendered message, so that expensive renders (whole proof
   * trees, say) only happen when the line is actually emitted.
   */
  lazy(level: LogLevel, component: LogComponent, render: () => string): void {
    if (this.shouldLog(level, component)) {
      this.opts.sink(this.formatMessage(level, component, render()));
    }
  }
}

// Singleton instance
export const debugLogger = new DebugLogger(optionsFromEnv(process.env));
