/**
 * Logger utility with verbose mode support
 * - info(): always prints (concise mode)
 * - debug(): only prints with --verbose or LOG_LEVEL=debug
 * - scope(): tagged child logger that also records lines into an episode log
 */

export interface LoggerConfig {
  verbose?: boolean;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Lines accumulated for one document-acquisition episode.
 * Returned to callers alongside the capture outcome.
 */
export class EpisodeLog {
  private readonly lines: string[] = [];

  record(level: LogLevel, message: string): void {
    this.lines.push(`${level.toUpperCase()} ${message}`);
  }

  entries(): readonly string[] {
    return [...this.lines];
  }
}

class Logger {
  private verbose: boolean = false;

  constructor(config?: LoggerConfig) {
    this.verbose = config?.verbose ?? false;
  }

  /**
   * Set verbose mode
   */
  setVerbose(verbose: boolean): void {
    this.verbose = verbose;
  }

  /**
   * Always prints - used for concise summary lines
   */
  info(message: string): void {
    console.log(`[clean-hands] ${message}`);
  }

  /**
   * Only prints in verbose mode - used for detailed steps and strategy failures
   */
  debug(message: string): void {
    if (this.verbose) {
      console.log(`[clean-hands] DEBUG: ${message}`);
    }
  }

  /**
   * Print a warning message
   */
  warn(message: string): void {
    console.warn(`[clean-hands] WARNING: ${message}`);
  }

  /**
   * Print an error message
   */
  error(message: string): void {
    console.error(`[clean-hands] ERROR: ${message}`);
  }

  /**
   * Print a phase completion message
   */
  phaseComplete(phaseName: string, details?: string): void {
    const msg = details
      ? `${phaseName} complete: ${details}`
      : `${phaseName} complete`;
    this.info(msg);
  }

  /**
   * Tagged logger for one capture component, e.g. scope('route') prints "[route] ..."
   */
  scope(tag: string, episode?: EpisodeLog): ScopedLogger {
    return new ScopedLogger(this, tag, episode);
  }
}

class ScopedLogger {
  constructor(
    private readonly parent: Logger,
    readonly tag: string,
    private readonly episode?: EpisodeLog
  ) {}

  info(message: string): void {
    this.emit('info', message);
  }

  debug(message: string): void {
    this.emit('debug', message);
  }

  warn(message: string): void {
    this.emit('warn', message);
  }

  error(message: string): void {
    this.emit('error', message);
  }

  private emit(level: LogLevel, message: string): void {
    const line = `[${this.tag}] ${message}`;
    this.episode?.record(level, line);
    this.parent[level](line);
  }
}

// Singleton instance
let loggerInstance: Logger | null = null;

/**
 * Get or create the logger singleton
 */
export function getLogger(config?: LoggerConfig): Logger {
  if (!loggerInstance) {
    loggerInstance = new Logger(config);
  } else if (config?.verbose !== undefined) {
    loggerInstance.setVerbose(config.verbose);
  }
  return loggerInstance;
}

/**
 * Reset logger (useful for testing)
 */
export function resetLogger(): void {
  loggerInstance = null;
}

/**
 * Render an unknown thrown value as a message
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export { Logger, ScopedLogger };
