import { appendFileSync, existsSync, mkdirSync, statSync, renameSync, unlinkSync, readdirSync } from 'fs';
import { basename, dirname, join } from 'path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

/**
 * Minimal logging surface shared by Logger and its children.
 * Services take this so tests can pass a silent or spying logger.
 */
export interface LoggerLike {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
  child(prefix: string): LoggerLike;
}

export interface LoggerOptions {
  logFilePath?: string;
  maxLogSizeBytes?: number;
  maxRotatedLogs?: number;
  /** Where formatted lines go besides the log file. Defaults to stderr. */
  write?: (line: string) => void;
}

/**
 * Logger for the MCP server
 * Writes to stderr (stdout belongs to the MCP transport) and an optional log file
 */
export class Logger implements LoggerLike {
  private logFilePath: string | null = null;
  private readonly maxLogSizeBytes: number;
  private readonly maxRotatedLogs: number;
  private readonly write: (line: string) => void;

  constructor(
    private readonly logLevel: LogLevel = 'info',
    options: LoggerOptions = {}
  ) {
    this.maxLogSizeBytes = options.maxLogSizeBytes ?? 10 * 1024 * 1024;
    this.maxRotatedLogs = options.maxRotatedLogs ?? 5;
    this.write = options.write ?? writeToStderr;

    if (options.logFilePath) {
      this.initializeLogFile(options.logFilePath);
    }
  }

  private initializeLogFile(logFilePath: string): void {
    try {
      const logDir = dirname(logFilePath);
      if (!existsSync(logDir)) {
        mkdirSync(logDir, { recursive: true });
      }

      this.logFilePath = logFilePath;
      this.rotateLogIfNeeded();
      this.cleanupOldRotatedLogs();

      appendFileSync(logFilePath, `\n${'='.repeat(80)}\nSupport Server Log - ${new Date().toISOString()}\n${'='.repeat(80)}\n`);
      this.info(`Logging initialized: ${logFilePath}`);
    } catch (error) {
      this.logFilePath = null;
      this.error('Failed to initialize log file, continuing with stderr only', error);
    }
  }

  /**
   * Rename the current log aside once it outgrows maxLogSizeBytes
   */
  private rotateLogIfNeeded(): void {
    if (!this.logFilePath || !existsSync(this.logFilePath)) {
      return;
    }

    if (statSync(this.logFilePath).size > this.maxLogSizeBytes) {
      const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
      renameSync(this.logFilePath, `${this.logFilePath}.${timestamp}`);
    }
  }

  /**
   * Keep only the newest maxRotatedLogs rotated files
   */
  private cleanupOldRotatedLogs(): void {
    if (!this.logFilePath) {
      return;
    }

    const logDir = dirname(this.logFilePath);
    const logFileName = basename(this.logFilePath);

    const rotatedLogs = readdirSync(logDir)
      .filter(f => f.startsWith(logFileName + '.'))
      .map(f => ({
        path: join(logDir, f),
        mtime: statSync(join(logDir, f)).mtime.getTime()
      }))
      .sort((a, b) => b.mtime - a.mtime);

    rotatedLogs.slice(this.maxRotatedLogs).forEach(log => unlinkSync(log.path));
  }

  debug(message: string, meta?: unknown): void {
    if (!this.shouldLog('debug')) return;
    this.log('DEBUG', message, meta);
  }

  info(message: string, meta?: unknown): void {
    if (!this.shouldLog('info')) return;
    this.log('INFO', message, meta);
  }

  warn(message: string, meta?: unknown): void {
    if (!this.shouldLog('warn')) return;
    this.log('WARN', message, meta);
  }

  error(message: string, meta?: unknown): void {
    if (!this.shouldLog('error')) return;
    this.log('ERROR', message, meta);
  }

  private log(level: string, message: string, meta?: unknown): void {
    const formatted = formatMessage(new Date().toISOString(), level, message, meta);

    this.write(formatted);

    if (this.logFilePath) {
      try {
        appendFileSync(this.logFilePath, formatted + '\n');
      } catch (error) {
        // Stop writing to a file we cannot append to; stderr keeps working.
        const path = this.logFilePath;
        this.logFilePath = null;
        this.write(formatMessage(new Date().toISOString(), 'ERROR', `Log file ${path} disabled`, error));
      }
    }
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.logLevel);
  }

  /**
   * Create a child logger with prefix
   */
  child(prefix: string): LoggerLike {
    return new ChildLogger(this, prefix);
  }
}

/**
 * Child logger with prefix
 */
class ChildLogger implements LoggerLike {
  constructor(
    private readonly parent: LoggerLike,
    private readonly prefix: string
  ) {}

  debug(message: string, meta?: unknown): void {
    this.parent.debug(`[${this.prefix}] ${message}`, meta);
  }

  info(message: string, meta?: unknown): void {
    this.parent.info(`[${this.prefix}] ${message}`, meta);
  }

  warn(message: string, meta?: unknown): void {
    this.parent.warn(`[${this.prefix}] ${message}`, meta);
  }

  error(message: string, meta?: unknown): void {
    this.parent.error(`[${this.prefix}] ${message}`, meta);
  }

  child(prefix: string): LoggerLike {
    return new ChildLogger(this, prefix);
  }
}

export function formatMessage(timestamp: string, level: string, message: string, meta?: unknown): string {
  let formatted = `[${timestamp}] [${level.padEnd(5)}] ${message}`;

  if (meta instanceof Error) {
    formatted += ` ${meta.name}: ${meta.message}`;
  } else if (meta !== undefined && meta !== null && typeof meta === 'object') {
    formatted += '\n' + JSON.stringify(meta, null, 2);
  } else if (meta !== undefined) {
    formatted += ` ${String(meta)}`;
  }

  return formatted;
}

function writeToStderr(line: string): void {
  // EPIPE means the MCP client closed the pipe; anything else is a real fault
  try {
    process.stderr.write(line + '\n');
  } catch (error) {
    if (!(error instanceof Error && 'code' in error && error.code === 'EPIPE')) {
      throw error;
    }
  }
}

/**
 * Logger that drops everything, for tests and embedding callers that log elsewhere
 */
export const silentLogger: LoggerLike = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  child: () => silentLogger
};
