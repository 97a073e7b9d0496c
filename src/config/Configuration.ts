import * as dotenv from 'dotenv';
import { existsSync } from 'fs';
import type { LogLevel, LoggerLike } from '../infrastructure/logging/Logger.js';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export type Environment = Record<string, string | undefined>;

/**
 * Application Configuration
 * Loads and validates environment variables for the MySQL-backed support store
 */
export class Configuration {
  private readonly env: Environment;

  // MySQL connection (REQUIRED: host, database, user)
  public readonly dbHost: string;
  public readonly dbPort: number;
  public readonly dbName: string;
  public readonly dbUser: string;
  public readonly dbPassword: string;

  // Pool tuning
  public readonly dbConnectionLimit: number;
  public readonly dbQueueLimit: number;
  public readonly dbTablePrefix: string;
  public readonly dbSlowQueryMs: number;

  // Circuit breaker
  public readonly circuitBreakerThreshold: number;
  public readonly circuitBreakerTimeoutMs: number;

  // Logging
  public readonly logLevel: LogLevel;
  public readonly logFile?: string;

  /**
   * @param env - variables to read; defaults to process.env after loading a .env file
   */
  constructor(env?: Environment) {
    this.env = env ?? Configuration.loadEnvironment();

    this.dbHost = this.getRequired('DB_HOST');
    this.dbPort = this.getInt('DB_PORT', 3306);
    this.dbName = this.getRequired('DB_NAME');
    this.dbUser = this.getRequired('DB_USER');
    this.dbPassword = this.get('DB_PASSWORD', '');

    this.dbConnectionLimit = this.getInt('DB_CONNECTION_LIMIT', 10);
    this.dbQueueLimit = this.getInt('DB_QUEUE_LIMIT', 50);
    this.dbTablePrefix = this.get('DB_TABLE_PREFIX', '');
    this.dbSlowQueryMs = this.getInt('DB_SLOW_QUERY_MS', 1000);

    this.circuitBreakerThreshold = this.getInt('CIRCUIT_BREAKER_THRESHOLD', 5);
    this.circuitBreakerTimeoutMs = this.getInt('CIRCUIT_BREAKER_TIMEOUT_MS', 60000);

    this.logLevel = this.getLogLevel();
    this.logFile = this.env.LOG_FILE || undefined;

    this.validate();
  }

  /**
   * Load .env from SUPPORT_ENV_FILE when it points at a file, else from CWD
   */
  private static loadEnvironment(): Environment {
    const envPath = process.env.SUPPORT_ENV_FILE;
    if (envPath && existsSync(envPath)) {
      dotenv.config({ path: envPath });
    } else {
      dotenv.config();
    }
    return process.env;
  }

  /**
   * Get environment variable with default
   */
  private get(key: string, defaultValue: string): string {
    return this.env[key] || defaultValue;
  }

  /**
   * Get required environment variable
   */
  private getRequired(key: string): string {
    const value = this.env[key];
    if (!value || value.trim().length === 0) {
      throw new Error(`Missing required environment variable: ${key}`);
    }
    return value;
  }

  private getInt(key: string, defaultValue: number): number {
    const raw = this.env[key];
    if (!raw) return defaultValue;

    const value = Number(raw);
    if (!Number.isInteger(value)) {
      throw new Error(`${key} must be an integer, got "${raw}"`);
    }
    return value;
  }

  private getLogLevel(): LogLevel {
    const raw = this.get('LOG_LEVEL', 'info').toLowerCase();
    const level = LOG_LEVELS.find(l => l === raw);
    if (!level) {
      throw new Error(`Invalid LOG_LEVEL: ${raw} (expected one of ${LOG_LEVELS.join(', ')})`);
    }
    return level;
  }

  private validate(): void {
    if (this.dbPort < 1 || this.dbPort > 65535) {
      throw new Error(`Invalid DB_PORT: ${this.dbPort}`);
    }

    if (this.dbConnectionLimit < 1) {
      throw new Error('DB_CONNECTION_LIMIT must be at least 1');
    }

    if (this.dbQueueLimit < 0) {
      throw new Error('DB_QUEUE_LIMIT cannot be negative');
    }

    // The prefix is interpolated into SQL identifiers
    if (!/^[A-Za-z0-9_]*$/.test(this.dbTablePrefix)) {
      throw new Error(`Invalid DB_TABLE_PREFIX: ${this.dbTablePrefix}`);
    }

    if (this.circuitBreakerThreshold < 1) {
      throw new Error('CIRCUIT_BREAKER_THRESHOLD must be at least 1');
    }
  }

  /**
   * Log configuration (without sensitive data)
   */
  public logSummary(logger: LoggerLike): void {
    logger.info('Loaded configuration:', {
      database: `${this.dbUser}@${this.dbHost}:${this.dbPort}/${this.dbName}`,
      password: this.dbPassword ? '***' : 'not set',
      connectionLimit: this.dbConnectionLimit,
      queueLimit: this.dbQueueLimit,
      tablePrefix: this.dbTablePrefix || 'none',
      slowQueryMs: this.dbSlowQueryMs,
      circuitBreaker: `${this.circuitBreakerThreshold} failures / ${this.circuitBreakerTimeoutMs}ms`,
      logLevel: this.logLevel,
      logFile: this.logFile ?? 'not set'
    });
  }
}
