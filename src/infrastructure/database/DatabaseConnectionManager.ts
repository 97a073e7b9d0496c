import { createPool } from 'mysql2/promise';
import { CircuitBreaker, CircuitBreakerOpenError, type CircuitBreakerOptions } from './CircuitBreaker.js';
import type { LoggerLike } from '../logging/Logger.js';
import { InternalFailureError, StorageFailureError, SupportError } from '../../core/errors/SupportError.js';

export type SqlValue = string | number | boolean | Date | null;

export interface WriteResult {
  readonly affectedRows: number;
}

/**
 * Parameterized statements against one connection or the pool.
 * Every rejection is a SupportError (StorageFailureError for driver faults).
 */
export interface QueryRunner {
  query<T>(sql: string, params?: SqlValue[]): Promise<T[]>;
  queryOne<T>(sql: string, params?: SqlValue[]): Promise<T | null>;
  execute(sql: string, params?: SqlValue[]): Promise<WriteResult>;
}

export interface Database extends QueryRunner {
  /**
   * Run `work` inside one transaction on a single pooled connection.
   * Commits when it resolves, rolls back when it rejects.
   */
  transaction<T>(work: (tx: QueryRunner) => Promise<T>): Promise<T>;
  healthCheck(): Promise<boolean>;
}

/**
 * The parts of a mysql2 pool connection the manager drives
 */
export interface PooledConnection {
  execute(sql: string, values: SqlValue[]): Promise<[unknown, unknown]>;
  beginTransaction(): Promise<void>;
  commit(): Promise<void>;
  rollback(): Promise<void>;
  release(): void;
}

export interface ConnectionPool {
  getConnection(): Promise<PooledConnection>;
  end(): Promise<void>;
}

export interface DatabaseConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  connectionLimit?: number;
  queueLimit?: number;
}

export interface DatabaseOptions {
  slowQueryMs?: number;
  circuitBreaker?: CircuitBreakerOptions;
}

/**
 * Driver errors that say the server is unreachable rather than that it refused a statement
 */
const CONNECTIVITY_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'EHOSTUNREACH',
  'PROTOCOL_CONNECTION_LOST',
  'ER_CON_COUNT_ERROR',
  'POOL_CLOSED'
]);

/**
 * Database Connection Manager
 * Owns the MySQL connection pool for the process. The pool is injected so it
 * can be created once at startup and drained at shutdown.
 */
export class DatabaseConnectionManager implements Database {
  private readonly circuitBreaker: CircuitBreaker;
  private readonly slowQueryMs: number;
  private closed = false;
  private metrics = {
    totalQueries: 0,
    slowQueries: 0,
    errors: 0,
    activeConnections: 0
  };

  constructor(
    private readonly pool: ConnectionPool,
    private readonly logger: LoggerLike,
    options: DatabaseOptions = {}
  ) {
    this.slowQueryMs = options.slowQueryMs ?? 1000;
    this.circuitBreaker = new CircuitBreaker({
      isFailure: isConnectivityError,
      ...options.circuitBreaker
    });
  }

  /**
   * Create the pool from configuration. Timestamps travel as UTC.
   */
  static create(config: DatabaseConfig, logger: LoggerLike, options: DatabaseOptions = {}): DatabaseConnectionManager {
    const pool = createPool({
      host: config.host,
      port: config.port,
      database: config.database,
      user: config.user,
      password: config.password,
      connectionLimit: config.connectionLimit ?? 10,
      queueLimit: config.queueLimit ?? 50,
      waitForConnections: true,
      enableKeepAlive: true,
      keepAliveInitialDelay: 0,
      connectTimeout: 10000,
      timezone: 'Z',
      namedPlaceholders: false
    });

    logger.info(`MySQL connection pool created for ${config.host}:${config.port}/${config.database}`);
    return new DatabaseConnectionManager(pool, logger, options);
  }

  async query<T>(sql: string, params: SqlValue[] = []): Promise<T[]> {
    return this.withConnection(connection => this.runQuery<T>(connection, sql, params));
  }

  async queryOne<T>(sql: string, params: SqlValue[] = []): Promise<T | null> {
    const rows = await this.query<T>(sql, params);
    return rows.length > 0 ? rows[0] : null;
  }

  async execute(sql: string, params: SqlValue[] = []): Promise<WriteResult> {
    return this.withConnection(connection => this.runExecute(connection, sql, params));
  }

  async transaction<T>(work: (tx: QueryRunner) => Promise<T>): Promise<T> {
    return this.withConnection(async connection => {
      await this.guard('BEGIN', () => connection.beginTransaction());

      const tx: QueryRunner = {
        query: <R>(sql: string, params: SqlValue[] = []) => this.runQuery<R>(connection, sql, params),
        queryOne: async <R>(sql: string, params: SqlValue[] = []) => {
          const rows = await this.runQuery<R>(connection, sql, params);
          return rows.length > 0 ? rows[0] : null;
        },
        execute: (sql: string, params: SqlValue[] = []) => this.runExecute(connection, sql, params)
      };

      try {
        const result = await work(tx);
        await this.guard('COMMIT', () => connection.commit());
        return result;
      } catch (error) {
        try {
          await connection.rollback();
        } catch (rollbackError) {
          this.logger.error('Rollback failed', rollbackError);
        }
        throw error;
      }
    });
  }

  /**
   * Health check - verify database is accessible
   */
  async healthCheck(): Promise<boolean> {
    try {
      await this.query('SELECT 1 AS health');
      return true;
    } catch (error) {
      this.logger.error('Health check failed:', error);
      return false;
    }
  }

  getStats(): DatabaseStats {
    return {
      ...this.metrics,
      circuitState: this.circuitBreaker.getState()
    };
  }

  /**
   * Drain the pool. Further calls fail with a storage error.
   */
  async disconnect(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.pool.end();
    this.logger.info('MySQL connection pool closed', this.getStats());
  }

  private async withConnection<T>(fn: (connection: PooledConnection) => Promise<T>): Promise<T> {
    if (this.closed) {
      throw new StorageFailureError('connection pool is closed', { driverCode: 'POOL_CLOSED' });
    }

    let connection: PooledConnection | null = null;
    try {
      connection = await this.guard('getConnection', () => this.pool.getConnection());
      this.metrics.activeConnections++;
      return await fn(connection);
    } finally {
      if (connection) {
        connection.release();
        this.metrics.activeConnections--;
      }
    }
  }

  private async runQuery<T>(connection: PooledConnection, sql: string, params: SqlValue[]): Promise<T[]> {
    const [rows] = await this.guard(sql, () => connection.execute(sql, params));
    if (!Array.isArray(rows)) {
      throw new InternalFailureError(`expected rows from: ${sql.substring(0, 100)}`);
    }
    return rows as T[];
  }

  private async runExecute(connection: PooledConnection, sql: string, params: SqlValue[]): Promise<WriteResult> {
    const [header] = await this.guard(sql, () => connection.execute(sql, params));
    if (!hasAffectedRows(header)) {
      throw new InternalFailureError(`expected a result header from: ${sql.substring(0, 100)}`);
    }
    return { affectedRows: header.affectedRows };
  }

  /**
   * Circuit breaker, timing and error translation for one driver call
   */
  private async guard<T>(label: string, fn: () => Promise<T>): Promise<T> {
    const startTime = Date.now();
    try {
      const result = await this.circuitBreaker.execute(fn);
      this.trackQueryPerformance(label, Date.now() - startTime);
      return result;
    } catch (error) {
      this.metrics.errors++;
      const failure = toStorageFailure(error);
      this.logger.error('Query error:', {
        error: failure.message,
        code: failure instanceof StorageFailureError ? failure.driverCode : failure.code,
        sql: label.substring(0, 100)
      });
      throw failure;
    }
  }

  private trackQueryPerformance(label: string, duration: number): void {
    this.metrics.totalQueries++;

    if (duration > this.slowQueryMs) {
      this.metrics.slowQueries++;
      this.logger.warn(`Slow query detected (${duration}ms): ${label.substring(0, 100)}`);
    }
  }
}

function driverCodeOf(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function hasAffectedRows(value: unknown): value is WriteResult {
  return typeof value === 'object' && value !== null && 'affectedRows' in value && typeof value.affectedRows === 'number';
}

export function isConnectivityError(error: unknown): boolean {
  if (error instanceof Error && 'fatal' in error && error.fatal === true) {
    return true;
  }
  const code = driverCodeOf(error);
  return code !== undefined && CONNECTIVITY_ERROR_CODES.has(code);
}

/**
 * Wrap any driver rejection into the support error taxonomy
 */
export function toStorageFailure(error: unknown): SupportError {
  if (error instanceof SupportError) {
    return error;
  }
  if (error instanceof CircuitBreakerOpenError) {
    return new StorageFailureError(error.message, { cause: error, driverCode: 'CIRCUIT_OPEN' });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new StorageFailureError(message, { cause: error, driverCode: driverCodeOf(error) });
}

export interface DatabaseStats {
  totalQueries: number;
  slowQueries: number;
  errors: number;
  activeConnections: number;
  circuitState: string;
}
