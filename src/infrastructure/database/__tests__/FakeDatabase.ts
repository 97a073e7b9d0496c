import { vi } from 'vitest';
import type { Database, QueryRunner, SqlValue, WriteResult } from '../DatabaseConnectionManager.js';
import type { LoggerLike } from '../../logging/Logger.js';

export interface RecordedCall {
  kind: 'query' | 'queryOne' | 'execute';
  sql: string;
  params: SqlValue[];
}

/**
 * In-process Database stand-in: records every statement and answers from queues.
 * Transactions run the work against the same fake.
 */
export class FakeDatabase implements Database {
  readonly calls: RecordedCall[] = [];
  transactionCount = 0;
  private readonly rowSets: unknown[][] = [];
  private readonly writes: WriteResult[] = [];
  private failure: Error | null = null;

  returnsRows(...rowSets: unknown[][]): this {
    this.rowSets.push(...rowSets);
    return this;
  }

  returnsWrites(...results: WriteResult[]): this {
    this.writes.push(...results);
    return this;
  }

  failsWith(error: Error): this {
    this.failure = error;
    return this;
  }

  async query<T>(sql: string, params: SqlValue[] = []): Promise<T[]> {
    this.record('query', sql, params);
    return this.nextRows<T>();
  }

  async queryOne<T>(sql: string, params: SqlValue[] = []): Promise<T | null> {
    this.record('queryOne', sql, params);
    return this.nextRows<T>()[0] ?? null;
  }

  async execute(sql: string, params: SqlValue[] = []): Promise<WriteResult> {
    this.record('execute', sql, params);
    return this.writes.shift() ?? { affectedRows: 1 };
  }

  async transaction<T>(work: (tx: QueryRunner) => Promise<T>): Promise<T> {
    this.transactionCount++;
    return work(this);
  }

  async healthCheck(): Promise<boolean> {
    return this.failure === null;
  }

  private record(kind: RecordedCall['kind'], sql: string, params: SqlValue[]): void {
    this.calls.push({ kind, sql, params });
    if (this.failure) {
      throw this.failure;
    }
  }

  private nextRows<T>(): T[] {
    // Rows are whatever the test queued, the way the driver hands back untyped rows
    return (this.rowSets.shift() ?? []) as T[];
  }
}

export function createSpyLogger(): LoggerLike {
  const logger: LoggerLike = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: () => logger
  };
  return logger;
}
