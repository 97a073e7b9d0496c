import type { SqlValue } from './DatabaseConnectionManager.js';

/**
 * Builds an AND-joined WHERE clause with positional placeholders.
 * Column names come from code, values only ever travel as bound parameters,
 * and predicates and values stay in the same order.
 */
export class WhereClause {
  private readonly predicates: string[] = [];
  private readonly params: SqlValue[] = [];

  equals(column: string, value: SqlValue): this {
    this.predicates.push(`${column} = ?`);
    this.params.push(value);
    return this;
  }

  /**
   * Adds `column = ?` only when a value is supplied
   */
  equalsIfPresent(column: string, value: SqlValue | undefined): this {
    return value === undefined ? this : this.equals(column, value);
  }

  isNull(column: string): this {
    this.predicates.push(`${column} IS NULL`);
    return this;
  }

  isNotNull(column: string): this {
    this.predicates.push(`${column} IS NOT NULL`);
    return this;
  }

  between(column: string, from: Date, to: Date): this {
    this.predicates.push(`${column} BETWEEN ? AND ?`);
    this.params.push(from, to);
    return this;
  }

  toSql(): string {
    return this.predicates.length > 0 ? `WHERE ${this.predicates.join(' AND ')}` : '';
  }

  get values(): SqlValue[] {
    return [...this.params];
  }
}
