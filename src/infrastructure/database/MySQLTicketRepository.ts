import { randomUUID } from 'crypto';
import type { ITicketRepository, Page } from '../../core/repositories/ITicketRepository.js';
import {
  TicketStatus,
  TicketPriority,
  type Ticket,
  type TicketMessage,
  type TicketFilter,
  type CreateTicketInput,
  type UpdateTicketInput,
  type AddTicketMessageInput
} from '../../core/entities/Ticket.js';
import { InternalFailureError, InvalidInputError } from '../../core/errors/SupportError.js';
import type { Database, QueryRunner } from './DatabaseConnectionManager.js';
import { WhereClause } from './WhereClause.js';
import type { LoggerLike } from '../logging/Logger.js';
import { silentLogger } from '../logging/Logger.js';

export interface TicketRow {
  id: string;
  product: string;
  customer_id: string;
  subject: string;
  description: string;
  status: string;
  priority: string;
  category: string | null;
  assigned_to: string | null;
  first_response_at: Date | string | null;
  resolved_at: Date | string | null;
  closed_at: Date | string | null;
  sla_breach: number | boolean;
  csat_score: number | null;
  created_at: Date | string;
  updated_at: Date | string;
  deleted_at: Date | string | null;
}

export interface MessageRow {
  id: string;
  ticket_id: string;
  author_id: string;
  is_internal: number | boolean;
  content: string;
  created_at: Date | string;
}

// metadata is stored but deliberately not part of the read model
const TICKET_COLUMNS = [
  'id', 'product', 'customer_id', 'subject', 'description', 'status', 'priority',
  'category', 'assigned_to', 'first_response_at', 'resolved_at', 'closed_at',
  'sla_breach', 'csat_score', 'created_at', 'updated_at', 'deleted_at'
].join(', ');

const MESSAGE_COLUMNS = 'id, ticket_id, author_id, is_internal, content, created_at';

type AppliedFilterField = 'status' | 'priority' | 'assignedTo' | 'customerId';

/**
 * Filter fields translated to predicates, in binding order.
 * category and searchQuery are intentionally absent.
 */
const FILTER_COLUMNS: ReadonlyArray<readonly [AppliedFilterField, string]> = [
  ['status', 'status'],
  ['priority', 'priority'],
  ['assignedTo', 'assigned_to'],
  ['customerId', 'customer_id']
];

/**
 * MySQL Implementation of Ticket Repository
 * Multi-statement writes run in one transaction so the row read back is the row written.
 * Every timestamp is bound from `clock`, never taken from the server's clock or session time zone.
 */
export class MySQLTicketRepository implements ITicketRepository {
  private readonly ticketsTable: string;
  private readonly messagesTable: string;

  constructor(
    private readonly db: Database,
    tablePrefix: string = '',
    private readonly logger: LoggerLike = silentLogger,
    private readonly clock: () => Date = () => new Date()
  ) {
    this.ticketsTable = `${tablePrefix}support_tickets`;
    this.messagesTable = `${tablePrefix}ticket_messages`;
  }

  async create(product: string, input: CreateTicketInput): Promise<Ticket> {
    const id = randomUUID();
    const now = this.clock();

    return this.db.transaction(async tx => {
      await tx.execute(
        `INSERT INTO ${this.ticketsTable}
          (id, product, customer_id, subject, description, status, priority, category, metadata, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, JSON_OBJECT(), ?, ?)`,
        [
          id,
          product,
          input.customerId,
          input.subject,
          input.description,
          TicketStatus.NEW,
          input.priority,
          input.category ?? null,
          now,
          now
        ]
      );

      const row = await this.selectTicket(tx, id);
      if (!row) {
        throw new InternalFailureError(`Ticket ${id} not readable after insert`);
      }
      this.logger.debug(`Created ticket ${id} for product ${product}`);
      return this.mapTicket(row);
    });
  }

  async findById(id: string): Promise<Ticket | null> {
    const row = await this.selectTicket(this.db, id);
    return row ? this.mapTicket(row) : null;
  }

  /**
   * COALESCE merge of the supplied fields.
   * MySQL applies SET assignments left to right, so the timestamp stamping
   * reads the previous status before `status` itself is overwritten.
   */
  async update(id: string, input: UpdateTicketInput): Promise<Ticket | null> {
    const status = input.status ?? null;
    const now = this.clock();

    return this.db.transaction(async tx => {
      const result = await tx.execute(
        `UPDATE ${this.ticketsTable} SET
          resolved_at = CASE
            WHEN ? = 'RESOLVED' AND status <> 'RESOLVED' AND resolved_at IS NULL THEN ?
            ELSE resolved_at END,
          closed_at = CASE
            WHEN ? = 'CLOSED' AND status <> 'CLOSED' AND closed_at IS NULL THEN ?
            ELSE closed_at END,
          subject = COALESCE(?, subject),
          description = COALESCE(?, description),
          status = COALESCE(?, status),
          priority = COALESCE(?, priority),
          category = COALESCE(?, category),
          assigned_to = COALESCE(?, assigned_to),
          updated_at = ?
         WHERE id = ? AND deleted_at IS NULL`,
        [
          status,
          now,
          status,
          now,
          input.subject ?? null,
          input.description ?? null,
          status,
          input.priority ?? null,
          input.category ?? null,
          input.assignedTo ?? null,
          now,
          id
        ]
      );

      // mysql2 connects with FOUND_ROWS, so affectedRows counts matched rows
      if (result.affectedRows === 0) {
        return null;
      }

      const row = await this.selectTicket(tx, id);
      return row ? this.mapTicket(row) : null;
    });
  }

  async list(product: string, filter: TicketFilter, page: Page): Promise<Ticket[]> {
    assertPage(page);

    const where = new WhereClause()
      .equals('product', product)
      .isNull('deleted_at');

    for (const [field, column] of FILTER_COLUMNS) {
      where.equalsIfPresent(column, filter[field]);
    }

    if (filter.category !== undefined || filter.searchQuery !== undefined) {
      this.logger.debug('category/searchQuery filters are accepted but not applied', {
        category: filter.category,
        searchQuery: filter.searchQuery
      });
    }

    // LIMIT/OFFSET are validated integers; MySQL rejects them as prepared-statement parameters
    const sql = `SELECT ${TICKET_COLUMNS} FROM ${this.ticketsTable}
      ${where.toSql()}
      ORDER BY created_at DESC, id DESC
      LIMIT ${page.limit} OFFSET ${page.offset}`;

    const rows = await this.db.query<TicketRow>(sql, where.values);
    return rows.map(row => this.mapTicket(row));
  }

  /**
   * Insert a message. The ticket is not looked up first: a dangling ticket_id
   * is rejected by the foreign key and surfaces as a storage failure.
   * The first public reply from anyone but the customer stamps first_response_at.
   */
  async addMessage(authorId: string, input: AddTicketMessageInput): Promise<TicketMessage> {
    const id = randomUUID();
    const now = this.clock();

    return this.db.transaction(async tx => {
      await tx.execute(
        `INSERT INTO ${this.messagesTable} (id, ticket_id, author_id, is_internal, content, created_at)
         VALUES (?, ?, ?, ?, ?, ?)`,
        [id, input.ticketId, authorId, input.isInternal, input.content, now]
      );

      const row = await tx.queryOne<MessageRow>(
        `SELECT ${MESSAGE_COLUMNS} FROM ${this.messagesTable} WHERE id = ?`,
        [id]
      );
      if (!row) {
        throw new InternalFailureError(`Message ${id} not readable after insert`);
      }
      const message = this.mapMessage(row);

      if (!message.isInternal) {
        await tx.execute(
          `UPDATE ${this.ticketsTable} SET
            first_response_at = ?,
            updated_at = ?
           WHERE id = ? AND first_response_at IS NULL AND customer_id <> ?`,
          [message.createdAt, now, input.ticketId, authorId]
        );
      }

      return message;
    });
  }

  async listMessages(ticketId: string): Promise<TicketMessage[]> {
    const rows = await this.db.query<MessageRow>(
      `SELECT ${MESSAGE_COLUMNS} FROM ${this.messagesTable}
       WHERE ticket_id = ?
       ORDER BY created_at ASC, id ASC`,
      [ticketId]
    );
    return rows.map(row => this.mapMessage(row));
  }

  async healthCheck(): Promise<boolean> {
    return this.db.healthCheck();
  }

  private selectTicket(runner: QueryRunner, id: string): Promise<TicketRow | null> {
    return runner.queryOne<TicketRow>(
      `SELECT ${TICKET_COLUMNS} FROM ${this.ticketsTable} WHERE id = ? AND deleted_at IS NULL`,
      [id]
    );
  }

  /**
   * Map database row to Ticket entity
   */
  private mapTicket(row: TicketRow): Ticket {
    return {
      id: row.id,
      product: row.product,
      customerId: row.customer_id,
      subject: row.subject,
      description: row.description,
      status: parseStatus(row.status),
      priority: parsePriority(row.priority),
      category: row.category ?? undefined,
      assignedTo: row.assigned_to ?? undefined,
      firstResponseAt: toOptionalDate(row.first_response_at),
      resolvedAt: toOptionalDate(row.resolved_at),
      closedAt: toOptionalDate(row.closed_at),
      slaBreach: Boolean(row.sla_breach),
      csatScore: row.csat_score ?? undefined,
      createdAt: toDate(row.created_at),
      updatedAt: toDate(row.updated_at),
      deletedAt: toOptionalDate(row.deleted_at)
    };
  }

  private mapMessage(row: MessageRow): TicketMessage {
    return {
      id: row.id,
      ticketId: row.ticket_id,
      authorId: row.author_id,
      isInternal: Boolean(row.is_internal),
      content: row.content,
      createdAt: toDate(row.created_at)
    };
  }
}

function assertPage(page: Page): void {
  if (!Number.isInteger(page.limit) || page.limit < 0) {
    throw new InvalidInputError(`limit must be a non-negative integer, got ${page.limit}`);
  }
  if (!Number.isInteger(page.offset) || page.offset < 0) {
    throw new InvalidInputError(`offset must be a non-negative integer, got ${page.offset}`);
  }
}

export function parseStatus(code: string): TicketStatus {
  const status = Object.values(TicketStatus).find(s => s === code);
  if (!status) {
    throw new InternalFailureError(`Unknown ticket status code: ${code}`);
  }
  return status;
}

export function parsePriority(code: string): TicketPriority {
  const priority = Object.values(TicketPriority).find(p => p === code);
  if (!priority) {
    throw new InternalFailureError(`Unknown ticket priority code: ${code}`);
  }
  return priority;
}

function toDate(value: Date | string): Date {
  return value instanceof Date ? value : new Date(value);
}

function toOptionalDate(value: Date | string | null): Date | undefined {
  return value === null ? undefined : toDate(value);
}
