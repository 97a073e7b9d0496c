import { describe, it, expect, beforeEach } from 'vitest';
import { MySQLTicketRepository, type MessageRow, type TicketRow } from '../MySQLTicketRepository.js';
import { TicketPriority, TicketStatus } from '../../../core/entities/Ticket.js';
import {
  InternalFailureError,
  InvalidInputError,
  StorageFailureError
} from '../../../core/errors/SupportError.js';
import { FakeDatabase, createSpyLogger } from './FakeDatabase.js';

const TICKET_ID = '6f1c3c1e-7a55-4b8e-9d0a-2f4a3b7c8d9e';
const CUSTOMER_ID = '0b6e2a4c-1d3f-4e5a-8b7c-9d0e1f2a3b4c';
const AGENT_ID = 'a1b2c3d4-e5f6-4a7b-8c9d-0e1f2a3b4c5d';
const NOW = new Date('2024-05-01T10:00:00.000Z');

function ticketRow(overrides: Partial<TicketRow> = {}): TicketRow {
  return {
    id: TICKET_ID,
    product: 'acme',
    customer_id: CUSTOMER_ID,
    subject: 'Cannot log in',
    description: 'Password reset link expired',
    status: 'NEW',
    priority: 'HIGH',
    category: null,
    assigned_to: null,
    first_response_at: null,
    resolved_at: null,
    closed_at: null,
    sla_breach: 0,
    csat_score: null,
    created_at: new Date('2024-05-01T09:00:00.000Z'),
    updated_at: new Date('2024-05-01T09:00:00.000Z'),
    deleted_at: null,
    ...overrides
  };
}

function messageRow(overrides: Partial<MessageRow> = {}): MessageRow {
  return {
    id: 'f0e1d2c3-b4a5-4968-8776-655443322110',
    ticket_id: TICKET_ID,
    author_id: AGENT_ID,
    is_internal: 0,
    content: 'Sent a new link',
    created_at: new Date('2024-05-01T09:30:00.000Z'),
    ...overrides
  };
}

describe('MySQLTicketRepository', () => {
  let db: FakeDatabase;
  let repository: MySQLTicketRepository;

  beforeEach(() => {
    db = new FakeDatabase();
    repository = new MySQLTicketRepository(db, '', createSpyLogger(), () => NOW);
  });

  describe('create', () => {
    it('inserts a NEW ticket and returns the stored row in one transaction', async () => {
      db.returnsRows([ticketRow({ category: 'auth' })]);

      const ticket = await repository.create('acme', {
        customerId: CUSTOMER_ID,
        subject: 'Cannot log in',
        description: 'Password reset link expired',
        priority: TicketPriority.HIGH,
        category: 'auth'
      });

      expect(db.transactionCount).toBe(1);
      expect(db.calls).toHaveLength(2);

      const [insert, select] = db.calls;
      expect(insert.kind).toBe('execute');
      expect(insert.sql).toContain('INSERT INTO support_tickets');
      expect(insert.params).toEqual([
        expect.any(String),
        'acme',
        CUSTOMER_ID,
        'Cannot log in',
        'Password reset link expired',
        'NEW',
        'HIGH',
        'auth',
        NOW,
        NOW
      ]);
      expect(select.kind).toBe('queryOne');
      expect(select.params).toEqual([insert.params[0]]);

      expect(ticket.status).toBe(TicketStatus.NEW);
      expect(ticket.priority).toBe(TicketPriority.HIGH);
      expect(ticket.category).toBe('auth');
      expect(ticket.slaBreach).toBe(false);
    });

    it('binds a missing category as NULL', async () => {
      db.returnsRows([ticketRow()]);

      await repository.create('acme', {
        customerId: CUSTOMER_ID,
        subject: 's',
        description: 'd',
        priority: TicketPriority.LOW
      });

      expect(db.calls[0].params[7]).toBeNull();
    });

    it('fails when the inserted row cannot be read back', async () => {
      await expect(repository.create('acme', {
        customerId: CUSTOMER_ID,
        subject: 's',
        description: 'd',
        priority: TicketPriority.LOW
      })).rejects.toBeInstanceOf(InternalFailureError);
    });
  });

  describe('findById', () => {
    it('maps a live row to the domain model', async () => {
      db.returnsRows([ticketRow({
        assigned_to: AGENT_ID,
        first_response_at: '2024-05-01T09:30:00.000Z',
        sla_breach: 1,
        csat_score: 4
      })]);

      const ticket = await repository.findById(TICKET_ID);

      expect(ticket).toEqual({
        id: TICKET_ID,
        product: 'acme',
        customerId: CUSTOMER_ID,
        subject: 'Cannot log in',
        description: 'Password reset link expired',
        status: TicketStatus.NEW,
        priority: TicketPriority.HIGH,
        category: undefined,
        assignedTo: AGENT_ID,
        firstResponseAt: new Date('2024-05-01T09:30:00.000Z'),
        resolvedAt: undefined,
        closedAt: undefined,
        slaBreach: true,
        csatScore: 4,
        createdAt: new Date('2024-05-01T09:00:00.000Z'),
        updatedAt: new Date('2024-05-01T09:00:00.000Z'),
        deletedAt: undefined
      });
      expect(db.calls[0].sql).toContain('WHERE id = ? AND deleted_at IS NULL');
      expect(db.calls[0].params).toEqual([TICKET_ID]);
    });

    it('returns null when no live row matches', async () => {
      await expect(repository.findById(TICKET_ID)).resolves.toBeNull();
    });

    it('rejects unknown status codes', async () => {
      db.returnsRows([ticketRow({ status: 'ARCHIVED' })]);

      await expect(repository.findById(TICKET_ID)).rejects.toThrow('Unknown ticket status code: ARCHIVED');
    });
  });

  describe('update', () => {
    it('binds fields in SET order with absent fields as NULL', async () => {
      db.returnsRows([ticketRow({ status: 'RESOLVED', assigned_to: AGENT_ID })]);

      const ticket = await repository.update(TICKET_ID, {
        status: TicketStatus.RESOLVED,
        assignedTo: AGENT_ID
      });

      const [update] = db.calls;
      expect(update.kind).toBe('execute');
      expect(update.sql).toContain('WHERE id = ? AND deleted_at IS NULL');
      expect(update.params).toEqual([
        'RESOLVED',
        NOW,
        'RESOLVED',
        NOW,
        null,
        null,
        'RESOLVED',
        null,
        null,
        AGENT_ID,
        NOW,
        TICKET_ID
      ]);
      expect(ticket?.status).toBe(TicketStatus.RESOLVED);
    });

    it('stamps lifecycle timestamps before overwriting status', async () => {
      db.returnsRows([ticketRow()]);

      await repository.update(TICKET_ID, { status: TicketStatus.CLOSED });

      const sql = db.calls[0].sql;
      expect(sql.indexOf('resolved_at = CASE')).toBeLessThan(sql.indexOf('status = COALESCE'));
      expect(sql.indexOf('closed_at = CASE')).toBeLessThan(sql.indexOf('status = COALESCE'));
      expect(sql).toMatch(/resolved_at IS NULL THEN \?\s+ELSE resolved_at END/);
      expect(sql).toContain('updated_at = ?');
    });

    it('returns null without reading back when no live row matched', async () => {
      db.returnsWrites({ affectedRows: 0 });

      await expect(repository.update(TICKET_ID, { subject: 'x' })).resolves.toBeNull();
      expect(db.calls).toHaveLength(1);
    });
  });

  describe('list', () => {
    it('scopes by product, applies filters and pages newest first', async () => {
      db.returnsRows([ticketRow(), ticketRow({ id: 'b' })]);

      const tickets = await repository.list(
        'acme',
        { status: TicketStatus.IN_PROGRESS, customerId: CUSTOMER_ID },
        { limit: 20, offset: 40 }
      );

      const [select] = db.calls;
      expect(select.sql).toContain(
        'WHERE product = ? AND deleted_at IS NULL AND status = ? AND customer_id = ?'
      );
      expect(select.sql).toContain('ORDER BY created_at DESC, id DESC');
      expect(select.sql).toContain('LIMIT 20 OFFSET 40');
      expect(select.params).toEqual(['acme', 'IN_PROGRESS', CUSTOMER_ID]);
      expect(tickets.map(t => t.id)).toEqual([TICKET_ID, 'b']);
    });

    it('binds filters in a fixed order regardless of how they are supplied', async () => {
      await repository.list(
        'acme',
        { assignedTo: AGENT_ID, priority: TicketPriority.URGENT, status: TicketStatus.NEW },
        { limit: 5, offset: 0 }
      );

      expect(db.calls[0].params).toEqual(['acme', 'NEW', 'URGENT', AGENT_ID]);
    });

    it('accepts category and searchQuery without filtering on them', async () => {
      const logger = createSpyLogger();
      repository = new MySQLTicketRepository(db, '', logger);

      await repository.list('acme', { category: 'billing', searchQuery: 'refund' }, { limit: 10, offset: 0 });

      expect(db.calls[0].params).toEqual(['acme']);
      expect(logger.debug).toHaveBeenCalledWith(
        'category/searchQuery filters are accepted but not applied',
        { category: 'billing', searchQuery: 'refund' }
      );
    });

    it('rejects a negative offset before querying', async () => {
      await expect(repository.list('acme', {}, { limit: 10, offset: -1 })).rejects.toBeInstanceOf(InvalidInputError);
      expect(db.calls).toHaveLength(0);
    });

    it('rejects a fractional limit before querying', async () => {
      await expect(repository.list('acme', {}, { limit: 2.5, offset: 0 })).rejects.toThrow(
        'Invalid input: limit must be a non-negative integer, got 2.5'
      );
    });
  });

  describe('addMessage', () => {
    it('stamps the first response for a public reply from someone other than the customer', async () => {
      db.returnsRows([messageRow()]);

      const message = await repository.addMessage(AGENT_ID, {
        ticketId: TICKET_ID,
        content: 'Sent a new link',
        isInternal: false
      });

      expect(db.transactionCount).toBe(1);
      expect(db.calls.map(call => call.kind)).toEqual(['execute', 'queryOne', 'execute']);
      expect(db.calls[0].params).toEqual([expect.any(String), TICKET_ID, AGENT_ID, false, 'Sent a new link', NOW]);

      const stamp = db.calls[2];
      expect(stamp.sql).toContain('first_response_at IS NULL AND customer_id <> ?');
      expect(stamp.params).toEqual([new Date('2024-05-01T09:30:00.000Z'), NOW, TICKET_ID, AGENT_ID]);

      expect(message).toEqual({
        id: 'f0e1d2c3-b4a5-4968-8776-655443322110',
        ticketId: TICKET_ID,
        authorId: AGENT_ID,
        isInternal: false,
        content: 'Sent a new link',
        createdAt: new Date('2024-05-01T09:30:00.000Z')
      });
    });

    it('leaves the ticket alone for internal notes', async () => {
      db.returnsRows([messageRow({ is_internal: 1 })]);

      const message = await repository.addMessage(AGENT_ID, {
        ticketId: TICKET_ID,
        content: 'Escalate',
        isInternal: true
      });

      expect(message.isInternal).toBe(true);
      expect(db.calls.map(call => call.kind)).toEqual(['execute', 'queryOne']);
    });

    it('surfaces a dangling ticket reference as a storage failure', async () => {
      const fkViolation = new StorageFailureError('Cannot add or update a child row', {
        driverCode: 'ER_NO_REFERENCED_ROW_2'
      });
      db.failsWith(fkViolation);

      await expect(repository.addMessage(AGENT_ID, {
        ticketId: TICKET_ID,
        content: 'Hello',
        isInternal: false
      })).rejects.toBe(fkViolation);
    });
  });

  describe('listMessages', () => {
    it('returns the thread oldest first, internal notes included', async () => {
      db.returnsRows([
        messageRow({ id: 'm1', author_id: CUSTOMER_ID }),
        messageRow({ id: 'm2', is_internal: 1 })
      ]);

      const messages = await repository.listMessages(TICKET_ID);

      expect(db.calls[0].sql).toContain('ORDER BY created_at ASC, id ASC');
      expect(db.calls[0].params).toEqual([TICKET_ID]);
      expect(messages.map(m => [m.id, m.isInternal])).toEqual([['m1', false], ['m2', true]]);
    });

    it('returns an empty list for an unknown ticket', async () => {
      await expect(repository.listMessages(TICKET_ID)).resolves.toEqual([]);
    });
  });

  it('binds every written timestamp from the clock instead of the database server', async () => {
    db.returnsRows([ticketRow()], [ticketRow()], [messageRow()]);

    await repository.create('acme', { customerId: CUSTOMER_ID, subject: 's', description: 'd', priority: TicketPriority.LOW });
    await repository.update(TICKET_ID, { status: TicketStatus.RESOLVED });
    await repository.addMessage(AGENT_ID, { ticketId: TICKET_ID, content: 'Done', isInternal: false });

    const writes = db.calls.filter(call => call.kind === 'execute');
    expect(writes).toHaveLength(4);
    for (const write of writes) {
      expect(write.sql).not.toMatch(/CURRENT_TIMESTAMP|NOW\(\)|UTC_TIMESTAMP/);
      expect(write.params).toContain(NOW);
    }
  });

  it('prefixes table names', async () => {
    repository = new MySQLTicketRepository(db, 'app_');

    await repository.listMessages(TICKET_ID);
    await repository.findById(TICKET_ID);

    expect(db.calls[0].sql).toContain('FROM app_ticket_messages');
    expect(db.calls[1].sql).toContain('FROM app_support_tickets');
  });
});
