import { describe, it, expect } from 'vitest';
import { formatError, toPage, toToolError, toToolResult, truncateIfNeeded } from '../responses.js';
import { CHARACTER_LIMIT } from '../../constants.js';
import {
  InternalFailureError,
  StorageFailureError,
  TicketNotFoundError,
  ValidationFailureError
} from '../../core/errors/SupportError.js';

describe('formatError', () => {
  it('adds a hint for missing tickets', () => {
    expect(formatError(new TicketNotFoundError('t-1'), 'Failed to get ticket')).toBe(
      'Error: Failed to get ticket - [TICKET_NOT_FOUND] Ticket not found: t-1. Verify the ticket ID; deleted tickets are not returned.'
    );
  });

  it('adds a hint for validation failures', () => {
    expect(formatError(new ValidationFailureError('limit: too big'), 'Failed to list tickets')).toBe(
      'Error: Failed to list tickets - [VALIDATION_FAILURE] Validation error: limit: too big. Fix the listed fields and retry.'
    );
  });

  it('points storage failures at the server log', () => {
    expect(formatError(new StorageFailureError('connection lost'), 'Failed to add ticket message')).toBe(
      'Error: Failed to add ticket message - [STORAGE_FAILURE] Database error: connection lost. The database rejected or could not run the request; check the server log.'
    );
  });

  it('leaves internal failures without a hint', () => {
    expect(formatError(new InternalFailureError('bad row'), 'Failed')).toBe(
      'Error: Failed - [INTERNAL_FAILURE] Internal error: bad row'
    );
  });

  it('falls back to the raw message for other errors', () => {
    expect(formatError(new Error('boom'), 'Failed')).toBe('Error: Failed - boom');
    expect(formatError('boom', 'Failed')).toBe('Error: Failed - boom');
  });
});

describe('truncateIfNeeded', () => {
  it('returns small payloads unchanged', () => {
    expect(truncateIfNeeded([1, 2, 3])).toEqual({ items: [1, 2, 3], truncated: false });
  });

  it('halves oversized payloads until they fit', () => {
    const big = 'x'.repeat(Math.ceil(CHARACTER_LIMIT / 3));
    const result = truncateIfNeeded([big, big, big, big]);

    expect(result.items).toEqual([big, big]);
    expect(result.truncated).toBe(true);
    expect(result.truncationMessage).toBe(
      "Response truncated from 4 to 2 items. Use 'offset' parameter to see more results."
    );
  });
});

describe('toPage', () => {
  it('reports the next offset when the page is full', () => {
    expect(toPage(['a', 'b'], 'tickets', 2, 4)).toEqual({
      tickets: ['a', 'b'],
      count: 2,
      offset: 4,
      has_more: true,
      next_offset: 6
    });
  });

  it('resumes after the last returned row when a full page is truncated', () => {
    const big = 'x'.repeat(Math.ceil(CHARACTER_LIMIT / 3));
    const page = toPage([big, big, big, big], 'tickets', 4, 8);

    expect(page.count).toBe(2);
    expect(page.has_more).toBe(true);
    expect(page.next_offset).toBe(10);
    expect(page.truncated).toBe(true);
  });

  it('keeps paging when a short last page is truncated', () => {
    const big = 'x'.repeat(Math.ceil(CHARACTER_LIMIT / 3));
    const page = toPage([big, big, big, big], 'tickets', 20, 0);

    expect(page.count).toBe(2);
    expect(page.has_more).toBe(true);
    expect(page.next_offset).toBe(2);
  });

  it('omits the next offset on the last page', () => {
    expect(toPage(['a'], 'tickets', 20, 0)).toEqual({
      tickets: ['a'],
      count: 1,
      offset: 0,
      has_more: false
    });
  });
});

describe('tool results', () => {
  it('serialises payloads as indented JSON text', () => {
    expect(toToolResult({ ok: true })).toEqual({
      content: [{ type: 'text', text: '{\n  "ok": true\n}' }]
    });
  });

  it('marks errors', () => {
    expect(toToolError(new Error('boom'), 'Failed')).toEqual({
      content: [{ type: 'text', text: 'Error: Failed - boom' }],
      isError: true
    });
  });
});
