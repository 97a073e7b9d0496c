/**
 * Zod Schemas for the support ticket API
 *
 * Runtime input validation for every facade operation. The same objects are
 * registered as MCP tool input schemas.
 */

import { z } from 'zod';

import { DEFAULT_LIMIT, MAX_LIMIT } from '../constants.js';
import { TicketPriority, TicketStatus } from '../core/entities/Ticket.js';

// ============================================================================
// Common Schemas
// ============================================================================

export const UuidSchema = z.string()
  .uuid('Must be a UUID');

export const ProductSchema = z.string()
  .trim()
  .min(1, 'Product is required')
  .max(50, 'Product must not exceed 50 characters')
  .describe('Product scope the tickets belong to (e.g., "acme")');

/**
 * ISO 8601 timestamp with offset, or a Date when called in-process
 */
export const DateTimeSchema = z.union([
  z.string().datetime({ offset: true, message: 'Must be an ISO 8601 timestamp' }),
  z.date()
]).transform(value => new Date(value));

export const TicketStatusSchema = z.nativeEnum(TicketStatus);
export const TicketPrioritySchema = z.nativeEnum(TicketPriority);

export const PaginationSchema = z.object({
  limit: z.number()
    .int()
    .min(1, 'Limit must be at least 1')
    .max(MAX_LIMIT, `Limit must not exceed ${MAX_LIMIT}`)
    .default(DEFAULT_LIMIT)
    .describe(`Maximum results to return (default: ${DEFAULT_LIMIT}, max: ${MAX_LIMIT})`),
  offset: z.number()
    .int()
    .min(0, 'Offset cannot be negative')
    .default(0)
    .describe('Number of results to skip for pagination (default: 0)')
});

export const TicketFilterSchema = z.object({
  status: TicketStatusSchema.optional(),
  priority: TicketPrioritySchema.optional(),
  assignedTo: UuidSchema.optional(),
  customerId: UuidSchema.optional(),
  category: z.string().max(100).optional()
    .describe('Accepted for forward compatibility; not applied yet'),
  searchQuery: z.string().max(200).optional()
    .describe('Accepted for forward compatibility; not applied yet')
}).strict();

// ============================================================================
// Query Input Schemas
// ============================================================================

/**
 * getTicket - a single live ticket
 */
export const GetTicketInputSchema = z.object({
  id: UuidSchema.describe('Ticket ID')
}).strict();

export type GetTicketArgs = z.input<typeof GetTicketInputSchema>;

/**
 * listTickets - product-scoped, newest first
 */
export const ListTicketsInputSchema = z.object({
  product: ProductSchema,
  filter: TicketFilterSchema.optional().describe('All fields optional and ANDed'),
  limit: PaginationSchema.shape.limit,
  offset: PaginationSchema.shape.offset
}).strict();

export type ListTicketsArgs = z.input<typeof ListTicketsInputSchema>;

/**
 * listTicketMessages - whole thread, oldest first
 */
export const ListTicketMessagesInputSchema = z.object({
  ticketId: UuidSchema.describe('Ticket ID')
}).strict();

export type ListTicketMessagesArgs = z.input<typeof ListTicketMessagesInputSchema>;

/**
 * getDashboardMetrics - privileged analytics over a creation-time window
 */
export const GetDashboardMetricsInputSchema = z.object({
  product: ProductSchema,
  periodStart: DateTimeSchema.describe('Window start (inclusive), ISO 8601'),
  periodEnd: DateTimeSchema.describe('Window end (inclusive), ISO 8601; also anchors the 7-day trend')
}).strict();

export type GetDashboardMetricsArgs = z.input<typeof GetDashboardMetricsInputSchema>;

// ============================================================================
// Mutation Input Schemas
// ============================================================================

/**
 * createTicket - new ticket, status NEW
 */
export const CreateTicketInputSchema = z.object({
  product: ProductSchema,
  input: z.object({
    customerId: UuidSchema.describe('Customer the ticket is raised for'),
    subject: z.string()
      .trim()
      .min(1, 'Subject is required')
      .max(500, 'Subject must not exceed 500 characters'),
    description: z.string()
      .min(1, 'Description is required')
      .max(65535, 'Description must not exceed 65535 characters'),
    priority: TicketPrioritySchema,
    category: z.string().min(1).max(100).optional()
  }).strict()
}).strict();

export type CreateTicketArgs = z.input<typeof CreateTicketInputSchema>;

/**
 * updateTicket - partial merge; absent fields keep their value
 */
export const UpdateTicketInputSchema = z.object({
  id: UuidSchema.describe('Ticket ID'),
  input: z.object({
    subject: z.string().trim().min(1).max(500).optional(),
    description: z.string().min(1).max(65535).optional(),
    status: TicketStatusSchema.optional(),
    priority: TicketPrioritySchema.optional(),
    category: z.string().min(1).max(100).optional(),
    assignedTo: UuidSchema.optional().describe('Agent to assign')
  }).strict()
}).strict();

export type UpdateTicketArgs = z.input<typeof UpdateTicketInputSchema>;

/**
 * addTicketMessage - append to the thread
 */
export const AddTicketMessageInputSchema = z.object({
  authorId: UuidSchema.describe('Authenticated author, supplied by the caller'),
  input: z.object({
    ticketId: UuidSchema,
    content: z.string()
      .min(1, 'Content is required')
      .max(65535, 'Content must not exceed 65535 characters'),
    isInternal: z.boolean()
      .default(false)
      .describe('Agent-only note, hidden from the customer')
  }).strict()
}).strict();

export type AddTicketMessageArgs = z.input<typeof AddTicketMessageInputSchema>;
