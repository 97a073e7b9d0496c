import type { ZodType, ZodTypeDef } from 'zod';
import type { TicketService } from '../../core/services/TicketService.js';
import type { AnalyticsService } from '../../core/services/AnalyticsService.js';
import type { Ticket, TicketMessage } from '../../core/entities/Ticket.js';
import type { DashboardMetrics } from '../../core/entities/DashboardMetrics.js';
import {
  InternalFailureError,
  ValidationFailureError,
  isSupportError
} from '../../core/errors/SupportError.js';
import {
  GetTicketInputSchema,
  ListTicketsInputSchema,
  ListTicketMessagesInputSchema,
  GetDashboardMetricsInputSchema,
  CreateTicketInputSchema,
  UpdateTicketInputSchema,
  AddTicketMessageInputSchema,
  type GetTicketArgs,
  type ListTicketsArgs,
  type ListTicketMessagesArgs,
  type GetDashboardMetricsArgs,
  type CreateTicketArgs,
  type UpdateTicketArgs,
  type AddTicketMessageArgs
} from '../../schemas/index.js';
import type { LoggerLike } from '../../infrastructure/logging/Logger.js';
import { silentLogger } from '../../infrastructure/logging/Logger.js';

/**
 * Support API facade
 * Validates and defaults external input, then delegates to the ticket store or
 * the analytics engine. Rejections are always SupportErrors, passed through as-is.
 *
 * No authorization happens here: callers must authenticate and authorize every
 * request first, and treat getDashboardMetrics as privileged.
 */
export class SupportApi {
  private readonly logger: LoggerLike;

  constructor(
    private readonly tickets: TicketService,
    private readonly analytics: AnalyticsService,
    logger: LoggerLike = silentLogger
  ) {
    this.logger = logger.child('SupportApi');
  }

  async getTicket(args: GetTicketArgs): Promise<Ticket> {
    const { id } = parseInput(GetTicketInputSchema, args);
    return this.run('getTicket', () => this.tickets.getTicket(id));
  }

  async listTickets(args: ListTicketsArgs): Promise<Ticket[]> {
    const { product, filter, limit, offset } = parseInput(ListTicketsInputSchema, args);
    return this.run('listTickets', () => this.tickets.listTickets(product, filter ?? {}, limit, offset));
  }

  async listTicketMessages(args: ListTicketMessagesArgs): Promise<TicketMessage[]> {
    const { ticketId } = parseInput(ListTicketMessagesInputSchema, args);
    return this.run('listTicketMessages', () => this.tickets.listMessages(ticketId));
  }

  async getDashboardMetrics(args: GetDashboardMetricsArgs): Promise<DashboardMetrics> {
    const scope = parseInput(GetDashboardMetricsInputSchema, args);
    return this.run('getDashboardMetrics', () => this.analytics.getDashboardMetrics(scope));
  }

  async createTicket(args: CreateTicketArgs): Promise<Ticket> {
    const { product, input } = parseInput(CreateTicketInputSchema, args);
    return this.run('createTicket', () => this.tickets.createTicket(product, input));
  }

  async updateTicket(args: UpdateTicketArgs): Promise<Ticket> {
    const { id, input } = parseInput(UpdateTicketInputSchema, args);
    return this.run('updateTicket', () => this.tickets.updateTicket(id, input));
  }

  async addTicketMessage(args: AddTicketMessageArgs): Promise<TicketMessage> {
    const { authorId, input } = parseInput(AddTicketMessageInputSchema, args);
    return this.run('addTicketMessage', () => this.tickets.addMessage(authorId, input));
  }

  /**
   * Anything that is not already a SupportError is a defect, reported as InternalFailure
   */
  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (isSupportError(error)) {
        this.logger.debug(`${operation} failed with ${error.code}: ${error.message}`);
        throw error;
      }
      this.logger.error(`${operation} failed unexpectedly`, error);
      const reason = error instanceof Error ? error.message : String(error);
      throw new InternalFailureError(`${operation}: ${reason}`);
    }
  }
}

/**
 * Parse with a zod schema, turning issues into a ValidationFailureError
 */
export function parseInput<Output, Input>(schema: ZodType<Output, ZodTypeDef, Input>, args: Input): Output {
  const result = schema.safeParse(args);
  if (result.success) {
    return result.data;
  }

  const issues = result.error.issues.map(issue => ({
    path: issue.path.join('.'),
    message: issue.message
  }));
  const reason = issues
    .map(issue => (issue.path ? `${issue.path}: ${issue.message}` : issue.message))
    .join('; ');

  throw new ValidationFailureError(reason, issues);
}
