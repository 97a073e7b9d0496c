import type { ITicketRepository } from '../repositories/ITicketRepository.js';
import type {
  Ticket,
  TicketMessage,
  TicketFilter,
  CreateTicketInput,
  UpdateTicketInput,
  AddTicketMessageInput
} from '../entities/Ticket.js';
import { TicketNotFoundError } from '../errors/SupportError.js';
import { DEFAULT_LIMIT } from '../../constants.js';
import type { LoggerLike } from '../../infrastructure/logging/Logger.js';
import { silentLogger } from '../../infrastructure/logging/Logger.js';

/**
 * Ticket Service - the ticket store's business layer.
 * Turns "no live row" into TicketNotFoundError and applies pagination defaults.
 * No caching: every call reads through to the repository.
 */
export class TicketService {
  private readonly logger: LoggerLike;

  constructor(
    private readonly repository: ITicketRepository,
    logger: LoggerLike = silentLogger
  ) {
    this.logger = logger.child('TicketService');
  }

  async createTicket(product: string, input: CreateTicketInput): Promise<Ticket> {
    const ticket = await this.repository.create(product, input);
    this.logger.info(`Ticket ${ticket.id} created`, { product, priority: ticket.priority });
    return ticket;
  }

  async getTicket(id: string): Promise<Ticket> {
    const ticket = await this.repository.findById(id);
    if (!ticket) {
      throw new TicketNotFoundError(id);
    }
    return ticket;
  }

  async updateTicket(id: string, input: UpdateTicketInput): Promise<Ticket> {
    const ticket = await this.repository.update(id, input);
    if (!ticket) {
      throw new TicketNotFoundError(id);
    }
    this.logger.info(`Ticket ${id} updated`, { fields: Object.keys(input) });
    return ticket;
  }

  async listTickets(
    product: string,
    filter: TicketFilter = {},
    limit: number = DEFAULT_LIMIT,
    offset: number = 0
  ): Promise<Ticket[]> {
    return this.repository.list(product, filter, { limit, offset });
  }

  async addMessage(authorId: string, input: AddTicketMessageInput): Promise<TicketMessage> {
    const message = await this.repository.addMessage(authorId, input);
    this.logger.debug(`Message ${message.id} added to ticket ${input.ticketId}`, { internal: input.isInternal });
    return message;
  }

  async listMessages(ticketId: string): Promise<TicketMessage[]> {
    return this.repository.listMessages(ticketId);
  }

  /**
   * Health check - verify service is operational
   */
  async healthCheck(): Promise<boolean> {
    return this.repository.healthCheck();
  }
}
