import type {
  Ticket,
  TicketMessage,
  TicketFilter,
  CreateTicketInput,
  UpdateTicketInput,
  AddTicketMessageInput
} from '../entities/Ticket.js';

export interface Page {
  readonly limit: number;
  readonly offset: number;
}

/**
 * Repository Interface for Ticket data access
 * Infrastructure layer will implement this
 */
export interface ITicketRepository {
  /**
   * Insert a ticket (status NEW) and return the persisted row
   */
  create(product: string, input: CreateTicketInput): Promise<Ticket>;

  /**
   * Find a live (not soft-deleted) ticket by ID
   */
  findById(id: string): Promise<Ticket | null>;

  /**
   * Merge supplied fields into a live ticket.
   * Resolves null when no live row matched.
   */
  update(id: string, input: UpdateTicketInput): Promise<Ticket | null>;

  /**
   * List live tickets of a product, newest first
   */
  list(product: string, filter: TicketFilter, page: Page): Promise<Ticket[]>;

  addMessage(authorId: string, input: AddTicketMessageInput): Promise<TicketMessage>;

  /**
   * Messages of a ticket, oldest first
   */
  listMessages(ticketId: string): Promise<TicketMessage[]>;

  /**
   * Health check - verify repository is operational
   */
  healthCheck(): Promise<boolean>;
}
