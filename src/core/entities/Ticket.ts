/**
 * Ticket Entity - Domain Model
 */
export interface Ticket {
  readonly id: string;
  readonly product: string;
  readonly customerId: string;
  readonly subject: string;
  readonly description: string;
  readonly status: TicketStatus;
  readonly priority: TicketPriority;
  readonly category?: string;
  readonly assignedTo?: string;
  readonly firstResponseAt?: Date;
  readonly resolvedAt?: Date;
  readonly closedAt?: Date;
  readonly slaBreach: boolean;
  readonly csatScore?: number;
  readonly createdAt: Date;
  readonly updatedAt: Date;
  readonly deletedAt?: Date;
}

/**
 * Entry in a ticket's conversation thread. Immutable once written.
 */
export interface TicketMessage {
  readonly id: string;
  readonly ticketId: string;
  readonly authorId: string;
  readonly isInternal: boolean;
  readonly content: string;
  readonly createdAt: Date;
}

export enum TicketStatus {
  NEW = 'NEW',
  IN_PROGRESS = 'IN_PROGRESS',
  WAITING_ON_CUSTOMER = 'WAITING_ON_CUSTOMER',
  RESOLVED = 'RESOLVED',
  CLOSED = 'CLOSED'
}

export enum TicketPriority {
  LOW = 'LOW',
  MEDIUM = 'MEDIUM',
  HIGH = 'HIGH',
  URGENT = 'URGENT'
}

/** Statuses that take a ticket out of the active queue */
export const TERMINAL_STATUSES: readonly TicketStatus[] = [TicketStatus.RESOLVED, TicketStatus.CLOSED];

export interface CreateTicketInput {
  readonly customerId: string;
  readonly subject: string;
  readonly description: string;
  readonly priority: TicketPriority;
  readonly category?: string;
}

/**
 * Partial update. Absent fields keep their stored value.
 */
export interface UpdateTicketInput {
  readonly subject?: string;
  readonly description?: string;
  readonly status?: TicketStatus;
  readonly priority?: TicketPriority;
  readonly category?: string;
  readonly assignedTo?: string;
}

export interface AddTicketMessageInput {
  readonly ticketId: string;
  readonly content: string;
  readonly isInternal: boolean;
}

/**
 * Ticket Filters for list queries.
 * `category` and `searchQuery` are part of the public filter shape but are not
 * applied by the store yet.
 */
export interface TicketFilter {
  readonly status?: TicketStatus;
  readonly priority?: TicketPriority;
  readonly assignedTo?: string;
  readonly customerId?: string;
  readonly category?: string;
  readonly searchQuery?: string;
}
