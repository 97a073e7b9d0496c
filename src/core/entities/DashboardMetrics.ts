import type { TicketPriority, TicketStatus } from './Ticket.js';

/**
 * Dashboard metrics - derived, never persisted.
 * Ratios and averages are null when nothing qualifies, except
 * SlaMetrics.complianceRate which is 0 on an empty window.
 */
export interface DashboardMetrics {
  readonly overview: OverviewMetrics;
  readonly ticketByStatus: TicketStatusCount[];
  readonly ticketByPriority: TicketPriorityCount[];
  readonly slaMetrics: SlaMetrics;
  readonly responseMetrics: ResponseMetrics;
  readonly topAgents: AgentPerformance[];
  readonly ticketTrends: TicketTrend[];
}

export interface OverviewMetrics {
  readonly totalActiveTickets: number;
  readonly newTicketsToday: number;
  readonly resolvedTicketsToday: number;
  readonly avgFirstResponseTimeMinutes: number | null;
  readonly avgResolutionTimeHours: number | null;
  readonly firstContactResolutionRate: number | null;
  readonly slaComplianceRate: number | null;
  readonly slaBreachCount: number;
  readonly avgCsatScore: number | null;
}

export interface TicketStatusCount {
  readonly status: TicketStatus;
  readonly count: number;
}

export interface TicketPriorityCount {
  readonly priority: TicketPriority;
  readonly count: number;
}

export interface SlaMetrics {
  readonly totalTickets: number;
  readonly ticketsMeetingSla: number;
  readonly ticketsBreachingSla: number;
  readonly complianceRate: number;
  readonly avgFirstResponseMinutes: number | null;
  readonly avgResolutionHours: number | null;
}

export interface ResponseMetrics {
  readonly avgFirstResponseMinutes: number | null;
  readonly medianFirstResponseMinutes: number | null;
  readonly avgResponseMinutes: number | null;
  readonly medianResponseMinutes: number | null;
  readonly avgResolutionHours: number | null;
  readonly medianResolutionHours: number | null;
}

export interface AgentPerformance {
  readonly agentId: string;
  readonly agentName: string;
  readonly ticketsAssigned: number;
  readonly ticketsResolved: number;
  readonly avgFirstResponseMinutes: number | null;
  readonly avgResolutionHours: number | null;
  readonly csatScore: number | null;
}

export interface TicketTrend {
  /** UTC calendar day, YYYY-MM-DD */
  readonly date: string;
  readonly newTickets: number;
  readonly resolvedTickets: number;
  readonly activeTickets: number;
}

/**
 * Product and creation-time window shared by every metric group
 */
export interface MetricsScope {
  readonly product: string;
  readonly periodStart: Date;
  readonly periodEnd: Date;
}
