import type {
  AgentPerformance,
  MetricsScope,
  TicketPriorityCount,
  TicketStatusCount
} from '../entities/DashboardMetrics.js';

/**
 * Raw per-window counts behind the overview. Rates are derived by the service.
 */
export interface OverviewAggregates {
  readonly totalTickets: number;
  readonly activeTickets: number;
  readonly newToday: number;
  readonly resolvedToday: number;
  readonly resolvedTickets: number;
  /** Resolved tickets whose resolution came less than an hour after the first response */
  readonly fastResolutions: number;
  readonly ticketsMeetingSla: number;
  readonly ticketsBreachingSla: number;
  readonly avgFirstResponseMinutes: number | null;
  readonly avgResolutionHours: number | null;
  readonly avgCsatScore: number | null;
}

export interface SlaAggregates {
  readonly totalTickets: number;
  readonly ticketsMeetingSla: number;
  readonly ticketsBreachingSla: number;
  readonly avgFirstResponseMinutes: number | null;
  readonly avgResolutionHours: number | null;
}

/**
 * Non-null durations of the tickets in scope, one entry per ticket
 */
export interface ResponseDurations {
  readonly firstResponseMinutes: number[];
  readonly resolutionHours: number[];
}

export interface DayBucket {
  /** UTC calendar day, YYYY-MM-DD */
  readonly date: string;
  readonly count: number;
}

export interface TrendWindow {
  /** First UTC day of the window (inclusive) */
  readonly firstDay: string;
  readonly start: Date;
  /** Midnight UTC after the last day of the window */
  readonly endExclusive: Date;
}

export interface TrendCounts {
  readonly created: DayBucket[];
  readonly resolved: DayBucket[];
  /**
   * Open tickets by creation day; tickets created before the window are
   * counted on its first day.
   */
  readonly openByCreationDay: DayBucket[];
}

/**
 * Read-only aggregate queries for the support dashboard
 */
export interface IAnalyticsRepository {
  getOverviewAggregates(scope: MetricsScope, todaySince: Date): Promise<OverviewAggregates>;

  getStatusCounts(scope: MetricsScope): Promise<TicketStatusCount[]>;

  getPriorityCounts(scope: MetricsScope): Promise<TicketPriorityCount[]>;

  getSlaAggregates(scope: MetricsScope): Promise<SlaAggregates>;

  getResponseDurations(scope: MetricsScope): Promise<ResponseDurations>;

  /**
   * Assignees ranked by resolved tickets, at most `limit` rows
   */
  getAgentPerformance(scope: MetricsScope, limit: number): Promise<AgentPerformance[]>;

  getTrendCounts(product: string, window: TrendWindow): Promise<TrendCounts>;
}
