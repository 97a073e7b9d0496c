import type { IAnalyticsRepository, DayBucket } from '../repositories/IAnalyticsRepository.js';
import type {
  AgentPerformance,
  DashboardMetrics,
  MetricsScope,
  OverviewMetrics,
  ResponseMetrics,
  SlaMetrics,
  TicketPriorityCount,
  TicketStatusCount,
  TicketTrend
} from '../entities/DashboardMetrics.js';
import { TicketPriority } from '../entities/Ticket.js';
import { InvalidInputError } from '../errors/SupportError.js';
import { mean, median, percentage } from '../../utils/statistics.js';
import { addUtcDays, startOfUtcDay, subtractHours, toUtcDay, trailingUtcDays } from '../../utils/dates.js';
import { TODAY_WINDOW_HOURS, TOP_AGENTS_LIMIT, TREND_DAYS } from '../../constants.js';
import type { LoggerLike } from '../../infrastructure/logging/Logger.js';
import { silentLogger } from '../../infrastructure/logging/Logger.js';

export const PRIORITY_RANK: Readonly<Record<TicketPriority, number>> = {
  [TicketPriority.URGENT]: 1,
  [TicketPriority.HIGH]: 2,
  [TicketPriority.MEDIUM]: 3,
  [TicketPriority.LOW]: 4
};

/**
 * Analytics Service - the dashboard aggregation engine.
 *
 * The seven metric groups are fetched concurrently and independently: there is
 * no shared snapshot, so under concurrent writes each group may reflect a
 * slightly different instant. Any failing group rejects the whole dashboard.
 */
export class AnalyticsService {
  private readonly logger: LoggerLike;

  constructor(
    private readonly repository: IAnalyticsRepository,
    private readonly clock: () => Date = () => new Date(),
    logger: LoggerLike = silentLogger
  ) {
    this.logger = logger.child('AnalyticsService');
  }

  async getDashboardMetrics(scope: MetricsScope): Promise<DashboardMetrics> {
    assertScope(scope);
    const startTime = Date.now();

    const [
      overview,
      ticketByStatus,
      ticketByPriority,
      slaMetrics,
      responseMetrics,
      topAgents,
      ticketTrends
    ] = await Promise.all([
      this.getOverviewMetrics(scope),
      this.getStatusCounts(scope),
      this.getPriorityCounts(scope),
      this.getSlaMetrics(scope),
      this.getResponseMetrics(scope),
      this.getTopAgents(scope),
      this.getTicketTrends(scope)
    ]);

    this.logger.debug(`Dashboard for ${scope.product} computed in ${Date.now() - startTime}ms`);

    return {
      overview,
      ticketByStatus,
      ticketByPriority,
      slaMetrics,
      responseMetrics,
      topAgents,
      ticketTrends
    };
  }

  /**
   * "Today" is the rolling 24 hours before now, independent of the period
   */
  async getOverviewMetrics(scope: MetricsScope): Promise<OverviewMetrics> {
    const todaySince = subtractHours(this.clock(), TODAY_WINDOW_HOURS);
    const aggregates = await this.repository.getOverviewAggregates(scope, todaySince);

    return {
      totalActiveTickets: aggregates.activeTickets,
      newTicketsToday: aggregates.newToday,
      resolvedTicketsToday: aggregates.resolvedToday,
      avgFirstResponseTimeMinutes: aggregates.avgFirstResponseMinutes,
      avgResolutionTimeHours: aggregates.avgResolutionHours,
      firstContactResolutionRate: percentage(aggregates.fastResolutions, aggregates.resolvedTickets),
      slaComplianceRate: percentage(aggregates.ticketsMeetingSla, aggregates.totalTickets),
      slaBreachCount: aggregates.ticketsBreachingSla,
      avgCsatScore: aggregates.avgCsatScore
    };
  }

  async getStatusCounts(scope: MetricsScope): Promise<TicketStatusCount[]> {
    const counts = await this.repository.getStatusCounts(scope);
    return [...counts].sort((a, b) => b.count - a.count);
  }

  /**
   * Always in severity order, whatever the counts
   */
  async getPriorityCounts(scope: MetricsScope): Promise<TicketPriorityCount[]> {
    const counts = await this.repository.getPriorityCounts(scope);
    return [...counts].sort((a, b) => PRIORITY_RANK[a.priority] - PRIORITY_RANK[b.priority]);
  }

  /**
   * Unlike the overview, compliance on an empty window is 0 rather than null
   */
  async getSlaMetrics(scope: MetricsScope): Promise<SlaMetrics> {
    const aggregates = await this.repository.getSlaAggregates(scope);

    return {
      totalTickets: aggregates.totalTickets,
      ticketsMeetingSla: aggregates.ticketsMeetingSla,
      ticketsBreachingSla: aggregates.ticketsBreachingSla,
      complianceRate: percentage(aggregates.ticketsMeetingSla, aggregates.totalTickets) ?? 0,
      avgFirstResponseMinutes: aggregates.avgFirstResponseMinutes,
      avgResolutionHours: aggregates.avgResolutionHours
    };
  }

  async getResponseMetrics(scope: MetricsScope): Promise<ResponseMetrics> {
    const { firstResponseMinutes, resolutionHours } = await this.repository.getResponseDurations(scope);

    const avgFirstResponse = mean(firstResponseMinutes);
    const medianFirstResponse = median(firstResponseMinutes);

    return {
      avgFirstResponseMinutes: avgFirstResponse,
      medianFirstResponseMinutes: medianFirstResponse,
      avgResponseMinutes: avgFirstResponse,
      medianResponseMinutes: medianFirstResponse,
      avgResolutionHours: mean(resolutionHours),
      medianResolutionHours: median(resolutionHours)
    };
  }

  async getTopAgents(scope: MetricsScope): Promise<AgentPerformance[]> {
    const agents = await this.repository.getAgentPerformance(scope, TOP_AGENTS_LIMIT);
    return [...agents]
      .sort((a, b) => b.ticketsResolved - a.ticketsResolved)
      .slice(0, TOP_AGENTS_LIMIT);
  }

  /**
   * One row per UTC day from periodEnd - 6 days to periodEnd, newest first.
   * periodStart is ignored; days without tickets are zero-filled.
   */
  async getTicketTrends(scope: MetricsScope): Promise<TicketTrend[]> {
    const days = trailingUtcDays(scope.periodEnd, TREND_DAYS);
    const start = addUtcDays(startOfUtcDay(scope.periodEnd), -(TREND_DAYS - 1));
    const counts = await this.repository.getTrendCounts(scope.product, {
      firstDay: toUtcDay(start),
      start,
      endExclusive: addUtcDays(start, TREND_DAYS)
    });

    const created = indexByDay(counts.created);
    const resolved = indexByDay(counts.resolved);

    return days.map(day => ({
      date: day,
      newTickets: created.get(day) ?? 0,
      resolvedTickets: resolved.get(day) ?? 0,
      activeTickets: counts.openByCreationDay
        .filter(bucket => bucket.date <= day)
        .reduce((sum, bucket) => sum + bucket.count, 0)
    }));
  }
}

function indexByDay(buckets: DayBucket[]): Map<string, number> {
  const index = new Map<string, number>();
  for (const bucket of buckets) {
    index.set(bucket.date, (index.get(bucket.date) ?? 0) + bucket.count);
  }
  return index;
}

function assertScope(scope: MetricsScope): void {
  if (Number.isNaN(scope.periodStart.getTime()) || Number.isNaN(scope.periodEnd.getTime())) {
    throw new InvalidInputError('period bounds must be valid dates');
  }
  if (scope.periodStart.getTime() > scope.periodEnd.getTime()) {
    throw new InvalidInputError('periodStart must not be after periodEnd');
  }
}
