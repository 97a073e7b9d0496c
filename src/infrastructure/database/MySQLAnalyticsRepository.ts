import type {
  IAnalyticsRepository,
  OverviewAggregates,
  SlaAggregates,
  ResponseDurations,
  TrendCounts,
  TrendWindow,
  DayBucket
} from '../../core/repositories/IAnalyticsRepository.js';
import type {
  AgentPerformance,
  MetricsScope,
  TicketPriorityCount,
  TicketStatusCount
} from '../../core/entities/DashboardMetrics.js';
import { TERMINAL_STATUSES } from '../../core/entities/Ticket.js';
import { InternalFailureError, InvalidInputError } from '../../core/errors/SupportError.js';
import { FIRST_CONTACT_RESOLUTION_SECONDS } from '../../constants.js';
import type { Database } from './DatabaseConnectionManager.js';
import { WhereClause } from './WhereClause.js';
import { parsePriority, parseStatus } from './MySQLTicketRepository.js';

/** MySQL returns DECIMAL and SUM() results as strings, COUNT() as numbers */
type SqlNumeric = number | string | null;

interface OverviewRow {
  total_tickets: SqlNumeric;
  active_tickets: SqlNumeric;
  new_today: SqlNumeric;
  resolved_today: SqlNumeric;
  resolved_tickets: SqlNumeric;
  fast_resolutions: SqlNumeric;
  meeting_sla: SqlNumeric;
  breaching_sla: SqlNumeric;
  avg_first_response_minutes: SqlNumeric;
  avg_resolution_hours: SqlNumeric;
  avg_csat_score: SqlNumeric;
}

interface SlaRow {
  total_tickets: SqlNumeric;
  meeting_sla: SqlNumeric;
  breaching_sla: SqlNumeric;
  avg_first_response_minutes: SqlNumeric;
  avg_resolution_hours: SqlNumeric;
}

interface GroupCountRow {
  code: string;
  ticket_count: SqlNumeric;
}

interface DurationRow {
  first_response_minutes: SqlNumeric;
  resolution_hours: SqlNumeric;
}

interface AgentRow {
  agent_id: string;
  tickets_assigned: SqlNumeric;
  tickets_resolved: SqlNumeric;
  avg_first_response_minutes: SqlNumeric;
  avg_resolution_hours: SqlNumeric;
  csat_score: SqlNumeric;
}

interface TrendRow {
  kind: string;
  day: string;
  ticket_count: SqlNumeric;
}

const FIRST_RESPONSE_MINUTES = 'TIMESTAMPDIFF(MICROSECOND, created_at, first_response_at) / 60000000';
const RESOLUTION_HOURS = 'TIMESTAMPDIFF(MICROSECOND, created_at, resolved_at) / 3600000000';
// Enum values, safe to inline
const TERMINAL_STATUS_LIST = TERMINAL_STATUSES.map(status => `'${status}'`).join(', ');
const OPEN_STATUS = `status NOT IN (${TERMINAL_STATUS_LIST})`;

/**
 * MySQL aggregate queries behind the support dashboard.
 * Every query is scoped to one product and skips soft-deleted rows; window
 * queries restrict created_at to [periodStart, periodEnd].
 */
export class MySQLAnalyticsRepository implements IAnalyticsRepository {
  private readonly ticketsTable: string;

  constructor(
    private readonly db: Database,
    tablePrefix: string = ''
  ) {
    this.ticketsTable = `${tablePrefix}support_tickets`;
  }

  async getOverviewAggregates(scope: MetricsScope, todaySince: Date): Promise<OverviewAggregates> {
    const where = this.scopeWhere(scope);
    const sql = `
      SELECT
        COUNT(*) AS total_tickets,
        SUM(${OPEN_STATUS}) AS active_tickets,
        SUM(created_at >= ?) AS new_today,
        SUM(resolved_at >= ?) AS resolved_today,
        SUM(resolved_at IS NOT NULL) AS resolved_tickets,
        SUM(resolved_at IS NOT NULL AND first_response_at IS NOT NULL
          AND TIMESTAMPDIFF(MICROSECOND, first_response_at, resolved_at) < ${FIRST_CONTACT_RESOLUTION_SECONDS * 1000000}) AS fast_resolutions,
        SUM(sla_breach = 0) AS meeting_sla,
        SUM(sla_breach = 1) AS breaching_sla,
        AVG(${FIRST_RESPONSE_MINUTES}) AS avg_first_response_minutes,
        AVG(${RESOLUTION_HOURS}) AS avg_resolution_hours,
        AVG(csat_score) AS avg_csat_score
      FROM ${this.ticketsTable}
      ${where.toSql()}
    `;

    const row = await this.db.queryOne<OverviewRow>(sql, [todaySince, todaySince, ...where.values]);
    if (!row) {
      throw new InternalFailureError('Overview aggregate returned no row');
    }

    return {
      totalTickets: toCount(row.total_tickets),
      activeTickets: toCount(row.active_tickets),
      newToday: toCount(row.new_today),
      resolvedToday: toCount(row.resolved_today),
      resolvedTickets: toCount(row.resolved_tickets),
      fastResolutions: toCount(row.fast_resolutions),
      ticketsMeetingSla: toCount(row.meeting_sla),
      ticketsBreachingSla: toCount(row.breaching_sla),
      avgFirstResponseMinutes: toNullableNumber(row.avg_first_response_minutes),
      avgResolutionHours: toNullableNumber(row.avg_resolution_hours),
      avgCsatScore: toNullableNumber(row.avg_csat_score)
    };
  }

  async getStatusCounts(scope: MetricsScope): Promise<TicketStatusCount[]> {
    const where = this.scopeWhere(scope);
    const rows = await this.db.query<GroupCountRow>(
      `SELECT status AS code, COUNT(*) AS ticket_count
       FROM ${this.ticketsTable}
       ${where.toSql()}
       GROUP BY status
       ORDER BY ticket_count DESC`,
      where.values
    );

    return rows.map(row => ({ status: parseStatus(row.code), count: toCount(row.ticket_count) }));
  }

  async getPriorityCounts(scope: MetricsScope): Promise<TicketPriorityCount[]> {
    const where = this.scopeWhere(scope);
    const rows = await this.db.query<GroupCountRow>(
      `SELECT priority AS code, COUNT(*) AS ticket_count
       FROM ${this.ticketsTable}
       ${where.toSql()}
       GROUP BY priority
       ORDER BY FIELD(priority, 'URGENT', 'HIGH', 'MEDIUM', 'LOW')`,
      where.values
    );

    return rows.map(row => ({ priority: parsePriority(row.code), count: toCount(row.ticket_count) }));
  }

  async getSlaAggregates(scope: MetricsScope): Promise<SlaAggregates> {
    const where = this.scopeWhere(scope);
    const row = await this.db.queryOne<SlaRow>(
      `SELECT
        COUNT(*) AS total_tickets,
        SUM(sla_breach = 0) AS meeting_sla,
        SUM(sla_breach = 1) AS breaching_sla,
        AVG(${FIRST_RESPONSE_MINUTES}) AS avg_first_response_minutes,
        AVG(${RESOLUTION_HOURS}) AS avg_resolution_hours
       FROM ${this.ticketsTable}
       ${where.toSql()}`,
      where.values
    );
    if (!row) {
      throw new InternalFailureError('SLA aggregate returned no row');
    }

    return {
      totalTickets: toCount(row.total_tickets),
      ticketsMeetingSla: toCount(row.meeting_sla),
      ticketsBreachingSla: toCount(row.breaching_sla),
      avgFirstResponseMinutes: toNullableNumber(row.avg_first_response_minutes),
      avgResolutionHours: toNullableNumber(row.avg_resolution_hours)
    };
  }

  /**
   * Per-ticket durations; medians are interpolated by the caller because
   * MySQL has no PERCENTILE_CONT.
   */
  async getResponseDurations(scope: MetricsScope): Promise<ResponseDurations> {
    const where = this.scopeWhere(scope);
    const rows = await this.db.query<DurationRow>(
      `SELECT
        ${FIRST_RESPONSE_MINUTES} AS first_response_minutes,
        ${RESOLUTION_HOURS} AS resolution_hours
       FROM ${this.ticketsTable}
       ${where.toSql()}
         AND (first_response_at IS NOT NULL OR resolved_at IS NOT NULL)`,
      where.values
    );

    const firstResponseMinutes: number[] = [];
    const resolutionHours: number[] = [];
    for (const row of rows) {
      const firstResponse = toNullableNumber(row.first_response_minutes);
      const resolution = toNullableNumber(row.resolution_hours);
      if (firstResponse !== null) firstResponseMinutes.push(firstResponse);
      if (resolution !== null) resolutionHours.push(resolution);
    }

    return { firstResponseMinutes, resolutionHours };
  }

  async getAgentPerformance(scope: MetricsScope, limit: number): Promise<AgentPerformance[]> {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new InvalidInputError(`agent limit must be a positive integer, got ${limit}`);
    }

    const where = this.scopeWhere(scope).isNotNull('assigned_to');
    const rows = await this.db.query<AgentRow>(
      `SELECT
        assigned_to AS agent_id,
        COUNT(*) AS tickets_assigned,
        SUM(status IN (${TERMINAL_STATUS_LIST})) AS tickets_resolved,
        AVG(${FIRST_RESPONSE_MINUTES}) AS avg_first_response_minutes,
        AVG(${RESOLUTION_HOURS}) AS avg_resolution_hours,
        AVG(csat_score) AS csat_score
       FROM ${this.ticketsTable}
       ${where.toSql()}
       GROUP BY assigned_to
       ORDER BY tickets_resolved DESC, agent_id ASC
       LIMIT ${limit}`,
      where.values
    );

    return rows.map(row => ({
      agentId: row.agent_id,
      agentName: row.agent_id,
      ticketsAssigned: toCount(row.tickets_assigned),
      ticketsResolved: toCount(row.tickets_resolved),
      avgFirstResponseMinutes: toNullableNumber(row.avg_first_response_minutes),
      avgResolutionHours: toNullableNumber(row.avg_resolution_hours),
      csatScore: toNullableNumber(row.csat_score)
    }));
  }

  /**
   * Day buckets for the trend window. Unlike the other groups this ignores the
   * caller's period: new and resolved counts use the window itself, open
   * tickets are counted from the start of the product's history.
   */
  async getTrendCounts(product: string, window: TrendWindow): Promise<TrendCounts> {
    const t = this.ticketsTable;
    const sql = `
      SELECT 'created' AS kind, DATE_FORMAT(created_at, '%Y-%m-%d') AS day, COUNT(*) AS ticket_count
      FROM ${t}
      WHERE product = ? AND deleted_at IS NULL AND created_at >= ? AND created_at < ?
      GROUP BY day
      UNION ALL
      SELECT 'resolved' AS kind, DATE_FORMAT(resolved_at, '%Y-%m-%d') AS day, COUNT(*) AS ticket_count
      FROM ${t}
      WHERE product = ? AND deleted_at IS NULL AND resolved_at >= ? AND resolved_at < ?
      GROUP BY day
      UNION ALL
      SELECT 'open' AS kind, GREATEST(DATE_FORMAT(created_at, '%Y-%m-%d'), ?) AS day, COUNT(*) AS ticket_count
      FROM ${t}
      WHERE product = ? AND deleted_at IS NULL AND ${OPEN_STATUS} AND created_at < ?
      GROUP BY day
    `;

    const rows = await this.db.query<TrendRow>(sql, [
      product, window.start, window.endExclusive,
      product, window.start, window.endExclusive,
      window.firstDay, product, window.endExclusive
    ]);

    const buckets = (kind: string): DayBucket[] =>
      rows
        .filter(row => row.kind === kind)
        .map(row => ({ date: row.day, count: toCount(row.ticket_count) }));

    return {
      created: buckets('created'),
      resolved: buckets('resolved'),
      openByCreationDay: buckets('open')
    };
  }

  private scopeWhere(scope: MetricsScope): WhereClause {
    return new WhereClause()
      .equals('product', scope.product)
      .isNull('deleted_at')
      .between('created_at', scope.periodStart, scope.periodEnd);
  }
}

export function toNullableNumber(value: SqlNumeric): number | null {
  if (value === null) return null;
  const parsed = typeof value === 'number' ? value : Number(value);
  if (Number.isNaN(parsed)) {
    throw new InternalFailureError(`Non-numeric aggregate value: ${value}`);
  }
  return parsed;
}

/**
 * SUM over zero rows is NULL in SQL; as a count it is 0
 */
export function toCount(value: SqlNumeric): number {
  return toNullableNumber(value) ?? 0;
}
