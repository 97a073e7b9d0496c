import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

import type { SupportApi } from './handlers/SupportApi.js';
import { toPage, toToolError, toToolResult } from './responses.js';
import {
  GetTicketInputSchema,
  ListTicketsInputSchema,
  ListTicketMessagesInputSchema,
  GetDashboardMetricsInputSchema,
  CreateTicketInputSchema,
  UpdateTicketInputSchema,
  AddTicketMessageInputSchema
} from '../schemas/index.js';
import { DEFAULT_LIMIT, SERVER_NAME, SERVER_VERSION } from '../constants.js';
import type { LoggerLike } from '../infrastructure/logging/Logger.js';

/**
 * Build the MCP server exposing the support API as tools.
 * Every tool delegates to the facade, which re-validates its arguments.
 *
 * The SDK checks arguments against `inputSchema` before a callback runs, so over
 * MCP a shape violation (bad UUID, limit above 100) is answered with a protocol
 * InvalidParams error. VALIDATION_FAILURE results reach in-process callers of
 * `SupportApi`. The shapes are the facade's own schemas, so both judge field values
 * alike. Unknown keys are stripped by the SDK and rejected by the facade.
 */
export function createSupportServer(api: SupportApi, logger: LoggerLike): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION
  });
  const log = logger.child('Tools');

  // ---------------------------------------------------------------------------
  // support_get_ticket - Get a single ticket
  // ---------------------------------------------------------------------------
  server.registerTool(
    'support_get_ticket',
    {
      title: 'Get Support Ticket',
      description: `Get a support ticket by ID.

Args:
  - id (string, required): Ticket UUID

Returns:
  { "ticket": {...} } with status, priority, assignee and lifecycle timestamps.

Error Handling:
  - Returns TICKET_NOT_FOUND if the ticket doesn't exist or was deleted`,
      inputSchema: GetTicketInputSchema.shape,
      annotations: {
        readOnlyHint: true,
        destructiveHint: false,
        idempotentHint: true,
        openWorldHint: false
      }
    },
    async (params) => {
      try {
        const ticket = await api.getTicket(params);
        return toToolResult({ ticket });
      } catch (error) {
        log.debug('support_get_ticket failed', error);
        return toToolError(error, 'Failed to get ticket');
      }
    }
  );

  // ---------------------------------------------------------------------------
  // support_list_tickets - List a product's tickets
  // ---------------------------------------------------------------------------
  server.registerTool(
    'support_list_tickets',
    {
      title: 'List Support Tickets',
      description: `List a product's tickets, newest first, with optional filters.

Args:
  - product (string, required): Product scope (e.g., "acme")
  - filter (object, optional): status, priority, assignedTo, customerId (ANDed)
  - limit (number): Max results (default: ${DEFAULT_LIMIT}, max: 100)
  - offset (number): Skip N results for pagination (default: 0)

Returns:
  {
    "tickets": [...],
    "count": number,
    "offset": number,
    "has_more": boolean,
    "next_offset": number | undefined
  }

Examples:
  - Urgent tickets: { "product": "acme", "filter": { "priority": "URGENT" } }
  - Second page: { "product": "acme", "offset": 20 }`,
      inputSchema: ListTicketsInputSchema.shape,
      annotations: {
        readOnlyHint: true,
        destructiveHint: false,
        idempotentHint: true,
        openWorldHint: false
      }
    },
    async (params) => {
      try {
        const tickets = await api.listTickets(params);
        return toToolResult(toPage(tickets, 'tickets', params.limit ?? DEFAULT_LIMIT, params.offset ?? 0));
      } catch (error) {
        log.debug('support_list_tickets failed', error);
        return toToolError(error, 'Failed to list tickets');
      }
    }
  );

  // ---------------------------------------------------------------------------
  // support_list_ticket_messages - Conversation thread
  // ---------------------------------------------------------------------------
  server.registerTool(
    'support_list_ticket_messages',
    {
      title: 'List Ticket Messages',
      description: `List every message on a ticket, oldest first, internal notes included.

Args:
  - ticketId (string, required): Ticket UUID

Returns:
  { "messages": [...], "count": number }

An unknown ticket yields an empty list, not an error.`,
      inputSchema: ListTicketMessagesInputSchema.shape,
      annotations: {
        readOnlyHint: true,
        destructiveHint: false,
        idempotentHint: true,
        openWorldHint: false
      }
    },
    async (params) => {
      try {
        const messages = await api.listTicketMessages(params);
        return toToolResult({ messages, count: messages.length });
      } catch (error) {
        log.debug('support_list_ticket_messages failed', error);
        return toToolError(error, 'Failed to list ticket messages');
      }
    }
  );

  // ---------------------------------------------------------------------------
  // support_get_dashboard_metrics - Aggregated dashboard
  // ---------------------------------------------------------------------------
  server.registerTool(
    'support_get_dashboard_metrics',
    {
      title: 'Get Support Dashboard Metrics',
      description: `Compute dashboard metrics for a product over a creation-time window.

Returns seven groups:
- overview: active/new/resolved counts, averages, FCR and SLA rates, CSAT
- ticketByStatus / ticketByPriority: ticket counts per status and per priority
- slaMetrics: compliance over the window
- responseMetrics: mean and median response and resolution times
- topAgents: up to 10 agents by resolved tickets
- ticketTrends: 7 daily rows ending at periodEnd, newest first

Args:
  - product (string, required): Product scope
  - periodStart (string, required): ISO 8601, inclusive
  - periodEnd (string, required): ISO 8601, inclusive

Averages over no data are null. Privileged: intended for staff only.`,
      inputSchema: GetDashboardMetricsInputSchema.shape,
      annotations: {
        readOnlyHint: true,
        destructiveHint: false,
        idempotentHint: true,
        openWorldHint: false
      }
    },
    async (params) => {
      try {
        const metrics = await api.getDashboardMetrics(params);
        return toToolResult({ metrics });
      } catch (error) {
        log.debug('support_get_dashboard_metrics failed', error);
        return toToolError(error, 'Failed to get dashboard metrics');
      }
    }
  );

  // ---------------------------------------------------------------------------
  // support_create_ticket - Open a ticket
  // ---------------------------------------------------------------------------
  server.registerTool(
    'support_create_ticket',
    {
      title: 'Create Support Ticket',
      description: `Create a ticket in status NEW.

Args:
  - product (string, required): Product scope
  - input.customerId (string, required): Customer UUID
  - input.subject (string, required): 1-500 characters
  - input.description (string, required)
  - input.priority ('LOW'|'MEDIUM'|'HIGH'|'URGENT', required)
  - input.category (string, optional)

Returns:
  { "success": true, "ticket": {...} }`,
      inputSchema: CreateTicketInputSchema.shape,
      annotations: {
        readOnlyHint: false,
        destructiveHint: false,
        idempotentHint: false,
        openWorldHint: false
      }
    },
    async (params) => {
      try {
        const ticket = await api.createTicket(params);
        return toToolResult({ success: true, ticket });
      } catch (error) {
        log.debug('support_create_ticket failed', error);
        return toToolError(error, 'Failed to create ticket');
      }
    }
  );

  // ---------------------------------------------------------------------------
  // support_update_ticket - Partial update
  // ---------------------------------------------------------------------------
  server.registerTool(
    'support_update_ticket',
    {
      title: 'Update Support Ticket',
      description: `Update a ticket. Only the supplied fields change.

Moving to RESOLVED or CLOSED stamps resolvedAt / closedAt the first time.

Args:
  - id (string, required): Ticket UUID
  - input (object, required): subject, description, status, priority, category, assignedTo

Returns:
  { "success": true, "ticket": {...updated ticket...} }

Examples:
  - Resolve: { "id": "...", "input": { "status": "RESOLVED" } }
  - Assign: { "id": "...", "input": { "assignedTo": "..." } }`,
      inputSchema: UpdateTicketInputSchema.shape,
      annotations: {
        readOnlyHint: false,
        destructiveHint: false,
        idempotentHint: true,
        openWorldHint: false
      }
    },
    async (params) => {
      try {
        const ticket = await api.updateTicket(params);
        return toToolResult({ success: true, ticket });
      } catch (error) {
        log.debug('support_update_ticket failed', error);
        return toToolError(error, 'Failed to update ticket');
      }
    }
  );

  // ---------------------------------------------------------------------------
  // support_add_ticket_message - Reply or internal note
  // ---------------------------------------------------------------------------
  server.registerTool(
    'support_add_ticket_message',
    {
      title: 'Add Ticket Message',
      description: `Append a message to a ticket's thread.

The first public message from someone other than the customer stamps the
ticket's firstResponseAt.

Args:
  - authorId (string, required): Authenticated author UUID
  - input.ticketId (string, required): Ticket UUID
  - input.content (string, required)
  - input.isInternal (boolean): Staff-only note (default: false)

Returns:
  { "success": true, "message": {...} }`,
      inputSchema: AddTicketMessageInputSchema.shape,
      annotations: {
        readOnlyHint: false,
        destructiveHint: false,
        idempotentHint: false,
        openWorldHint: false
      }
    },
    async (params) => {
      try {
        const message = await api.addTicketMessage(params);
        return toToolResult({ success: true, message });
      } catch (error) {
        log.debug('support_add_ticket_message failed', error);
        return toToolError(error, 'Failed to add ticket message');
      }
    }
  );

  return server;
}
