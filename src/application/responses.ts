import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';

import { CHARACTER_LIMIT } from '../constants.js';
import { isSupportError } from '../core/errors/SupportError.js';

/**
 * Format error message with actionable suggestions
 */
export function formatError(error: unknown, context: string): string {
  if (!isSupportError(error)) {
    const message = error instanceof Error ? error.message : String(error);
    return `Error: ${context} - ${message}`;
  }

  const prefix = `Error: ${context} - [${error.code}] ${error.message}`;

  switch (error.code) {
    case 'TICKET_NOT_FOUND':
      return `${prefix}. Verify the ticket ID; deleted tickets are not returned.`;
    case 'VALIDATION_FAILURE':
      return `${prefix}. Fix the listed fields and retry.`;
    case 'INVALID_INPUT':
      return `${prefix}. Check the argument ranges (limit 1-100, offset >= 0, periodStart <= periodEnd).`;
    case 'STORAGE_FAILURE':
      return `${prefix}. The database rejected or could not run the request; check the server log.`;
    case 'UNAUTHORIZED':
      return `${prefix}. The caller is not allowed to perform this operation.`;
    case 'INTERNAL_FAILURE':
      return prefix;
  }
}

/**
 * Truncate a list response if it exceeds the character limit
 */
export function truncateIfNeeded<T>(
  data: readonly T[]
): { items: T[]; truncated: boolean; truncationMessage?: string } {
  if (JSON.stringify(data, null, 2).length <= CHARACTER_LIMIT) {
    return { items: [...data], truncated: false };
  }

  // Halve until under the limit, keeping at least one item
  let items = [...data];
  while (JSON.stringify(items, null, 2).length > CHARACTER_LIMIT && items.length > 1) {
    items = items.slice(0, Math.ceil(items.length / 2));
  }

  return {
    items,
    truncated: true,
    truncationMessage: `Response truncated from ${data.length} to ${items.length} items. Use 'offset' parameter to see more results.`
  };
}

export function toToolResult(payload: unknown): CallToolResult {
  return {
    content: [{ type: 'text', text: JSON.stringify(payload, null, 2) }]
  };
}

export function toToolError(error: unknown, context: string): CallToolResult {
  return {
    content: [{ type: 'text', text: formatError(error, context) }],
    isError: true
  };
}

/**
 * Page envelope for list tools, same shape as the MCP pagination convention.
 * next_offset follows the rows actually returned, so truncated rows come back on the next page.
 */
export function toPage<T>(rows: readonly T[], key: string, limit: number, offset: number): Record<string, unknown> {
  const { items, truncated, truncationMessage } = truncateIfNeeded(rows);
  const hasMore = truncated || rows.length === limit;

  return {
    [key]: items,
    count: items.length,
    offset,
    has_more: hasMore,
    ...(hasMore ? { next_offset: offset + items.length } : {}),
    ...(truncated ? { truncated: true, truncation_message: truncationMessage } : {})
  };
}
