/**
 * Shared constants for the support ticket MCP server
 */

// Response size limits
export const CHARACTER_LIMIT = 25000; // Maximum response size in characters

// Pagination defaults
export const DEFAULT_LIMIT = 20;
export const MAX_LIMIT = 100;

// Dashboard
export const TOP_AGENTS_LIMIT = 10;
export const TREND_DAYS = 7;
export const TODAY_WINDOW_HOURS = 24;
export const FIRST_CONTACT_RESOLUTION_SECONDS = 3600;

// Server info
export const SERVER_NAME = 'support-ticket-mcp-server';
export const SERVER_VERSION = '1.0.0';
