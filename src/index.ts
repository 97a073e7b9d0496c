#!/usr/bin/env node

/**
 * Support Ticket MCP Server
 *
 * Exposes the ticket store and the dashboard aggregation engine over stdio.
 * All data lives in MySQL; see sql/ for the schema.
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

// Configuration
import { Configuration } from './config/Configuration.js';

// Infrastructure
import { Logger } from './infrastructure/logging/Logger.js';
import { DatabaseConnectionManager } from './infrastructure/database/DatabaseConnectionManager.js';
import { MySQLTicketRepository } from './infrastructure/database/MySQLTicketRepository.js';
import { MySQLAnalyticsRepository } from './infrastructure/database/MySQLAnalyticsRepository.js';

// Application
import { TicketService } from './core/services/TicketService.js';
import { AnalyticsService } from './core/services/AnalyticsService.js';
import { SupportApi } from './application/handlers/SupportApi.js';
import { createSupportServer } from './application/server.js';

// Constants
import { SERVER_NAME, SERVER_VERSION } from './constants.js';

// ============================================================================
// Server Startup
// ============================================================================

async function main(): Promise<void> {
  const config = new Configuration();
  const logger = new Logger(config.logLevel, { logFilePath: config.logFile });

  logger.info(`Starting ${SERVER_NAME} v${SERVER_VERSION}...`);
  config.logSummary(logger);

  const db = DatabaseConnectionManager.create(
    {
      host: config.dbHost,
      port: config.dbPort,
      database: config.dbName,
      user: config.dbUser,
      password: config.dbPassword,
      connectionLimit: config.dbConnectionLimit,
      queueLimit: config.dbQueueLimit
    },
    logger,
    {
      slowQueryMs: config.dbSlowQueryMs,
      circuitBreaker: {
        threshold: config.circuitBreakerThreshold,
        timeoutMs: config.circuitBreakerTimeoutMs
      }
    }
  );

  const tickets = new TicketService(new MySQLTicketRepository(db, config.dbTablePrefix, logger), logger);
  const analytics = new AnalyticsService(new MySQLAnalyticsRepository(db, config.dbTablePrefix), undefined, logger);
  const server = createSupportServer(new SupportApi(tickets, analytics, logger), logger);

  // Health check
  const healthy = await tickets.healthCheck();
  if (!healthy) {
    logger.warn('Health check failed - database not reachable, requests will fail until it is');
  } else {
    logger.info('Health check passed');
  }

  const shutdown = (signal: string): void => {
    logger.info(`Received ${signal}, shutting down...`);
    db.disconnect()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error('Error while closing the connection pool', error);
        process.exit(1);
      });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  // Connect via stdio
  const transport = new StdioServerTransport();
  await server.connect(transport);

  logger.info('Server running and ready');
}

main().catch((error: unknown) => {
  // Configuration errors happen before the logger exists
  process.stderr.write(`Failed to start server: ${error instanceof Error ? error.message : String(error)}\n`);
  process.exit(1);
});
