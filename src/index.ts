#!/usr/bin/env node

/**
 * Chat Store Service - Entry Point
 */

import {
  ConfigValidationError,
  getConfig,
  printConfigErrors,
  printConfigInfo,
} from './config.js';
import { DatabaseConnection } from './infrastructure/database/DatabaseConnection.js';
import { SessionRepository } from './infrastructure/database/repositories/SessionRepository.js';
import { MessageRepository } from './infrastructure/database/repositories/MessageRepository.js';
import { SessionService } from './application/services/SessionService.js';
import { MessageService } from './application/services/MessageService.js';
import { WebServer } from './infrastructure/web/WebServer.js';
import { configureLogging, getLogger } from './utils/logger.js';

const logger = getLogger('Main');

async function main() {
  let dbConnection: DatabaseConnection | null = null;
  let webServer: WebServer | null = null;

  try {
    const config = getConfig();

    configureLogging({ level: config.server.logLevel, service: config.server.name });
    printConfigInfo(config);

    dbConnection = new DatabaseConnection(config.database.path);
    logger.info('database_opened', { path: dbConnection.getDatabasePath() });
    const db = dbConnection.getDatabase();
    const sessionRepo = new SessionRepository(db);
    const messageRepo = new MessageRepository(db);

    webServer = new WebServer(
      config,
      {
        sessions: new SessionService(sessionRepo),
        messages: new MessageService(messageRepo, sessionRepo),
      },
      dbConnection
    );
    await webServer.start();

    const server = webServer;
    const connection = dbConnection;
    const shutdown = async (signal: string) => {
      logger.info('shutdown_requested', { signal });
      try {
        await server.stop();
      } finally {
        connection.close();
      }
      process.exit(0);
    };

    process.on('SIGINT', () => {
      shutdown('SIGINT').catch((error) => {
        logger.error('shutdown_failed', { error });
        process.exit(1);
      });
    });
    process.on('SIGTERM', () => {
      shutdown('SIGTERM').catch((error) => {
        logger.error('shutdown_failed', { error });
        process.exit(1);
      });
    });
  } catch (error) {
    if (error instanceof ConfigValidationError) {
      printConfigErrors(error);
      process.exit(1);
    }

    logger.error('startup_failed', { error });

    if (webServer && webServer.isRunning()) {
      await webServer.stop();
    }
    dbConnection?.close();

    process.exit(1);
  }
}

main().catch((error) => {
  console.error('💥 Fatal error in main():', error);
  process.exit(1);
});
