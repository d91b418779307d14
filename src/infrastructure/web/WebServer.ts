import express, { Express, Router } from 'express';
import { Server as HttpServer } from 'http';
import cors from 'cors';
import { Config } from '../../config.js';
import { SessionService } from '../../application/services/SessionService.js';
import { MessageService } from '../../application/services/MessageService.js';
import { DatabaseConnection } from '../database/DatabaseConnection.js';
import { SessionController } from '../../presentation/http/SessionController.js';
import { MessageController } from '../../presentation/http/MessageController.js';
import { HealthController } from '../../presentation/http/HealthController.js';
import { registerSessionRoutes } from '../../presentation/http/routes.js';
import { requireApiKey } from './middleware/auth.js';
import { requestLogging } from './middleware/requestLogging.js';
import { createRateLimiters } from './middleware/rateLimiter.js';
import { errorHandler, notFoundHandler } from './middleware/errorHandler.js';
import { getLogger } from '../../utils/logger.js';

const logger = getLogger('WebServer');

export interface Services {
  sessions: SessionService;
  messages: MessageService;
}

export class WebServer {
  private app: Express;
  private httpServer: HttpServer | null = null;

  constructor(
    private config: Config,
    services: Services,
    dbConnection: DatabaseConnection
  ) {
    this.app = express();
    this.setupMiddleware();
    this.setupRoutes(services, dbConnection);
  }

  getApp(): Express {
    return this.app;
  }

  private setupMiddleware(): void {
    this.app.disable('x-powered-by');
    this.app.use(
      cors({
        origin: this.config.api.corsOrigins,
        credentials: true,
      })
    );
    this.app.use(express.json());
    this.app.use(requestLogging());
  }

  private setupRoutes(services: Services, dbConnection: DatabaseConnection): void {
    const health = new HealthController(dbConnection);
    this.app.get('/health', health.check);

    const api = Router();
    api.use(requireApiKey(this.config.auth.apiKey));
    registerSessionRoutes(
      api,
      {
        sessions: new SessionController(services.sessions),
        messages: new MessageController(services.messages, services.sessions),
      },
      createRateLimiters(this.config.rateLimit)
    );
    this.app.use(this.config.api.prefix, api);

    this.app.use(notFoundHandler);
    this.app.use(errorHandler);
  }

  public start(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(this.config.api.port);

      server.once('listening', () => {
        this.httpServer = server;
        logger.info('server_started', {
          port: this.config.api.port,
          prefix: this.config.api.prefix,
        });
        resolve();
      });

      server.on('error', (error) => {
        logger.error('server_error', { error });
        reject(error);
      });
    });
  }

  public stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = this.httpServer;
      if (!server) {
        resolve();
        return;
      }

      server.close((error) => {
        this.httpServer = null;
        if (error) {
          reject(error);
          return;
        }
        logger.info('server_stopped');
        resolve();
      });
    });
  }

  public isRunning(): boolean {
    return this.httpServer !== null;
  }
}
