import { Request, Response } from 'express';
import { DatabaseConnection } from '../../infrastructure/database/DatabaseConnection.js';
import { getLogger } from '../../utils/logger.js';

const logger = getLogger('HealthController');

/**
 * Render an uptime as "1d 2hrs 3mins 4s"
 */
export function formatUptime(uptimeMs: number): string {
  const totalSeconds = Math.floor(uptimeMs / 1000);
  const days = Math.floor(totalSeconds / 86400);
  const hours = Math.floor((totalSeconds % 86400) / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  return `${days}d ${hours}hrs ${minutes}mins ${seconds}s`;
}

/**
 * Liveness probe with database statistics
 */
export class HealthController {
  private readonly startTime: Date;

  constructor(
    private dbConnection: DatabaseConnection,
    private clock: () => Date = () => new Date()
  ) {
    this.startTime = clock();
  }

  check = (_req: Request, res: Response): void => {
    const currentTime = this.clock();
    const uptimeMs = currentTime.getTime() - this.startTime.getTime();

    const health: Record<string, unknown> = {
      status: 'OK',
      start_time: this.startTime.toISOString(),
      current_time: currentTime.toISOString(),
      uptime: formatUptime(uptimeMs),
    };

    try {
      if (!this.dbConnection.isOpen()) {
        throw new Error('Database connection is closed');
      }
      health.database = { status: 'healthy', statistics: this.dbConnection.getStatistics() };
    } catch (error) {
      logger.error('health_check_database_failed', { error });
      health.status = 'degraded';
      health.database = {
        status: 'error',
        message: error instanceof Error ? error.message : String(error),
      };
    }

    logger.debug('health_check_requested', { uptimeSeconds: uptimeMs / 1000 });
    res.status(health.status === 'OK' ? 200 : 503).json(health);
  };
}
