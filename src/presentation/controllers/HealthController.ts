import { Request, Response } from 'express';
import config from '../../config';
import { logError } from '../../utils/logger';
import { HealthCheckDTO } from '../../application/dto/CatalogDTO';

// Health Check Controller
export class HealthController {
  constructor(private readonly checkDatabase: () => Promise<boolean>) {}

  async checkHealth(req: Request, res: Response): Promise<void> {
    try {
      const dbHealthy = await this.checkDatabase();

      const healthCheck: HealthCheckDTO = {
        status: dbHealthy ? 'healthy' : 'unhealthy',
        service: config.server.serviceName,
        timestamp: new Date(),
        version: process.env.npm_package_version || '1.0.0',
        uptime: process.uptime(),
        checks: {
          database: dbHealthy
        }
      };

      res.status(dbHealthy ? 200 : 503).json({
        success: dbHealthy,
        data: healthCheck
      });
    } catch (error) {
      logError('Health check failed', error);

      res.status(503).json({
        success: false,
        error: {
          code: 'HEALTH_CHECK_FAILED',
          message: 'Service health check failed'
        }
      });
    }
  }
}

export default HealthController;
