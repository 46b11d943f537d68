import express, { Application, Request, Response, NextFunction } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import rateLimit from 'express-rate-limit';
import config from './config';
import logger, { logError } from './utils/logger';
import { CatalogStore } from './domain/repositories/CatalogStore';
import { createCatalogServices } from './application/services';
import { requestId, requestLogger } from './presentation/middleware/auth';
import { createCatalogRoutes } from './presentation/routes/catalog.routes';

// API version prefix
export const API_PREFIX = '/api/v1';

// Builds the Express application over a catalog store. The server passes the
// TypeORM store; tests pass an in-memory one.
export const createApp = (store: CatalogStore): Application => {
  const app: Application = express();

  // ==========================================
  // Security Middleware
  // ==========================================

  app.use(helmet({
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'self'"],
        styleSrc: ["'self'", "'unsafe-inline'"],
        scriptSrc: ["'self'"],
        imgSrc: ["'self'", 'data:', 'https:'],
      },
    },
    crossOriginEmbedderPolicy: false,
  }));

  app.use(cors({
    origin: (origin, callback) => {
      // Allow requests with no origin (server-to-server, curl, etc.)
      if (!origin) return callback(null, true);

      if (config.security.allowedOrigins.includes(origin) || config.server.env === 'development') {
        callback(null, true);
      } else {
        callback(new Error('Not allowed by CORS'));
      }
    },
    credentials: true,
    methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-Request-ID']
  }));

  app.use(rateLimit({
    windowMs: config.security.rateWindow,
    max: config.security.rateLimit,
    standardHeaders: true,
    legacyHeaders: false,
    handler: (req: Request, res: Response) => {
      logger.warn('Rate limit exceeded', {
        ip: req.ip,
        path: req.path
      });
      res.status(429).json({
        success: false,
        error: {
          code: 'RATE_LIMIT_EXCEEDED',
          message: 'Too many requests, please try again later'
        }
      });
    }
  }));

  app.use(compression());

  // ==========================================
  // Request Middleware
  // ==========================================

  app.use(requestId);
  app.use(requestLogger);
  app.use(express.json({ limit: '1mb' }));

  // ==========================================
  // API Routes
  // ==========================================

  app.use(API_PREFIX, createCatalogRoutes(createCatalogServices(store), () => store.checkHealth()));

  app.get('/', (req: Request, res: Response) => {
    res.json({
      success: true,
      data: {
        service: config.server.serviceName,
        version: process.env.npm_package_version || '1.0.0',
        environment: config.server.env,
        health: `${API_PREFIX}/health`
      }
    });
  });

  // ==========================================
  // Error Handling
  // ==========================================

  // 404 handler
  app.use((req: Request, res: Response) => {
    logger.warn('Route not found', {
      method: req.method,
      path: req.path,
      ip: req.ip
    });

    res.status(404).json({
      success: false,
      error: {
        code: 'ROUTE_NOT_FOUND',
        message: `Route ${req.method} ${req.path} not found`
      }
    });
  });

  // Global error handler; body-parser failures arrive here with a 4xx status
  app.use((err: Error & { status?: number }, req: Request, res: Response, _next: NextFunction) => {
    if (err.status && err.status >= 400 && err.status < 500) {
      res.status(err.status).json({
        success: false,
        error: {
          code: 'BAD_REQUEST',
          message: err.message
        }
      });
      return;
    }

    logError('Unhandled error', err, {
      method: req.method,
      path: req.path,
      ip: req.ip
    });

    // Don't leak error details in production
    const isDevelopment = config.server.env === 'development';

    res.status(500).json({
      success: false,
      error: {
        code: 'INTERNAL_SERVER_ERROR',
        message: isDevelopment ? err.message : 'An unexpected error occurred'
      }
    });
  });

  return app;
};

export default createApp;
