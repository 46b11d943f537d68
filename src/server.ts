#!/usr/bin/env node

import 'reflect-metadata';
import { Server } from 'http';
import { createApp } from './app';
import config from './config';
import logger, { logError } from './utils/logger';
import AppDataSource, { connectDatabase, disconnectDatabase } from './infrastructure/database/dataSource';
import { TypeOrmCatalogStore } from './infrastructure/database/TypeOrmCatalogStore';

let server: Server | null = null;

// ==========================================
// Graceful Shutdown
// ==========================================

const shutdown = async (signal: string, exitCode = 0): Promise<void> => {
  logger.info(`📥 Received ${signal}. Starting graceful shutdown...`);

  // Stop accepting new connections
  if (server) {
    await new Promise<void>((resolve) => {
      server?.close(() => {
        logger.info('🔒 HTTP server closed');
        resolve();
      });
    });
  }

  try {
    await disconnectDatabase();
  } catch (error) {
    logError('Error disconnecting from database', error);
  }

  logger.info('👋 Graceful shutdown completed');
  process.exit(exitCode);
};

const setupGracefulShutdown = (): void => {
  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });

  process.on('uncaughtException', (error: Error) => {
    logError('💥 Uncaught Exception', error);
    void shutdown('uncaughtException', 1);
  });

  process.on('unhandledRejection', (reason: unknown) => {
    logError('💥 Unhandled Rejection', reason);
    void shutdown('unhandledRejection', 1);
  });
};

// ==========================================
// Server Startup
// ==========================================

const startServer = async (): Promise<void> => {
  try {
    logger.info(`🚀 Starting ${config.server.serviceName}...`);
    logger.info(`📍 Environment: ${config.server.env}`);

    await connectDatabase();

    const app = createApp(new TypeOrmCatalogStore(AppDataSource));

    server = app.listen(config.server.port, () => {
      logger.info(`✅ Server running on port ${config.server.port}`);
      logger.info(`💚 Health check at http://localhost:${config.server.port}/api/v1/health`);
    });

    setupGracefulShutdown();
  } catch (error) {
    logError('❌ Failed to start server', error);
    process.exit(1);
  }
};

void startServer();
