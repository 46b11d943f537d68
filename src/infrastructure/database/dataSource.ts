import 'reflect-metadata';
import { DataSource } from 'typeorm';
import config from '../../config';
import logger, { logError } from '../../utils/logger';
import {
  AuthorEntity,
  BookCategoryEntity,
  BookEntity,
  CategoryEntity,
  PublisherEntity,
  ReviewEntity
} from './entities';

export const AppDataSource = new DataSource({
  type: 'postgres',
  host: config.database.host,
  port: config.database.port,
  username: config.database.user,
  password: config.database.password,
  database: config.database.name,
  synchronize: config.database.synchronize,
  logging: config.database.logging,
  entities: [CategoryEntity, BookEntity, AuthorEntity, PublisherEntity, BookCategoryEntity, ReviewEntity]
});

export const connectDatabase = async (): Promise<void> => {
  if (AppDataSource.isInitialized) {
    logger.debug('Database already connected');
    return;
  }

  try {
    await AppDataSource.initialize();
    logger.info('✅ Database connected successfully', {
      database: config.database.name,
      host: config.database.host
    });
  } catch (error) {
    logError('❌ Failed to connect to database', error);
    throw error;
  }
};

export const disconnectDatabase = async (): Promise<void> => {
  if (!AppDataSource.isInitialized) {
    return;
  }

  await AppDataSource.destroy();
  logger.info('Database disconnected');
};

export const checkDatabaseHealth = async (dataSource: DataSource = AppDataSource): Promise<boolean> => {
  try {
    await dataSource.query('SELECT 1');
    return true;
  } catch (error) {
    logError('Database health check failed', error);
    return false;
  }
};

export default AppDataSource;
