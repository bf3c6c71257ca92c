import { DataSource } from 'typeorm';
import { FailedRelay } from '../models/FailedRelay';
import { Logger } from '../utils/logger';

export const ENTITIES = [FailedRelay];

export const createDataSource = (database: string): DataSource =>
  new DataSource({
    type: 'sqlite',
    database,
    entities: ENTITIES,
    synchronize: true,
    logging: false
  });

// Initialize database connection
export const initializeDatabase = async (dataSource: DataSource, logger: Logger): Promise<void> => {
  try {
    await dataSource.initialize();
    logger.info('Database connection established', { database: String(dataSource.options.database) });
  } catch (error) {
    logger.error('Error during database initialization', undefined, error);
    throw error;
  }
};
