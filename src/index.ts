import 'reflect-metadata';
import express, { Request, Response } from 'express';
import cors from 'cors';
import http from 'http';
import dotenv from 'dotenv';
import { loadConfig, getConfigSummary, RelayerConfig } from './config/config';
import { createDataSource, initializeDatabase } from './config/database';
import { FailedRelay } from './models/FailedRelay';
import { ChainConnector } from './services/ChainConnector';
import { DestinationRelayer } from './services/DestinationRelayer';
import { DeadLetterService } from './services/DeadLetterService';
import { EventListenerService } from './services/EventListenerService';
import { WebSocketService } from './services/WebSocketService';
import { FailureController } from './controllers/FailureController';
import { StatsController } from './controllers/StatsController';
import { ConfigError } from './errors';
import { Logger } from './utils/logger';

async function bootstrap() {
  // Load environment variables from .env file
  dotenv.config();

  let config: RelayerConfig;
  try {
    config = loadConfig();
  } catch (error) {
    const bootLogger = new Logger({ logDir: null });
    if (error instanceof ConfigError) {
      error.problems.forEach((problem) => bootLogger.critical(problem));
    }
    bootLogger.critical('Failed to load configuration. Please check your .env file.', undefined, error);
    process.exit(1);
  }

  const logger = new Logger({ level: config.logLevel, logDir: config.logDir });
  logger.info('Configuration loaded', getConfigSummary(config));

  try {
    const dataSource = createDataSource(config.dbName);
    await initializeDatabase(dataSource, logger);
    const deadLetterService = new DeadLetterService(dataSource.getRepository(FailedRelay));

    // Services
    const connector = new ChainConnector(config.source.rpcUrl, config.source.chainId, logger);
    const relayer = new DestinationRelayer(config.destination, logger);
    const listenerService = new EventListenerService(connector, relayer, config, logger, {
      deadLetters: deadLetterService
    });

    // Connect and subscribe before serving anything; failures here are fatal
    await listenerService.start();

    const app = express();
    const server = http.createServer(app);

    app.use(cors());
    app.use(express.json());

    const webSocketService = new WebSocketService(server, logger);
    listenerService.onRelayOutcome((outcome) => webSocketService.broadcastOutcome(outcome));

    // Controllers
    const statsController = new StatsController(listenerService, logger);
    const failureController = new FailureController(deadLetterService, logger);

    // Routes
    app.get('/health', statsController.getHealth);
    app.get('/stats', statsController.getStats);
    app.get('/failures', failureController.getFailures);

    // API documentation
    app.get('/', (_req: Request, res: Response) => {
      res.json({
        name: 'Bridge Event Relayer API',
        description: `Status of the ${config.source.eventName} relay pipeline`,
        endpoints: [
          { path: '/health', description: 'Listener state', method: 'GET' },
          { path: '/stats', description: 'Relay counters and RPC failure rates', method: 'GET' },
          {
            path: '/failures',
            description: 'Events that exhausted their delivery retries',
            method: 'GET',
            params: {
              transactionHash: 'Filter by source transaction hash',
              page: 'Page number (default: 1)',
              pageSize: 'Items per page (default: 10, max: 100)'
            }
          }
        ],
        websocket: {
          path: '/',
          description: 'WebSocket stream of relay outcomes'
        }
      });
    });

    server.listen(config.port, () => {
      logger.info(`Status API running on port ${config.port}`);
    });

    const loop = listenerService.run();

    // Graceful shutdown: the loop finishes its current iteration first
    const shutdown = async () => {
      logger.info('Shutting down relayer...');
      listenerService.stop();
      await loop;
      await webSocketService.close();
      server.close();
      await dataSource.destroy();
      process.exit(0);
    };

    const onSignal = () => {
      shutdown().catch((error) => {
        logger.critical('Error during shutdown', undefined, error);
        process.exit(1);
      });
    };

    process.on('SIGTERM', onSignal);
    process.on('SIGINT', onSignal);

    await loop;
  } catch (error) {
    logger.critical('Failed to initialize the relayer', undefined, error);
    process.exit(1);
  }
}

// Start application
void bootstrap();
