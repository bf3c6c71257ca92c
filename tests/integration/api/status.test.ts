import request from 'supertest';
import express from 'express';
import { initializeTestDatabase, closeTestDatabase, TestDataSource } from '../../config/database';
import { FailedRelay } from '../../../src/models/FailedRelay';
import { DeadLetterService } from '../../../src/services/DeadLetterService';
import { EventListenerService } from '../../../src/services/EventListenerService';
import { StatsController } from '../../../src/controllers/StatsController';
import { FailureController } from '../../../src/controllers/FailureController';
import { Logger } from '../../../src/utils/logger';
import {
  TX_HASH_1,
  TX_HASH_2,
  createListenerConfig,
  createMockConnector,
  createMockRelayer,
  createSilentLogger,
  delivered,
  depositLog,
  rejected
} from '../../helpers/factories';

describe('Status API Integration Tests', () => {
  let app: express.Application;
  let logger: Logger;
  let listenerService: EventListenerService;

  beforeAll(async () => {
    await initializeTestDatabase();
  });

  afterAll(async () => {
    await closeTestDatabase();
  });

  beforeEach(async () => {
    await TestDataSource.getRepository(FailedRelay).clear();

    logger = createSilentLogger();
    const relayer = createMockRelayer();
    relayer.deliver
      .mockResolvedValueOnce(rejected())
      .mockResolvedValueOnce(rejected())
      .mockResolvedValueOnce(rejected())
      .mockResolvedValueOnce(delivered());

    const deadLetterService = new DeadLetterService(TestDataSource.getRepository(FailedRelay));
    listenerService = new EventListenerService(createMockConnector(), relayer, createListenerConfig(), logger, {
      deadLetters: deadLetterService,
      sleep: jest.fn().mockResolvedValue(undefined)
    });

    const statsController = new StatsController(listenerService, logger);
    const failureController = new FailureController(deadLetterService, logger);

    app = express();
    app.use(express.json());
    app.get('/health', statsController.getHealth);
    app.get('/stats', statsController.getStats);
    app.get('/failures', failureController.getFailures);
  });

  describe('GET /health', () => {
    it('should report degraded before the listener is polling', async () => {
      const response = await request(app).get('/health').expect('Content-Type', /json/).expect(200);

      expect(response.body).toEqual({ status: 'degraded', state: 'STARTING' });
    });

    it('should report ok while polling', async () => {
      await listenerService.start();

      const response = await request(app).get('/health').expect(200);

      expect(response.body).toEqual({ status: 'ok', state: 'POLLING' });
    });
  });

  describe('GET /stats', () => {
    it('should return relay counters and RPC statistics', async () => {
      await listenerService.start();
      await listenerService.processLog(depositLog(TX_HASH_1, 101));
      await listenerService.processLog(depositLog(TX_HASH_2, 102));
      await listenerService.processLog({ transactionHash: TX_HASH_2, blockNumber: 103, logIndex: 1 });
      logger.logApiSuccess('eth_getFilterChanges');
      logger.logApiSuccess('eth_getFilterChanges');
      logger.logApiSuccess('eth_getFilterChanges');
      logger.logApiFailure('eth_getFilterChanges', ['0x1'], new Error('timeout'));

      const response = await request(app).get('/stats').expect('Content-Type', /json/).expect(200);

      expect(response.body).toMatchObject({
        state: 'POLLING',
        eventName: 'BridgeDepositInitiated',
        cursor: 103,
        stats: { relayed: 1, failed: 1, skipped: 1, deliveryAttempts: 4 },
        lastError: null,
        rpc: {
          overallFailureRate: '25.00%',
          methodStats: [
            { method: 'eth_getFilterChanges', success: 3, failure: 1, total: 4, failureRate: '25.00%' }
          ]
        }
      });
    });
  });

  describe('GET /failures', () => {
    it('should list events that exhausted their retries', async () => {
      await listenerService.processLog(depositLog(TX_HASH_1, 101, 5000n));

      const response = await request(app)
        .get('/failures')
        .query({ page: '1', pageSize: '10' })
        .expect('Content-Type', /json/)
        .expect(200);

      expect(response.body.pagination).toEqual({ totalCount: 1, page: 1, pageSize: 10, totalPages: 1 });
      expect(response.body.data).toHaveLength(1);
      expect(response.body.data[0]).toMatchObject({
        transactionHash: TX_HASH_1,
        blockNumber: 101,
        amount: '5000',
        destinationChainId: 2,
        attempts: 3,
        lastError: 'Destination responded with HTTP 500'
      });
    });

    it('should return 400 for an invalid page size', async () => {
      const response = await request(app).get('/failures').query({ pageSize: '0' }).expect(400);

      expect(response.body).toEqual({ errors: ['pageSize must be between 1 and 100'] });
    });
  });
});
