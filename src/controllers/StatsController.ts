import { Request, Response } from 'express';
import { EventListenerService } from '../services/EventListenerService';
import { Logger } from '../utils/logger';

export class StatsController {
  private listenerService: EventListenerService;
  private logger: Logger;

  constructor(listenerService: EventListenerService, logger: Logger) {
    this.listenerService = listenerService;
    this.logger = logger;
  }

  public getHealth = (_req: Request, res: Response): void => {
    const state = this.listenerService.getState();
    res.json({ status: state === 'POLLING' ? 'ok' : 'degraded', state });
  };

  public getStats = (_req: Request, res: Response): void => {
    const status = this.listenerService.getStatus();
    const rpcStats = this.logger.getFailureStats();

    res.json({
      ...status,
      rpc: {
        overallFailureRate: `${rpcStats.overallRate.toFixed(2)}%`,
        methodStats: Object.entries(rpcStats.methodStats).map(([method, stats]) => ({
          method,
          success: stats.success,
          failure: stats.failure,
          total: stats.success + stats.failure,
          failureRate: `${stats.rate.toFixed(2)}%`
        }))
      }
    });
  };
}
