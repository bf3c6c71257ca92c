import { Request, Response } from 'express';
import { isHexString } from 'ethers';
import { DeadLetterService } from '../services/DeadLetterService';
import { Logger } from '../utils/logger';

export class FailureController {
  private deadLetterService: DeadLetterService;
  private logger: Logger;

  constructor(deadLetterService: DeadLetterService, logger: Logger) {
    this.deadLetterService = deadLetterService;
    this.logger = logger;
  }

  public getFailures = async (req: Request, res: Response): Promise<void> => {
    try {
      const { transactionHash, page = '1', pageSize = '10' } = req.query;

      const errors: string[] = [];

      if (transactionHash !== undefined && (typeof transactionHash !== 'string' || !isHexString(transactionHash, 32))) {
        errors.push('transactionHash must be a 32-byte hex string');
      }

      const parsedPage = typeof page === 'string' ? Number(page) : NaN;
      const parsedPageSize = typeof pageSize === 'string' ? Number(pageSize) : NaN;

      if (!Number.isInteger(parsedPage) || parsedPage < 1) {
        errors.push('page must be a positive number');
      }

      if (!Number.isInteger(parsedPageSize) || parsedPageSize < 1 || parsedPageSize > 100) {
        errors.push('pageSize must be between 1 and 100');
      }

      if (errors.length > 0) {
        res.status(400).json({ errors });
        return;
      }

      const result = await this.deadLetterService.getFailures({
        transactionHash: typeof transactionHash === 'string' ? transactionHash : undefined,
        page: parsedPage,
        pageSize: parsedPageSize
      });

      res.json({
        data: result.failures,
        pagination: {
          totalCount: result.totalCount,
          page: parsedPage,
          pageSize: parsedPageSize,
          totalPages: Math.ceil(result.totalCount / parsedPageSize)
        }
      });
    } catch (error) {
      this.logger.error('Error retrieving failed relays', undefined, error);
      res.status(500).json({ error: 'An error occurred while retrieving failed relays' });
    }
  };
}
