import WebSocket from 'ws';
import http from 'http';
import { RelayOutcome } from '../types';
import { Logger } from '../utils/logger';

/**
 * Pushes relay outcomes to connected WebSocket clients
 */
export class WebSocketService {
  private wss: WebSocket.Server;
  private clients: Set<WebSocket> = new Set();
  private logger: Logger;

  constructor(server: http.Server, logger: Logger) {
    this.logger = logger;
    this.wss = new WebSocket.Server({ server });
    this.setupWebSocketServer();
  }

  private setupWebSocketServer(): void {
    this.wss.on('connection', (ws: WebSocket) => {
      this.logger.debug('WebSocket client connected');
      this.clients.add(ws);

      ws.send(JSON.stringify({ type: 'info', message: 'Connected to bridge relay outcome stream' }));

      ws.on('close', () => {
        this.logger.debug('WebSocket client disconnected');
        this.clients.delete(ws);
      });

      ws.on('error', (error) => {
        this.logger.warn('WebSocket client error', { reason: error.message });
        this.clients.delete(ws);
      });
    });
  }

  public broadcastOutcome(outcome: RelayOutcome): void {
    const message = JSON.stringify({
      type: 'relayOutcome',
      data: {
        status: outcome.status,
        attempts: outcome.attempts,
        error: outcome.error ?? null,
        transactionHash: outcome.event.transactionHash,
        blockNumber: outcome.event.blockNumber,
        sourceChainId: outcome.event.sourceChainId,
        destinationChainId: outcome.event.destinationChainId,
        user: outcome.event.user,
        token: outcome.event.token,
        amount: outcome.event.amount
      }
    });

    this.clients.forEach((client) => {
      if (client.readyState === WebSocket.OPEN) {
        client.send(message);
      }
    });
  }

  public getClientCount(): number {
    return this.clients.size;
  }

  public close(): Promise<void> {
    this.clients.forEach((client) => client.terminate());
    this.clients.clear();
    return new Promise((resolve, reject) => {
      this.wss.close((error) => (error ? reject(error) : resolve()));
    });
  }
}
