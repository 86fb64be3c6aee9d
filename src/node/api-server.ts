import express, { Request, Response } from 'express';
import { Server } from 'http';
import { MarketNode } from './market-node';
import { MarketAPI } from '../marketplace/market-api';

export class MarketAPIServer {
  private app: express.Application;
  private node: MarketNode;
  private api: MarketAPI;
  private port: number;
  private server: Server | null = null;

  constructor(node: MarketNode, port: number) {
    this.app = express();
    this.node = node;
    this.api = new MarketAPI(node);
    this.port = port;
    this.setupMiddleware();
    this.setupRoutes();
  }

  private setupMiddleware(): void {
    this.app.use(express.json());

    this.app.use((req, res, next) => {
      res.header('Access-Control-Allow-Origin', '*');
      res.header('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
      res.header('Access-Control-Allow-Headers', 'Content-Type');

      if (req.method === 'OPTIONS') {
        res.sendStatus(200);
      } else {
        next();
      }
    });
  }

  private setupRoutes(): void {
    this.app.get('/health', (req: Request, res: Response) => {
      res.json({ status: 'healthy', market: this.node.getInfo() });
    });

    this.app.get('/api/market/info', (req, res) => this.api.getInfo(req, res));
    this.app.get('/api/market/items/:tokenId', (req, res) => this.api.getItem(req, res));
    this.app.get('/api/market/unsold', (req, res) => this.api.getUnsoldTokens(req, res));
    this.app.get('/api/market/owned/:address', (req, res) => this.api.getOwnedTokens(req, res));
    this.app.get('/api/market/events', (req, res) => this.api.getEvents(req, res));
    this.app.get('/api/wallet/:address/balance', (req, res) => this.api.getBalance(req, res));

    this.app.post('/api/market/buy', (req, res) => this.api.buyToken(req, res));
    this.app.post('/api/market/resell', (req, res) => this.api.resellToken(req, res));
    this.app.post('/api/market/royalty-fee', (req, res) => this.api.updateRoyaltyFee(req, res));
  }

  /**
   * Starts listening and resolves with the bound port (useful when `port` is 0).
   */
  async start(host?: string): Promise<number> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(this.port, host ?? '0.0.0.0', () => {
        const address = server.address();
        const boundPort = typeof address === 'object' && address !== null ? address.port : this.port;
        console.log(`[Market API] Server listening on port ${boundPort}`);
        resolve(boundPort);
      });
      server.on('error', reject);
      this.server = server;
    });
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;

    await new Promise<void>((resolve, reject) => {
      server.close(error => (error ? reject(error) : resolve()));
    });
    this.server = null;
    console.log('[Market API] Server stopped');
  }
}
