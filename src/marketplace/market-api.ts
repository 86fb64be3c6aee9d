import { Request, Response } from 'express';
import { MarketNode } from '../node/market-node';
import { SignedCall } from '../auth/call-auth';
import { isMarketError, MarketErrorCode } from '../core/errors';

const STATUS_BY_CODE: Record<MarketErrorCode, number> = {
  INVALID_ARGUMENT: 400,
  PAYMENT_MISMATCH: 402,
  INSUFFICIENT_FUNDS: 402,
  INSUFFICIENT_DEPOSIT: 402,
  UNAUTHORIZED: 403,
  STATE_INTEGRITY: 409
};

class BadRequestError extends Error {}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readInteger(body: Record<string, unknown>, key: string): number {
  const value = body[key];
  if (typeof value !== 'number' || !Number.isSafeInteger(value)) {
    throw new BadRequestError(`Field "${key}" must be an integer`);
  }
  return value;
}

function readString(body: Record<string, unknown>, key: string): string {
  const value = body[key];
  if (typeof value !== 'string' || value === '') {
    throw new BadRequestError(`Field "${key}" is required`);
  }
  return value;
}

function readBody(req: Request): Record<string, unknown> {
  const body: unknown = req.body;
  if (!isRecord(body)) {
    throw new BadRequestError('Request body must be a JSON object');
  }
  return body;
}

function readSignedCall(body: Record<string, unknown>): SignedCall {
  return {
    publicKey: readString(body, 'publicKey'),
    signature: readString(body, 'signature'),
    timestamp: readInteger(body, 'timestamp'),
    nonce: readString(body, 'nonce')
  };
}

function parseTokenId(raw: string): number {
  if (!/^\d+$/.test(raw)) {
    throw new BadRequestError(`Invalid token id: ${raw}`);
  }
  return Number(raw);
}

function sendError(res: Response, error: unknown): void {
  if (error instanceof BadRequestError) {
    res.status(400).json({ success: false, error: error.message, code: 'BAD_REQUEST' });
    return;
  }

  if (isMarketError(error)) {
    res.status(STATUS_BY_CODE[error.code]).json({ success: false, error: error.message, code: error.code });
    return;
  }

  const message = error instanceof Error ? error.message : String(error);
  console.error('[Market API] Unhandled error:', error);
  res.status(500).json({ success: false, error: message, code: 'INTERNAL' });
}

export class MarketAPI {
  private node: MarketNode;

  constructor(node: MarketNode) {
    this.node = node;
  }

  /**
   * GET /api/market/info
   */
  async getInfo(req: Request, res: Response): Promise<void> {
    try {
      res.json({ success: true, info: this.node.getInfo() });
    } catch (error) {
      sendError(res, error);
    }
  }

  /**
   * GET /api/market/items/:tokenId
   */
  async getItem(req: Request, res: Response): Promise<void> {
    try {
      const item = this.node.getItem(parseTokenId(req.params.tokenId));
      res.json({ success: true, item });
    } catch (error) {
      if (isMarketError(error) && error.code === 'INVALID_ARGUMENT') {
        res.status(404).json({ success: false, error: error.message, code: 'NOT_FOUND' });
        return;
      }
      sendError(res, error);
    }
  }

  /**
   * GET /api/market/unsold
   */
  async getUnsoldTokens(req: Request, res: Response): Promise<void> {
    try {
      res.json({ success: true, items: this.node.getUnsoldTokens() });
    } catch (error) {
      sendError(res, error);
    }
  }

  /**
   * GET /api/market/owned/:address
   */
  async getOwnedTokens(req: Request, res: Response): Promise<void> {
    try {
      res.json({ success: true, items: this.node.getOwnedTokens(req.params.address) });
    } catch (error) {
      sendError(res, error);
    }
  }

  /**
   * GET /api/market/events
   */
  async getEvents(req: Request, res: Response): Promise<void> {
    try {
      res.json({ success: true, events: this.node.getEvents() });
    } catch (error) {
      sendError(res, error);
    }
  }

  /**
   * GET /api/wallet/:address/balance
   */
  async getBalance(req: Request, res: Response): Promise<void> {
    try {
      res.json({ success: true, address: req.params.address, balance: this.node.getBalance(req.params.address) });
    } catch (error) {
      sendError(res, error);
    }
  }

  /**
   * POST /api/market/buy
   * Body: { tokenId, value, publicKey, signature, timestamp, nonce }
   */
  async buyToken(req: Request, res: Response): Promise<void> {
    try {
      const body = readBody(req);
      const item = await this.node.buy(readInteger(body, 'tokenId'), readInteger(body, 'value'), readSignedCall(body));
      res.json({ success: true, item });
    } catch (error) {
      sendError(res, error);
    }
  }

  /**
   * POST /api/market/resell
   * Body: { tokenId, price, value, publicKey, signature, timestamp, nonce }
   */
  async resellToken(req: Request, res: Response): Promise<void> {
    try {
      const body = readBody(req);
      const item = await this.node.resell(
        readInteger(body, 'tokenId'),
        readInteger(body, 'price'),
        readInteger(body, 'value'),
        readSignedCall(body)
      );
      res.json({ success: true, item });
    } catch (error) {
      sendError(res, error);
    }
  }

  /**
   * POST /api/market/royalty-fee
   * Owner only. Body: { fee, publicKey, signature, timestamp, nonce }
   */
  async updateRoyaltyFee(req: Request, res: Response): Promise<void> {
    try {
      const body = readBody(req);
      const royaltyFee = await this.node.updateRoyaltyFee(readInteger(body, 'fee'), readSignedCall(body));
      res.json({ success: true, royaltyFee });
    } catch (error) {
      sendError(res, error);
    }
  }
}
