import axios, { AxiosInstance } from 'axios';
import { signCall } from '../auth/call-auth';
import { MarketEvent, MarketInfo, MarketItem } from '../types';

export interface WalletKeys {
  privateKey: string;
  publicKey: string;
}

export interface ItemResponse extends MarketItem {
  owner: string;
  tokenURI: string;
}

interface ApiEnvelope {
  success: boolean;
  error?: string;
  code?: string;
}

export class MarketClientError extends Error {
  readonly status: number | undefined;
  readonly code: string | undefined;

  constructor(message: string, status?: number, code?: string) {
    super(message);
    this.name = 'MarketClientError';
    this.status = status;
    this.code = code;
  }
}

/**
 * HTTP client for a running market node.
 */
export class MarketClient {
  private http: AxiosInstance;

  constructor(baseURL: string, http?: AxiosInstance) {
    this.http = http ?? axios.create({ baseURL, timeout: 5000 });
  }

  async getInfo(): Promise<MarketInfo> {
    const data = await this.get<ApiEnvelope & { info: MarketInfo }>('/api/market/info');
    return data.info;
  }

  async getItem(tokenId: number): Promise<ItemResponse> {
    const data = await this.get<ApiEnvelope & { item: ItemResponse }>(`/api/market/items/${tokenId}`);
    return data.item;
  }

  async getUnsoldTokens(): Promise<MarketItem[]> {
    const data = await this.get<ApiEnvelope & { items: MarketItem[] }>('/api/market/unsold');
    return data.items;
  }

  async getOwnedTokens(address: string): Promise<MarketItem[]> {
    const data = await this.get<ApiEnvelope & { items: MarketItem[] }>(
      `/api/market/owned/${encodeURIComponent(address)}`
    );
    return data.items;
  }

  async getEvents(): Promise<MarketEvent[]> {
    const data = await this.get<ApiEnvelope & { events: MarketEvent[] }>('/api/market/events');
    return data.events;
  }

  async getBalance(address: string): Promise<number> {
    const data = await this.get<ApiEnvelope & { balance: number }>(
      `/api/wallet/${encodeURIComponent(address)}/balance`
    );
    return data.balance;
  }

  async buyToken(tokenId: number, value: number, keys: WalletKeys): Promise<MarketItem> {
    const call = signCall('buy', { tokenId, value }, keys);
    const data = await this.post<ApiEnvelope & { item: MarketItem }>('/api/market/buy', { tokenId, value, ...call });
    return data.item;
  }

  async resellToken(tokenId: number, price: number, value: number, keys: WalletKeys): Promise<MarketItem> {
    const call = signCall('resell', { tokenId, price, value }, keys);
    const data = await this.post<ApiEnvelope & { item: MarketItem }>('/api/market/resell', {
      tokenId,
      price,
      value,
      ...call
    });
    return data.item;
  }

  async updateRoyaltyFee(fee: number, keys: WalletKeys): Promise<number> {
    const call = signCall('royalty-fee', { fee, value: 0 }, keys);
    const data = await this.post<ApiEnvelope & { royaltyFee: number }>('/api/market/royalty-fee', { fee, ...call });
    return data.royaltyFee;
  }

  private async get<T extends ApiEnvelope>(url: string): Promise<T> {
    try {
      const response = await this.http.get<T>(url);
      return response.data;
    } catch (error) {
      throw this.toClientError(error);
    }
  }

  private async post<T extends ApiEnvelope>(url: string, body: object): Promise<T> {
    try {
      const response = await this.http.post<T>(url, body);
      return response.data;
    } catch (error) {
      throw this.toClientError(error);
    }
  }

  private toClientError(error: unknown): MarketClientError {
    if (axios.isAxiosError<ApiEnvelope>(error)) {
      const data = error.response?.data;
      return new MarketClientError(data?.error ?? error.message, error.response?.status, data?.code);
    }
    return new MarketClientError(error instanceof Error ? error.message : String(error));
  }
}
