export enum ListingState {
  LISTED = "LISTED",
  HELD = "HELD"
}

export interface MarketItem {
  tokenId: number;
  seller: string | null;
  price: number;
}

export interface CallContext {
  caller: string;
  value: number;
}

export interface CollectionMetadata {
  name: string;
  symbol: string;
  baseURI: string;
}

export interface DeployParams {
  royaltyFee: number;
  artist: string;
  prices: number[];
  metadata?: Partial<CollectionMetadata>;
}

export enum MarketEventType {
  MARKET_ITEM_BOUGHT = "MARKET_ITEM_BOUGHT",
  MARKET_ITEM_RELISTED = "MARKET_ITEM_RELISTED",
  ROYALTY_FEE_UPDATED = "ROYALTY_FEE_UPDATED",
  OWNERSHIP_TRANSFERRED = "OWNERSHIP_TRANSFERRED"
}

export interface BaseMarketEvent {
  eventId: string;
  eventType: MarketEventType;
  height: number;
  timestamp: number;
  previousEventHash: string;
}

export interface MarketItemBoughtEvent extends BaseMarketEvent {
  eventType: MarketEventType.MARKET_ITEM_BOUGHT;
  tokenId: number;
  seller: string;
  buyer: string;
  price: number;
}

export interface MarketItemRelistedEvent extends BaseMarketEvent {
  eventType: MarketEventType.MARKET_ITEM_RELISTED;
  tokenId: number;
  seller: string;
  price: number;
}

export interface RoyaltyFeeUpdatedEvent extends BaseMarketEvent {
  eventType: MarketEventType.ROYALTY_FEE_UPDATED;
  previousFee: number;
  newFee: number;
}

export interface OwnershipTransferredEvent extends BaseMarketEvent {
  eventType: MarketEventType.OWNERSHIP_TRANSFERRED;
  previousOwner: string | null;
  newOwner: string | null;
}

export type MarketEvent =
  | MarketItemBoughtEvent
  | MarketItemRelistedEvent
  | RoyaltyFeeUpdatedEvent
  | OwnershipTransferredEvent;

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

/**
 * Event payload before it is stamped with height, timestamp and hash.
 */
export type MarketEventPayload = DistributiveOmit<MarketEvent, keyof Omit<BaseMarketEvent, 'eventType'>>;

export interface LedgerState {
  address: string;
  metadata: CollectionMetadata;
  artist: string;
  owner: string | null;
  royaltyFee: number;
  items: MarketItem[];
  events: MarketEvent[];
}

export interface MarketInfo extends CollectionMetadata {
  address: string;
  artist: string;
  owner: string | null;
  royaltyFee: number;
  totalSupply: number;
  escrowBalance: number;
}

export interface Payout {
  to: string;
  amount: number;
  reason: 'royalty' | 'sale';
}
