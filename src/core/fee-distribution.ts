import { MarketItem, Payout } from '../types';
import { InvalidArgumentError, StateIntegrityError } from './errors';

export interface RoyaltyConfig {
  artist: string;
  royaltyFee: number;
}

export function assertAmount(value: number, label: string): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new InvalidArgumentError(`${label} must be a non-negative integer amount of sats`);
  }
}

export function assertPrice(price: number, message: string = 'Price must be greater than zero'): void {
  if (!Number.isSafeInteger(price) || price <= 0) {
    throw new InvalidArgumentError(message);
  }
}

/**
 * Deposit the deployer attaches so every catalogued token carries one royalty.
 */
export function calculateRequiredDeposit(tokenCount: number, royaltyFee: number): number {
  const required = tokenCount * royaltyFee;
  if (!Number.isSafeInteger(required)) {
    throw new InvalidArgumentError('Required deposit exceeds the safe integer range');
  }
  return required;
}

export class RoyaltyPlanner {
  private config: RoyaltyConfig;

  constructor(config: RoyaltyConfig) {
    this.config = config;
  }

  /**
   * Payouts for a purchase: the royalty to the artist (out of escrow), then
   * the full attached value to the seller.
   */
  planPurchase(item: MarketItem, value: number): Payout[] {
    if (item.seller === null) {
      throw new StateIntegrityError(`Token ${item.tokenId} has no seller to pay`);
    }

    const payouts: Payout[] = [];
    if (this.config.royaltyFee > 0) {
      payouts.push({ to: this.config.artist, amount: this.config.royaltyFee, reason: 'royalty' });
    }
    if (value > 0) {
      payouts.push({ to: item.seller, amount: value, reason: 'sale' });
    }
    return payouts;
  }

  updateRoyaltyFee(royaltyFee: number): void {
    assertAmount(royaltyFee, 'Royalty fee');
    this.config = { ...this.config, royaltyFee };
  }

  getConfig(): RoyaltyConfig {
    return { ...this.config };
  }
}
