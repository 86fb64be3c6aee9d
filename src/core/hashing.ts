import { sha256 } from '../crypto';
import { MarketEvent, MarketEventType } from '../types';

type Canonical = null | boolean | number | string | Canonical[] | { [key: string]: Canonical };

export const GENESIS_EVENT_HASH = '0'.repeat(64);

export function sortObjectKeys(value: unknown): Canonical {
  if (value === null || value === undefined) {
    return null;
  }

  if (typeof value === 'boolean' || typeof value === 'number' || typeof value === 'string') {
    return value;
  }

  if (Array.isArray(value)) {
    return value.map(sortObjectKeys);
  }

  if (typeof value === 'object') {
    const sorted: { [key: string]: Canonical } = {};
    const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));

    for (const [key, entry] of entries) {
      if (entry !== undefined) {
        sorted[key] = sortObjectKeys(entry);
      }
    }

    return sorted;
  }

  throw new TypeError(`Cannot canonicalize value of type ${typeof value}`);
}

export function canonicalSerialize(value: unknown): string {
  return JSON.stringify(sortObjectKeys(value));
}

export function calculateEventHash(event: MarketEvent): string {
  const canonical: { [key: string]: Canonical } = {
    eventType: event.eventType,
    height: event.height,
    timestamp: event.timestamp,
    previousEventHash: event.previousEventHash
  };

  switch (event.eventType) {
    case MarketEventType.MARKET_ITEM_BOUGHT:
      canonical.tokenId = event.tokenId;
      canonical.seller = event.seller;
      canonical.buyer = event.buyer;
      canonical.price = event.price;
      break;

    case MarketEventType.MARKET_ITEM_RELISTED:
      canonical.tokenId = event.tokenId;
      canonical.seller = event.seller;
      canonical.price = event.price;
      break;

    case MarketEventType.ROYALTY_FEE_UPDATED:
      canonical.previousFee = event.previousFee;
      canonical.newFee = event.newFee;
      break;

    case MarketEventType.OWNERSHIP_TRANSFERRED:
      canonical.previousOwner = event.previousOwner;
      canonical.newOwner = event.newOwner;
      break;
  }

  return sha256(canonicalSerialize(canonical));
}

export function validateEventChain(events: MarketEvent[]): { valid: boolean; error?: string } {
  let previousHash = GENESIS_EVENT_HASH;

  for (let i = 0; i < events.length; i++) {
    const event = events[i];

    if (event.height !== i + 1) {
      return { valid: false, error: `Event height gap at index ${i}: expected ${i + 1}, got ${event.height}` };
    }

    if (event.previousEventHash !== previousHash) {
      return { valid: false, error: `Event hash chain broken at index ${i}` };
    }

    if (calculateEventHash(event) !== event.eventId) {
      return { valid: false, error: `Event hash mismatch at index ${i}` };
    }

    previousHash = event.eventId;
  }

  return { valid: true };
}
