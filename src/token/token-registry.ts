import { StateIntegrityError } from '../core/errors';
import { OwnershipRecord, TokenRecord, TokenRegistry, TokenRegistryState } from './token-types';

function cloneRecord(token: TokenRecord): TokenRecord {
  return {
    ...token,
    ownershipHistory: token.ownershipHistory.map(record => ({ ...record }))
  };
}

export class InMemoryTokenRegistry implements TokenRegistry {
  private tokens: Map<number, TokenRecord>;

  constructor(state?: TokenRegistryState) {
    this.tokens = new Map();
    if (state) {
      this.revert(state);
    }
  }

  mint(tokenId: number, to: string): void {
    if (this.tokens.has(tokenId)) {
      throw new StateIntegrityError(`Token ${tokenId} already minted`);
    }

    const now = Date.now();
    this.tokens.set(tokenId, {
      tokenId,
      currentOwner: to,
      ownershipHistory: [{ owner: to, timestamp: now, transferType: 'mint' }],
      mintedAt: now
    });
  }

  transfer(tokenId: number, from: string, to: string): void {
    const token = this.requireToken(tokenId);

    if (token.currentOwner !== from) {
      throw new StateIntegrityError(`Token ${tokenId} transfer from incorrect owner`);
    }

    token.currentOwner = to;
    token.ownershipHistory.push({
      owner: to,
      timestamp: Date.now(),
      transferType: 'transfer'
    });
  }

  ownerOf(tokenId: number): string {
    return this.requireToken(tokenId).currentOwner;
  }

  balanceOf(owner: string): number {
    let count = 0;
    for (const token of this.tokens.values()) {
      if (token.currentOwner === owner) {
        count++;
      }
    }
    return count;
  }

  exists(tokenId: number): boolean {
    return this.tokens.has(tokenId);
  }

  totalSupply(): number {
    return this.tokens.size;
  }

  getTokenHistory(tokenId: number): OwnershipRecord[] {
    const token = this.tokens.get(tokenId);
    return token ? token.ownershipHistory.map(record => ({ ...record })) : [];
  }

  checkpoint(): TokenRegistryState {
    return this.exportState();
  }

  revert(state: TokenRegistryState): void {
    this.tokens = new Map(state.tokens.map(token => [token.tokenId, cloneRecord(token)]));
  }

  exportState(): TokenRegistryState {
    return {
      tokens: Array.from(this.tokens.values())
        .sort((a, b) => a.tokenId - b.tokenId)
        .map(cloneRecord)
    };
  }

  private requireToken(tokenId: number): TokenRecord {
    const token = this.tokens.get(tokenId);
    if (!token) {
      throw new StateIntegrityError(`Token ${tokenId} does not exist`);
    }
    return token;
  }
}
