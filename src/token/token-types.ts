export interface OwnershipRecord {
  owner: string;
  timestamp: number;
  transferType: 'mint' | 'transfer';
}

export interface TokenRecord {
  tokenId: number;
  currentOwner: string;
  ownershipHistory: OwnershipRecord[];
  mintedAt: number;
}

export interface TokenRegistryState {
  tokens: TokenRecord[];
}

/**
 * Ownership registry the market ledger delegates to. `transfer` fails when
 * `from` is not the token's current owner.
 */
export interface TokenRegistry {
  mint(tokenId: number, to: string): void;
  transfer(tokenId: number, from: string, to: string): void;
  ownerOf(tokenId: number): string;
  balanceOf(owner: string): number;
  exists(tokenId: number): boolean;
  totalSupply(): number;
  getTokenHistory(tokenId: number): OwnershipRecord[];
  checkpoint(): TokenRegistryState;
  revert(state: TokenRegistryState): void;
  exportState(): TokenRegistryState;
}
