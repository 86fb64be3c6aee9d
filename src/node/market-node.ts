import { EventStore, FileEventStore, MarketSnapshot } from './event-store';
import { MarketplaceLedger } from '../marketplace/market-ledger';
import { InMemoryTokenRegistry } from '../token/token-registry';
import { InMemoryBalanceBook } from '../payment/adapter';
import { CallArguments, CallAuthenticator, SignedCall } from '../auth/call-auth';
import { calculateRequiredDeposit } from '../core/fee-distribution';
import { InvalidArgumentError } from '../core/errors';
import { MarketConfig } from '../config/market-config';
import { MarketEvent, MarketInfo, MarketItem } from '../types';

export interface MarketNodeOptions {
  deployer: string;
  /** Credit the deployer with the required deposit before deploying. */
  fundDeployer?: boolean;
  store?: EventStore;
  authenticator?: CallAuthenticator;
}

export interface ItemView extends MarketItem {
  owner: string;
  tokenURI: string;
}

export class MarketNode {
  private config: MarketConfig;
  private options: MarketNodeOptions;
  private store: EventStore;
  private authenticator: CallAuthenticator;
  private registry: InMemoryTokenRegistry = new InMemoryTokenRegistry();
  private balances: InMemoryBalanceBook = new InMemoryBalanceBook();
  private ledger: MarketplaceLedger | null = null;
  private persistedHeight = 0;
  private persistQueue: Promise<void> = Promise.resolve();

  constructor(config: MarketConfig, options: MarketNodeOptions) {
    this.config = config;
    this.options = options;
    this.store = options.store ?? new FileEventStore(config.dataDir);
    this.authenticator = options.authenticator ?? new CallAuthenticator();
  }

  async initialize(): Promise<void> {
    console.log(`[Market Node] Initializing ${this.config.collection.name}...`);

    const snapshot = await this.store.loadSnapshot();
    if (snapshot) {
      this.restore(snapshot);
    } else {
      this.deploy();
    }

    await this.persist();
    console.log(`[Market Node] Ledger ready at ${this.requireLedger().address}`);
  }

  async buy(tokenId: number, value: number, call: SignedCall): Promise<MarketItem> {
    const caller = this.authenticator.authenticate('buy', { tokenId, value }, call);
    const item = this.requireLedger().buyToken(tokenId, { caller, value });
    await this.persistCommitted();
    return item;
  }

  async resell(tokenId: number, price: number, value: number, call: SignedCall): Promise<MarketItem> {
    const caller = this.authenticator.authenticate('resell', { tokenId, price, value }, call);
    const item = this.requireLedger().resellToken(tokenId, price, { caller, value });
    await this.persistCommitted();
    return item;
  }

  async updateRoyaltyFee(fee: number, call: SignedCall): Promise<number> {
    const args: CallArguments = { fee, value: 0 };
    const caller = this.authenticator.authenticate('royalty-fee', args, call);
    const ledger = this.requireLedger();
    ledger.updateRoyaltyFee(fee, { caller, value: 0 });
    await this.persistCommitted();
    return ledger.royaltyFee;
  }

  getInfo(): MarketInfo {
    return this.requireLedger().getInfo();
  }

  getItem(tokenId: number): ItemView {
    const ledger = this.requireLedger();
    return {
      ...ledger.marketItem(tokenId),
      owner: ledger.ownerOf(tokenId),
      tokenURI: ledger.tokenURI(tokenId)
    };
  }

  getUnsoldTokens(): MarketItem[] {
    return this.requireLedger().getUnsoldTokens();
  }

  getOwnedTokens(owner: string): MarketItem[] {
    return this.requireLedger().getOwnedTokens(owner);
  }

  getEvents(): MarketEvent[] {
    return this.requireLedger().getEvents();
  }

  getBalance(address: string): number {
    return this.balances.getBalance(address);
  }

  private deploy(): void {
    const artist = this.config.artist;
    if (!artist) {
      throw new InvalidArgumentError('An artist address is required to deploy the market');
    }

    for (const [address, amount] of Object.entries(this.config.genesisBalances)) {
      this.balances.credit(address, amount);
    }

    const deposit = calculateRequiredDeposit(this.config.pricesSats.length, this.config.royaltyFeeSats);
    if (this.options.fundDeployer) {
      this.balances.credit(this.options.deployer, deposit);
    }

    this.ledger = MarketplaceLedger.deploy(
      {
        royaltyFee: this.config.royaltyFeeSats,
        artist,
        prices: this.config.pricesSats,
        metadata: this.config.collection
      },
      { caller: this.options.deployer, value: deposit },
      { registry: this.registry, balances: this.balances }
    );
  }

  private restore(snapshot: MarketSnapshot): void {
    console.log(`[Market Node] Restoring snapshot saved at ${new Date(snapshot.savedAt).toISOString()}`);

    this.registry = new InMemoryTokenRegistry(snapshot.tokens);
    this.balances = new InMemoryBalanceBook(snapshot.balances);
    this.ledger = MarketplaceLedger.restore(snapshot.ledger, {
      registry: this.registry,
      balances: this.balances
    });
    this.persistedHeight = snapshot.ledger.events.length;
  }

  /**
   * Persists after the ledger has committed. The call already took effect, so
   * a failed write is logged and left for the next persist to catch up.
   */
  private async persistCommitted(): Promise<void> {
    try {
      await this.persist();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      console.warn(`[Market Node] Store behind ledger since height ${this.persistedHeight} (${reason}); retrying on next write`);
    }
  }

  /**
   * Writes new events and a fresh snapshot. Writes are queued so snapshots
   * land in commit order.
   */
  private persist(): Promise<void> {
    const next = this.persistQueue.then(() => this.persistNow());
    this.persistQueue = next.catch(error => {
      console.error('[Market Node] Failed to persist ledger state:', error);
    });
    return next;
  }

  private async persistNow(): Promise<void> {
    const ledger = this.requireLedger();
    const events = ledger.getEvents();

    for (const event of events.slice(this.persistedHeight)) {
      await this.store.saveEvent(event);
    }
    this.persistedHeight = events.length;

    await this.store.saveSnapshot({
      ledger: ledger.exportState(),
      tokens: this.registry.exportState(),
      balances: this.balances.exportState(),
      savedAt: Date.now()
    });
  }

  private requireLedger(): MarketplaceLedger {
    if (!this.ledger) {
      throw new Error('Market node is not initialized');
    }
    return this.ledger;
  }
}
