import { EventEmitter } from 'events';
import { deriveEscrowAddress, isValidAddress, truncateAddress } from '../crypto';
import { calculateEventHash, GENESIS_EVENT_HASH, validateEventChain } from '../core/hashing';
import { ListingStateMachine } from '../core/state-machine';
import {
  assertAmount,
  assertPrice,
  calculateRequiredDeposit,
  RoyaltyPlanner
} from '../core/fee-distribution';
import {
  InsufficientDepositError,
  InvalidArgumentError,
  PaymentMismatchError,
  StateIntegrityError,
  UnauthorizedError
} from '../core/errors';
import { TokenRegistry, TokenRegistryState } from '../token/token-types';
import { BalanceBook, BalanceBookState } from '../payment/adapter';
import {
  CallContext,
  CollectionMetadata,
  DeployParams,
  LedgerState,
  MarketEvent,
  MarketEventPayload,
  MarketEventType,
  MarketInfo,
  MarketItem
} from '../types';

export const DEFAULT_COLLECTION: CollectionMetadata = {
  name: 'MarketNFTs',
  symbol: 'MNFT',
  baseURI: ''
};

export interface MarketLedgerDeps {
  registry: TokenRegistry;
  balances: BalanceBook;
}

interface LedgerCheckpoint {
  items: MarketItem[];
  owner: string | null;
  royaltyFee: number;
  pendingCount: number;
  registry: TokenRegistryState;
  balances: BalanceBookState;
}

function stampEvent(
  payload: MarketEventPayload,
  height: number,
  timestamp: number,
  previousEventHash: string
): MarketEvent {
  const event: MarketEvent = { ...payload, eventId: '', height, timestamp, previousEventHash };
  event.eventId = calculateEventHash(event);
  return event;
}

function assertAddress(address: string, label: string): void {
  if (!isValidAddress(address)) {
    throw new InvalidArgumentError(`Invalid ${label} address: ${address}`);
  }
}

/**
 * Fixed-catalogue NFT market.
 *
 * Tokens are minted into the ledger's escrow address at deployment. A token is
 * listed exactly while escrow owns it; buying moves it to the buyer and clears
 * the seller, relisting moves it back with a new price. Every mutating call is
 * atomic: a thrown error reverts the items, the token registry, the balance
 * book and any events recorded during the call, including state touched by
 * reentrant calls made from payee receive hooks.
 *
 * Emits `'event'` (and the event's own type) once per committed event.
 * Listener errors are logged and never reach the caller.
 */
export class MarketplaceLedger extends EventEmitter {
  private readonly registry: TokenRegistry;
  private readonly balances: BalanceBook;
  private readonly ledgerAddress: string;
  private readonly metadata: CollectionMetadata;
  private readonly artistAddress: string;
  private ownerAddress: string | null;
  private royalties: RoyaltyPlanner;
  private items: MarketItem[];
  private events: MarketEvent[];
  private pending: MarketEventPayload[] = [];
  private depth = 0;

  private constructor(state: LedgerState, deps: MarketLedgerDeps) {
    super();
    this.registry = deps.registry;
    this.balances = deps.balances;
    this.ledgerAddress = state.address;
    this.metadata = { ...state.metadata };
    this.artistAddress = state.artist;
    this.ownerAddress = state.owner;
    this.royalties = new RoyaltyPlanner({ artist: state.artist, royaltyFee: state.royaltyFee });
    this.items = state.items.map(item => ({ ...item }));
    this.events = state.events.map(event => ({ ...event }));
  }

  /**
   * Mints one token per price into escrow and lists each for the deployer.
   * The attached value is the deposit and must cover one royalty per token.
   */
  static deploy(params: DeployParams, ctx: CallContext, deps: MarketLedgerDeps): MarketplaceLedger {
    const metadata: CollectionMetadata = { ...DEFAULT_COLLECTION, ...params.metadata };

    assertAddress(ctx.caller, 'deployer');
    assertAddress(params.artist, 'artist');
    assertAmount(params.royaltyFee, 'Royalty fee');
    assertAmount(ctx.value, 'Deposit');

    if (ctx.value < calculateRequiredDeposit(params.prices.length, params.royaltyFee)) {
      throw new InsufficientDepositError();
    }
    for (const price of params.prices) {
      assertPrice(price, 'Price must be greater than 0');
    }
    if (deps.registry.totalSupply() !== 0) {
      throw new InvalidArgumentError('Token registry must be empty at deployment');
    }

    const address = deriveEscrowAddress(ctx.caller, metadata.name);
    const registryCheckpoint = deps.registry.checkpoint();
    const balancesCheckpoint = deps.balances.checkpoint();

    try {
      deps.balances.transfer(ctx.caller, address, ctx.value);
      params.prices.forEach((_, tokenId) => deps.registry.mint(tokenId, address));
    } catch (error) {
      deps.registry.revert(registryCheckpoint);
      deps.balances.revert(balancesCheckpoint);
      throw error;
    }

    const ledger = new MarketplaceLedger(
      {
        address,
        metadata,
        artist: params.artist,
        owner: ctx.caller,
        royaltyFee: params.royaltyFee,
        items: params.prices.map((price, tokenId) => ({ tokenId, seller: ctx.caller, price })),
        events: []
      },
      deps
    );

    console.log(
      `[Market Ledger] Deployed ${metadata.name} (${metadata.symbol}) at ${address} with ${params.prices.length} tokens`
    );
    return ledger;
  }

  /**
   * Rebuilds a ledger from an exported state around an already restored
   * registry and balance book.
   */
  static restore(state: LedgerState, deps: MarketLedgerDeps): MarketplaceLedger {
    const chain = validateEventChain(state.events);
    if (!chain.valid) {
      throw new StateIntegrityError(`Cannot restore ledger: ${chain.error}`);
    }

    const ledger = new MarketplaceLedger(state, deps);
    ledger.assertInvariants();

    console.log(`[Market Ledger] Restored ${state.metadata.name} with ${state.items.length} tokens`);
    return ledger;
  }

  updateRoyaltyFee(newFee: number, ctx: CallContext): void {
    this.transact(() => {
      this.requireOwner(ctx);
      this.requireNoPayment(ctx, 'Royalty fee updates do not accept payment');
      assertAmount(newFee, 'Royalty fee');

      const previousFee = this.royaltyFee;
      this.royalties.updateRoyaltyFee(newFee);
      this.record({ eventType: MarketEventType.ROYALTY_FEE_UPDATED, previousFee, newFee });

      console.log(`[Market Ledger] Royalty fee updated from ${previousFee} to ${newFee} sats`);
    });
  }

  buyToken(tokenId: number, ctx: CallContext): MarketItem {
    return this.transact(() => {
      this.requireCaller(ctx);
      const item = this.requireItem(tokenId);
      const { price, seller } = item;

      if (ctx.value !== price) {
        throw new PaymentMismatchError('Please send the asking price in order to complete the purchase');
      }

      const transition = ListingStateMachine.validateTransition(item, 'BUY');
      if (!transition.valid || seller === null) {
        throw new StateIntegrityError(transition.error ?? `Token ${tokenId} is not listed for sale`);
      }

      // Listing and ownership settle before any balance movement can run a receive hook.
      item.seller = null;
      this.registry.transfer(tokenId, this.ledgerAddress, ctx.caller);

      this.balances.transfer(ctx.caller, this.ledgerAddress, ctx.value);
      for (const payout of this.royalties.planPurchase({ tokenId, seller, price }, ctx.value)) {
        this.balances.transfer(this.ledgerAddress, payout.to, payout.amount);
      }

      this.record({
        eventType: MarketEventType.MARKET_ITEM_BOUGHT,
        tokenId,
        seller,
        buyer: ctx.caller,
        price
      });

      console.log(
        `[Market Ledger] Token ${tokenId} bought by ${truncateAddress(ctx.caller)} from ${truncateAddress(seller)} for ${price} sats`
      );
      return this.marketItem(tokenId);
    });
  }

  resellToken(tokenId: number, newPrice: number, ctx: CallContext): MarketItem {
    return this.transact(() => {
      this.requireCaller(ctx);
      const item = this.requireItem(tokenId);

      assertPrice(newPrice, 'Price must be greater than zero');

      if (ctx.value !== this.royaltyFee) {
        throw new PaymentMismatchError('Must pay royalty');
      }

      if (this.registry.ownerOf(tokenId) !== ctx.caller) {
        throw new UnauthorizedError(`Caller does not own token ${tokenId}`);
      }

      const transition = ListingStateMachine.validateTransition(item, 'RELIST');
      if (!transition.valid) {
        throw new StateIntegrityError(transition.error);
      }

      this.registry.transfer(tokenId, ctx.caller, this.ledgerAddress);
      item.price = newPrice;
      item.seller = ctx.caller;
      this.balances.transfer(ctx.caller, this.ledgerAddress, ctx.value);

      this.record({
        eventType: MarketEventType.MARKET_ITEM_RELISTED,
        tokenId,
        seller: ctx.caller,
        price: newPrice
      });

      console.log(`[Market Ledger] Token ${tokenId} relisted by ${truncateAddress(ctx.caller)} for ${newPrice} sats`);
      return this.marketItem(tokenId);
    });
  }

  transferOwnership(newOwner: string, ctx: CallContext): void {
    this.transact(() => {
      this.requireOwner(ctx);
      this.requireNoPayment(ctx, 'Ownership transfers do not accept payment');

      if (newOwner === '') {
        throw new InvalidArgumentError('Ownable: new owner is the zero address');
      }
      assertAddress(newOwner, 'owner');

      this.setOwner(newOwner);
    });
  }

  renounceOwnership(ctx: CallContext): void {
    this.transact(() => {
      this.requireOwner(ctx);
      this.requireNoPayment(ctx, 'Ownership transfers do not accept payment');
      this.setOwner(null);
    });
  }

  getUnsoldTokens(): MarketItem[] {
    return this.items.filter(item => item.seller !== null).map(item => ({ ...item }));
  }

  getOwnedTokens(owner: string): MarketItem[] {
    return this.items
      .filter(item => this.registry.ownerOf(item.tokenId) === owner)
      .map(item => ({ ...item }));
  }

  marketItem(tokenId: number): MarketItem {
    return { ...this.requireItem(tokenId) };
  }

  ownerOf(tokenId: number): string {
    this.requireItem(tokenId);
    return this.registry.ownerOf(tokenId);
  }

  balanceOf(owner: string): number {
    return this.registry.balanceOf(owner);
  }

  tokenURI(tokenId: number): string {
    this.requireItem(tokenId);
    return `${this.metadata.baseURI}${tokenId}`;
  }

  get address(): string {
    return this.ledgerAddress;
  }

  get artist(): string {
    return this.artistAddress;
  }

  get owner(): string | null {
    return this.ownerAddress;
  }

  get royaltyFee(): number {
    return this.royalties.getConfig().royaltyFee;
  }

  get name(): string {
    return this.metadata.name;
  }

  get symbol(): string {
    return this.metadata.symbol;
  }

  get baseURI(): string {
    return this.metadata.baseURI;
  }

  get totalSupply(): number {
    return this.items.length;
  }

  escrowBalance(): number {
    return this.balances.getBalance(this.ledgerAddress);
  }

  getInfo(): MarketInfo {
    return {
      ...this.metadata,
      address: this.ledgerAddress,
      artist: this.artistAddress,
      owner: this.ownerAddress,
      royaltyFee: this.royaltyFee,
      totalSupply: this.totalSupply,
      escrowBalance: this.escrowBalance()
    };
  }

  getEvents(): MarketEvent[] {
    return this.events.map(event => ({ ...event }));
  }

  exportState(): LedgerState {
    return {
      address: this.ledgerAddress,
      metadata: { ...this.metadata },
      artist: this.artistAddress,
      owner: this.ownerAddress,
      royaltyFee: this.royaltyFee,
      items: this.items.map(item => ({ ...item })),
      events: this.getEvents()
    };
  }

  /**
   * Throws when the item table and the token registry disagree.
   */
  assertInvariants(): void {
    if (this.registry.totalSupply() !== this.items.length) {
      throw new StateIntegrityError(
        `Registry holds ${this.registry.totalSupply()} tokens, ledger holds ${this.items.length} items`
      );
    }

    this.items.forEach((item, index) => {
      if (item.tokenId !== index) {
        throw new StateIntegrityError(`Item at index ${index} carries token id ${item.tokenId}`);
      }

      const escrowed = this.registry.ownerOf(item.tokenId) === this.ledgerAddress;
      if (escrowed !== (item.seller !== null)) {
        throw new StateIntegrityError(`Token ${item.tokenId} listing does not match escrow ownership`);
      }

      if (item.seller !== null && !(Number.isSafeInteger(item.price) && item.price > 0)) {
        throw new StateIntegrityError(`Listed token ${item.tokenId} has a non-positive price`);
      }
    });
  }

  private transact<T>(operation: () => T): T {
    const result = this.atomic(operation);
    if (this.depth === 0) {
      this.commitPending();
    }
    return result;
  }

  private atomic<T>(operation: () => T): T {
    const checkpoint = this.checkpoint();
    this.depth++;

    try {
      const result = operation();
      this.assertInvariants();
      return result;
    } catch (error) {
      this.revert(checkpoint);
      throw error;
    } finally {
      this.depth--;
    }
  }

  private checkpoint(): LedgerCheckpoint {
    return {
      items: this.items.map(item => ({ ...item })),
      owner: this.ownerAddress,
      royaltyFee: this.royaltyFee,
      pendingCount: this.pending.length,
      registry: this.registry.checkpoint(),
      balances: this.balances.checkpoint()
    };
  }

  private revert(checkpoint: LedgerCheckpoint): void {
    this.items = checkpoint.items;
    this.ownerAddress = checkpoint.owner;
    this.royalties = new RoyaltyPlanner({ artist: this.artistAddress, royaltyFee: checkpoint.royaltyFee });
    this.pending = this.pending.slice(0, checkpoint.pendingCount);
    this.registry.revert(checkpoint.registry);
    this.balances.revert(checkpoint.balances);
  }

  private record(payload: MarketEventPayload): void {
    this.pending.push(payload);
  }

  private commitPending(): void {
    const committed: MarketEvent[] = [];

    for (const payload of this.pending) {
      const previous = this.events[this.events.length - 1];
      const event = stampEvent(
        payload,
        this.events.length + 1,
        Date.now(),
        previous ? previous.eventId : GENESIS_EVENT_HASH
      );
      this.events.push(event);
      committed.push(event);
    }
    this.pending = [];

    for (const event of committed) {
      try {
        this.emit('event', event);
        this.emit(event.eventType, event);
      } catch (error) {
        console.error(`[Market Ledger] Listener failed for event ${event.eventId}:`, error);
      }
    }
  }

  private setOwner(newOwner: string | null): void {
    const previousOwner = this.ownerAddress;
    this.ownerAddress = newOwner;
    this.record({ eventType: MarketEventType.OWNERSHIP_TRANSFERRED, previousOwner, newOwner });

    console.log(`[Market Ledger] Ownership transferred from ${previousOwner ?? 'nobody'} to ${newOwner ?? 'nobody'}`);
  }

  private requireItem(tokenId: number): MarketItem {
    if (!Number.isSafeInteger(tokenId) || tokenId < 0 || tokenId >= this.items.length) {
      throw new InvalidArgumentError(`Token ${tokenId} does not exist`);
    }
    return this.items[tokenId];
  }

  private requireCaller(ctx: CallContext): void {
    assertAddress(ctx.caller, 'caller');
    assertAmount(ctx.value, 'Attached value');

    if (ctx.caller === this.ledgerAddress) {
      throw new UnauthorizedError('The escrow address cannot act as a caller');
    }
  }

  private requireOwner(ctx: CallContext): void {
    if (this.ownerAddress === null || ctx.caller !== this.ownerAddress) {
      throw new UnauthorizedError();
    }
  }

  private requireNoPayment(ctx: CallContext, message: string): void {
    if (ctx.value !== 0) {
      throw new PaymentMismatchError(message);
    }
  }
}
