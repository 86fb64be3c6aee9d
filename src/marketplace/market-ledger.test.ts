import { beforeEach, describe, expect, it, vi } from 'vitest';
import { MarketplaceLedger } from './market-ledger';
import { InMemoryTokenRegistry } from '../token/token-registry';
import { InMemoryBalanceBook } from '../payment/adapter';
import {
  InsufficientDepositError,
  InsufficientFundsError,
  InvalidArgumentError,
  PaymentMismatchError,
  StateIntegrityError,
  UnauthorizedError
} from '../core/errors';
import { validateEventChain } from '../core/hashing';
import { MarketEvent, MarketEventType } from '../types';
import {
  accounts,
  BASE_URI,
  DEPOSIT,
  deployMarketFixture,
  PRICES,
  ROYALTY_FEE,
  SATS_PER_UNIT,
  WALLET_FUNDING
} from '../testing/market-fixture';

function expectListingInvariant(ledger: MarketplaceLedger): void {
  for (let tokenId = 0; tokenId < ledger.totalSupply; tokenId++) {
    const escrowed = ledger.ownerOf(tokenId) === ledger.address;
    expect(ledger.marketItem(tokenId).seller !== null).toBe(escrowed);
  }
}

describe('MarketplaceLedger', () => {
  let fixture: ReturnType<typeof deployMarketFixture>;

  beforeEach(() => {
    fixture = deployMarketFixture();
  });

  describe('deployment', () => {
    it('records collection metadata, royalty fee, artist and owner', () => {
      const { ledger, artist, deployer } = fixture;

      expect(ledger.name).toBe('TestNFTs');
      expect(ledger.symbol).toBe('TNFT');
      expect(ledger.baseURI).toBe(BASE_URI);
      expect(ledger.royaltyFee).toBe(ROYALTY_FEE);
      expect(ledger.artist).toBe(artist);
      expect(ledger.owner).toBe(deployer);
      expect(ledger.tokenURI(3)).toBe(`${BASE_URI}3`);
    });

    it('mints every token into escrow', () => {
      const { ledger } = fixture;

      expect(ledger.totalSupply).toBe(8);
      expect(ledger.balanceOf(ledger.address)).toBe(PRICES.length);
    });

    it('lists every token for the deployer at its catalogue price', () => {
      const { ledger, deployer } = fixture;

      const unsold = ledger.getUnsoldTokens();
      expect(unsold).toHaveLength(8);
      unsold.forEach((item, index) => {
        expect(item).toEqual({ tokenId: index, seller: deployer, price: PRICES[index] });
      });
    });

    it('moves the deposit from the deployer into escrow', () => {
      const { ledger, balances, deployer } = fixture;

      expect(ledger.escrowBalance()).toBe(DEPOSIT);
      expect(balances.getBalance(deployer)).toBe(0);
    });

    it('rejects a deposit that does not cover one royalty per token', () => {
      const registry = new InMemoryTokenRegistry();
      const balances = new InMemoryBalanceBook();
      balances.credit(accounts.deployer, DEPOSIT);

      expect(() =>
        MarketplaceLedger.deploy(
          { royaltyFee: ROYALTY_FEE, artist: accounts.artist, prices: PRICES },
          { caller: accounts.deployer, value: DEPOSIT - 1 },
          { registry, balances }
        )
      ).toThrow(InsufficientDepositError);

      expect(registry.totalSupply()).toBe(0);
      expect(balances.getBalance(accounts.deployer)).toBe(DEPOSIT);
    });

    it('rejects a catalogue containing a non-positive price', () => {
      const registry = new InMemoryTokenRegistry();
      const balances = new InMemoryBalanceBook();
      balances.credit(accounts.deployer, DEPOSIT);

      expect(() =>
        MarketplaceLedger.deploy(
          { royaltyFee: ROYALTY_FEE, artist: accounts.artist, prices: [SATS_PER_UNIT, 0, SATS_PER_UNIT] },
          { caller: accounts.deployer, value: DEPOSIT },
          { registry, balances }
        )
      ).toThrow('Price must be greater than 0');

      expect(registry.totalSupply()).toBe(0);
    });

    it('rejects a malformed artist address', () => {
      expect(() =>
        MarketplaceLedger.deploy(
          { royaltyFee: 0, artist: 'not-an-address', prices: [] },
          { caller: accounts.deployer, value: 0 },
          { registry: new InMemoryTokenRegistry(), balances: new InMemoryBalanceBook() }
        )
      ).toThrow(InvalidArgumentError);
    });

    it('reverts minting when the deployer cannot fund the deposit', () => {
      const registry = new InMemoryTokenRegistry();
      const balances = new InMemoryBalanceBook();

      expect(() =>
        MarketplaceLedger.deploy(
          { royaltyFee: ROYALTY_FEE, artist: accounts.artist, prices: PRICES },
          { caller: accounts.deployer, value: DEPOSIT },
          { registry, balances }
        )
      ).toThrow(InsufficientFundsError);

      expect(registry.totalSupply()).toBe(0);
    });

    it('derives the escrow address from deployer and collection name', () => {
      const other = MarketplaceLedger.deploy(
        { royaltyFee: 0, artist: accounts.artist, prices: [SATS_PER_UNIT], metadata: { name: 'OtherNFTs' } },
        { caller: accounts.deployer, value: 0 },
        { registry: new InMemoryTokenRegistry(), balances: new InMemoryBalanceBook() }
      );

      expect(other.address).not.toBe(fixture.ledger.address);
      expect(other.address.startsWith('3')).toBe(true);
    });
  });

  describe('updateRoyaltyFee', () => {
    const newFee = 2 * ROYALTY_FEE;

    it('refuses callers other than the owner', () => {
      const { ledger, user1 } = fixture;

      expect(() => ledger.updateRoyaltyFee(newFee, { caller: user1, value: 0 })).toThrow(
        'Ownable: caller is not the owner'
      );
      expect(ledger.royaltyFee).toBe(ROYALTY_FEE);
    });

    it('lets the owner change the fee', () => {
      const { ledger, deployer } = fixture;

      ledger.updateRoyaltyFee(newFee, { caller: deployer, value: 0 });

      expect(ledger.royaltyFee).toBe(newFee);
      const [event] = ledger.getEvents();
      expect(event).toMatchObject({
        eventType: MarketEventType.ROYALTY_FEE_UPDATED,
        previousFee: ROYALTY_FEE,
        newFee
      });
    });

    it('rejects negative fees and attached payments', () => {
      const { ledger, deployer } = fixture;

      expect(() => ledger.updateRoyaltyFee(-1, { caller: deployer, value: 0 })).toThrow(InvalidArgumentError);
      expect(() => ledger.updateRoyaltyFee(newFee, { caller: deployer, value: 1 })).toThrow(PaymentMismatchError);
      expect(ledger.royaltyFee).toBe(ROYALTY_FEE);
    });
  });

  describe('buyToken', () => {
    it('pays the seller the full price and the artist the royalty', () => {
      const { ledger, balances, deployer, artist, user1 } = fixture;

      ledger.buyToken(0, { caller: user1, value: PRICES[0] });

      expect(balances.getBalance(deployer)).toBe(PRICES[0]);
      expect(balances.getBalance(artist)).toBe(ROYALTY_FEE);
      expect(balances.getBalance(user1)).toBe(WALLET_FUNDING - PRICES[0]);
      expect(ledger.escrowBalance()).toBe(DEPOSIT - ROYALTY_FEE);
    });

    it('makes the buyer the owner and clears the seller', () => {
      const { ledger, user1 } = fixture;

      const item = ledger.buyToken(0, { caller: user1, value: PRICES[0] });

      expect(item).toEqual({ tokenId: 0, seller: null, price: PRICES[0] });
      expect(ledger.ownerOf(0)).toBe(user1);
      expect(ledger.marketItem(0).seller).toBeNull();
      expect(ledger.getUnsoldTokens()).toHaveLength(7);
    });

    it('emits a purchase event with token, seller, buyer and price', () => {
      const { ledger, deployer, user1 } = fixture;
      const received: MarketEvent[] = [];
      ledger.on(MarketEventType.MARKET_ITEM_BOUGHT, (event: MarketEvent) => received.push(event));

      ledger.buyToken(0, { caller: user1, value: PRICES[0] });

      expect(received).toHaveLength(1);
      expect(received[0]).toMatchObject({
        eventType: MarketEventType.MARKET_ITEM_BOUGHT,
        tokenId: 0,
        seller: deployer,
        buyer: user1,
        price: PRICES[0],
        height: 1
      });
    });

    it('rejects a payment that differs from the asking price', () => {
      const { ledger, user1 } = fixture;

      expect(() => ledger.buyToken(1, { caller: user1, value: PRICES[2] })).toThrow(
        'Please send the asking price in order to complete the purchase'
      );
      expect(() => ledger.buyToken(1, { caller: user1, value: PRICES[1] + 1 })).toThrow(PaymentMismatchError);
      expect(() => ledger.buyToken(1, { caller: user1, value: PRICES[1] - 1 })).toThrow(PaymentMismatchError);
      expect(ledger.ownerOf(1)).toBe(ledger.address);
    });

    it('fails the second purchase of the same token', () => {
      const { ledger, user1, user2 } = fixture;

      ledger.buyToken(0, { caller: user1, value: PRICES[0] });

      expect(() => ledger.buyToken(0, { caller: user2, value: PRICES[0] })).toThrow(StateIntegrityError);
      expect(ledger.ownerOf(0)).toBe(user1);
    });

    it('rejects token ids outside the catalogue', () => {
      const { ledger, user1 } = fixture;

      expect(() => ledger.buyToken(8, { caller: user1, value: PRICES[0] })).toThrow(InvalidArgumentError);
      expect(() => ledger.buyToken(-1, { caller: user1, value: PRICES[0] })).toThrow(InvalidArgumentError);
      expect(() => ledger.buyToken(0.5, { caller: user1, value: PRICES[0] })).toThrow(InvalidArgumentError);
    });

    it('leaves no trace when the buyer cannot pay', () => {
      const { ledger, balances, deployer, outsider } = fixture;

      expect(() => ledger.buyToken(0, { caller: outsider, value: PRICES[0] })).toThrow(InsufficientFundsError);

      expect(ledger.ownerOf(0)).toBe(ledger.address);
      expect(ledger.marketItem(0).seller).toBe(deployer);
      expect(balances.getBalance(deployer)).toBe(0);
      expect(ledger.escrowBalance()).toBe(DEPOSIT);
      expect(ledger.getEvents()).toEqual([]);
    });

    it('reverts when escrow cannot cover the royalty', () => {
      const { ledger, balances, deployer, user1 } = fixture;
      ledger.updateRoyaltyFee(DEPOSIT + PRICES[0], { caller: deployer, value: 0 });

      expect(() => ledger.buyToken(0, { caller: user1, value: PRICES[0] })).toThrow(InsufficientFundsError);

      expect(ledger.ownerOf(0)).toBe(ledger.address);
      expect(balances.getBalance(user1)).toBe(WALLET_FUNDING);
      expect(ledger.escrowBalance()).toBe(DEPOSIT);
    });

    it('refuses the escrow address as a caller', () => {
      const { ledger } = fixture;

      expect(() => ledger.buyToken(0, { caller: ledger.address, value: PRICES[0] })).toThrow(UnauthorizedError);
    });
  });

  describe('resellToken', () => {
    const resalePrice = 2 * SATS_PER_UNIT;

    beforeEach(() => {
      fixture.ledger.buyToken(0, { caller: fixture.user1, value: PRICES[0] });
    });

    it('keeps the royalty in escrow', () => {
      const { ledger, balances, artist, user1 } = fixture;
      const escrowBefore = ledger.escrowBalance();

      ledger.resellToken(0, resalePrice, { caller: user1, value: ROYALTY_FEE });

      expect(ledger.escrowBalance()).toBe(escrowBefore + ROYALTY_FEE);
      expect(balances.getBalance(artist)).toBe(ROYALTY_FEE);
    });

    it('returns the token to escrow with the new seller and price', () => {
      const { ledger, user1 } = fixture;

      ledger.resellToken(0, resalePrice, { caller: user1, value: ROYALTY_FEE });

      expect(ledger.ownerOf(0)).toBe(ledger.address);
      expect(ledger.marketItem(0)).toEqual({ tokenId: 0, seller: user1, price: resalePrice });
    });

    it('emits a relisting event', () => {
      const { ledger, user1 } = fixture;

      ledger.resellToken(0, resalePrice, { caller: user1, value: ROYALTY_FEE });

      const events = ledger.getEvents();
      expect(events[events.length - 1]).toMatchObject({
        eventType: MarketEventType.MARKET_ITEM_RELISTED,
        tokenId: 0,
        seller: user1,
        price: resalePrice
      });
    });

    it('rejects a zero price whether or not the royalty is right', () => {
      const { ledger, user1 } = fixture;

      expect(() => ledger.resellToken(0, 0, { caller: user1, value: ROYALTY_FEE })).toThrow(
        'Price must be greater than zero'
      );
      expect(() => ledger.resellToken(0, 0, { caller: user1, value: 0 })).toThrow(InvalidArgumentError);
    });

    it('rejects a payment other than the royalty fee', () => {
      const { ledger, user1 } = fixture;

      expect(() => ledger.resellToken(0, resalePrice, { caller: user1, value: 0 })).toThrow('Must pay royalty');
      expect(ledger.ownerOf(0)).toBe(user1);
    });

    it('refuses callers that do not hold the token', () => {
      const { ledger, user2, deployer } = fixture;

      expect(() => ledger.resellToken(0, resalePrice, { caller: user2, value: ROYALTY_FEE })).toThrow(
        UnauthorizedError
      );
      expect(() => ledger.resellToken(1, resalePrice, { caller: deployer, value: ROYALTY_FEE })).toThrow(
        UnauthorizedError
      );
    });

    it('completes a relist and buy round trip', () => {
      const { ledger, balances, artist, user1, user2 } = fixture;

      ledger.resellToken(0, resalePrice, { caller: user1, value: ROYALTY_FEE });
      const user1Before = balances.getBalance(user1);
      ledger.buyToken(0, { caller: user2, value: resalePrice });

      expect(ledger.ownerOf(0)).toBe(user2);
      expect(ledger.marketItem(0).seller).toBeNull();
      expect(balances.getBalance(user1)).toBe(user1Before + resalePrice);
      expect(balances.getBalance(artist)).toBe(2 * ROYALTY_FEE);
      expectListingInvariant(ledger);
    });
  });

  describe('queries', () => {
    beforeEach(() => {
      const { ledger, user1, user2 } = fixture;
      ledger.buyToken(3, { caller: user1, value: PRICES[3] });
      ledger.buyToken(5, { caller: user1, value: PRICES[5] });
      ledger.buyToken(7, { caller: user2, value: PRICES[7] });
    });

    it('returns unsold items in token order', () => {
      expect(fixture.ledger.getUnsoldTokens().map(item => item.tokenId)).toEqual([0, 1, 2, 4, 6]);
    });

    it('returns the items owned by each address', () => {
      const { ledger, user1, user2, outsider } = fixture;

      expect(ledger.getOwnedTokens(user1).map(item => item.tokenId)).toEqual([3, 5]);
      expect(ledger.getOwnedTokens(user2).map(item => item.tokenId)).toEqual([7]);
      expect(ledger.getOwnedTokens(outsider)).toEqual([]);
      expect(ledger.getOwnedTokens(ledger.address)).toEqual(ledger.getUnsoldTokens());
    });

    it('returns copies that cannot alter the ledger', () => {
      const { ledger } = fixture;

      const [first] = ledger.getUnsoldTokens();
      first.price = 1;

      expect(ledger.marketItem(0).price).toBe(PRICES[0]);
    });

    it('keeps listing state and escrow ownership in step', () => {
      expectListingInvariant(fixture.ledger);
    });
  });

  describe('reentrancy', () => {
    it('shows a reentrant buyer the token as already sold', () => {
      const { ledger, balances, artist, user1 } = fixture;
      const errors: unknown[] = [];

      balances.onReceive(artist, () => {
        try {
          ledger.buyToken(0, { caller: artist, value: PRICES[0] });
        } catch (error) {
          errors.push(error);
        }
      });

      ledger.buyToken(0, { caller: user1, value: PRICES[0] });

      expect(errors).toHaveLength(1);
      expect(errors[0]).toBeInstanceOf(StateIntegrityError);
      expect(ledger.ownerOf(0)).toBe(user1);
      expect(ledger.getEvents()).toHaveLength(1);
    });

    it('reverts the whole purchase when a payee rejects the payment', () => {
      const { ledger, balances, deployer, artist, user1 } = fixture;
      const listener = vi.fn();
      ledger.on('event', listener);

      balances.onReceive(deployer, () => {
        throw new Error('payment refused');
      });

      expect(() => ledger.buyToken(0, { caller: user1, value: PRICES[0] })).toThrow('payment refused');

      expect(ledger.ownerOf(0)).toBe(ledger.address);
      expect(ledger.marketItem(0).seller).toBe(deployer);
      expect(balances.getBalance(user1)).toBe(WALLET_FUNDING);
      expect(balances.getBalance(artist)).toBe(0);
      expect(ledger.escrowBalance()).toBe(DEPOSIT);
      expect(listener).not.toHaveBeenCalled();
    });

    it('commits a successful nested purchase together with the outer one', () => {
      const { ledger, balances, artist, user1 } = fixture;
      balances.credit(artist, PRICES[1]);
      let reentered = false;

      balances.onReceive(artist, () => {
        if (reentered) return;
        reentered = true;
        ledger.buyToken(1, { caller: artist, value: PRICES[1] });
      });

      const listener = vi.fn();
      ledger.on('event', listener);
      ledger.buyToken(0, { caller: user1, value: PRICES[0] });

      expect(ledger.ownerOf(0)).toBe(user1);
      expect(ledger.ownerOf(1)).toBe(artist);
      expect(listener).toHaveBeenCalledTimes(2);
      expect(ledger.getEvents().map(event => event.eventType === MarketEventType.MARKET_ITEM_BOUGHT && event.tokenId)).toEqual([1, 0]);
      expectListingInvariant(ledger);
    });
  });

  describe('ownership administration', () => {
    it('hands fee control to the new owner', () => {
      const { ledger, deployer, user1 } = fixture;

      ledger.transferOwnership(user1, { caller: deployer, value: 0 });

      expect(ledger.owner).toBe(user1);
      expect(() => ledger.updateRoyaltyFee(0, { caller: deployer, value: 0 })).toThrow(UnauthorizedError);
      ledger.updateRoyaltyFee(0, { caller: user1, value: 0 });
      expect(ledger.royaltyFee).toBe(0);
    });

    it('rejects an empty new owner', () => {
      const { ledger, deployer } = fixture;

      expect(() => ledger.transferOwnership('', { caller: deployer, value: 0 })).toThrow(
        'Ownable: new owner is the zero address'
      );
    });

    it('locks the royalty fee after renouncing', () => {
      const { ledger, deployer } = fixture;

      ledger.renounceOwnership({ caller: deployer, value: 0 });

      expect(ledger.owner).toBeNull();
      expect(() => ledger.updateRoyaltyFee(0, { caller: deployer, value: 0 })).toThrow(UnauthorizedError);
      expect(ledger.getEvents()[0]).toMatchObject({
        eventType: MarketEventType.OWNERSHIP_TRANSFERRED,
        previousOwner: deployer,
        newOwner: null
      });
    });
  });

  describe('events', () => {
    it('chains committed events by hash', () => {
      const { ledger, deployer, user1 } = fixture;

      ledger.buyToken(0, { caller: user1, value: PRICES[0] });
      ledger.resellToken(0, PRICES[1], { caller: user1, value: ROYALTY_FEE });
      ledger.updateRoyaltyFee(ROYALTY_FEE * 3, { caller: deployer, value: 0 });

      const events = ledger.getEvents();
      expect(events.map(event => event.height)).toEqual([1, 2, 3]);
      expect(events[1].previousEventHash).toBe(events[0].eventId);
      expect(validateEventChain(events)).toEqual({ valid: true });
    });
  });

  describe('listeners', () => {
    it('keeps a committed purchase when a listener throws', () => {
      const { ledger, user1 } = fixture;
      ledger.on('event', () => {
        throw new Error('listener failed');
      });

      expect(() => ledger.buyToken(0, { caller: user1, value: PRICES[0] })).not.toThrow();
      expect(ledger.ownerOf(0)).toBe(user1);
      expect(ledger.getEvents()).toHaveLength(1);
    });
  });

  describe('exportState / restore', () => {
    it('rebuilds an equivalent ledger', () => {
      const { ledger, registry, balances, user1 } = fixture;
      ledger.buyToken(2, { caller: user1, value: PRICES[2] });

      const restored = MarketplaceLedger.restore(ledger.exportState(), {
        registry: new InMemoryTokenRegistry(registry.exportState()),
        balances: new InMemoryBalanceBook(balances.exportState())
      });

      expect(restored.address).toBe(ledger.address);
      expect(restored.getUnsoldTokens()).toEqual(ledger.getUnsoldTokens());
      expect(restored.getOwnedTokens(user1)).toEqual(ledger.getOwnedTokens(user1));
      expect(restored.getEvents()).toEqual(ledger.getEvents());
      expect(restored.escrowBalance()).toBe(ledger.escrowBalance());
    });

    it('refuses a state whose listing disagrees with the registry', () => {
      const { ledger, registry, balances } = fixture;
      const state = ledger.exportState();
      state.items[4] = { ...state.items[4], seller: null };

      expect(() =>
        MarketplaceLedger.restore(state, {
          registry: new InMemoryTokenRegistry(registry.exportState()),
          balances: new InMemoryBalanceBook(balances.exportState())
        })
      ).toThrow(StateIntegrityError);
    });

    it('refuses a tampered event log', () => {
      const { ledger, registry, balances, user1 } = fixture;
      ledger.buyToken(0, { caller: user1, value: PRICES[0] });
      const state = ledger.exportState();
      state.events[0] = { ...state.events[0], timestamp: state.events[0].timestamp + 1 };

      expect(() =>
        MarketplaceLedger.restore(state, {
          registry: new InMemoryTokenRegistry(registry.exportState()),
          balances: new InMemoryBalanceBook(balances.exportState())
        })
      ).toThrow('Event hash mismatch at index 0');
    });
  });

  describe('catalogue scenario', () => {
    it('follows a purchase and relist through balances and listings', () => {
      const { ledger, balances, deployer, artist, user1 } = fixture;
      expect(ledger.getUnsoldTokens()).toHaveLength(8);

      ledger.buyToken(0, { caller: user1, value: 1 * SATS_PER_UNIT });

      expect(ledger.getUnsoldTokens()).toHaveLength(7);
      expect(ledger.ownerOf(0)).toBe(user1);
      expect(ledger.marketItem(0).seller).toBeNull();
      expect(balances.getBalance(artist)).toBe(1_000_000);
      expect(balances.getBalance(deployer)).toBe(100_000_000);

      ledger.resellToken(0, 2 * SATS_PER_UNIT, { caller: user1, value: 1_000_000 });

      expect(ledger.ownerOf(0)).toBe(ledger.address);
      expect(ledger.marketItem(0)).toEqual({ tokenId: 0, seller: user1, price: 200_000_000 });
      expect(ledger.escrowBalance()).toBe(8_000_000);
    });
  });
});
