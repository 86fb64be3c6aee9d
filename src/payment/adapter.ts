import { InsufficientFundsError, InvalidArgumentError } from '../core/errors';
import { assertAmount } from '../core/fee-distribution';

export interface PaymentReceipt {
  from: string;
  to: string;
  amount: number;
}

/**
 * Runs synchronously when a payment lands in a wallet. Throwing from a hook
 * rejects the payment.
 */
export type ReceiveHook = (receipt: PaymentReceipt) => void;

export interface BalanceBookState {
  balances: Array<[string, number]>;
}

export interface BalanceBook {
  getBalance(address: string): number;
  credit(address: string, amount: number): void;
  transfer(from: string, to: string, amount: number): void;
  onReceive(address: string, hook: ReceiveHook): () => void;
  checkpoint(): BalanceBookState;
  revert(state: BalanceBookState): void;
  exportState(): BalanceBookState;
}

export class InMemoryBalanceBook implements BalanceBook {
  private balances: Map<string, number>;
  private hooks: Map<string, ReceiveHook[]> = new Map();

  constructor(state?: BalanceBookState) {
    this.balances = new Map(state ? state.balances : []);
  }

  getBalance(address: string): number {
    return this.balances.get(address) ?? 0;
  }

  /**
   * Funds a wallet from outside the market (genesis balances, faucets, tests).
   */
  credit(address: string, amount: number): void {
    assertAmount(amount, 'Credit amount');
    this.balances.set(address, this.nextBalance(address, amount));
  }

  transfer(from: string, to: string, amount: number): void {
    assertAmount(amount, 'Transfer amount');

    const available = this.getBalance(from);
    if (available < amount) {
      throw new InsufficientFundsError(`Insufficient balance: ${from} holds ${available} sats, needs ${amount}`);
    }

    const received = this.nextBalance(to, amount);
    this.balances.set(from, available - amount);
    this.balances.set(to, received);

    const hooks = this.hooks.get(to);
    if (hooks) {
      for (const hook of [...hooks]) {
        hook({ from, to, amount });
      }
    }
  }

  onReceive(address: string, hook: ReceiveHook): () => void {
    const hooks = this.hooks.get(address) ?? [];
    hooks.push(hook);
    this.hooks.set(address, hooks);

    return () => {
      const current = this.hooks.get(address);
      if (!current) return;
      const remaining = current.filter(h => h !== hook);
      if (remaining.length === 0) {
        this.hooks.delete(address);
      } else {
        this.hooks.set(address, remaining);
      }
    };
  }

  private nextBalance(address: string, amount: number): number {
    const next = this.getBalance(address) + amount;
    if (!Number.isSafeInteger(next)) {
      throw new InvalidArgumentError(`Balance of ${address} would exceed the safe integer range`);
    }
    return next;
  }

  checkpoint(): BalanceBookState {
    return this.exportState();
  }

  revert(state: BalanceBookState): void {
    this.balances = new Map(state.balances);
  }

  exportState(): BalanceBookState {
    return {
      balances: Array.from(this.balances.entries()).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    };
  }
}
