export type MarketErrorCode =
  | 'INVALID_ARGUMENT'
  | 'PAYMENT_MISMATCH'
  | 'INSUFFICIENT_FUNDS'
  | 'INSUFFICIENT_DEPOSIT'
  | 'UNAUTHORIZED'
  | 'STATE_INTEGRITY';

export class MarketError extends Error {
  readonly code: MarketErrorCode;

  constructor(code: MarketErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InvalidArgumentError extends MarketError {
  constructor(message = 'Invalid argument', options?: ErrorOptions) {
    super('INVALID_ARGUMENT', message, options);
  }
}

export class PaymentMismatchError extends MarketError {
  constructor(message = 'Attached value does not match the required amount', options?: ErrorOptions) {
    super('PAYMENT_MISMATCH', message, options);
  }
}

export class InsufficientFundsError extends MarketError {
  constructor(message = 'Insufficient balance', options?: ErrorOptions) {
    super('INSUFFICIENT_FUNDS', message, options);
  }
}

export class InsufficientDepositError extends MarketError {
  constructor(
    message = 'Deployer must pay royalty fee for each token listed on the marketplace',
    options?: ErrorOptions
  ) {
    super('INSUFFICIENT_DEPOSIT', message, options);
  }
}

export class UnauthorizedError extends MarketError {
  constructor(message = 'Ownable: caller is not the owner', options?: ErrorOptions) {
    super('UNAUTHORIZED', message, options);
  }
}

export class StateIntegrityError extends MarketError {
  constructor(message = 'Ledger state does not allow this transition', options?: ErrorOptions) {
    super('STATE_INTEGRITY', message, options);
  }
}

export function isMarketError(error: unknown): error is MarketError {
  return error instanceof MarketError;
}
