/**
 * SIGNED CALL AUTHENTICATION
 *
 * Callers of mutating market operations prove control of their identity by
 * signing the call with their wallet key. The caller address is derived from
 * the public key, never taken from the request body.
 */
import {
  createTimestampedSignature,
  generateNonce,
  publicKeyToAddress,
  verifyTimestampedSignature
} from '../crypto';
import { UnauthorizedError } from '../core/errors';

export type MarketAction = 'buy' | 'resell' | 'royalty-fee';

export interface CallArguments {
  tokenId?: number;
  price?: number;
  fee?: number;
  value: number;
}

export interface SignedCall {
  publicKey: string;
  signature: string;
  timestamp: number;
  nonce: string;
}

export function callMessage(action: MarketAction, args: CallArguments): string {
  return [action, args.tokenId ?? '', args.price ?? '', args.fee ?? '', args.value].join(':');
}

export function signCall(
  action: MarketAction,
  args: CallArguments,
  keys: { privateKey: string; publicKey: string },
  timestamp: number = Date.now()
): SignedCall {
  const signed = createTimestampedSignature(callMessage(action, args), keys.privateKey, timestamp, generateNonce());
  return { publicKey: keys.publicKey, ...signed };
}

export class CallAuthenticator {
  private usedNonces: Map<string, number> = new Map();
  private maxAgeSeconds: number;

  constructor(maxAgeSeconds: number = 300) {
    this.maxAgeSeconds = maxAgeSeconds;
  }

  /**
   * Verifies the signature and burns the nonce. Returns the caller address.
   */
  authenticate(action: MarketAction, args: CallArguments, call: SignedCall): string {
    this.cleanupExpiredNonces();

    if (this.usedNonces.has(call.nonce)) {
      throw new UnauthorizedError('Call nonce already used');
    }

    const valid = verifyTimestampedSignature(
      callMessage(action, args),
      call.signature,
      call.publicKey,
      call.timestamp,
      call.nonce,
      this.maxAgeSeconds
    );

    if (!valid) {
      throw new UnauthorizedError('Invalid call signature');
    }

    this.usedNonces.set(call.nonce, call.timestamp);

    let caller: string;
    try {
      caller = publicKeyToAddress(call.publicKey);
    } catch (error) {
      throw new UnauthorizedError('Invalid public key', { cause: error });
    }
    return caller;
  }

  private cleanupExpiredNonces(): void {
    const cutoff = Date.now() - this.maxAgeSeconds * 1000;
    for (const [nonce, timestamp] of this.usedNonces.entries()) {
      if (timestamp < cutoff) {
        this.usedNonces.delete(nonce);
      }
    }
  }
}
