import * as crypto from 'crypto';
import * as ecc from 'tiny-secp256k1';
import { ECPairFactory } from 'ecpair';
import * as bitcoin from 'bitcoinjs-lib';

const ECPair = ECPairFactory(ecc);
const NETWORK = bitcoin.networks.bitcoin;

export interface KeyPair {
  privateKey: string;
  publicKey: string;
  address: string;
}

export function sha256(data: string | Buffer): string {
  const buffer = typeof data === 'string' ? Buffer.from(data, 'utf8') : data;
  return crypto.createHash('sha256').update(buffer).digest('hex');
}

export function generateKeyPair(): KeyPair {
  const keyPair = ECPair.makeRandom();
  if (!keyPair.privateKey) {
    throw new Error('Generated key pair has no private key');
  }

  return {
    privateKey: Buffer.from(keyPair.privateKey).toString('hex'),
    publicKey: Buffer.from(keyPair.publicKey).toString('hex'),
    address: publicKeyToAddress(Buffer.from(keyPair.publicKey).toString('hex'))
  };
}

export function signMessage(message: string, privateKeyHex: string): string {
  const messageHash = sha256(message);
  const keyPair = ECPair.fromPrivateKey(Buffer.from(privateKeyHex, 'hex'));
  if (!keyPair.privateKey) {
    throw new Error('Key pair has no private key');
  }

  const signature = ecc.sign(Buffer.from(messageHash, 'hex'), keyPair.privateKey);
  return Buffer.from(signature).toString('hex');
}

export function verifySignature(message: string, signature: string, publicKeyHex: string): boolean {
  try {
    const messageHash = sha256(message);
    const publicKey = Buffer.from(publicKeyHex, 'hex');
    const signatureBuffer = Buffer.from(signature, 'hex');

    return ecc.verify(Buffer.from(messageHash, 'hex'), publicKey, signatureBuffer);
  } catch (error) {
    return false;
  }
}

export function publicKeyToAddress(publicKeyHex: string): string {
  const { address } = bitcoin.payments.p2pkh({
    pubkey: Buffer.from(publicKeyHex, 'hex'),
    network: NETWORK
  });
  if (!address) {
    throw new Error('Unable to derive address from public key');
  }
  return address;
}

/**
 * Deterministic P2PKH address for a seed string. Used for identities that
 * have no key pair of their own, such as fixtures and demo accounts.
 */
export function deriveAddress(seed: string): string {
  const { address } = bitcoin.payments.p2pkh({
    hash: bitcoin.crypto.hash160(Buffer.from(seed, 'utf8')),
    network: NETWORK
  });
  if (!address) {
    throw new Error(`Unable to derive address for seed ${seed}`);
  }
  return address;
}

/**
 * The escrow identity of a deployed ledger: a P2SH address over
 * hash160(deployer:collectionName).
 */
export function deriveEscrowAddress(deployer: string, collectionName: string): string {
  const { address } = bitcoin.payments.p2sh({
    hash: bitcoin.crypto.hash160(Buffer.from(`${deployer}:${collectionName}`, 'utf8')),
    network: NETWORK
  });
  if (!address) {
    throw new Error('Unable to derive escrow address');
  }
  return address;
}

export function isValidAddress(address: string): boolean {
  try {
    bitcoin.address.toOutputScript(address, NETWORK);
    return true;
  } catch (error) {
    return false;
  }
}

export function truncateAddress(address: string): string {
  if (address.length <= 8) return address;
  return `${address.slice(0, 4)}...${address.slice(-4)}`;
}

export function generateNonce(): string {
  return crypto.randomBytes(32).toString('hex');
}

export function createTimestampedSignature(
  message: string,
  privateKeyHex: string,
  timestamp: number,
  nonce: string
): { signature: string; timestamp: number; nonce: string } {
  const fullMessage = `${message}:${timestamp}:${nonce}`;
  const signature = signMessage(fullMessage, privateKeyHex);

  return {
    signature,
    timestamp,
    nonce
  };
}

export function verifyTimestampedSignature(
  message: string,
  signature: string,
  publicKeyHex: string,
  timestamp: number,
  nonce: string,
  maxAgeSeconds: number = 300
): boolean {
  const now = Date.now();
  const age = (now - timestamp) / 1000;

  if (age > maxAgeSeconds || age < -60) {
    return false;
  }

  const fullMessage = `${message}:${timestamp}:${nonce}`;
  return verifySignature(fullMessage, signature, publicKeyHex);
}
