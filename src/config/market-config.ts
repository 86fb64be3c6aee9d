import * as fs from 'fs';
import * as path from 'path';
import { InvalidArgumentError } from '../core/errors';
import { CollectionMetadata } from '../types';

export interface MarketConfig {
  collection: CollectionMetadata;
  royaltyFeeSats: number;
  pricesSats: number[];
  artist?: string;
  genesisBalances: Record<string, number>;
  port: number;
  dataDir: string;
}

export const DEFAULT_CONFIG_PATH = './market-config.json';
export const DEFAULT_PORT = 3000;
export const DEFAULT_DATA_DIR = './market-data';

type Env = Record<string, string | undefined>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(source: Record<string, unknown>, key: string, fallback: string): string {
  const value = source[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'string') {
    throw new InvalidArgumentError(`Config field "${key}" must be a string`);
  }
  return value;
}

function parseSats(value: unknown, label: string): number {
  const parsed = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
  if (typeof parsed !== 'number' || !Number.isSafeInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError(`${label} must be a non-negative integer amount of sats`);
  }
  return parsed;
}

function parsePort(value: string): number {
  const port = /^\d+$/.test(value) ? parseInt(value, 10) : NaN;
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new InvalidArgumentError(`Invalid port: ${value}`);
  }
  return port;
}

/**
 * Builds a config from a parsed catalogue file and environment overrides.
 */
export function parseMarketConfig(raw: unknown, env: Env = process.env): MarketConfig {
  if (!isRecord(raw)) {
    throw new InvalidArgumentError('Market config must be a JSON object');
  }

  const prices = raw.pricesSats;
  if (!Array.isArray(prices)) {
    throw new InvalidArgumentError('Config field "pricesSats" must be an array');
  }

  const balances = raw.genesisBalances ?? {};
  if (!isRecord(balances)) {
    throw new InvalidArgumentError('Config field "genesisBalances" must be an object');
  }

  const genesisBalances: Record<string, number> = {};
  for (const [address, amount] of Object.entries(balances)) {
    genesisBalances[address] = parseSats(amount, `Genesis balance for ${address}`);
  }

  const artist = env.MARKET_ARTIST || (raw.artist === undefined ? undefined : readString(raw, 'artist', ''));

  return {
    collection: {
      name: readString(raw, 'name', 'MarketNFTs'),
      symbol: readString(raw, 'symbol', 'MNFT'),
      baseURI: readString(raw, 'baseURI', '')
    },
    royaltyFeeSats: parseSats(env.MARKET_ROYALTY_FEE_SATS || (raw.royaltyFeeSats ?? 0), 'Royalty fee'),
    pricesSats: prices.map((price, index) => parseSats(price, `Price of token ${index}`)),
    artist: artist || undefined,
    genesisBalances,
    port: parsePort(env.MARKET_PORT || String(DEFAULT_PORT)),
    dataDir: env.MARKET_DATA_DIR || DEFAULT_DATA_DIR
  };
}

export function loadMarketConfig(configPath?: string, env: Env = process.env): MarketConfig {
  const resolved = path.resolve(configPath || env.MARKET_CONFIG || DEFAULT_CONFIG_PATH);

  if (!fs.existsSync(resolved)) {
    throw new InvalidArgumentError(`Market config not found at ${resolved}`);
  }

  const raw: unknown = JSON.parse(fs.readFileSync(resolved, 'utf8'));
  return parseMarketConfig(raw, env);
}
