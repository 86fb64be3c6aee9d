#!/usr/bin/env node

import { Command } from 'commander';
import * as dotenv from 'dotenv';
import * as fs from 'fs';
import * as path from 'path';
import { MarketNode } from '../node/market-node';
import { MarketAPIServer } from '../node/api-server';
import { MarketClient } from '../client/market-client';
import { loadMarketConfig, DEFAULT_DATA_DIR } from '../config/market-config';
import { generateKeyPair, KeyPair } from '../crypto';

dotenv.config();

const KEYS_FILE = 'market-keys.json';

function isKeyPair(value: unknown): value is KeyPair {
  return (
    typeof value === 'object' &&
    value !== null &&
    'privateKey' in value &&
    'publicKey' in value &&
    'address' in value &&
    typeof value.privateKey === 'string' &&
    typeof value.publicKey === 'string' &&
    typeof value.address === 'string'
  );
}

function readKeys(keysFile: string): KeyPair {
  const parsed: unknown = JSON.parse(fs.readFileSync(keysFile, 'utf8'));
  if (!isKeyPair(parsed)) {
    throw new Error(`Key file ${keysFile} is malformed`);
  }
  return parsed;
}

function loadOrCreateKeys(dataDir: string): KeyPair {
  if (!fs.existsSync(dataDir)) {
    fs.mkdirSync(dataDir, { recursive: true });
  }

  const keysFile = path.join(dataDir, KEYS_FILE);
  if (fs.existsSync(keysFile)) {
    console.log('📂 Loading existing wallet keys...');
    return readKeys(keysFile);
  }

  console.log('🔑 Generating new wallet keys...');
  const keys = generateKeyPair();
  fs.writeFileSync(keysFile, JSON.stringify(keys, null, 2));
  console.log('✅ Keys saved to:', keysFile);
  console.log('⚠️  IMPORTANT: Backup your private key securely!\n');
  return keys;
}

function parseSatsArg(value: string): number {
  const parsed = Number(value);
  if (!Number.isSafeInteger(parsed) || parsed < 0) {
    throw new Error(`Invalid amount: ${value}`);
  }
  return parsed;
}

function printItems(items: { tokenId: number; seller: string | null; price: number }[]): void {
  if (items.length === 0) {
    console.log('(none)');
    return;
  }
  for (const item of items) {
    console.log(`#${item.tokenId}  ${item.price} sats  seller: ${item.seller ?? '-'}`);
  }
}

const program = new Command();

program
  .name('market')
  .description('Royalty NFT market node')
  .version('1.0.0')
  .option('-u, --url <url>', 'Market node URL for client commands', process.env.MARKET_URL || 'http://localhost:3000')
  .option('-d, --data-dir <dir>', 'Data directory', process.env.MARKET_DATA_DIR || DEFAULT_DATA_DIR);

program
  .command('start')
  .description('Deploy (or restore) the market ledger and serve the API')
  .option('-p, --port <port>', 'Port to listen on')
  .option('-c, --config <path>', 'Catalogue config file')
  .option('-a, --artist <address>', 'Royalty payee address')
  .option('--fund-deployer', 'Credit the deployer wallet with the required deposit')
  .action(async (options: { port?: string; config?: string; artist?: string; fundDeployer?: boolean }) => {
    console.log('🚀 Starting market node...\n');

    const globals = program.opts<{ dataDir: string }>();
    const config = loadMarketConfig(options.config);
    config.dataDir = globals.dataDir;
    if (options.port) config.port = parseInt(options.port, 10);
    if (options.artist) config.artist = options.artist;

    const keys = loadOrCreateKeys(config.dataDir);

    console.log('📋 Market Configuration:');
    console.log(`   Collection: ${config.collection.name} (${config.collection.symbol})`);
    console.log(`   Tokens: ${config.pricesSats.length}`);
    console.log(`   Royalty Fee: ${config.royaltyFeeSats} sats`);
    console.log(`   Artist: ${config.artist ?? '(unset)'}`);
    console.log(`   Deployer: ${keys.address}`);
    console.log(`   Port: ${config.port}`);
    console.log(`   Data Dir: ${config.dataDir}\n`);

    const node = new MarketNode(config, { deployer: keys.address, fundDeployer: options.fundDeployer });
    await node.initialize();

    const apiServer = new MarketAPIServer(node, config.port);
    const port = await apiServer.start();

    console.log('✅ Market node is running!');
    console.log(`🔍 API: http://localhost:${port}/api/market`);
    console.log('Press Ctrl+C to stop\n');
  });

program
  .command('generate-keys')
  .description('Generate a new wallet key pair')
  .action(() => {
    const keys = generateKeyPair();

    console.log('✅ Keys generated successfully!\n');
    console.log('Public Key:');
    console.log(keys.publicKey);
    console.log('\nAddress:');
    console.log(keys.address);
    console.log('\n⚠️  PRIVATE KEY (KEEP SECRET!):');
    console.log(keys.privateKey);
  });

program
  .command('info')
  .description('Show wallet and market information')
  .action(async () => {
    const { dataDir, url } = program.opts<{ dataDir: string; url: string }>();
    const keysFile = path.join(dataDir, KEYS_FILE);

    if (!fs.existsSync(keysFile)) {
      console.log('❌ No wallet keys found. Run "market start" first.');
      return;
    }

    const keys = readKeys(keysFile);
    console.log('📋 Wallet:');
    console.log(`   Address: ${keys.address}`);
    console.log(`   Public Key: ${keys.publicKey}\n`);

    const info = await new MarketClient(url).getInfo();
    console.log('📋 Market:');
    console.log(`   ${info.name} (${info.symbol}) at ${info.address}`);
    console.log(`   Artist: ${info.artist}`);
    console.log(`   Owner: ${info.owner ?? '(renounced)'}`);
    console.log(`   Royalty Fee: ${info.royaltyFee} sats`);
    console.log(`   Escrow Balance: ${info.escrowBalance} sats`);
  });

program
  .command('unsold')
  .description('List tokens currently for sale')
  .action(async () => {
    const { url } = program.opts<{ url: string }>();
    printItems(await new MarketClient(url).getUnsoldTokens());
  });

program
  .command('owned <address>')
  .description('List tokens held by an address')
  .action(async (address: string) => {
    const { url } = program.opts<{ url: string }>();
    printItems(await new MarketClient(url).getOwnedTokens(address));
  });

program
  .command('buy <tokenId>')
  .description('Buy a listed token, paying its asking price')
  .requiredOption('-v, --value <sats>', 'Attached payment in sats')
  .action(async (tokenId: string, options: { value: string }) => {
    const { dataDir, url } = program.opts<{ dataDir: string; url: string }>();
    const keys = readKeys(path.join(dataDir, KEYS_FILE));
    const item = await new MarketClient(url).buyToken(parseInt(tokenId, 10), parseSatsArg(options.value), keys);
    console.log(`✅ Bought token #${item.tokenId}`);
  });

program
  .command('resell <tokenId> <price>')
  .description('Relist a held token for a new price, paying the royalty fee')
  .requiredOption('-v, --value <sats>', 'Attached royalty payment in sats')
  .action(async (tokenId: string, price: string, options: { value: string }) => {
    const { dataDir, url } = program.opts<{ dataDir: string; url: string }>();
    const keys = readKeys(path.join(dataDir, KEYS_FILE));
    const item = await new MarketClient(url).resellToken(
      parseInt(tokenId, 10),
      parseSatsArg(price),
      parseSatsArg(options.value),
      keys
    );
    console.log(`✅ Relisted token #${item.tokenId} for ${item.price} sats`);
  });

program.parseAsync().catch(error => {
  console.error('❌', error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
