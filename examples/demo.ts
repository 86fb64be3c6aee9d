import {
  MarketplaceLedger,
  InMemoryTokenRegistry,
  InMemoryBalanceBook,
  MarketEvent,
  deriveAddress,
  calculateRequiredDeposit
} from '../src';

const SATS_PER_UNIT = 100_000_000;

function runDemo() {
  console.log('=== Royalty NFT Market - Demo ===\n');

  const deployer = deriveAddress('demo-deployer');
  const artist = deriveAddress('demo-artist');
  const collector = deriveAddress('demo-collector');
  const royaltyFee = SATS_PER_UNIT / 100;
  const prices = [1, 2, 3, 4, 5, 6, 7, 8].map(units => units * SATS_PER_UNIT);

  const balances = new InMemoryBalanceBook();
  const deposit = calculateRequiredDeposit(prices.length, royaltyFee);
  balances.credit(deployer, deposit);
  balances.credit(collector, 10 * SATS_PER_UNIT);

  console.log('Step 1: Deploying the market...');
  const ledger = MarketplaceLedger.deploy(
    { royaltyFee, artist, prices, metadata: { name: 'DemoNFTs', symbol: 'DEMO', baseURI: 'ipfs://demo/' } },
    { caller: deployer, value: deposit },
    { registry: new InMemoryTokenRegistry(), balances }
  );
  ledger.on('event', (event: MarketEvent) => console.log(`   event #${event.height}: ${event.eventType}`));
  console.log(`✓ ${ledger.getUnsoldTokens().length} tokens listed at ${ledger.address}\n`);

  console.log('Step 2: Collector buys token 0...');
  ledger.buyToken(0, { caller: collector, value: prices[0] });
  console.log(`✓ Token 0 owner: ${ledger.ownerOf(0)}`);
  console.log(`✓ Artist balance: ${balances.getBalance(artist)} sats`);
  console.log(`✓ Deployer balance: ${balances.getBalance(deployer)} sats\n`);

  console.log('Step 3: Collector relists token 0 for 2 units...');
  ledger.resellToken(0, 2 * SATS_PER_UNIT, { caller: collector, value: royaltyFee });
  console.log(`✓ Token 0 seller: ${ledger.marketItem(0).seller}, price: ${ledger.marketItem(0).price} sats`);
  console.log(`✓ Escrow balance: ${ledger.escrowBalance()} sats\n`);

  console.log('=== Demo complete ===');
}

runDemo();
