#!/usr/bin/env tsx
import 'dotenv/config';
import { AlpacaBrokerClient } from './lib/alpaca';
import { loadCredentials } from './lib/config';
import { errorMessage } from './lib/errors';

async function checkOpenPositions() {
  const broker = new AlpacaBrokerClient(loadCredentials());

  console.log('\n📊 Checking open positions...\n');

  const symbols = await broker.getOpenPositionSymbols();
  if (symbols.size === 0) {
    console.log('⭕ No open positions');
    return;
  }

  console.log(`✅ Found ${symbols.size} position(s):\n`);
  for (const symbol of symbols) {
    const position = await broker.getPosition(symbol);
    if (position) {
      console.log(`${position.symbol} ${position.side.toUpperCase()} qty ${position.qty} @ ${position.avgEntryPrice.toFixed(2)}`);
    }
  }
}

checkOpenPositions().catch(err => {
  console.error('❌ Error:', errorMessage(err));
  process.exit(1);
});
