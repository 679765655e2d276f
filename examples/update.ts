/**
 * Live run: point an A record at a new address.
 *
 * Usage:
 *   DREAMHOST_API_KEY=xxx npx tsx examples/update.ts home.example.com 198.51.100.4 203.0.113.7
 */

import {
  createReconciler,
  createTransport,
  loadConfig,
  ReconcileError,
} from '../src/index.js';

const [record, oldAddress, newAddress] = process.argv.slice(2);

if (!record || !oldAddress || !newAddress) {
  console.error(
    'Usage: DREAMHOST_API_KEY=xxx npx tsx examples/update.ts <record> <old-address> <new-address>'
  );
  process.exit(1);
}

async function main(record: string, oldAddress: string, newAddress: string) {
  const config = loadConfig();
  const transport = createTransport({
    apiKey: config.apiKey,
    baseUrl: config.baseUrl,
    cooldownMs: config.cooldownMs,
    timeoutMs: config.timeoutMs,
  });
  const reconciler = createReconciler(transport);

  console.log(`\nReplacing ${record}: ${oldAddress} -> ${newAddress}...`);
  const result = await reconciler.replace(record, oldAddress, newAddress);

  if (result.addOutcome?.status !== 'success') {
    console.log(`  ! Add rejected: ${result.addOutcome?.detail}`);
    console.log(`  = Kept: A ${record} -> ${oldAddress}`);
    return;
  }
  console.log(`  + Added: A ${record} -> ${newAddress} (${result.addOutcome.detail})`);

  if (result.removeOutcome?.status === 'success') {
    console.log(`  - Removed: A ${record} -> ${oldAddress}`);
  } else {
    console.log(`  ! Remove rejected: ${result.removeOutcome?.detail}`);
  }
}

main(record, oldAddress, newAddress).catch((err: unknown) => {
  if (err instanceof ReconcileError) {
    console.error(`\n${record} now resolves to both addresses; remove ${oldAddress} by hand.`);
  }
  console.error('\nError:', err instanceof Error ? err.message : err);
  process.exit(1);
});
