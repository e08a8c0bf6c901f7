#!/usr/bin/env npx tsx
/**
 * Maintenance Connection Query
 * ============================
 * Fetches one page of a v8 collection and prints it as JSON.
 * Server and credentials come from MC_SERVER / MC_USER / MC_PASSWORD (.env is loaded).
 *
 * Usage:
 *   npx tsx scripts/mc-query.ts assets --filter ID --op eq --id SHI-V-1405
 *   npx tsx scripts/mc-query.ts assets --filter parentRef.ID --id "SHI-INLET FLASH GAS AREA" --top 500
 *   npx tsx scripts/mc-query.ts classifications --top 50 --skip 50 --raw
 */

import 'dotenv/config';
import {
  createClient,
  loadConfigFromEnv,
  type GetOptions,
} from '../packages/maintenance-connection/src/index.js';

const args = process.argv.slice(2);
const collection = args[0];

function getArg(name: string): string | undefined {
  const idx = args.indexOf(`--${name}`);
  return idx >= 0 ? args[idx + 1] : undefined;
}

function getNumber(name: string): number | undefined {
  const value = getArg(name);
  return value === undefined ? undefined : Number(value);
}

async function main(): Promise<void> {
  if (!collection || collection.startsWith('--')) {
    console.error('Usage: npx tsx scripts/mc-query.ts <module> [--filter F] [--op OP] [--id ID] [--top N] [--skip N] [--raw]');
    process.exit(1);
  }

  const client = createClient(loadConfigFromEnv(process.env));
  const options: GetOptions = {
    filter: getArg('filter'),
    operator: getArg('op'),
    identifier: getArg('id'),
    top: getNumber('top'),
    skip: getNumber('skip'),
  };

  const records = args.includes('--raw')
    ? await client.get(collection, { ...options, raw: true })
    : await client.get(collection, options);

  console.log(JSON.stringify(records, null, 2));
  console.error(`\n📋 ${records.length} record(s) from ${collection}`);
}

main().catch((error: unknown) => {
  console.error('❌ Query failed:', error instanceof Error ? error.message : error);
  process.exit(1);
});
