#!/usr/bin/env node
/**
 * Runs the scheduler sweep against the snapshot file and writes it back.
 * Usage:
 *   npx tsx scripts/run_sweep.ts                       # one sweep at the current time
 *   npx tsx scripts/run_sweep.ts --at 2030-01-01T00:00:00Z
 *   npx tsx scripts/run_sweep.ts --watch               # keep sweeping every SWEEP_INTERVAL_MS
 */

import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import { config } from '../src/env_bootstrap.js';
import { openDb, saveSnapshot } from '../src/adapters/snapshot_file.js';
import { createMarketplace } from '../src/engine/marketplace.js';
import { getEvents } from '../src/engine/events.js';

interface Args { at?: Date; watch: boolean; }

function parseArgs(): Args {
  const argv = process.argv.slice(2);
  const args: Args = { watch: false };
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (a === '--at') {
      const at = new Date(argv[++i] ?? '');
      if (Number.isNaN(at.getTime())) {
        console.error('Expected: --at <ISO-8601 timestamp>');
        process.exit(1);
      }
      args.at = at;
    } else if (a === '--watch') args.watch = true;
  }
  return args;
}

const __dirname = dirname(fileURLToPath(import.meta.url));
const dataFile = config.dataFile ?? join(__dirname, '..', 'data', 'marketplace.json');

async function main() {
  const { at, watch } = parseArgs();
  const core = createMarketplace({ db: openDb(dataFile), config });

  if (watch) {
    console.log(`Sweeping every ${config.sweepIntervalMs}ms (Ctrl+C to stop)`);
    const scheduler = core.startSweepScheduler({
      onTick: report => {
        saveSnapshot(dataFile, core.ctx.db);
        console.log(JSON.stringify({ advanced: report.advanced, completed: report.completed, credited: report.credited.length, failed: report.failed }));
      }
    });
    process.on('SIGINT', () => { scheduler.stop(); process.exit(0); });
    return;
  }

  const report = await core.runSweep(at);
  saveSnapshot(dataFile, core.ctx.db);
  console.log('--- Sweep ---');
  console.log(JSON.stringify(report, null, 2));
  console.log('\nRecent Events:');
  console.log(JSON.stringify(getEvents().slice(-10), null, 2));
}

main().catch(err => { console.error(err); process.exit(1); });
