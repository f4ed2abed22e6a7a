// Seed script: loads skills, users and rewards from data/seed.json into the
// snapshot file named by MARKETPLACE_DATA_FILE (default data/marketplace.json).
// Run with: npm run seed
// Existing rows with the same id are replaced; balances of existing users are kept.

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import { config } from '../src/env_bootstrap.js';
import { openDb, saveSnapshot } from '../src/adapters/snapshot_file.js';
import { formatIssues, seedSchema } from '../src/models/schemas.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const seedFile = join(__dirname, '..', 'data', 'seed.json');
const dataFile = config.dataFile ?? join(__dirname, '..', 'data', 'marketplace.json');

async function main() {
  const parsed = seedSchema.safeParse(JSON.parse(readFileSync(seedFile, 'utf-8')));
  if (!parsed.success) throw new Error(`Invalid seed file: ${formatIssues(parsed.error).join('; ')}`);
  const seed = parsed.data;

  const db = openDb(dataFile);
  await db.transaction(async tx => {
    for (const s of seed.skills) await tx.putSkill(s);
    for (const u of seed.users) await tx.putUser(u);
    for (const r of seed.rewards) await tx.putReward(r);
  });
  saveSnapshot(dataFile, db);
  console.log(`Seeded ${seed.skills.length} skills, ${seed.users.length} users, ${seed.rewards.length} rewards -> ${dataFile}`);
}

main().catch(err => { console.error(err); process.exit(1); });
