// JSON file persistence for the in-memory store: the whole state is written
// as one snapshot and read back into a fresh store on start.
import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { formatIssues, snapshotSchema } from '../models/schemas.js';
import { createDb, type Db, type Snapshot } from './db.js';

export function loadSnapshot(file: string): Snapshot | undefined {
  if (!existsSync(file)) return undefined;
  const raw: unknown = JSON.parse(readFileSync(file, 'utf-8'));
  const parsed = snapshotSchema.safeParse(raw);
  if (!parsed.success) throw new Error(`Invalid snapshot ${file}: ${formatIssues(parsed.error).join('; ')}`);
  return parsed.data;
}

// Written to a temp file, then renamed over the target.
export function saveSnapshot(file: string, db: Db) {
  mkdirSync(dirname(file), { recursive: true });
  const tmp = `${file}.tmp`;
  writeFileSync(tmp, JSON.stringify(db.snapshot(), null, 2));
  renameSync(tmp, file);
}

/** Store backed by `file` when given (empty when the file does not exist yet), else a bare in-memory one. */
export function openDb(file?: string): Db {
  return createDb(file ? loadSnapshot(file) : undefined);
}
