// Centralized environment bootstrap so any script can import once.
// Usage: import './env_bootstrap.js'; near the top of entrypoints.
import 'dotenv/config';
import { loadConfig } from './config.js';
import { setEventMirror } from './engine/events.js';

export const config = loadConfig();
setEventMirror(config.debugEvents);

if (!config.dataFile) {
  console.warn('[env] MARKETPLACE_DATA_FILE not set – state lives in memory only.');
}
