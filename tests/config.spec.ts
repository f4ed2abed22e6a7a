import { describe, it, expect, beforeAll } from 'vitest';
import { mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { DEFAULT_CONFIG, loadConfig } from '../src/config.js';

let dir: string;

beforeAll(() => {
  dir = mkdtempSync(join(tmpdir(), 'marketplace-config-'));
});

function yamlFile(name: string, body: string) {
  const file = join(dir, name);
  writeFileSync(file, body);
  return file;
}

describe('loadConfig', () => {
  it('falls back to defaults without a file or environment', () => {
    expect(loadConfig({ file: join(dir, 'missing.yaml'), env: {} })).toEqual({ ...DEFAULT_CONFIG, dataFile: undefined });
  });

  it('reads the policy file', () => {
    const file = yamlFile('policy.yaml', [
      'sweep:',
      '  interval_ms: 5000',
      '  pending_on_completion: reject',
      'redemption:',
      '  code_length: 8',
      'data_file: /tmp/state.json'
    ].join('\n'));
    expect(loadConfig({ file, env: {} })).toEqual({
      sweepIntervalMs: 5000,
      pendingOnCompletion: 'reject',
      redemptionCodeLength: 8,
      redemptionCodeAttempts: 5,
      dataFile: '/tmp/state.json',
      debugEvents: false
    });
  });

  it('lets the environment override the file', () => {
    const file = yamlFile('override.yaml', 'sweep:\n  interval_ms: 5000\n');
    const cfg = loadConfig({ file, env: { SWEEP_INTERVAL_MS: '2000', REDEMPTION_CODE_ATTEMPTS: '9', DEBUG_EVENTS: '1' } });
    expect(cfg.sweepIntervalMs).toBe(2000);
    expect(cfg.redemptionCodeAttempts).toBe(9);
    expect(cfg.debugEvents).toBe(true);
  });

  it('takes the event mirror from the file unless the environment says otherwise', () => {
    const file = yamlFile('debug.yaml', 'debug_events: true\n');
    expect(loadConfig({ file, env: {} }).debugEvents).toBe(true);
    expect(loadConfig({ file, env: { DEBUG_EVENTS: '0' } }).debugEvents).toBe(false);
  });

  it('ignores empty environment values', () => {
    const cfg = loadConfig({ file: join(dir, 'missing.yaml'), env: { SWEEP_INTERVAL_MS: '', PENDING_ON_COMPLETION: '' } });
    expect(cfg.sweepIntervalMs).toBe(60_000);
    expect(cfg.pendingOnCompletion).toBe('leave');
  });

  it('names every bad key', () => {
    expect(() => loadConfig({ file: join(dir, 'missing.yaml'), env: { REDEMPTION_CODE_LENGTH: 'ten', PENDING_ON_COMPLETION: 'drop' } }))
      .toThrow(/^Invalid environment: .*PENDING_ON_COMPLETION.*REDEMPTION_CODE_LENGTH/);
  });

  it('rejects unknown keys in the file', () => {
    const file = yamlFile('typo.yaml', 'sweep:\n  intervl_ms: 5000\n');
    expect(() => loadConfig({ file, env: {} })).toThrow(/^Invalid config file/);
  });

  it('finds the file through MARKETPLACE_CONFIG', () => {
    const file = yamlFile('via-env.yaml', 'redemption:\n  max_attempts: 3\n');
    expect(loadConfig({ env: { MARKETPLACE_CONFIG: file } }).redemptionCodeAttempts).toBe(3);
  });
});
