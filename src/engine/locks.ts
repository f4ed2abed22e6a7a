// In-process keyed locks: calls sharing a key run one after another, calls on
// different keys run in parallel.
const locks = new Map<string, Promise<unknown>>();

export async function withLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
  const prev = locks.get(key) ?? Promise.resolve();
  let release: () => void = () => {};
  const held = new Promise<void>(r => { release = r; });
  const tail = prev.then(() => held);
  locks.set(key, tail);
  try {
    await prev;
    return await fn();
  } finally {
    release();
    if (locks.get(key) === tail) locks.delete(key);
  }
}

// Keys are taken in sorted order so two callers asking for the same pair
// cannot deadlock each other.
export async function withLocks<T>(keys: string[], fn: () => Promise<T>): Promise<T> {
  const ordered = [...new Set(keys)].sort();
  const run = (i: number): Promise<T> => (i >= ordered.length ? fn() : withLock(ordered[i], () => run(i + 1)));
  return run(0);
}

export function isLocked(key: string) {
  return locks.has(key);
}

// Keys are namespaced per store so marketplaces over different stores in one
// process never wait on, or skip for, each other.
const scopes = new WeakMap<object, string>();
let nextScope = 1;

export function storeScope(store: object) {
  let scope = scopes.get(store);
  if (!scope) {
    scope = `s${nextScope++}`;
    scopes.set(store, scope);
  }
  return scope;
}

const inflight = new Map<string, Promise<unknown>>();

// Single-flight: while a run for `key` is active a second caller gets
// `undefined` straight away instead of queueing a duplicate run.
export async function runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T | undefined> {
  if (inflight.has(key)) return undefined;
  const p = fn();
  inflight.set(key, p);
  try {
    return await p;
  } finally {
    inflight.delete(key);
  }
}

export function lockKey(store: object, kind: 'opportunity' | 'user' | 'reward' | 'sweep', id: string) {
  return `${storeScope(store)}/${kind}:${id}`;
}
