import type { EventLogEntry } from '../models/types.js';

const RING_SIZE = 5000;
const events: EventLogEntry[] = [];
let seq = 1;
let mirror = false;

/** Mirror every event to the console; entry points set this from config.debugEvents. */
export function setEventMirror(on: boolean) {
  mirror = on;
}

export function logEvent(type: string, payload: Record<string, unknown>) {
  const entry: EventLogEntry = { id: `${Date.now()}-${seq++}`, ts: new Date().toISOString(), type, payload };
  events.push(entry);
  if (events.length > RING_SIZE) events.shift();
  if (mirror) {
    const line = `[event] ${type} ${JSON.stringify(payload)}`;
    if (type.endsWith('failed')) console.warn(line);
    else console.debug(line);
  }
  return entry;
}

export function getEvents(filter?: { type?: string }) {
  if (!filter?.type) return [...events];
  return events.filter(e => e.type === filter.type);
}

export function clearEvents() { events.length = 0; }
