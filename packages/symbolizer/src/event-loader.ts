import fs from 'node:fs';
import path from 'node:path';
import { isEventFile, unpackEventArchive } from './unpacker.js';
import { CrashEvent, DateRange, LoadedEvents, SessionEvent, TelemetryEvent } from './types.js';

const RE_DAY = /^(\d{4})-(\d{2})-(\d{2})$/;
// ISO timestamp without a zone designator
const RE_NAIVE_TIME = /T\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?$/;

// ============================================================
// Field narrowing
// ============================================================

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function optNumber(value: unknown): number | undefined {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value.trim() !== '' && Number.isFinite(Number(value))) {
    return Number(value);
  }
  return undefined;
}

function toCrashEvent(raw: JsonRecord): CrashEvent {
  const backtrace = Array.isArray(raw.backtrace)
    ? raw.backtrace.filter((a): a is string => typeof a === 'string')
    : undefined;

  return {
    event: 'crash',
    device_id: optString(raw.device_id),
    app_version: optString(raw.app_version),
    signal_name: optString(raw.signal_name),
    uptime_sec: optNumber(raw.uptime_sec),
    timestamp: optString(raw.timestamp),
    backtrace,
  };
}

function toSessionEvent(raw: JsonRecord): SessionEvent {
  const rawApp = raw.app;
  const app = isRecord(rawApp)
    ? { platform: optString(rawApp.platform), version: optString(rawApp.version) }
    : undefined;

  return {
    event: 'session',
    device_id: optString(raw.device_id),
    timestamp: optString(raw.timestamp),
    app,
  };
}

/**
 * Parse one telemetry file: a single event object or an array of them.
 * Invalid JSON yields no events; unknown event kinds are dropped.
 */
export function parseEventFile(content: string): TelemetryEvent[] {
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch {
    return [];
  }

  const items: unknown[] = Array.isArray(data) ? data : [data];
  const events: TelemetryEvent[] = [];
  for (const item of items) {
    if (!isRecord(item)) continue;
    if (item.event === 'crash') events.push(toCrashEvent(item));
    else if (item.event === 'session') events.push(toSessionEvent(item));
  }
  return events;
}

// ============================================================
// Date filtering
// ============================================================

/**
 * Parse a `YYYY-MM-DD` day as UTC midnight, or 23:59:59 when `endOfDay`.
 */
export function parseDay(day: string, endOfDay = false): number {
  const m = day.match(RE_DAY);
  if (!m) {
    throw new Error(`Invalid date "${day}", expected YYYY-MM-DD`);
  }
  const [y, mo, d] = [Number(m[1]), Number(m[2]) - 1, Number(m[3])];
  return endOfDay ? Date.UTC(y, mo, d, 23, 59, 59) : Date.UTC(y, mo, d);
}

export function parseTimestamp(timestamp: string): number {
  const normalized = RE_NAIVE_TIME.test(timestamp) ? `${timestamp}Z` : timestamp;
  return Date.parse(normalized);
}

/**
 * Build a predicate for a date range. Events without a parseable timestamp
 * always pass.
 */
export function createDateFilter(range: DateRange): (event: TelemetryEvent) => boolean {
  const since = range.since ? parseDay(range.since) : undefined;
  const until = range.until ? parseDay(range.until, true) : undefined;

  return (event) => {
    if (!event.timestamp || (since === undefined && until === undefined)) return true;
    const ts = parseTimestamp(event.timestamp);
    if (Number.isNaN(ts)) return true;
    if (since !== undefined && ts < since) return false;
    if (until !== undefined && ts > until) return false;
    return true;
  };
}

// ============================================================
// Loading
// ============================================================

function listEventFiles(dir: string): string[] {
  const files: string[] = [];
  for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...listEventFiles(full));
    } else if (entry.isFile() && isEventFile(entry.name)) {
      files.push(full);
    }
  }
  return files.sort();
}

async function readEventFiles(source: string): Promise<Map<string, string>> {
  if (source.endsWith('.zip')) {
    return unpackEventArchive(source);
  }
  if (fs.statSync(source).isFile()) {
    return new Map([[source, await fs.promises.readFile(source, 'utf-8')]]);
  }

  const contents = new Map<string, string>();
  for (const file of listEventFiles(source)) {
    try {
      contents.set(file, await fs.promises.readFile(file, 'utf-8'));
    } catch (err) {
      console.warn(`[events] Skipping unreadable file ${file}: ${err instanceof Error ? err.message : String(err)}`);
    }
  }
  return contents;
}

/**
 * Load crash and session events from a directory tree of `.json` files,
 * a single `.json` file, or a `.zip` export.
 */
export async function loadEvents(source: string, range: DateRange = {}): Promise<LoadedEvents> {
  if (!fs.existsSync(source)) {
    throw new Error(`Data directory not found: ${source}`);
  }

  const inRange = createDateFilter(range);
  const files = await readEventFiles(source);
  const crashes: CrashEvent[] = [];
  const sessions: SessionEvent[] = [];

  for (const content of files.values()) {
    for (const event of parseEventFile(content)) {
      if (!inRange(event)) continue;
      if (event.event === 'crash') crashes.push(event);
      else sessions.push(event);
    }
  }

  console.warn(`[events] Loaded ${crashes.length} crashes, ${sessions.length} sessions from ${files.size} files`);
  return { crashes, sessions, fileCount: files.size };
}
