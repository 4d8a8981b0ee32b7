import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import {
  createDateFilter,
  loadEvents,
  parseDay,
  parseEventFile,
  parseTimestamp,
} from '../src/event-loader.js';
import { isEventFile } from '../src/unpacker.js';

const CRASH_1 = {
  event: 'crash',
  device_id: 'device-aaaa-1111',
  app_version: '0.9.12',
  signal_name: 'SIGSEGV',
  uptime_sec: 30,
  timestamp: '2026-02-09T23:59:00Z',
  backtrace: ['0xaaaa1100', '0xaaaa1060'],
};

const CRASH_2 = {
  event: 'crash',
  device_id: 'device-bbbb-2222',
  app_version: '0.9.12',
  signal_name: 'SIGABRT',
  uptime_sec: 600,
  timestamp: '2026-02-11T12:00:00Z',
  backtrace: ['0xaaaa5100'],
};

const SESSION = {
  event: 'session',
  device_id: 'device-aaaa-1111',
  timestamp: '2026-02-10T09:00:00Z',
  app: { platform: 'rpi4_64bit', version: '0.9.12' },
};

describe('parseEventFile', () => {
  it('should parse a single event object', () => {
    expect(parseEventFile(JSON.stringify(CRASH_1))).toEqual([CRASH_1]);
  });

  it('should parse an array and drop unknown event kinds', () => {
    const events = parseEventFile(JSON.stringify([CRASH_1, SESSION, { event: 'heartbeat' }, 42]));
    expect(events.map((e) => e.event)).toEqual(['crash', 'session']);
    expect(events[1]).toEqual(SESSION);
  });

  it('should drop non-string backtrace entries and coerce numeric strings', () => {
    const [event] = parseEventFile(JSON.stringify({
      event: 'crash',
      uptime_sec: '45',
      backtrace: ['0x1000', 17, null, '0x2000'],
    }));
    expect(event).toEqual({
      event: 'crash',
      device_id: undefined,
      app_version: undefined,
      signal_name: undefined,
      uptime_sec: 45,
      timestamp: undefined,
      backtrace: ['0x1000', '0x2000'],
    });
  });

  it('should return nothing for invalid JSON', () => {
    expect(parseEventFile('{ not json')).toEqual([]);
  });
});

describe('date filtering', () => {
  it('should parse days as UTC', () => {
    expect(parseDay('2026-02-10')).toBe(Date.UTC(2026, 1, 10));
    expect(parseDay('2026-02-10', true)).toBe(Date.UTC(2026, 1, 10, 23, 59, 59));
  });

  it('should reject malformed days', () => {
    expect(() => parseDay('02/10/2026')).toThrow('Invalid date "02/10/2026", expected YYYY-MM-DD');
  });

  it('should read zone-less timestamps as UTC', () => {
    expect(parseTimestamp('2026-02-10T00:00:00')).toBe(Date.UTC(2026, 1, 10));
    expect(parseTimestamp('2026-02-10T02:00:00+02:00')).toBe(Date.UTC(2026, 1, 10));
  });

  it('should include the whole until day', () => {
    const inRange = createDateFilter({ since: '2026-02-10', until: '2026-02-10' });
    expect(inRange({ event: 'crash', timestamp: '2026-02-10T00:00:00Z' })).toBe(true);
    expect(inRange({ event: 'crash', timestamp: '2026-02-10T23:59:30Z' })).toBe(true);
    expect(inRange({ event: 'crash', timestamp: '2026-02-09T23:59:59Z' })).toBe(false);
    expect(inRange({ event: 'crash', timestamp: '2026-02-11T00:00:00Z' })).toBe(false);
  });

  it('should let events without a usable timestamp through', () => {
    const inRange = createDateFilter({ since: '2026-02-10' });
    expect(inRange({ event: 'crash' })).toBe(true);
    expect(inRange({ event: 'crash', timestamp: 'yesterday' })).toBe(true);
  });
});

describe('loadEvents', () => {
  let dataDir: string;

  beforeEach(() => {
    dataDir = fs.mkdtempSync(path.join(os.tmpdir(), 'events-'));
    fs.mkdirSync(path.join(dataDir, '2026', '02'), { recursive: true });
    fs.writeFileSync(path.join(dataDir, 'a.json'), JSON.stringify(CRASH_1));
    fs.writeFileSync(path.join(dataDir, '2026', '02', 'b.json'), JSON.stringify([CRASH_2, SESSION]));
    fs.writeFileSync(path.join(dataDir, 'broken.json'), '{ "event": ');
    fs.writeFileSync(path.join(dataDir, 'notes.txt'), 'not telemetry');
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(dataDir, { recursive: true, force: true });
  });

  it('should load every json file in the tree', async () => {
    const loaded = await loadEvents(dataDir);
    expect(loaded.fileCount).toBe(3);
    expect(loaded.crashes.map((c) => c.device_id)).toEqual(['device-bbbb-2222', 'device-aaaa-1111']);
    expect(loaded.sessions).toHaveLength(1);
  });

  it('should apply the date range', async () => {
    const loaded = await loadEvents(dataDir, { since: '2026-02-10' });
    expect(loaded.crashes.map((c) => c.device_id)).toEqual(['device-bbbb-2222']);
    expect(loaded.sessions).toHaveLength(1);
  });

  it('should load a single file', async () => {
    const loaded = await loadEvents(path.join(dataDir, 'a.json'));
    expect(loaded.fileCount).toBe(1);
    expect(loaded.crashes).toHaveLength(1);
  });

  it('should fail for a missing directory', async () => {
    const missing = path.join(dataDir, 'nope');
    await expect(loadEvents(missing)).rejects.toThrow(`Data directory not found: ${missing}`);
  });
});

describe('isEventFile', () => {
  it('should accept json files at any depth', () => {
    expect(isEventFile('events/2026/02/batch-1.json')).toBe(true);
  });

  it('should skip other files and resource forks', () => {
    expect(isEventFile('events/README.md')).toBe(false);
    expect(isEventFile('__MACOSX/events/._batch-1.json')).toBe(false);
  });
});
