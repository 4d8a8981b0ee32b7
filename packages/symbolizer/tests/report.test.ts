import { describe, it, expect } from 'vitest';
import {
  formatDuration,
  formatFrame,
  formatJson,
  formatTerminal,
  topFunction,
} from '../src/report.js';
import { CrashAnalysisResult, CrashSignatureGroup, ResolvedFrame, SHARED_LIB_MARKER } from '../src/types.js';

function frame(resolved: string, rawAddress = '0xaaaa1000'): ResolvedFrame {
  return { rawAddress, resolved, isSharedLibrary: resolved === SHARED_LIB_MARKER };
}

function makeGroup(overrides: Partial<CrashSignatureGroup> = {}): CrashSignatureGroup {
  const frames = [frame('crash_signal_handler', '0xaaaa1100'), frame('foo+0x10', '0xaaaa1060'), frame('bar+0x10', '0xaaaa1210')];
  return {
    signature: 'a3f82b1c',
    count: 2,
    signal: 'SIGSEGV',
    versions: new Set(['0.9.12', '0.9.11']),
    devices: new Set(['device-a', 'device-b']),
    platforms: new Set(['pi']),
    uptimes: [30, 7200],
    timestamps: ['2026-02-10T10:00:00Z', '2026-02-11T08:30:00Z'],
    frames,
    shallow: false,
    instances: [
      { version: '0.9.12', platform: 'pi', device: 'device-a', uptime: 30, signal: 'SIGSEGV', timestamp: '2026-02-10T10:00:00Z', frames },
      { version: '0.9.11', platform: 'pi', device: 'device-b', uptime: 7200, signal: 'SIGSEGV', timestamp: '2026-02-11T08:30:00Z', frames },
    ],
    ...overrides,
  };
}

function makeResult(signatures: CrashSignatureGroup[], warnings: string[] = []): CrashAnalysisResult {
  return {
    totalCrashes: signatures.reduce((n, g) => n + g.count, 0),
    totalSignatures: signatures.length,
    skippedEvents: 0,
    signatures,
    warnings,
  };
}

describe('formatDuration', () => {
  it('should format seconds, minutes and hours', () => {
    expect(formatDuration(45)).toBe('45s');
    expect(formatDuration(90)).toBe('1.5min');
    expect(formatDuration(7200)).toBe('2.0hr');
  });
});

describe('formatFrame', () => {
  it('should mark frame 0 and right-align the address', () => {
    expect(formatFrame(frame('crash_signal_handler', '0xaaaa1100'), 0))
      .toBe(`  → #0 ${' '.repeat(11)}0xaaaa1100  crash_signal_handler`);
    expect(formatFrame(frame('foo+0x10', '0xaaaa1060'), 12))
      .toBe(`    #12${' '.repeat(11)}0xaaaa1060  foo+0x10`);
  });
});

describe('topFunction', () => {
  it('should skip frame 0, libraries and raw addresses', () => {
    expect(topFunction([frame('crash_signal_handler'), frame(SHARED_LIB_MARKER), frame('0x1234'), frame('bar+0x8')])).toBe('bar');
  });

  it('should return ? when nothing resolved', () => {
    expect(topFunction([frame('0x1'), frame('0x2')])).toBe('?');
  });
});

describe('formatTerminal', () => {
  it('should render a group summary', () => {
    const lines = formatTerminal(makeResult([makeGroup()])).split('\n');

    expect(lines[0]).toBe('='.repeat(70));
    expect(lines).toContain('  Total crashes: 2');
    expect(lines).toContain('  Unique signatures: 1');
    expect(lines).toContain('  [a3f82b1c] 2x SIGSEGV — foo');
    expect(lines).toContain('    versions: v0.9.11, v0.9.12  |  platforms: pi  |  devices: 2');
    expect(lines).toContain('    uptime: 30s — 2.0hr');
    expect(lines).toContain(`    #2${' '.repeat(12)}0xaaaa1210  bar+0x10`);
    expect(lines).not.toContain('  Warnings:');
  });

  it('should list warnings and flag shallow groups', () => {
    const text = formatTerminal(makeResult(
      [makeGroup({ shallow: true, uptimes: [60, 60] })],
      ['v0.9.12/pi32: symbols not available (HTTP 404)'],
    ));
    const lines = text.split('\n');

    expect(lines).toContain('  Warnings:');
    expect(lines).toContain('    ⚠ v0.9.12/pi32: symbols not available (HTTP 404)');
    expect(lines).toContain('    ⚠ shallow backtrace (pi32?) — grouping may be unreliable');
    expect(lines).toContain('    uptime: 1.0min');
  });

  it('should cap the representative backtrace preview', () => {
    const frames = Array.from({ length: 12 }, (_, i) => frame(`fn_${i}`, `0x${(0x1000 + i).toString(16)}`));
    const lines = formatTerminal(makeResult([makeGroup({ frames })])).split('\n');

    expect(lines.filter((l) => / #\d+ /.test(l))).toHaveLength(9);
    expect(lines).toContain('       ... +4 more frames');
  });

  it('should expand every instance in detail mode', () => {
    const lines = formatTerminal(makeResult([makeGroup()]), { detail: true }).split('\n');

    expect(lines).toContain('    ── v0.9.12 pi dev=device-a uptime=30s 2026-02-10T10:00:00Z');
    expect(lines).toContain('    ── v0.9.11 pi dev=device-b uptime=7200s 2026-02-11T08:30:00Z');
    expect(lines.filter((l) => l.includes('crash_signal_handler'))).toHaveLength(2);
  });

  it('should say so when nothing matched', () => {
    const lines = formatTerminal(makeResult([])).split('\n');
    expect(lines).toContain('  No crashes found matching filters.');
    expect(lines[lines.length - 1]).toBe('='.repeat(70));
  });
});

describe('formatJson', () => {
  it('should write sets as sorted arrays', () => {
    const parsed = JSON.parse(formatJson(makeResult([makeGroup()])));
    expect(parsed.signatures[0].versions).toEqual(['0.9.11', '0.9.12']);
    expect(parsed.signatures[0].devices).toEqual(['device-a', 'device-b']);
    expect(parsed.signatures[0].frames[1]).toEqual({
      rawAddress: '0xaaaa1060',
      resolved: 'foo+0x10',
      isSharedLibrary: false,
    });
    expect(parsed.totalSignatures).toBe(1);
  });
});
