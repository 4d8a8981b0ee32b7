import { isBareAddress } from './symbol-table.js';
import { stripOffset } from './signature.js';
import { CrashAnalysisResult, CrashSignatureGroup, ResolvedFrame } from './types.js';

const SEPARATOR = '='.repeat(70);
const MAX_PREVIEW_FRAMES = 8;

export interface TerminalReportOptions {
  detail?: boolean;
}

// ============================================================
// Helpers
// ============================================================

export function formatDuration(seconds: number): string {
  if (seconds < 60) return `${Math.round(seconds)}s`;
  if (seconds < 3600) return `${(seconds / 60).toFixed(1)}min`;
  return `${(seconds / 3600).toFixed(1)}hr`;
}

export function formatFrame(frame: ResolvedFrame, index: number): string {
  const marker = index === 0 ? '→' : ' ';
  return `  ${marker} #${String(index).padEnd(2)} ${frame.rawAddress.padStart(20)}  ${frame.resolved}`;
}

/**
 * First named frame below the signal handler, without its offset.
 */
export function topFunction(frames: ResolvedFrame[]): string {
  const top = frames.slice(1).find((f) => !f.isSharedLibrary && !isBareAddress(f.resolved));
  return top ? stripOffset(top.resolved) : '?';
}

function sorted(values: Iterable<string>): string[] {
  return [...values].sort();
}

// ============================================================
// Terminal
// ============================================================

function formatGroup(group: CrashSignatureGroup, detail: boolean): string[] {
  const lines: string[] = [];

  lines.push(`  [${group.signature}] ${group.count}x ${group.signal} — ${topFunction(group.frames)}`);
  lines.push(
    `    versions: ${sorted(group.versions).map((v) => `v${v}`).join(', ')}  |  ` +
    `platforms: ${sorted(group.platforms).join(', ')}  |  ` +
    `devices: ${group.devices.size}`
  );

  if (group.uptimes.length > 0) {
    const minUp = Math.min(...group.uptimes);
    const maxUp = Math.max(...group.uptimes);
    lines.push(minUp === maxUp
      ? `    uptime: ${formatDuration(minUp)}`
      : `    uptime: ${formatDuration(minUp)} — ${formatDuration(maxUp)}`);
  }

  if (group.shallow) {
    lines.push('    ⚠ shallow backtrace (pi32?) — grouping may be unreliable');
  }

  if (detail) {
    for (const inst of group.instances) {
      lines.push(
        `    ── v${inst.version} ${inst.platform} dev=${inst.device} ` +
        `uptime=${inst.uptime}s ${inst.timestamp}`
      );
      inst.frames.forEach((frame, idx) => lines.push(formatFrame(frame, idx)));
    }
  } else {
    for (const [idx, frame] of group.frames.entries()) {
      if (idx > MAX_PREVIEW_FRAMES) {
        lines.push(`       ... +${group.frames.length - MAX_PREVIEW_FRAMES} more frames`);
        break;
      }
      lines.push(formatFrame(frame, idx));
    }
  }

  lines.push('');
  return lines;
}

export function formatTerminal(result: CrashAnalysisResult, options: TerminalReportOptions = {}): string {
  const lines: string[] = [
    SEPARATOR,
    '  CRASH TRIAGE',
    SEPARATOR,
    `  Total crashes: ${result.totalCrashes}`,
    `  Unique signatures: ${result.totalSignatures}`,
  ];

  if (result.warnings.length > 0) {
    lines.push('', '  Warnings:');
    for (const w of result.warnings) {
      lines.push(`    ⚠ ${w}`);
    }
  }

  lines.push('');

  for (const group of result.signatures) {
    lines.push(...formatGroup(group, options.detail ?? false));
  }

  if (result.signatures.length === 0) {
    lines.push('  No crashes found matching filters.');
  }

  lines.push(SEPARATOR);
  return lines.join('\n');
}

// ============================================================
// JSON
// ============================================================

/**
 * `JSON.stringify` replacer: sets become sorted arrays, bigints hex strings.
 */
export function jsonReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Set) return sorted([...value].map(String));
  if (typeof value === 'bigint') return `0x${value.toString(16)}`;
  return value;
}

export function formatJson(result: CrashAnalysisResult): string {
  return JSON.stringify(result, jsonReplacer, 2);
}
