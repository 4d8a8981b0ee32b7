import crypto from 'node:crypto';
import { parseAddress } from './aslr-resolver.js';
import { formatHex, isBareAddress } from './symbol-table.js';
import { ResolvedFrame } from './types.js';

export const UNKNOWN_SIGNATURE = 'unknown';

/**
 * Drop a trailing `+0xNN` so crashes at different offsets in the same
 * function share a signature.
 */
export function stripOffset(name: string): string {
  const plusIdx = name.lastIndexOf('+0x');
  return plusIdx > 0 ? name.slice(0, plusIdx) : name;
}

export function hasResolvedSymbols(frames: ResolvedFrame[]): boolean {
  return frames.slice(1).some((f) => !f.isSharedLibrary && !isBareAddress(f.resolved));
}

/**
 * Hash a resolved backtrace into an 8-hex-char grouping key.
 *
 * Frame 0 (the signal handler) and shared-library frames are ignored.
 * Without any resolved names, frames are keyed by their distance from the
 * first in-binary frame, which is stable across ASLR load bases.
 */
export function computeSignature(frames: ResolvedFrame[]): string {
  const parts = hasResolvedSymbols(frames) ? symbolParts(frames) : relativeParts(frames);
  if (parts.length === 0) return UNKNOWN_SIGNATURE;

  return crypto.createHash('sha256').update(parts.join('\n')).digest('hex').slice(0, 8);
}

function symbolParts(frames: ResolvedFrame[]): string[] {
  return frames
    .slice(1)
    .filter((f) => !f.isSharedLibrary)
    .map((f) => stripOffset(f.resolved));
}

function relativeParts(frames: ResolvedFrame[]): string[] {
  const baseFrame = frames.find((f) => !f.isSharedLibrary);
  if (!baseFrame) return [];

  const base = parseAddress(baseFrame.rawAddress);
  return frames
    .slice(1)
    .filter((f) => !f.isSharedLibrary)
    .map((f) => `rel+${formatHex(parseAddress(f.rawAddress) - base)}`);
}
