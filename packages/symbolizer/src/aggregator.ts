import { CrashEvent, CrashSignatureGroup, PlatformId, ResolvedFrame } from './types.js';

const DEVICE_ID_PREFIX_LEN = 8;

// Backtraces with this few in-binary frames are likely truncated by the
// unwinder (common on armhf) and group less reliably.
const SHALLOW_FRAME_LIMIT = 2;

export function isShallowBacktrace(frames: ResolvedFrame[]): boolean {
  return frames.filter((f) => !f.isSharedLibrary).length <= SHALLOW_FRAME_LIMIT;
}

/**
 * Folds signed crash events into per-signature groups. The first event of a
 * signature fixes the group's representative frames; later events only
 * extend the counters and history.
 */
export class CrashAggregator {
  private readonly bySignature = new Map<string, CrashSignatureGroup>();

  ingest(
    event: CrashEvent,
    frames: ResolvedFrame[],
    signature: string,
    platform: PlatformId,
  ): CrashSignatureGroup {
    const version = event.app_version ?? 'unknown';
    const device = (event.device_id ?? '').slice(0, DEVICE_ID_PREFIX_LEN);
    const uptime = event.uptime_sec ?? 0;
    const signal = event.signal_name ?? '?';
    const timestamp = event.timestamp ?? '';

    let group = this.bySignature.get(signature);
    if (!group) {
      group = {
        signature,
        count: 0,
        signal,
        versions: new Set(),
        devices: new Set(),
        platforms: new Set(),
        uptimes: [],
        timestamps: [],
        frames,
        shallow: isShallowBacktrace(frames),
        instances: [],
      };
      this.bySignature.set(signature, group);
    }

    group.count++;
    group.versions.add(version);
    group.devices.add(device);
    group.platforms.add(platform);
    group.uptimes.push(uptime);
    group.timestamps.push(timestamp);
    group.instances.push({ version, platform, device, uptime, signal, timestamp, frames });

    return group;
  }

  get size(): number {
    return this.bySignature.size;
  }

  /** Groups ordered by count, most frequent first. */
  groups(): CrashSignatureGroup[] {
    return [...this.bySignature.values()].sort((a, b) => b.count - a.count);
  }
}
