import { CrashAggregator } from './aggregator.js';
import { parseAddress, resolveBacktrace } from './aslr-resolver.js';
import { defaultClassifier, detectPlatformFromAddresses, normalizePlatform } from './platform.js';
import { computeSignature } from './signature.js';
import { SymbolSource } from './symbol-cache.js';
import { SymbolTable } from './symbol-table.js';
import {
  AnalyzeOptions,
  CrashAnalysisResult,
  CrashEvent,
  PlatformId,
  SessionEvent,
} from './types.js';

// ============================================================
// Platform lookup
// ============================================================

/**
 * Map device id → platform from session events. Later sessions win.
 */
export function buildDevicePlatformMap(sessions: SessionEvent[]): Map<string, PlatformId> {
  const deviceMap = new Map<string, PlatformId>();
  for (const session of sessions) {
    const deviceId = session.device_id;
    const platform = session.app?.platform;
    if (deviceId && platform) {
      deviceMap.set(deviceId, normalizePlatform(platform));
    }
  }
  return deviceMap;
}

/**
 * Platform for a crash: explicit override, then what the device reported
 * in its sessions, then a guess from the backtrace addresses.
 */
export function getPlatform(
  crash: CrashEvent,
  deviceMap: Map<string, PlatformId>,
  override?: PlatformId,
): PlatformId {
  if (override) return override;

  const known = deviceMap.get(crash.device_id ?? '');
  if (known) return known;

  const addresses = (crash.backtrace ?? [])
    .filter((a) => /^(?:0[xX])?[0-9a-fA-F]+$/.test(a.trim()))
    .map(parseAddress);
  return detectPlatformFromAddresses(addresses);
}

// ============================================================
// Analysis
// ============================================================

interface PreparedCrash {
  crash: CrashEvent;
  version: string;
  platform: PlatformId;
}

/**
 * Resolve, sign and group crashes.
 *
 * Symbol tables are fetched once per (version, platform) up front; the
 * resolution pass itself is synchronous.
 */
export async function analyzeCrashes(
  crashes: CrashEvent[],
  sessions: SessionEvent[],
  symbols: SymbolSource,
  options: AnalyzeOptions = {},
): Promise<CrashAnalysisResult> {
  const classifier = options.classifier ?? defaultClassifier;
  const deviceMap = buildDevicePlatformMap(sessions);

  const selected = options.version
    ? crashes.filter((c) => c.app_version === options.version)
    : crashes;

  const prepared: PreparedCrash[] = [];
  let skippedEvents = 0;
  for (const crash of selected) {
    if (!crash.backtrace || crash.backtrace.length === 0) {
      skippedEvents++;
      continue;
    }
    prepared.push({
      crash,
      version: crash.app_version ?? 'unknown',
      platform: getPlatform(crash, deviceMap, options.platformOverride),
    });
  }

  const tables = new Map<string, SymbolTable | undefined>();
  for (const { version, platform } of prepared) {
    const key = `${version}/${platform}`;
    if (!tables.has(key)) {
      tables.set(key, await symbols.get(version, platform));
    }
  }

  const aggregator = new CrashAggregator();
  for (const { crash, version, platform } of prepared) {
    const table = tables.get(`${version}/${platform}`);
    const frames = resolveBacktrace(crash.backtrace ?? [], platform, table, classifier);
    const signature = computeSignature(frames);

    if (options.signaturePrefix && !signature.startsWith(options.signaturePrefix)) continue;

    aggregator.ingest(crash, frames, signature, platform);
  }

  const warnings = [...symbols.warnings];
  if (skippedEvents > 0) {
    warnings.push(`skipped ${skippedEvents} crash event(s) with no backtrace`);
  }

  const signatures = aggregator.groups();
  return {
    totalCrashes: selected.length,
    totalSignatures: signatures.length,
    skippedEvents,
    signatures,
    warnings,
  };
}
