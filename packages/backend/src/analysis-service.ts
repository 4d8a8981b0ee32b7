import {
  analyzeCrashes,
  CrashAnalysisResult,
  DateRange,
  loadEvents,
  RemoteSymbolCache,
  SymbolSource,
} from '@crash-triage/symbolizer';
import { AppConfig, getConfig } from './config.js';

export interface AnalysisRequest extends DateRange {
  version?: string;
  platform?: string;
  sig?: string;
}

export function createSymbolSource(config: AppConfig = getConfig()): SymbolSource {
  return new RemoteSymbolCache({
    baseUrl: config.symbols.baseUrl,
    cacheDir: config.symbols.cacheDir,
    timeoutMs: config.symbols.timeoutMs,
  });
}

/**
 * Load events from a directory or archive and analyze them.
 * Returns undefined when no crash events fall in the date range.
 */
export async function runAnalysis(
  source: string,
  request: AnalysisRequest,
  symbols: SymbolSource,
): Promise<CrashAnalysisResult | undefined> {
  const { crashes, sessions } = await loadEvents(source, {
    since: request.since,
    until: request.until,
  });

  if (crashes.length === 0) return undefined;

  return analyzeCrashes(crashes, sessions, symbols, {
    platformOverride: request.platform,
    version: request.version,
    signaturePrefix: request.sig,
  });
}

function queryString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

/**
 * Pick analysis filters out of an HTTP query object.
 */
export function parseAnalysisQuery(query: Record<string, unknown>): AnalysisRequest {
  return {
    since: queryString(query.since),
    until: queryString(query.until),
    version: queryString(query.version),
    platform: queryString(query.platform),
    sig: queryString(query.sig),
  };
}

export function emptyResult(): CrashAnalysisResult {
  return { totalCrashes: 0, totalSignatures: 0, skippedEvents: 0, signatures: [], warnings: [] };
}
