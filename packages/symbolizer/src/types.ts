// ============================================================
// Symbols
// ============================================================

export interface SymbolEntry {
  address: bigint;   // link-time file offset of the symbol start
  name: string;      // demangled name as printed by nm -C
}

// ============================================================
// Platforms
// ============================================================

/**
 * Platform identifiers as reported by devices in session telemetry.
 * `rpi4_64bit` is an alias of `pi` and is normalized on ingestion.
 */
export type KnownPlatform = 'pi' | 'pi32' | 'rpi4_64bit';

export type PlatformId = KnownPlatform | (string & {});

export interface PlatformClassifier {
  isSharedLibrary(address: bigint, platform: PlatformId): boolean;
}

// ============================================================
// Resolution
// ============================================================

export const SHARED_LIB_MARKER = '<shared lib>';

export interface ResolvedFrame {
  rawAddress: string;        // "0xaaaa1060"
  resolved: string;          // "foo+0x10" | "0xaaaa1060" | "<shared lib>"
  isSharedLibrary: boolean;
}

// ============================================================
// Telemetry events
// ============================================================

export interface CrashEvent {
  event: 'crash';
  device_id?: string;
  app_version?: string;
  signal_name?: string;
  uptime_sec?: number;
  timestamp?: string;        // ISO-8601
  backtrace?: string[];
}

export interface SessionEvent {
  event: 'session';
  device_id?: string;
  timestamp?: string;
  app?: {
    platform?: string;
    version?: string;
  };
}

export type TelemetryEvent = CrashEvent | SessionEvent;

export interface LoadedEvents {
  crashes: CrashEvent[];
  sessions: SessionEvent[];
  fileCount: number;
}

export interface DateRange {
  since?: string;            // YYYY-MM-DD, inclusive
  until?: string;            // YYYY-MM-DD, inclusive of the whole day
}

// ============================================================
// Aggregation
// ============================================================

export interface CrashInstance {
  version: string;
  platform: PlatformId;
  device: string;            // truncated device id
  uptime: number;
  signal: string;
  timestamp: string;
  frames: ResolvedFrame[];
}

export interface CrashSignatureGroup {
  signature: string;
  count: number;
  signal: string;
  versions: Set<string>;
  devices: Set<string>;
  platforms: Set<PlatformId>;
  uptimes: number[];
  timestamps: string[];
  frames: ResolvedFrame[];   // representative backtrace, fixed at first insertion
  shallow: boolean;
  instances: CrashInstance[];
}

export interface CrashAnalysisResult {
  totalCrashes: number;
  totalSignatures: number;
  skippedEvents: number;
  signatures: CrashSignatureGroup[];
  warnings: string[];
}

export interface AnalyzeOptions {
  platformOverride?: PlatformId;
  version?: string;
  signaturePrefix?: string;
  classifier?: PlatformClassifier;
}
