import { CrashAnalysisResult } from '@crash-triage/symbolizer';

/**
 * Simple in-memory store for analysis results.
 * Keyed by report ID. Entries expire after 1 hour.
 */
export class ReportStore {
  private store = new Map<string, { result: CrashAnalysisResult; timestamp: number }>();
  private readonly ttlMs: number;

  constructor(ttlMs = 60 * 60 * 1000) {
    this.ttlMs = ttlMs;
  }

  set(id: string, result: CrashAnalysisResult): void {
    this.store.set(id, { result, timestamp: Date.now() });
    this.cleanup();
  }

  get(id: string): CrashAnalysisResult | undefined {
    const entry = this.store.get(id);
    if (!entry) return undefined;
    if (Date.now() - entry.timestamp > this.ttlMs) {
      this.store.delete(id);
      return undefined;
    }
    return entry.result;
  }

  get size(): number {
    return this.store.size;
  }

  private cleanup(): void {
    const now = Date.now();
    for (const [key, entry] of this.store) {
      if (now - entry.timestamp > this.ttlMs) {
        this.store.delete(key);
      }
    }
  }
}

export const reportStore = new ReportStore();
