import fs from 'node:fs';
import path from 'node:path';
import { parseSymbolFile, SymbolTable } from './symbol-table.js';
import { PlatformId } from './types.js';

/**
 * Supplies symbol tables per (version, platform). Missing or broken symbol
 * files are reported through `warnings` rather than thrown.
 */
export interface SymbolSource {
  readonly warnings: readonly string[];
  get(version: string, platform: PlatformId): Promise<SymbolTable | undefined>;
}

function symbolKey(version: string, platform: PlatformId): string {
  return `v${version}/${platform}`;
}

/**
 * Parse a downloaded symbol file and record why it can't be used, if so.
 * A table without the anchor is returned with a warning; resolution
 * falls back to raw addresses for it.
 */
export function validateSymbolFile(
  label: string,
  content: string,
  warnings: string[],
): SymbolTable | undefined {
  if (content.length === 0) {
    warnings.push(`${label}: symbol file is empty (broken upload?)`);
    return undefined;
  }

  const table = parseSymbolFile(content);
  if (table.isEmpty) {
    warnings.push(`${label}: no text symbols found in .sym file`);
    return undefined;
  }

  if (!table.hasAnchor) {
    warnings.push(`${label}: crash_signal_handler not found in symbols`);
  }

  return table;
}

export interface FetchedText {
  ok: boolean;
  status: number;
  body: string;     // empty unless `ok`
}

/**
 * Fetch and read the body under one abort timeout.
 */
export async function fetchWithTimeout(
  url: string,
  init: RequestInit,
  timeoutMs = 30_000
): Promise<FetchedText> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetch(url, {
      ...init,
      signal: controller.signal,
    });
    const body = response.ok ? await response.text() : '';
    return { ok: response.ok, status: response.status, body };
  } finally {
    clearTimeout(timer);
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// ============================================================
// Remote cache
// ============================================================

export interface RemoteSymbolCacheOptions {
  baseUrl: string;     // symbol files live under `${baseUrl}/symbols/`
  cacheDir: string;
  timeoutMs?: number;
}

/**
 * Downloads `.sym` files from the release store and keeps them on disk.
 * Each (version, platform) is loaded at most once per cache instance,
 * including failed lookups.
 */
export class RemoteSymbolCache implements SymbolSource {
  private readonly tables = new Map<string, Promise<SymbolTable | undefined>>();
  private readonly warningList: string[] = [];

  constructor(private readonly options: RemoteSymbolCacheOptions) {}

  get warnings(): readonly string[] {
    return this.warningList;
  }

  get(version: string, platform: PlatformId): Promise<SymbolTable | undefined> {
    const key = symbolKey(version, platform);
    let pending = this.tables.get(key);
    if (!pending) {
      pending = this.load(version, platform);
      this.tables.set(key, pending);
    }
    return pending;
  }

  symbolPath(version: string, platform: PlatformId): string {
    return path.join(this.options.cacheDir, `v${version}`, `${platform}.sym`);
  }

  private async load(version: string, platform: PlatformId): Promise<SymbolTable | undefined> {
    const label = symbolKey(version, platform);
    const symPath = this.symbolPath(version, platform);

    if (!fs.existsSync(symPath)) {
      const downloaded = await this.download(label, symPath);
      if (!downloaded) return undefined;
    }

    let content: string;
    try {
      content = await fs.promises.readFile(symPath, 'utf-8');
    } catch (err) {
      this.warningList.push(`${label}: cached symbol file unreadable (${errorMessage(err)})`);
      return undefined;
    }
    return validateSymbolFile(label, content, this.warningList);
  }

  private async download(label: string, symPath: string): Promise<boolean> {
    const url = `${this.options.baseUrl.replace(/\/+$/, '')}/symbols/${label}.sym`;
    console.warn(`[symbols] Downloading symbols for ${label}...`);

    try {
      const response = await fetchWithTimeout(url, { method: 'GET' }, this.options.timeoutMs);
      if (!response.ok) {
        this.warningList.push(`${label}: symbols not available (HTTP ${response.status})`);
        return false;
      }

      await fs.promises.mkdir(path.dirname(symPath), { recursive: true });
      await fs.promises.writeFile(symPath, response.body, 'utf-8');
      return true;
    } catch (err) {
      this.warningList.push(`${label}: download failed (${errorMessage(err)})`);
      return false;
    }
  }
}

// ============================================================
// In-memory source
// ============================================================

/**
 * Symbol tables supplied up front, keyed by `version/platform`. Values may be
 * raw symbol file text (validated like a download) or a built table.
 */
export class StaticSymbolSource implements SymbolSource {
  private readonly tables = new Map<string, SymbolTable | undefined>();
  private readonly warningList: string[] = [];

  constructor(files: Record<string, string | SymbolTable> = {}) {
    for (const [key, value] of Object.entries(files)) {
      const [version, platform] = splitKey(key);
      this.add(version, platform, value);
    }
  }

  get warnings(): readonly string[] {
    return this.warningList;
  }

  add(version: string, platform: PlatformId, value: string | SymbolTable): void {
    const label = symbolKey(version, platform);
    const table = typeof value === 'string'
      ? validateSymbolFile(label, value, this.warningList)
      : value;
    this.tables.set(label, table);
  }

  async get(version: string, platform: PlatformId): Promise<SymbolTable | undefined> {
    const label = symbolKey(version, platform);
    if (!this.tables.has(label)) {
      this.warningList.push(`${label}: symbols not available (not registered)`);
      this.tables.set(label, undefined);
    }
    return this.tables.get(label);
  }
}

function splitKey(key: string): [string, string] {
  const slash = key.lastIndexOf('/');
  if (slash <= 0) {
    throw new Error(`Invalid symbol key "${key}", expected "version/platform"`);
  }
  return [key.slice(0, slash), key.slice(slash + 1)];
}
