import { SymbolEntry } from './types.js';

// ============================================================
// Constants
// ============================================================

export const ANCHOR_SYMBOL = 'crash_signal_handler';

// nm type codes for code symbols: global/local text, global/local weak
const TEXT_SYMBOL_TYPES = new Set(['T', 't', 'W', 'w']);

// Linker/runtime boundary symbols. An address that lands on one of these
// means the unwinder stopped in a gap, not inside a function.
const BOUNDARY_SYMBOLS: ReadonlySet<string> = new Set([
  'data_start', '_edata', '_end', '__bss_start', '__bss_start__',
  '__bss_end__', '__data_start', '__dso_handle', '__libc_csu_init',
  '__libc_csu_fini', '_fini', '_init', '_fp_hw', '_IO_stdin_used',
  '__init_array_start', '__init_array_end', '__fini_array_start',
  '__fini_array_end', '__FRAME_END__', '__GNU_EH_FRAME_HDR',
  '__TMC_END__', '__ehdr_start', '__exidx_start', '__exidx_end',
  '_GLOBAL_OFFSET_TABLE_', '_DYNAMIC', '_PROCEDURE_LINKAGE_TABLE_',
  'completed.0',
]);

const RE_HEX = /^[0-9a-fA-F]+$/;

// ============================================================
// Formatting helpers
// ============================================================

export function formatHex(value: bigint): string {
  return value < 0n ? `-0x${(-value).toString(16)}` : `0x${value.toString(16)}`;
}

export function isBareAddress(text: string): boolean {
  return /^-?0x[0-9a-f]+$/.test(text);
}

export function isBoundarySymbol(name: string): boolean {
  return BOUNDARY_SYMBOLS.has(name);
}

// ============================================================
// Symbol table
// ============================================================

/**
 * Sorted address → name index over the text symbols of one build.
 *
 * An empty table, or one without the anchor, is still usable for lookups;
 * callers check `isEmpty` and `anchorOffset` before attempting ASLR reversal.
 */
export class SymbolTable {
  readonly anchorOffset: bigint | undefined;
  private readonly addresses: bigint[];
  private readonly names: string[];

  constructor(entries: SymbolEntry[]) {
    const sorted = [...entries].sort((a, b) => (a.address < b.address ? -1 : a.address > b.address ? 1 : 0));

    this.addresses = [];
    this.names = [];
    let anchor: bigint | undefined;
    for (const entry of sorted) {
      // Scanned before aliases at the same address overwrite the name
      if (anchor === undefined && entry.name.includes(ANCHOR_SYMBOL)) {
        anchor = entry.address;
      }
      const last = this.addresses.length - 1;
      if (last >= 0 && this.addresses[last] === entry.address) {
        // Same address seen again: the later line wins
        this.names[last] = entry.name;
        continue;
      }
      this.addresses.push(entry.address);
      this.names.push(entry.name);
    }

    this.anchorOffset = anchor;
  }

  get size(): number {
    return this.addresses.length;
  }

  get isEmpty(): boolean {
    return this.addresses.length === 0;
  }

  get hasAnchor(): boolean {
    return this.anchorOffset !== undefined;
  }

  entries(): SymbolEntry[] {
    return this.addresses.map((address, i) => ({ address, name: this.names[i] }));
  }

  /**
   * Resolve a file offset to `name`, `name+0xNN`, a boundary marker,
   * or the bare hex offset when nothing lies at or below it.
   */
  lookup(fileOffset: bigint): string {
    const idx = this.indexAtOrBelow(fileOffset);
    if (idx < 0) return formatHex(fileOffset);

    const name = this.names[idx];
    if (isBoundarySymbol(name)) {
      return `(unknown @ ${formatHex(fileOffset)})`;
    }

    const delta = fileOffset - this.addresses[idx];
    return delta === 0n ? name : `${name}+${formatHex(delta)}`;
  }

  private indexAtOrBelow(value: bigint): number {
    let lo = 0;
    let hi = this.addresses.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (this.addresses[mid] <= value) {
        lo = mid + 1;
      } else {
        hi = mid;
      }
    }
    return lo - 1;
  }
}

// ============================================================
// Parser
// ============================================================

/**
 * Parse `nm -nC` output. Only text and weak-text symbols with a non-zero
 * address are kept; everything else is skipped.
 */
export function parseSymbolEntries(content: string): SymbolEntry[] {
  const entries: SymbolEntry[] = [];

  for (const rawLine of content.split('\n')) {
    const line = rawLine.trim();
    if (!line) continue;

    // "<addr> <type> <name with spaces>"
    const match = line.match(/^(\S+)\s+(\S+)\s+(.+)$/);
    if (!match) continue;

    const [, addrStr, type, name] = match;
    if (!TEXT_SYMBOL_TYPES.has(type)) continue;
    if (!RE_HEX.test(addrStr)) continue;

    const address = BigInt(`0x${addrStr}`);
    if (address === 0n) continue;

    entries.push({ address, name: name.trim() });
  }

  return entries;
}

export function parseSymbolFile(content: string): SymbolTable {
  return new SymbolTable(parseSymbolEntries(content));
}
