import { defaultClassifier } from './platform.js';
import { formatHex, SymbolTable } from './symbol-table.js';
import { PlatformClassifier, PlatformId, ResolvedFrame, SHARED_LIB_MARKER } from './types.js';

const RE_ADDRESS = /^(?:0[xX])?([0-9a-fA-F]+)$/;

/**
 * Parse a backtrace address string. Anything that is not hex becomes 0
 * so one corrupt frame doesn't throw away the rest of the stack.
 */
export function parseAddress(text: string): bigint {
  const match = text.trim().match(RE_ADDRESS);
  return match ? BigInt(`0x${match[1]}`) : 0n;
}

/**
 * Resolve a raw backtrace to named frames.
 *
 * Frame 0 is always inside `crash_signal_handler`, so its address minus the
 * handler's file offset gives the load base for the whole binary. Without a
 * table or an anchor there is no base, and frames pass through as raw hex.
 */
export function resolveBacktrace(
  backtrace: string[],
  platform: PlatformId,
  symbols: SymbolTable | undefined,
  classifier: PlatformClassifier = defaultClassifier,
): ResolvedFrame[] {
  if (backtrace.length === 0) return [];

  const addresses = backtrace.map(parseAddress);
  const anchorOffset = symbols?.anchorOffset;

  if (!symbols || anchorOffset === undefined) {
    return addresses.map((addr) => {
      const isLib = classifier.isSharedLibrary(addr, platform);
      return {
        rawAddress: formatHex(addr),
        resolved: isLib ? SHARED_LIB_MARKER : formatHex(addr),
        isSharedLibrary: isLib,
      };
    });
  }

  const table = symbols;
  const baseAddress = addresses[0] - anchorOffset;

  return addresses.map((addr) => {
    if (classifier.isSharedLibrary(addr, platform)) {
      return { rawAddress: formatHex(addr), resolved: SHARED_LIB_MARKER, isSharedLibrary: true };
    }
    return {
      rawAddress: formatHex(addr),
      resolved: table.lookup(addr - baseAddress),
      isSharedLibrary: false,
    };
  });
}
