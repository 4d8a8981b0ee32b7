export * from './types.js';
export {
  ANCHOR_SYMBOL,
  SymbolTable,
  formatHex,
  isBareAddress,
  isBoundarySymbol,
  parseSymbolEntries,
  parseSymbolFile,
} from './symbol-table.js';
export {
  defaultClassifier,
  detectPlatformFromAddresses,
  isSharedLibraryAddress,
  normalizePlatform,
} from './platform.js';
export { parseAddress, resolveBacktrace } from './aslr-resolver.js';
export { UNKNOWN_SIGNATURE, computeSignature, hasResolvedSymbols, stripOffset } from './signature.js';
export { CrashAggregator, isShallowBacktrace } from './aggregator.js';
export {
  RemoteSymbolCache,
  StaticSymbolSource,
  fetchWithTimeout,
  validateSymbolFile,
} from './symbol-cache.js';
export type { FetchedText, RemoteSymbolCacheOptions, SymbolSource } from './symbol-cache.js';
export { createDateFilter, loadEvents, parseDay, parseEventFile, parseTimestamp } from './event-loader.js';
export { unpackEventArchive } from './unpacker.js';
export { analyzeCrashes, buildDevicePlatformMap, getPlatform } from './analyzer.js';
export { formatDuration, formatFrame, formatJson, formatTerminal, jsonReplacer, topFunction } from './report.js';
export type { TerminalReportOptions } from './report.js';
