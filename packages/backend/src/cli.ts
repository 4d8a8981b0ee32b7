import path from 'node:path';
import { pathToFileURL } from 'node:url';
import { parseArgs } from 'node:util';
import { formatJson, formatTerminal, parseDay, SymbolSource } from '@crash-triage/symbolizer';
import { getConfig } from './config.js';
import { AnalysisRequest, createSymbolSource, runAnalysis } from './analysis-service.js';

const USAGE = `Usage: crash-triage [options]

Resolve ASLR-randomized crash backtraces from telemetry and group them by stack signature.

Options:
  --since YYYY-MM-DD   Include crashes on or after this date
  --until YYYY-MM-DD   Include crashes on or before this date
  --version VER        Filter to a specific app version (e.g. 0.9.12)
  --platform PLAT      Override platform detection (pi, pi32)
  --sig HASH           Show only crashes whose signature starts with HASH
  --detail             Show full resolved backtraces per instance
  --json               Machine-readable JSON output
  --data-dir PATH      Telemetry events directory, .json file or .zip export
  -h, --help           Show this help`;

export interface CliOptions extends AnalysisRequest {
  detail: boolean;
  json: boolean;
  dataDir?: string;
  help: boolean;
}

export function parseCliArgs(argv: string[]): CliOptions {
  const { values } = parseArgs({
    args: argv,
    options: {
      since: { type: 'string' },
      until: { type: 'string' },
      version: { type: 'string' },
      platform: { type: 'string' },
      sig: { type: 'string' },
      detail: { type: 'boolean', default: false },
      json: { type: 'boolean', default: false },
      'data-dir': { type: 'string' },
      help: { type: 'boolean', short: 'h', default: false },
    },
    strict: true,
  });

  // Fail on a bad date before touching any files
  if (values.since) parseDay(values.since);
  if (values.until) parseDay(values.until);

  return {
    since: values.since,
    until: values.until,
    version: values.version,
    platform: values.platform,
    sig: values.sig,
    detail: values.detail ?? false,
    json: values.json ?? false,
    dataDir: values['data-dir'],
    help: values.help ?? false,
  };
}

export interface CliDeps {
  symbols?: SymbolSource;
  stdout?: (text: string) => void;
  stderr?: (text: string) => void;
}

/**
 * Run the CLI and return its exit code.
 */
export async function main(argv: string[], deps: CliDeps = {}): Promise<number> {
  const stdout = deps.stdout ?? ((text: string) => console.log(text));
  const stderr = deps.stderr ?? ((text: string) => console.error(text));

  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (err) {
    stderr(`[crash-triage] ${err instanceof Error ? err.message : String(err)}`);
    stderr(USAGE);
    return 2;
  }

  if (options.help) {
    stdout(USAGE);
    return 0;
  }

  const config = getConfig();
  const dataDir = path.resolve(options.dataDir ?? config.dataDir);
  const symbols = deps.symbols ?? createSymbolSource(config);

  try {
    const result = await runAnalysis(dataDir, options, symbols);
    if (!result) {
      stderr('No crashes found.');
      return 0;
    }

    stdout(options.json ? formatJson(result) : formatTerminal(result, { detail: options.detail }));
    return 0;
  } catch (err) {
    stderr(`[crash-triage] ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }
}

const entry = process.argv[1];
if (entry && import.meta.url === pathToFileURL(path.resolve(entry)).href) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      console.error('[crash-triage] Unexpected error:', err);
      process.exitCode = 1;
    },
  );
}
