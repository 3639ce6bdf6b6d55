// oslq: query shader parameters from compiled OSO files.
// Orchestrates the managers and renderers; all I/O goes through `CliIO`.

import { parseArgs } from 'util';

import { Logger, setLogLevel } from '../shared/logger.js';
import { isOsoParseError } from '../shared/oso/errors.js';
import type { ShaderQuery } from '../shared/shader-query.js';

// Managers
import { FileManager } from './managers/file-manager.js';
import { SettingsManager, isLogLevelName } from './managers/settings-manager.js';
import type { QuerySettings, SettingsOverrides } from './managers/settings-manager.js';

// Renderers
import { renderJson } from './renderers/json-renderer.js';
import { renderText } from './renderers/text-renderer.js';

const log = new Logger('App');

export const USAGE = `Usage: oslq [options] <files...>

Query shader parameters from compiled OSO files.

Options:
  -v, --verbose            Verbose listing with metadata
  -p, --searchpath <dirs>  Colon-separated directories to search for shaders
      --param <name>       Only show the named parameter
      --json               Print JSON instead of text
      --runstats           Print per-file parse time on stderr
      --config <file>      Settings file (default: ./.oslqrc.json when present)
      --log-level <level>  off, error, warn, info or debug
      --require-version    Reject files without an OpenShadingLanguage marker
  -h, --help               Show this help
`;

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  /** Working directory for relative paths and the default settings file */
  cwd?: string;
  /** Millisecond clock used by --runstats */
  now?: () => number;
}

// ---------------------------------------------------------------------------
// Argument parsing
// ---------------------------------------------------------------------------

function parseCliArgs(argv: readonly string[]) {
  return parseArgs({
    args: [...argv],
    allowPositionals: true,
    strict: true,
    options: {
      verbose: { type: 'boolean', short: 'v' },
      searchpath: { type: 'string', short: 'p' },
      param: { type: 'string' },
      json: { type: 'boolean' },
      runstats: { type: 'boolean' },
      config: { type: 'string' },
      'log-level': { type: 'string' },
      'require-version': { type: 'boolean' },
      help: { type: 'boolean', short: 'h' },
    },
  });
}

type CliValues = ReturnType<typeof parseCliArgs>['values'];

function toOverrides(values: CliValues): SettingsOverrides {
  const overrides: SettingsOverrides = {};
  if (values.verbose !== undefined) overrides.verbose = values.verbose;
  if (values.json !== undefined) overrides.json = values.json;
  if (values.searchpath !== undefined) overrides.searchPath = values.searchpath;
  if (values['require-version'] !== undefined) overrides.requireVersion = values['require-version'];
  const level = values['log-level'];
  if (level !== undefined) {
    if (!isLogLevelName(level)) throw new Error(`Invalid log level '${level}'`);
    overrides.logLevel = level;
  }
  return overrides;
}

/** One-line description of a per-file failure */
export function describeError(err: unknown): string {
  if (isOsoParseError(err)) return `line ${err.line}: ${err.detail} (${err.kind})`;
  return err instanceof Error ? err.message : String(err);
}

// ---------------------------------------------------------------------------
// Query run
// ---------------------------------------------------------------------------

interface RunContext {
  io: CliIO;
  files: FileManager;
  settings: Readonly<QuerySettings>;
  param: string | undefined;
  runstats: boolean;
  now: () => number;
}

/** Expand directory arguments into the shader files they contain */
async function expandInputs(files: FileManager, inputs: readonly string[]): Promise<string[]> {
  const expanded: string[] = [];
  for (const input of inputs) {
    if (await files.isDirectory(input)) {
      expanded.push(...await files.findShaders(input));
    } else {
      expanded.push(input);
    }
  }
  return expanded;
}

function render(ctx: RunContext, file: string, query: ShaderQuery): boolean {
  const { io, settings, param } = ctx;
  const target = param === undefined ? undefined : query.paramByName(param);
  if (param !== undefined && target === undefined) {
    io.stderr(`Parameter '${param}' not found in ${file}\n`);
    return false;
  }

  io.stdout(settings.json
    ? renderJson(query, target)
    : renderText(query, { verbose: settings.verbose, param }));
  return true;
}

/** Resolve, parse and render one file. Returns false when it failed. */
async function queryFile(ctx: RunContext, file: string): Promise<boolean> {
  const { io, files, settings } = ctx;
  try {
    const resolved = await files.resolveShaderPath(file, settings.searchPath);
    if (resolved === null) throw new Error(`Shader file not found: ${file}`);

    const start = ctx.now();
    const query = await files.readShader(resolved, { requireVersion: settings.requireVersion });
    const elapsed = ctx.now() - start;

    const ok = render(ctx, file, query);
    if (ctx.runstats) io.stderr(`Parse time: ${elapsed.toFixed(3)}ms\n`);
    return ok;
  } catch (err) {
    log.debug(`Query of ${file} failed:`, err);
    io.stderr(`Error reading ${file}: ${describeError(err)}\n`);
    return false;
  }
}

/** Run the command line; resolves to the process exit code */
export async function runCli(argv: readonly string[], io: CliIO): Promise<number> {
  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(argv);
  } catch (err) {
    io.stderr(`Error: ${describeError(err)}\n${USAGE}`);
    return 1;
  }
  const { values, positionals } = parsed;

  if (values.help) {
    io.stdout(USAGE);
    return 0;
  }

  const cwd = io.cwd ?? process.cwd();
  const settingsManager = new SettingsManager();
  try {
    await settingsManager.load(values.config, cwd);
    settingsManager.apply(toOverrides(values));
  } catch (err) {
    io.stderr(`Error: ${describeError(err)}\n`);
    return 1;
  }
  const settings = settingsManager.current;
  setLogLevel(settings.logLevel);
  if (settingsManager.source) log.info(`Using settings from ${settingsManager.source}`);

  if (positionals.length === 0) {
    io.stderr(`Error: No input files specified\n${USAGE}`);
    return 1;
  }

  const files = new FileManager(cwd);
  const ctx: RunContext = {
    io,
    files,
    settings,
    param: values.param,
    runstats: values.runstats ?? false,
    now: io.now ?? (() => performance.now()),
  };

  let inputs: string[];
  try {
    inputs = await expandInputs(files, positionals);
  } catch (err) {
    io.stderr(`Error: ${describeError(err)}\n`);
    return 1;
  }

  let failed = false;
  for (const file of inputs) {
    if (!await queryFile(ctx, file)) failed = true;
  }
  return failed ? 1 : 0;
}
