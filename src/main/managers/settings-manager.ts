// SettingsManager: loads and serves query-tool settings
// Sources, lowest precedence first: built-in defaults, the JSON settings file,
// command-line overrides.

import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { Logger } from '../../shared/logger.js';
import type { LogLevelName } from '../../shared/logger.js';
import { splitSearchPath } from './file-manager.js';

const log = new Logger('Settings');

export const SETTINGS_FILE_NAME = '.oslqrc.json';

const logLevelSchema = z.enum(['off', 'error', 'warn', 'info', 'debug']);

export const settingsFileSchema = z.object({
  searchPath: z.union([z.string(), z.array(z.string())]).optional(),
  verbose: z.boolean().optional(),
  json: z.boolean().optional(),
  logLevel: logLevelSchema.optional(),
  requireVersion: z.boolean().optional(),
}).strict();

/** Settings as written in a file or given on the command line; every field optional */
export type SettingsOverrides = z.infer<typeof settingsFileSchema>;

export interface QuerySettings {
  searchPath: string[];
  verbose: boolean;
  json: boolean;
  logLevel: LogLevelName;
  requireVersion: boolean;
}

/** Default settings values */
const DEFAULTS: QuerySettings = {
  searchPath: [],
  verbose: false,
  json: false,
  logLevel: 'warn',
  requireVersion: false,
};

/**
 * Format Zod errors into human-readable messages
 */
export function formatValidationErrors(errors: z.ZodError): string[] {
  return errors.issues.map((issue) => {
    const issuePath = issue.path.join('.');
    return `${issuePath ? `${issuePath}: ` : ''}${issue.message}`;
  });
}

export class SettingsManager {
  private settings: QuerySettings = { ...DEFAULTS, searchPath: [] };
  private _source: string | null = null;

  get current(): Readonly<QuerySettings> { return this.settings; }

  /** File the current settings were loaded from, if any */
  get source(): string | null { return this._source; }

  /**
   * Load settings from `settingsFile`, or from `.oslqrc.json` in `cwd` when
   * no file is named. Invalid files, and a named file that does not exist,
   * are reported and ignored, leaving the current values in place.
   */
  async load(settingsFile?: string, cwd: string = process.cwd()): Promise<void> {
    const file = path.resolve(cwd, settingsFile ?? SETTINGS_FILE_NAME);
    log.debug(`Loading settings from ${file}`);

    const raw = await this.readFileOrNull(file);
    if (raw === null) {
      if (settingsFile !== undefined) log.warn(`Settings file not found: ${file}`);
      return;
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (err) {
      log.warn(`Ignoring ${file}: ${err instanceof Error ? err.message : String(err)}`);
      return;
    }

    const result = settingsFileSchema.safeParse(data);
    if (!result.success) {
      log.warn(`Ignoring ${file}: ${formatValidationErrors(result.error).join('; ')}`);
      return;
    }
    this.apply(result.data);
    this._source = file;
  }

  /** Merge overrides on top of the current settings */
  apply(overrides: SettingsOverrides): void {
    const next: QuerySettings = { ...this.settings };
    if (overrides.searchPath !== undefined) next.searchPath = splitSearchPath(overrides.searchPath);
    if (overrides.verbose !== undefined) next.verbose = overrides.verbose;
    if (overrides.json !== undefined) next.json = overrides.json;
    if (overrides.logLevel !== undefined) next.logLevel = overrides.logLevel;
    if (overrides.requireVersion !== undefined) next.requireVersion = overrides.requireVersion;
    this.settings = next;
  }

  private async readFileOrNull(filePath: string): Promise<string | null> {
    try {
      return await fs.promises.readFile(filePath, 'utf-8');
    } catch (err: unknown) {
      if ((err as NodeJS.ErrnoException).code === 'ENOENT') return null;
      throw err;
    }
  }
}

export function isLogLevelName(value: string): value is LogLevelName {
  return logLevelSchema.safeParse(value).success;
}
