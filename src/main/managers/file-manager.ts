import fs from 'fs';
import path from 'path';
import { Logger } from '../../shared/logger.js';
import type { ParseOptions } from '../../shared/types/oso.js';
import { ShaderQuery } from '../../shared/shader-query.js';

const fsPromises = fs.promises;

const log = new Logger('FileManager');

export const OSO_EXTENSION = '.oso';

/** A ':'-separated directory list, or the directories themselves */
export type SearchPath = string | readonly string[];

export function splitSearchPath(searchPath: SearchPath): string[] {
  const dirs = typeof searchPath === 'string' ? searchPath.split(':') : [...searchPath];
  return dirs.filter(dir => dir.length > 0);
}

function withExtension(name: string): string {
  return name + OSO_EXTENSION;
}

/**
 * Owns the query tool's file-system access. Shaders are located by name
 * along a search path, then read and parsed.
 */
export class FileManager {
  /** Directory relative names and search-path entries are resolved against */
  readonly baseDir: string;

  constructor(baseDir: string = process.cwd()) {
    this.baseDir = baseDir;
  }

  // ── Low-level utilities ─────────────────────────────────────────────

  private async statOrNull(filePath: string): Promise<fs.Stats | null> {
    try {
      return await fsPromises.stat(path.resolve(this.baseDir, filePath));
    } catch (err: unknown) {
      const code = (err as NodeJS.ErrnoException).code;
      if (code === 'ENOENT' || code === 'ENOTDIR') return null;
      throw err;
    }
  }

  async isFile(filePath: string): Promise<boolean> {
    const stat = await this.statOrNull(filePath);
    return stat !== null && stat.isFile();
  }

  async isDirectory(filePath: string): Promise<boolean> {
    const stat = await this.statOrNull(filePath);
    return stat !== null && stat.isDirectory();
  }

  // ── Resolution ──────────────────────────────────────────────────────

  /**
   * Find the file a shader name refers to. Tries, in order: the name with
   * `.oso` appended (when it lacks the extension), the name as given, then
   * every search-path directory with the name as given and with `.oso`.
   * Returns the absolute path of the first existing file, or null.
   */
  async resolveShaderPath(name: string, searchPath: SearchPath = []): Promise<string | null> {
    const candidates: string[] = [];
    const hasExtension = path.extname(name) === OSO_EXTENSION;
    if (!hasExtension) candidates.push(withExtension(name));
    candidates.push(name);

    if (!path.isAbsolute(name)) {
      for (const dir of splitSearchPath(searchPath)) {
        const joined = path.join(dir, name);
        candidates.push(joined);
        if (!hasExtension) candidates.push(withExtension(joined));
      }
    }

    for (const candidate of candidates) {
      const resolved = path.resolve(this.baseDir, candidate);
      if (await this.isFile(resolved)) {
        log.debug(`Resolved ${name} -> ${resolved}`);
        return resolved;
      }
    }
    log.debug(`Could not resolve ${name} (${candidates.length} candidates tried)`);
    return null;
  }

  // ── Reading ─────────────────────────────────────────────────────────

  /** Read a shader file as bytes and parse it */
  async readShader(filePath: string, options: ParseOptions = {}): Promise<ShaderQuery> {
    const bytes = await fsPromises.readFile(path.resolve(this.baseDir, filePath));
    return ShaderQuery.fromString(bytes, options);
  }

  /** Paths of the `.oso` files directly inside `dir`, sorted by name */
  async findShaders(dir: string): Promise<string[]> {
    const root = path.resolve(this.baseDir, dir);
    const entries = await fsPromises.readdir(root, { withFileTypes: true });
    return entries
      .filter(entry => entry.isFile() && path.extname(entry.name) === OSO_EXTENSION)
      .map(entry => entry.name)
      .sort()
      .map(name => path.join(root, name));
  }
}
