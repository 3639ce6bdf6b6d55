import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { FileManager, splitSearchPath } from './file-manager.js';
import { OsoParseError } from '../../shared/oso/errors.js';

const MATTE = 'OpenShadingLanguage 1.12\nshader surface "matte"\nparam float Kd 0.8\ncode ___main___\n';

describe('FileManager', () => {
  let root: string;
  let files: FileManager;

  beforeEach(async () => {
    root = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'oslq-files-'));
    await fs.promises.mkdir(path.join(root, 'shaders', 'nested'), { recursive: true });
    await fs.promises.writeFile(path.join(root, 'shaders', 'matte.oso'), MATTE);
    await fs.promises.writeFile(path.join(root, 'shaders', 'bare'), MATTE);
    await fs.promises.writeFile(path.join(root, 'shaders', 'readme.txt'), 'not a shader');
    await fs.promises.writeFile(path.join(root, 'shaders', 'nested', 'deep.oso'), MATTE);
    await fs.promises.writeFile(path.join(root, 'local.oso'), MATTE);
    await fs.promises.writeFile(path.join(root, 'bad.oso'), 'shader s\nparam int x "y"\n');
    files = new FileManager(root);
  });

  afterEach(async () => {
    await fs.promises.rm(root, { recursive: true, force: true });
  });

  describe('resolveShaderPath', () => {
    it('appends the extension to a bare name', async () => {
      expect(await files.resolveShaderPath('local')).toBe(path.join(root, 'local.oso'));
    });

    it('accepts a relative path with the extension', async () => {
      expect(await files.resolveShaderPath('shaders/matte.oso')).toBe(path.join(root, 'shaders', 'matte.oso'));
    });

    it('searches each search-path directory', async () => {
      expect(await files.resolveShaderPath('matte', ['nowhere', 'shaders']))
        .toBe(path.join(root, 'shaders', 'matte.oso'));
      expect(await files.resolveShaderPath('matte', 'nowhere:shaders'))
        .toBe(path.join(root, 'shaders', 'matte.oso'));
    });

    it('prefers the name as given over the name with the extension in a search directory', async () => {
      expect(await files.resolveShaderPath('bare', 'shaders')).toBe(path.join(root, 'shaders', 'bare'));
    });

    it('accepts absolute paths', async () => {
      const absolute = path.join(root, 'shaders', 'matte.oso');
      expect(await files.resolveShaderPath(absolute, 'nowhere')).toBe(absolute);
    });

    it('returns null when nothing matches', async () => {
      expect(await files.resolveShaderPath('missing', 'shaders')).toBeNull();
      expect(await files.resolveShaderPath('shaders')).toBeNull();
    });
  });

  describe('readShader', () => {
    it('parses the file', async () => {
      const query = await files.readShader('shaders/matte.oso');
      expect(query.shaderName).toBe('matte');
      expect(query.paramByName('Kd')?.default).toEqual({ kind: 'float', values: [0.8] });
    });

    it('surfaces parse errors', async () => {
      await expect(files.readShader('bad.oso')).rejects.toBeInstanceOf(OsoParseError);
    });

    it('passes parse options through', async () => {
      await expect(files.readShader('bad.oso', { requireVersion: true }))
        .rejects.toThrow("Expected 'OpenShadingLanguage' version marker, found 'shader'");
    });
  });

  describe('findShaders', () => {
    it('lists the .oso files of a directory in name order', async () => {
      await fs.promises.writeFile(path.join(root, 'shaders', 'aaa.oso'), MATTE);
      expect(await files.findShaders('shaders')).toEqual([
        path.join(root, 'shaders', 'aaa.oso'),
        path.join(root, 'shaders', 'matte.oso'),
      ]);
    });
  });

  it('tells files from directories', async () => {
    expect(await files.isFile('local.oso')).toBe(true);
    expect(await files.isFile('shaders')).toBe(false);
    expect(await files.isDirectory('shaders')).toBe(true);
    expect(await files.isDirectory('missing')).toBe(false);
    expect(await files.isFile('local.oso/child')).toBe(false);
  });
});

describe('splitSearchPath', () => {
  it('drops empty entries', () => {
    expect(splitSearchPath('a::b:')).toEqual(['a', 'b']);
    expect(splitSearchPath(['a', ''])).toEqual(['a']);
  });
});
