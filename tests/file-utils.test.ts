import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { Readable } from 'stream';
import {
  getDefaultOutputPath,
  readFileContent,
  readStdin,
  writeFileContent,
} from '../src/utils/file-utils.js';
import { FileNotFoundError } from '../src/utils/error-handler.js';

describe('file utils', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'pyxify-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('writes into directories that do not exist yet', async () => {
    const target = join(dir, 'out', 'nested', 'mod.pyx');
    await writeFileContent(target, 'cdef int x = 1\n');
    expect(await readFile(target, 'utf-8')).toBe('cdef int x = 1\n');
    expect(await readFileContent(target)).toBe('cdef int x = 1\n');
  });

  it('throws FileNotFoundError for missing input', async () => {
    await expect(readFileContent(join(dir, 'missing.py'))).rejects.toThrow(
      FileNotFoundError
    );
  });

  it('reads a whole stream', async () => {
    expect(await readStdin(Readable.from(['def f():\n', '    pass\n']))).toBe(
      'def f():\n    pass\n'
    );
  });

  it('derives the output path from the input path', () => {
    expect(getDefaultOutputPath(join(dir, 'loops.py'))).toBe(
      join(dir, 'loops.pyx')
    );
    expect(getDefaultOutputPath()).toBe(join(process.cwd(), 'generated.pyx'));
  });
});
