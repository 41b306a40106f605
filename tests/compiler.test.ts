import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';

const { execaMock } = vi.hoisted(() => ({ execaMock: vi.fn() }));
vi.mock('execa', () => ({ execa: execaMock }));

import { buildExtension } from '../src/compiler/index.js';
import { executeTool } from '../src/compiler/compiler-bridge.js';
import { BuildError, FileNotFoundError } from '../src/utils/error-handler.js';

describe('executeTool', () => {
  afterEach(() => {
    execaMock.mockReset();
  });

  it('collects output from a failing command', async () => {
    execaMock.mockResolvedValueOnce({ exitCode: 2, stdout: '', stderr: 'boom' });

    expect(await executeTool('cythonize', ['x.pyx'], 'cythonize')).toEqual({
      success: false,
      stdout: '',
      stderr: 'boom',
      errors: ['boom'],
    });
  });

  it('wraps spawn failures in BuildError', async () => {
    execaMock.mockRejectedValueOnce(new Error('spawn cythonize ENOENT'));

    await expect(executeTool('cythonize', [], 'cythonize')).rejects.toThrow(
      'Failed to execute cythonize: spawn cythonize ENOENT'
    );
  });
});

describe('buildExtension', () => {
  let dir: string;
  let pyxPath: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'pyxify-build-'));
    pyxPath = join(dir, 'mod.pyx');
    await writeFile(pyxPath, 'cdef int add(int a, int b):\n    return a + b\n');
  });

  afterEach(async () => {
    execaMock.mockReset();
    await rm(dir, { recursive: true, force: true });
  });

  it('runs cythonize in the directory of the file', async () => {
    execaMock
      .mockResolvedValueOnce({ exitCode: 0, stdout: 'Cython version 3.0.10' })
      .mockResolvedValueOnce({ exitCode: 0, stdout: 'Compiling mod.pyx', stderr: '' });

    const result = await buildExtension(pyxPath);

    expect(result).toEqual({ pyxPath, output: 'Compiling mod.pyx' });
    expect(execaMock).toHaveBeenNthCalledWith(1, 'cythonize', ['--version'], {
      stdio: 'pipe',
    });
    expect(execaMock).toHaveBeenNthCalledWith(
      2,
      'cythonize',
      ['-i', '-3', 'mod.pyx'],
      expect.objectContaining({ cwd: dir })
    );
  });

  it('fails when cythonize is not installed', async () => {
    execaMock.mockRejectedValueOnce(new Error('spawn cythonize ENOENT'));

    await expect(buildExtension(pyxPath)).rejects.toThrow(
      'Cython (cythonize) is not installed or not available in PATH'
    );
  });

  it('fails when compilation fails', async () => {
    execaMock
      .mockResolvedValueOnce({ exitCode: 0, stdout: 'Cython version 3.0.10' })
      .mockResolvedValueOnce({ exitCode: 1, stdout: '', stderr: 'mod.pyx:1:0: error' });

    const failure = buildExtension(pyxPath);
    await expect(failure).rejects.toBeInstanceOf(BuildError);
    await expect(failure).rejects.toMatchObject({
      details: 'mod.pyx:1:0: error',
    });
  });

  it('fails for a missing file without calling cythonize', async () => {
    await expect(buildExtension(join(dir, 'missing.pyx'))).rejects.toBeInstanceOf(
      FileNotFoundError
    );
    expect(execaMock).not.toHaveBeenCalled();
  });
});
