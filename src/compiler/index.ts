import { dirname, basename } from 'path';
import { BuildError, FileNotFoundError } from '../utils/error-handler.js';
import { fileExists } from '../utils/file-utils.js';
import { logger } from '../utils/logger.js';
import { checkToolAvailable, executeTool } from './compiler-bridge.js';

export interface BuildResult {
  pyxPath: string;
  output: string;
}

/**
 * Compile a generated .pyx file into an extension module in place, using
 * Cython's `cythonize` tool.
 */
export async function buildExtension(pyxPath: string): Promise<BuildResult> {
  if (!(await fileExists(pyxPath))) {
    throw new FileNotFoundError(pyxPath);
  }

  await checkToolAvailable('cythonize', 'Cython (cythonize)');

  logger.debug(`Building extension module from: ${pyxPath}`);
  const result = await executeTool(
    'cythonize',
    ['-i', '-3', basename(pyxPath)],
    'cythonize',
    dirname(pyxPath)
  );

  if (!result.success) {
    throw new BuildError(
      `Failed to build extension module from ${pyxPath}`,
      result.errors?.join('\n')
    );
  }

  return { pyxPath, output: result.stdout ?? '' };
}
