import { execa } from 'execa';
import { BuildError } from '../utils/error-handler.js';
import { logger } from '../utils/logger.js';

export interface ToolResult {
  success: boolean;
  stdout?: string;
  stderr?: string;
  errors?: string[];
}

export async function executeTool(
  command: string,
  args: string[],
  description: string,
  cwd?: string
): Promise<ToolResult> {
  try {
    logger.debug(`Executing: ${command} ${args.join(' ')}`);
    if (cwd) {
      logger.debug(`Working directory: ${cwd}`);
    }

    const result = await execa(command, args, {
      stdio: ['pipe', 'pipe', 'pipe'],
      reject: false,
      cwd,
    });

    if (result.exitCode !== 0) {
      logger.debug(`${description} failed with exit code ${result.exitCode}`);
      logger.debug(`stdout: ${result.stdout}`);
      logger.debug(`stderr: ${result.stderr}`);

      return {
        success: false,
        stdout: result.stdout,
        stderr: result.stderr,
        errors: [result.stderr || result.stdout || `Unknown ${description} error`],
      };
    }

    return {
      success: true,
      stdout: result.stdout,
      stderr: result.stderr,
    };
  } catch (error) {
    if (error instanceof Error) {
      throw new BuildError(
        `Failed to execute ${description}: ${error.message}`,
        error.message
      );
    }
    throw error;
  }
}

export async function checkToolAvailable(
  command: string,
  toolName: string
): Promise<void> {
  try {
    await execa(command, ['--version'], { stdio: 'pipe' });
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    logger.debug(`${command} --version failed: ${reason}`);
    throw new BuildError(
      `${toolName} is not installed or not available in PATH`,
      `Install ${toolName} (pip install cython) before using --build.`
    );
  }
}
