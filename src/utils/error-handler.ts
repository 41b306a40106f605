import { logger } from './logger.js';

export class PyxifyError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: string
  ) {
    super(message);
    this.name = 'PyxifyError';
  }
}

export class UnsupportedSyntaxError extends PyxifyError {
  constructor(
    message: string,
    public readonly line: number,
    details?: string
  ) {
    super(message, 'UNSUPPORTED_SYNTAX', details);
    this.name = 'UnsupportedSyntaxError';
  }
}

export class BuildError extends PyxifyError {
  constructor(message: string, details?: string) {
    super(message, 'BUILD_ERROR', details);
    this.name = 'BuildError';
  }
}

export class ConfigError extends PyxifyError {
  constructor(message: string, details?: string) {
    super(message, 'CONFIG_ERROR', details);
    this.name = 'ConfigError';
  }
}

export class FileNotFoundError extends PyxifyError {
  constructor(filePath: string) {
    super(
      `File not found: ${filePath}`,
      'FILE_NOT_FOUND',
      `The file at ${filePath} does not exist. Please check the path and try again.`
    );
    this.name = 'FileNotFoundError';
  }
}

export function handleError(error: unknown): never {
  logger.stopSpinner();

  if (error instanceof PyxifyError) {
    logger.error(error.message);
    if (error.details) {
      console.error(`\n${error.details}\n`);
    }
    process.exit(1);
  }

  if (error instanceof Error) {
    logger.error(`Unexpected error: ${error.message}`);
    if (error.stack) {
      console.error(error.stack);
    }
    process.exit(1);
  }

  logger.error('An unknown error occurred');
  console.error(error);
  process.exit(1);
}
