import { Program } from './types.js';
import { parse } from './python-parser.js';
import { readFileContent, isPythonFile } from '../utils/file-utils.js';
import { logger } from '../utils/logger.js';

export { parse, extractSignature } from './python-parser.js';
export * from './types.js';

export async function parseFile(filePath: string): Promise<Program> {
  if (!isPythonFile(filePath)) {
    logger.warn(`${filePath} does not have a .py extension; parsing anyway`);
  }

  logger.debug(`Parsing: ${filePath}`);
  const content = await readFileContent(filePath);
  const program = parse(content);
  logger.debug(`  Found ${program.statements.length} top-level statement(s)`);

  return program;
}
