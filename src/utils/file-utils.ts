import { readFile, writeFile, mkdir, access } from 'fs/promises';
import { constants } from 'fs';
import { dirname, extname, join, basename } from 'path';
import { FileNotFoundError } from './error-handler.js';

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath, constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

export async function readFileContent(filePath: string): Promise<string> {
  const exists = await fileExists(filePath);
  if (!exists) {
    throw new FileNotFoundError(filePath);
  }
  return readFile(filePath, 'utf-8');
}

export async function writeFileContent(
  filePath: string,
  content: string
): Promise<void> {
  await ensureDirectory(dirname(filePath));
  await writeFile(filePath, content, 'utf-8');
}

export async function ensureDirectory(dirPath: string): Promise<void> {
  await mkdir(dirPath, { recursive: true });
}

export async function readStdin(
  stream: NodeJS.ReadableStream = process.stdin
): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks).toString('utf-8');
}

export function getFileExtension(filePath: string): string {
  return extname(filePath).toLowerCase();
}

export function isPythonFile(filePath: string): boolean {
  return getFileExtension(filePath) === '.py';
}

/**
 * Default output location: `<name>.pyx` beside the input, or
 * `generated.pyx` in the working directory when reading stdin.
 */
export function getDefaultOutputPath(inputPath?: string): string {
  if (!inputPath) {
    return join(process.cwd(), 'generated.pyx');
  }
  const name = basename(inputPath, extname(inputPath));
  return join(dirname(inputPath), `${name}.pyx`);
}
