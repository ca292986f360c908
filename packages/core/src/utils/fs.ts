import { promises as fs, constants as fsConstants } from 'fs';
import { FileSystemError } from './errors.js';
import { logger } from './logger.js';

/**
 * File system utilities
 */

/**
 * Check if a file or directory exists
 */
export async function exists(path: string): Promise<boolean> {
  try {
    await fs.access(path, fsConstants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Read a text file
 */
export async function readTextFile(path: string, encoding: BufferEncoding = 'utf8'): Promise<string> {
  try {
    const content = await fs.readFile(path, encoding);
    logger.debug(`Read file: ${path}`, { bytes: content.length });
    return content;
  } catch (error) {
    throw new FileSystemError(`Failed to read file: ${path}`, { path, error });
  }
}

/**
 * Read a whole readable stream (stdin in practice) as UTF-8 text
 */
export async function readStreamText(stream: NodeJS.ReadableStream): Promise<string> {
  const chunks: Buffer[] = [];
  try {
    for await (const chunk of stream) {
      chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk);
    }
  } catch (error) {
    throw new FileSystemError('Failed to read input stream', { error });
  }
  return Buffer.concat(chunks).toString('utf8');
}
