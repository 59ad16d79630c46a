import * as fsPromises from 'node:fs/promises';
import { dirname } from 'node:path';
import { errorMessage, WriteError } from '../errors/custom-errors.js';

/**
 * Write an output file, creating its parent directory
 *
 * @throws WriteError on any filesystem failure
 */
export async function writeOutputFile(path: string, data: string | Uint8Array): Promise<string> {
  try {
    await fsPromises.mkdir(dirname(path), { recursive: true });
    await fsPromises.writeFile(path, data, typeof data === 'string' ? 'utf-8' : undefined);
    return path;
  } catch (error) {
    throw new WriteError(`Failed to write ${path}: ${errorMessage(error)}`, path, error);
  }
}
