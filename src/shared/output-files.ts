import { promises as fs } from 'fs';
import path from 'path';
import { OutputWriteException } from '../utils/exceptions';

/**
 * Write a UTF-8 text file (no byte-order mark), replacing any previous
 * contents and creating the parent directory when needed.
 */
export async function writeOutputFile(target: string, content: string): Promise<void> {
  try {
    await fs.mkdir(path.dirname(path.resolve(target)), { recursive: true });
    await fs.writeFile(target, content, 'utf8');
  } catch (error) {
    throw new OutputWriteException(target, error);
  }
}
