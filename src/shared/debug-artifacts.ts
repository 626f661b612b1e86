import { promises as fs } from 'fs';
import path from 'path';
import { logger } from '../config/logger.config';

/**
 * Writes diagnostic files (filter payload, response headers, body excerpts)
 * into one directory. Failures are logged and never interrupt the run.
 */
export class DebugArtifactWriter {
  constructor(private readonly dir: string | null) {}

  async write(name: string, content: string | object): Promise<void> {
    if (this.dir === null) return;

    const target = path.join(this.dir, name);
    const text = typeof content === 'string' ? content : JSON.stringify(content, null, 2);

    try {
      await fs.mkdir(this.dir, { recursive: true });
      await fs.writeFile(target, text, 'utf8');
    } catch (error) {
      logger.warn('Failed to write debug artifact', {
        target,
        errorMessage: error instanceof Error ? error.message : String(error),
      });
    }
  }
}

/** Writer used when debug output is turned off. */
export const disabledDebugWriter = new DebugArtifactWriter(null);
