import { errorMessage, failure, type Logger, type Outcome } from '@tfcanvas/contracts';
import fs from 'node:fs/promises';
import path from 'node:path';

export const DEFAULT_DOCUMENT_NAME = 'main.tf';

export type WriteResult = Outcome<{ path: string }>;

/**
 * Writes rendered documents into the output directory.
 * Failures are logged and returned, never thrown.
 */
export class DocumentWriter {
  constructor(
    readonly outputDir: string,
    private readonly logger: Logger
  ) {}

  async write(content: string, filename: string = DEFAULT_DOCUMENT_NAME): Promise<WriteResult> {
    const filePath = path.join(this.outputDir, filename);

    try {
      await fs.mkdir(this.outputDir, { recursive: true });
      await fs.writeFile(filePath, content, 'utf8');
      this.logger.debug(`Wrote ${content.length} bytes to ${filePath}`);
      return { ok: true, path: filePath };
    } catch (error) {
      const message = `Error writing file ${filename}: ${errorMessage(error)}`;
      this.logger.error(message);
      return failure('WriteError', message);
    }
  }
}
