import { createReadStream, statSync } from 'node:fs';
import { basename } from 'node:path';
import type { DataSource, SourceMetadata } from '../../domain/ports/DataSource.js';

export interface FilePathSourceOptions {
  /** Chunk size in bytes for streaming reads. Default: 65536 (64KB). */
  readonly highWaterMark?: number;
}

/**
 * Data source that streams a local file with `createReadStream`. Node.js only.
 *
 * Chunks are raw Buffers; the reader decodes them with its configured encoding.
 * Stopping iteration early destroys the stream.
 */
export class FilePathSource implements DataSource {
  private readonly filePath: string;
  private readonly highWaterMark: number;

  constructor(filePath: string, options?: FilePathSourceOptions) {
    this.filePath = filePath;
    this.highWaterMark = options?.highWaterMark ?? 65536;
  }

  async *read(): AsyncIterable<Buffer> {
    const stream = createReadStream(this.filePath, { highWaterMark: this.highWaterMark });

    try {
      for await (const chunk of stream) {
        yield Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
      }
    } finally {
      stream.destroy();
    }
  }

  /** File name and size; the size is left out when the file cannot be stat'ed. */
  metadata(): SourceMetadata {
    let fileSize: number | undefined;
    try {
      fileSize = statSync(this.filePath).size;
    } catch {
      fileSize = undefined;
    }
    return { fileName: basename(this.filePath), fileSize };
  }
}
