import type { DataSource, SourceMetadata } from '../../domain/ports/DataSource.js';
import { RecordFileError } from '../../domain/model/RecordFileError.js';

export interface StreamSourceOptions {
  /** File name for metadata. Default: 'stream-input'. */
  readonly fileName?: string;
  /** File size in bytes for metadata (if known). */
  readonly fileSize?: number;
}

/** Data source that wraps an `AsyncIterable` (e.g. `process.stdin`, a Node stream) or a web `ReadableStream`. Single use. */
export class StreamSource implements DataSource {
  private readonly stream: AsyncIterable<string | Buffer> | ReadableStream<string | Buffer>;
  private readonly meta: SourceMetadata;
  private consumed = false;

  constructor(stream: AsyncIterable<string | Buffer> | ReadableStream<string | Buffer>, options?: StreamSourceOptions) {
    this.stream = stream;
    this.meta = {
      fileName: options?.fileName ?? 'stream-input',
      fileSize: options?.fileSize,
    };
  }

  async *read(): AsyncIterable<string | Buffer> {
    if (this.consumed) {
      throw new RecordFileError('SOURCE_UNAVAILABLE', 'StreamSource: stream has already been consumed. Streams can only be read once.');
    }
    this.consumed = true;

    const iterable = this.isReadableStream(this.stream) ? this.fromReadableStream(this.stream) : this.stream;

    for await (const chunk of iterable) {
      yield chunk;
    }
  }

  metadata(): SourceMetadata {
    return this.meta;
  }

  private isReadableStream(
    stream: AsyncIterable<string | Buffer> | ReadableStream<string | Buffer>,
  ): stream is ReadableStream<string | Buffer> {
    return 'getReader' in stream && typeof stream.getReader === 'function';
  }

  private async *fromReadableStream(stream: ReadableStream<string | Buffer>): AsyncIterable<string | Buffer> {
    const reader = stream.getReader();
    try {
      for (;;) {
        const { done, value } = await reader.read();
        if (done) break;
        yield value;
      }
    } finally {
      reader.releaseLock();
    }
  }
}
