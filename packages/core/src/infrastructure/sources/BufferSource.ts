import type { DataSource, SourceMetadata } from '../../domain/ports/DataSource.js';

/** Data source over an in-memory string or Buffer. Reusable: each `read()` yields the whole content. */
export class BufferSource implements DataSource {
  private readonly content: string | Buffer;
  private readonly meta: SourceMetadata;

  constructor(data: string | Buffer, metadata?: Partial<SourceMetadata>) {
    this.content = data;
    this.meta = {
      fileName: metadata?.fileName ?? 'buffer-input',
      fileSize: typeof data === 'string' ? Buffer.byteLength(data) : data.length,
    };
  }

  async *read(): AsyncIterable<string | Buffer> {
    yield await Promise.resolve(this.content);
  }

  metadata(): SourceMetadata {
    return this.meta;
  }
}
