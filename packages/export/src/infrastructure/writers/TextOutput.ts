import { once } from 'node:events';
import { finished } from 'node:stream/promises';
import type { Writable } from 'node:stream';

export interface TextOutputOptions {
  /** Stream receiving the text. Without one, text accumulates and is read back with `toString()`. */
  readonly output?: Writable;
  /** End `output` on `close()`. Default: `true`; pass `false` for `process.stdout`. */
  readonly end?: boolean;
}

/** Text destination shared by the text-based writers. */
export abstract class TextOutput {
  private readonly output: Writable | undefined;
  private readonly endOnClose: boolean;
  private buffer = '';
  private closed = false;

  protected constructor(options?: TextOutputOptions) {
    this.output = options?.output;
    this.endOnClose = options?.end ?? true;
  }

  /** Text accumulated since the previous call. Empty when writing to a stream. */
  toString(): string {
    const text = this.buffer;
    this.buffer = '';
    return text;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    if (this.output && this.endOnClose) {
      this.output.end();
      await finished(this.output);
    }
  }

  /** Resolves once `output` accepts more text; waits for `'drain'` when its buffer is full. */
  protected async emit(text: string): Promise<void> {
    if (!this.output) {
      this.buffer += text;
      return;
    }
    if (!this.output.write(text)) {
      await once(this.output, 'drain');
    }
  }
}
