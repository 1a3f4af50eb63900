import type { Record } from '@fixedrec/core';

/**
 * Port for record sinks.
 *
 * `write()` receives the reader's shared template: implementations copy what
 * they keep past the call.
 */
export interface RecordWriter {
  write(record: Record): void | Promise<void>;
  /** Flush pending output and release resources. */
  close(): Promise<void>;
}
