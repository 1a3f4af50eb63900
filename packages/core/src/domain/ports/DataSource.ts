/** Metadata about the data source (optional, for logging and diagnostics). */
export interface SourceMetadata {
  readonly fileName?: string;
  readonly fileSize?: number;
}

/**
 * Port for reading a record-based file from any origin (file, buffer, stream).
 *
 * Chunks may split lines anywhere; the reader reassembles lines. Implementations
 * should release their underlying resource when iteration stops early.
 */
export interface DataSource {
  /** Yield data chunks as strings or Buffers for lazy/streaming consumption. */
  read(): AsyncIterable<string | Buffer>;
  /** Return metadata about the source (file name, size). */
  metadata(): SourceMetadata;
}
