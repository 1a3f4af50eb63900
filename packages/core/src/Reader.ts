import type { DataSource } from './domain/ports/DataSource.js';
import type { LineClassifier } from './domain/ports/LineClassifier.js';
import type { Layout } from './domain/model/Layout.js';
import type { Record } from './domain/model/Record.js';
import type { RecordFilter } from './domain/services/RecordFilter.js';
import type { EventType, EventPayload, DomainEvent } from './domain/events/DomainEvents.js';
import { ReaderState, canTransition } from './domain/model/ReaderState.js';
import { RecordFileError, isRecordFileError } from './domain/model/RecordFileError.js';
import { EventBus } from './application/EventBus.js';
import { splitLines } from './application/LineSplitter.js';
import { logger as defaultLogger, type Logger } from './infrastructure/logging/logger.js';

/**
 * How lines whose length differs from their record length are handled.
 *
 * - `lazy`: pad with blanks or truncate, silently.
 * - `strict`: fail the reader with `LINE_LENGTH_MISMATCH`.
 */
export type ReadMode = 'lazy' | 'strict';

/** Configuration for a reader. */
export interface ReaderOptions {
  /** Default: `'lazy'`. */
  readonly readMode?: ReadMode;
  /** Encoding used to decode Buffer chunks. Default: `'utf-8'`. */
  readonly encoding?: BufferEncoding;
  /** Only records satisfying this filter are returned; the others are skipped. */
  readonly filter?: RecordFilter;
  /** Default: the shared `fixedrec` pino logger. */
  readonly logger?: Logger;
}

/** Counters of a reader run. */
export interface ReaderStats {
  readonly linesRead: number;
  readonly recordsDecoded: number;
  readonly linesSkipped: number;
  readonly recordsFiltered: number;
}

/**
 * Sequential, single-pass decoder of a record-based file.
 *
 * Each line is classified into a record-type key, decoded into the layout's
 * template for that key, and the template itself is returned. **The same
 * `Record` object is returned for every line of a given type, overwritten in
 * place**: copy with `record.cloneValues()` before advancing if the values must
 * outlive the current line.
 *
 * Lines whose key is not in the layout are skipped and reported through the
 * `line:skipped` event.
 *
 * @example
 * ```typescript
 * const reader = new Reader(new FilePathSource('world.txt'), layout, byPrefix(4));
 * reader.on('line:skipped', (e) => console.warn(`line ${e.lineNumber}: unknown key ${e.key}`));
 * for await (const rec of reader) {
 *   console.log(rec.name, rec.getFirstValue('NAME'));
 * }
 * ```
 */
export class Reader implements AsyncIterable<Record> {
  private readonly source: DataSource;
  private readonly layout: Layout;
  private readonly classify: LineClassifier;
  private readonly readMode: ReadMode;
  private readonly encoding: BufferEncoding;
  private readonly filter: RecordFilter | undefined;
  private readonly logger: Logger;
  private readonly eventBus: EventBus;

  private lines: AsyncIterator<string, void> | null = null;
  private _state: ReaderState = ReaderState.NOT_STARTED;
  private currentLine = '';
  private currentRecord: Record | null = null;
  private _lineNumber = 0;
  private recordsDecoded = 0;
  private linesSkipped = 0;
  private recordsFiltered = 0;

  constructor(source: DataSource, layout: Layout, classify: LineClassifier, options?: ReaderOptions) {
    this.source = source;
    this.layout = layout;
    this.classify = classify;
    this.readMode = options?.readMode ?? 'lazy';
    this.encoding = options?.encoding ?? 'utf-8';
    this.filter = options?.filter;
    this.logger = options?.logger ?? defaultLogger;
    this.eventBus = new EventBus(this.logger);
  }

  get state(): ReaderState {
    return this._state;
  }

  /** One-based number of the line the reader is positioned on; `0` before `open()`. */
  get lineNumber(): number {
    return this._lineNumber;
  }

  /** The raw line at the current position (without its line terminator). */
  get line(): string {
    return this.currentLine;
  }

  get stats(): ReaderStats {
    return {
      linesRead: this._lineNumber,
      recordsDecoded: this.recordsDecoded,
      linesSkipped: this.linesSkipped,
      recordsFiltered: this.recordsFiltered,
    };
  }

  /** Subscribe to reader events of the given type. */
  on<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.eventBus.on(type, handler);
    return this;
  }

  /** Subscribe to all reader events. */
  onAny(handler: (event: DomainEvent) => void): this {
    this.eventBus.onAny(handler);
    return this;
  }

  off<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.eventBus.off(type, handler);
    return this;
  }

  offAny(handler: (event: DomainEvent) => void): this {
    this.eventBus.offAny(handler);
    return this;
  }

  /** Start reading: position on the first line, or reach `EXHAUSTED` for an empty input. */
  async open(): Promise<void> {
    if (this._state !== ReaderState.NOT_STARTED) {
      throw new RecordFileError('READER_STATE', `Cannot open a reader in state ${this._state}`, {
        metadata: { state: this._state },
      });
    }

    this.lines = splitLines(this.source.read(), this.encoding)[Symbol.asyncIterator]();
    await this.readLine();

    this.eventBus.emit({
      type: 'reader:opened',
      source: this.source.metadata().fileName ?? 'unknown',
      state: this._state,
      timestamp: Date.now(),
    });
  }

  /**
   * Decode the line at the current position and return its record template.
   *
   * Lines with an unknown key (and, with a filter, records that do not match)
   * are skipped: the reader advances until a line yields a record. Returns `null`
   * when the input ends first.
   */
  async current(): Promise<Record | null> {
    this.assertReadable('current');

    while (this._state === ReaderState.POSITIONED) {
      if (this.currentRecord) return this.currentRecord;

      const record = this.decodeCurrentLine();
      if (record) {
        this.currentRecord = record;
        return record;
      }
      await this.readLine();
    }

    return null;
  }

  /** Move to the next line. */
  async advance(): Promise<void> {
    this.assertReadable('advance');
    if (this._state !== ReaderState.POSITIONED) return;
    await this.readLine();
  }

  /** Release the source. Idempotent; called automatically when `for await` iteration ends. */
  async close(): Promise<void> {
    if (this._state === ReaderState.CLOSED) return;

    const lines = this.lines;
    this.lines = null;
    this.currentRecord = null;
    this.transition(ReaderState.CLOSED);

    try {
      await lines?.return?.();
    } finally {
      this.eventBus.emit({ type: 'reader:closed', linesRead: this._lineNumber, timestamp: Date.now() });
    }
  }

  /** Iterate over decoded records. The source is closed when iteration ends, breaks or throws. */
  async *[Symbol.asyncIterator](): AsyncGenerator<Record, void, undefined> {
    try {
      if (this._state === ReaderState.NOT_STARTED) {
        await this.open();
      }
      for (;;) {
        const record = await this.current();
        if (record === null) break;
        yield record;
        await this.advance();
      }
    } finally {
      await this.close();
    }
  }

  /** Iterate over the records whose type is one of `names`. */
  async *byRecordName(names: Iterable<string>): AsyncGenerator<Record, void, undefined> {
    const wanted = new Set(names);
    for await (const record of this) {
      if (wanted.has(record.name)) yield record;
    }
  }

  private decodeCurrentLine(): Record | null {
    const line = this.currentLine;
    let key: string;

    try {
      key = this.classify(line);
    } catch (err) {
      throw this.fail(err);
    }

    if (!this.layout.contains(key)) {
      this.linesSkipped++;
      this.logger.debug({ lineNumber: this._lineNumber, key }, 'line skipped: record type not in layout');
      this.eventBus.emit({ type: 'line:skipped', lineNumber: this._lineNumber, key, line, timestamp: Date.now() });
      return null;
    }

    const record = this.layout.get(key);
    if (this.readMode === 'strict' && line.length !== record.length) {
      throw this.fail(
        new RecordFileError(
          'LINE_LENGTH_MISMATCH',
          `Line ${String(this._lineNumber)} has ${String(line.length)} characters, record '${key}' expects ${String(record.length)}`,
          { metadata: { lineNumber: this._lineNumber, record: key, expected: record.length, actual: line.length } },
        ),
      );
    }

    record.decode(line);

    if (this.filter && !this.filter.matches(record)) {
      this.recordsFiltered++;
      this.eventBus.emit({ type: 'record:filtered', lineNumber: this._lineNumber, recordName: key, timestamp: Date.now() });
      return null;
    }

    this.recordsDecoded++;
    this.eventBus.emit({ type: 'record:decoded', lineNumber: this._lineNumber, record, timestamp: Date.now() });
    return record;
  }

  private async readLine(): Promise<void> {
    if (!this.lines) {
      throw new RecordFileError('READER_STATE', 'Reader has no open source');
    }

    let next: IteratorResult<string, void>;
    try {
      next = await this.lines.next();
    } catch (err) {
      throw this.fail(
        new RecordFileError('SOURCE_UNAVAILABLE', `Unable to read input after line ${String(this._lineNumber)}`, {
          cause: err,
          metadata: { lineNumber: this._lineNumber, source: this.source.metadata().fileName },
        }),
      );
    }

    this.currentRecord = null;

    if (next.done) {
      this.currentLine = '';
      this.transition(ReaderState.EXHAUSTED);
      this.eventBus.emit({
        type: 'reader:exhausted',
        linesRead: this._lineNumber,
        recordsDecoded: this.recordsDecoded,
        linesSkipped: this.linesSkipped,
        timestamp: Date.now(),
      });
      return;
    }

    this._lineNumber++;
    this.currentLine = next.value;
    this.transition(ReaderState.POSITIONED);
  }

  /** Move to `FAILED`, report, and hand back the error to throw. */
  private fail(err: unknown): Error {
    const error = err instanceof Error ? err : new Error(String(err));
    if (canTransition(this._state, ReaderState.FAILED)) {
      this.transition(ReaderState.FAILED);
    }
    this.logger.error(
      { err: error, lineNumber: this._lineNumber, code: isRecordFileError(error) ? error.code : undefined },
      'reader failed',
    );
    this.eventBus.emit({ type: 'reader:failed', lineNumber: this._lineNumber, error: error.message, timestamp: Date.now() });
    return error;
  }

  private assertReadable(operation: string): void {
    if (this._state === ReaderState.NOT_STARTED || this._state === ReaderState.CLOSED || this._state === ReaderState.FAILED) {
      throw new RecordFileError('READER_STATE', `Cannot call ${operation}() on a reader in state ${this._state}`, {
        metadata: { state: this._state, operation },
      });
    }
  }

  private transition(to: ReaderState): void {
    if (!canTransition(this._state, to)) {
      throw new RecordFileError('READER_STATE', `Invalid reader transition ${this._state} → ${to}`, {
        metadata: { from: this._state, to },
      });
    }
    this._state = to;
  }
}
