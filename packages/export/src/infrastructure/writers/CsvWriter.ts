import Papa from 'papaparse';
import type { FixedrecConfig, Record } from '@fixedrec/core';
import type { RecordWriter } from '../../domain/ports/RecordWriter.js';
import { TextOutput, type TextOutputOptions } from './TextOutput.js';

export interface CsvWriterOptions extends TextOutputOptions {
  /** Default: `';'`. */
  readonly delimiter?: string;
  /** Write a row of field names before the first record of each type. Default: `false`. */
  readonly header?: boolean;
  /** Write raw slices instead of blank-trimmed values. Default: `false`. */
  readonly raw?: boolean;
}

/** One CSV row per record, formatted with PapaParse. Values holding the delimiter or quotes are quoted. */
export class CsvWriter extends TextOutput implements RecordWriter {
  private readonly delimiter: string;
  private readonly header: boolean;
  private readonly raw: boolean;
  private readonly headed = new Set<string>();

  constructor(options?: CsvWriterOptions) {
    super(options);
    this.delimiter = options?.delimiter ?? ';';
    this.header = options?.header ?? false;
    this.raw = options?.raw ?? false;
  }

  /** Writer using the configured `export.csvDelimiter`. */
  static fromConfig(config: FixedrecConfig, options?: Omit<CsvWriterOptions, 'delimiter'>): CsvWriter {
    return new CsvWriter({ ...options, delimiter: config.export.csvDelimiter });
  }

  write(record: Record): Promise<void> {
    const rows: string[][] = [];

    if (this.header && !this.headed.has(record.name)) {
      this.headed.add(record.name);
      rows.push(record.arrayOf('name'));
    }
    rows.push(record.arrayOf(this.raw ? 'rawValue' : 'value'));

    return this.emit(Papa.unparse(rows, { delimiter: this.delimiter, newline: '\n' }) + '\n');
  }
}
