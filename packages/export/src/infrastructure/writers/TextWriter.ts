import type { Record } from '@fixedrec/core';
import type { RecordWriter } from '../../domain/ports/RecordWriter.js';
import { TextOutput, type TextOutputOptions } from './TextOutput.js';

/**
 * - `table`: field names, a dashed rule and the values, in columns as wide as
 *   the larger of field length and name length, followed by a blank line.
 * - `tag`: `RECORD:NAME1="value1" NAME2="value2"`.
 */
export type TextStyle = 'table' | 'tag';

export interface TextWriterOptions extends TextOutputOptions {
  /** Default: `'table'`. */
  readonly style?: TextStyle;
}

/** Human-readable dump of records. */
export class TextWriter extends TextOutput implements RecordWriter {
  private readonly style: TextStyle;

  constructor(options?: TextWriterOptions) {
    super(options);
    this.style = options?.style ?? 'table';
  }

  write(record: Record): Promise<void> {
    return this.emit(this.style === 'tag' ? TextWriter.tag(record) : TextWriter.table(record));
  }

  private static table(record: Record): string {
    const names: string[] = [];
    const values: string[] = [];

    for (const field of record) {
      const width = Math.max(field.length, field.name.length);
      names.push(field.name.padEnd(width));
      values.push(field.value.padEnd(width));
    }

    const header = names.join('|');
    return `${header}\n${'-'.repeat(header.length)}\n${values.join('|')}\n\n`;
  }

  private static tag(record: Record): string {
    const pairs = [...record].map((f) => `${f.name}="${f.value}"`);
    return `${record.name}:${pairs.join(' ')}\n`;
  }
}
