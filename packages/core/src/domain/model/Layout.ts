import type { LayoutDefinition } from './LayoutDefinition.js';
import { Field } from './Field.js';
import { FieldType } from './FieldType.js';
import { Record } from './Record.js';
import { RecordFileError } from './RecordFileError.js';

/**
 * Schema of a whole record-based file: one `Record` template per record-type key.
 *
 * Built once, then shared with a `Reader`, which overwrites the field values of
 * the templates on every decoded line. Do not let two active readers share one
 * layout.
 *
 * @example
 * ```typescript
 * const layout = Layout.build({
 *   fieldTypes: [{ name: 'A/N', description: 'string' }],
 *   records: [{ name: 'HDR1', description: 'Header', fields: [{ name: 'ID', description: 'Id', type: 'A/N', length: 4 }] }],
 * });
 * layout.get('HDR1').length; // 4
 * ```
 */
export class Layout implements Iterable<Record> {
  readonly name: string;
  readonly description: string;
  readonly meta: Readonly<{ [key: string]: string }>;
  readonly fieldTypes: ReadonlyMap<string, FieldType>;

  private records: Map<string, Record>;

  private constructor(
    name: string,
    description: string,
    meta: Readonly<{ [key: string]: string }>,
    fieldTypes: ReadonlyMap<string, FieldType>,
    records: Map<string, Record>,
  ) {
    this.name = name;
    this.description = description;
    this.meta = meta;
    this.fieldTypes = fieldTypes;
    this.records = records;
  }

  /** Assemble the record templates of `definition`, in schema order. */
  static build(definition: LayoutDefinition): Layout {
    const fieldTypes = new Map<string, FieldType>();
    for (const ft of definition.fieldTypes) {
      if (fieldTypes.has(ft.name)) {
        throw new RecordFileError('DUPLICATE_FIELD_TYPE', `Field type '${ft.name}' is declared twice`, {
          metadata: { fieldType: ft.name },
        });
      }
      fieldTypes.set(ft.name, new FieldType(ft.name, ft.description, { format: ft.format }));
    }

    const records = new Map<string, Record>();
    for (const entry of definition.records) {
      if (records.has(entry.name)) {
        throw new RecordFileError('DUPLICATE_RECORD_NAME', `Record '${entry.name}' is declared twice`, {
          metadata: { record: entry.name },
        });
      }

      const record = new Record(entry.name, entry.description);
      for (const fieldEntry of entry.fields) {
        const type = fieldTypes.get(fieldEntry.type);
        if (!type) {
          throw new RecordFileError(
            'INVALID_FIELD_REFERENCE',
            `Field '${fieldEntry.name}' of record '${entry.name}' refers to undeclared type '${fieldEntry.type}'`,
            { metadata: { record: entry.name, field: fieldEntry.name, fieldType: fieldEntry.type } },
          );
        }
        record.append(new Field(fieldEntry.name, fieldEntry.description, type, fieldEntry.length));
      }

      records.set(entry.name, record);
    }

    return new Layout(definition.name ?? '', definition.description ?? '', definition.meta ?? {}, fieldTypes, records);
  }

  /** Number of record types. */
  get size(): number {
    return this.records.size;
  }

  /** Record template for `key`. */
  get(key: string): Record {
    const record = this.records.get(key);
    if (!record) {
      throw new RecordFileError('UNKNOWN_RECORD_TYPE', `Record type '${key}' is not part of layout '${this.name}'`, {
        metadata: { layout: this.name, key },
      });
    }
    return record;
  }

  contains(key: string): boolean {
    return this.records.has(key);
  }

  /** Record-type keys in schema order. */
  keys(): string[] {
    return [...this.records.keys()];
  }

  [Symbol.iterator](): Iterator<Record> {
    return this.records.values();
  }

  /** `true` when at least one record type declares a field named `name`. */
  containsField(name: string): boolean {
    for (const record of this.records.values()) {
      if (record.contains(name)) return true;
    }
    return false;
  }

  /** Keep only the record types listed in `keys`. */
  keep(keys: Iterable<string>): void {
    const wanted = new Set(keys);
    this.records = new Map([...this.records].filter(([key]) => wanted.has(key)));
  }

  /** Drop the record types listed in `keys`. */
  delete(keys: Iterable<string>): void {
    const dropped = new Set(keys);
    this.records = new Map([...this.records].filter(([key]) => !dropped.has(key)));
  }

  /** Remove the named fields from every record type. */
  prune(fieldNames: Iterable<string>): void {
    const names = [...fieldNames];
    for (const record of this.records.values()) {
      record.remove(names);
    }
  }

  /**
   * Reduce the layout to the listed records and fields.
   *
   * Each entry reads `'RECORD:FIELD1,FIELD2'`. Records not listed are dropped;
   * listed records keep only the listed fields.
   */
  simplify(selection: Iterable<string>): void {
    const kept: string[] = [];

    for (const entry of selection) {
      const separator = entry.indexOf(':');
      if (separator < 0) {
        throw new RecordFileError('INVALID_FILTER', `Selection '${entry}' must read 'RECORD:FIELD1,FIELD2'`, {
          metadata: { entry },
        });
      }
      const key = entry.slice(0, separator).trim();
      const fields = entry
        .slice(separator + 1)
        .split(',')
        .map((f) => f.trim())
        .filter((f) => f !== '');

      this.get(key).keep(fields);
      kept.push(key);
    }

    this.keep(kept);
  }
}
