import type { ConvertedValue, Field } from './Field.js';
import { RecordFileError } from './RecordFileError.js';

/** Field attributes that `Record.arrayOf()` can collect. */
export type FieldAttribute = 'name' | 'description' | 'value' | 'rawValue';

/** Detached copy of one decoded field. */
export interface FieldSnapshot {
  readonly name: string;
  readonly value: string;
  readonly rawValue: string;
}

/** Detached copy of a decoded record, safe to keep after the reader advances. */
export interface RecordSnapshot {
  readonly name: string;
  readonly fields: readonly FieldSnapshot[];
}

/** Value of a key in `Record.toObject()`: a single value, or a list when the field name repeats. */
export type RecordObjectValue = ConvertedValue | ConvertedValue[];

export interface ToObjectOptions {
  /** Convert values through `Field.convert()`. Default: `false` (normalized strings). */
  readonly convert?: boolean;
}

/**
 * An ordered, named collection of fields describing one record type.
 *
 * Field positions are computed as fields are appended. Several fields may share
 * a name; `lookupByName()` returns all of them in append order.
 *
 * A record held in a `Layout` is a template reused for every line of its type:
 * `decode()` overwrites the values of the same `Field` objects. Take
 * `cloneValues()` to keep data across lines.
 */
export class Record implements Iterable<Field> {
  readonly name: string;
  readonly description: string;

  private _length = 0;
  private fields: Field[] = [];
  private nameIndex = new Map<string, number[]>();

  constructor(name: string, description = '') {
    if (name === '') {
      throw new RecordFileError('EMPTY_RECORD_NAME', 'Record name must not be empty');
    }
    this.name = name;
    this.description = description;
  }

  /** Sum of the lengths of every field ever appended. Never shrinks. */
  get length(): number {
    return this._length;
  }

  /** Number of fields currently held. */
  get count(): number {
    return this.fields.length;
  }

  /** Append a field, assigning its index, offset and bounds. */
  append(field: Field): void {
    field.attach(this.fields.length, this._length);

    const position = this.fields.length;
    this.fields.push(field);

    const positions = this.nameIndex.get(field.name);
    if (positions) {
      positions.push(position);
    } else {
      this.nameIndex.set(field.name, [position]);
    }

    this._length += field.length;
  }

  /**
   * Slice `line` into the fields of this record.
   *
   * Shorter lines are right-padded with blanks and longer lines truncated to the
   * record length; neither is an error.
   */
  decode(line: string): void {
    const normalized = line.length < this._length ? line.padEnd(this._length, ' ') : line.slice(0, this._length);

    for (const field of this.fields) {
      field.decode(normalized.slice(field.lowerBound, field.upperBound));
    }
  }

  /** Concatenation of every field's raw value, in append order. */
  encode(): string {
    let out = '';
    for (const field of this.fields) {
      out += field.rawValue;
    }
    return out;
  }

  /** All fields named `name`, in append order. Empty when none match. */
  lookupByName(name: string): Field[] {
    const positions = this.nameIndex.get(name);
    if (!positions) return [];

    const found: Field[] = [];
    for (const position of positions) {
      const field = this.fields[position];
      if (field) found.push(field);
    }
    return found;
  }

  /** Field at position `index`. */
  at(index: number): Field {
    const field = Number.isInteger(index) && index >= 0 ? this.fields[index] : undefined;
    if (!field) {
      throw new RecordFileError(
        'INDEX_OUT_OF_RANGE',
        `Index ${String(index)} is out of range for record '${this.name}' (${String(this.fields.length)} fields)`,
        { metadata: { record: this.name, index, count: this.fields.length } },
      );
    }
    return field;
  }

  /** Normalized value of the first field named `name`. */
  getFirstValue(name: string): string {
    const [first] = this.lookupByName(name);
    if (!first) {
      throw new RecordFileError('FIELD_NOT_FOUND', `Field '${name}' not found in record '${this.name}'`, {
        metadata: { record: this.name, field: name },
      });
    }
    return first.value;
  }

  contains(name: string): boolean {
    return this.nameIndex.has(name);
  }

  [Symbol.iterator](): Iterator<Field> {
    return this.fields[Symbol.iterator]();
  }

  /** Collect one attribute of every field, in append order. */
  arrayOf(attribute: FieldAttribute): string[] {
    return this.fields.map((f) => f[attribute]);
  }

  /**
   * Build a plain object keyed by field name.
   *
   * Empty values are left out. A repeated field name maps to the list of its values.
   */
  toObject(options?: ToObjectOptions): { [name: string]: RecordObjectValue } {
    const out: { [name: string]: RecordObjectValue } = {};

    for (const field of this.fields) {
      if (field.value === '') continue;
      const value = options?.convert ? field.convert() : field.value;

      const existing = out[field.name];
      if (existing === undefined) {
        out[field.name] = value;
      } else if (Array.isArray(existing)) {
        existing.push(value);
      } else {
        out[field.name] = [existing, value];
      }
    }

    return out;
  }

  /** Copy the current decoded values out of the shared template. */
  cloneValues(): RecordSnapshot {
    return {
      name: this.name,
      fields: this.fields.map((f) => ({ name: f.name, value: f.value, rawValue: f.rawValue })),
    };
  }

  /**
   * Remove every field whose name is in `names`.
   *
   * Remaining fields keep their index, offset and bounds, and the record length
   * is unchanged, so decoding still slices the original positions.
   */
  remove(names: Iterable<string>): void {
    const drop = new Set(names);
    this.retain((f) => !drop.has(f.name));
  }

  /** Remove every field whose name is not in `names`. Positions are kept as with `remove()`. */
  keep(names: Iterable<string>): void {
    const wanted = new Set(names);
    this.retain((f) => wanted.has(f.name));
  }

  /** New template with a fresh copy of every field definition, values empty. */
  copy(): Record {
    const copied = new Record(this.name, this.description);
    for (const field of this.fields) {
      copied.append(field.copy());
    }
    return copied;
  }

  toString(): string {
    return `${this.name}(${String(this._length)}): ${this.fields.map((f) => f.toString()).join(' ')}`;
  }

  private retain(predicate: (field: Field) => boolean): void {
    this.fields = this.fields.filter(predicate);
    this.nameIndex = new Map();
    this.fields.forEach((field, position) => {
      const positions = this.nameIndex.get(field.name);
      if (positions) {
        positions.push(position);
      } else {
        this.nameIndex.set(field.name, [position]);
      }
    });
  }
}
