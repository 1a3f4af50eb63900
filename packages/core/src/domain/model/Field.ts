import dayjs from 'dayjs';
import customParseFormat from 'dayjs/plugin/customParseFormat.js';
import { FieldKind, type FieldType } from './FieldType.js';
import { decodeOverpunch, type Sign } from './Overpunch.js';
import { RecordFileError } from './RecordFileError.js';

dayjs.extend(customParseFormat);

/** Typed value produced by `Field.convert()`. */
export type ConvertedValue = string | number | Date | null;

/** Remove leading and trailing ASCII blanks only. Tabs and other whitespace are kept. */
export function trimBlanks(s: string): string {
  let start = 0;
  let end = s.length;
  while (start < end && s.charCodeAt(start) === 0x20) start++;
  while (end > start && s.charCodeAt(end - 1) === 0x20) end--;
  return s.slice(start, end);
}

/**
 * A named, typed, fixed-length slot of a record.
 *
 * `index`, `offset` and the bounds are meaningful once the field has been
 * appended to a `Record`; they are assigned then and never change. `rawValue`,
 * `value` and `sign` are overwritten on every decode of the owning line.
 */
export class Field {
  readonly name: string;
  readonly description: string;
  readonly type: FieldType;
  readonly length: number;

  private _index = 0;
  private _offset = 0;
  private _attached = false;
  private _rawValue = '';
  private _value = '';
  private _sign: Sign = 0;

  constructor(name: string, description: string, type: FieldType, length: number) {
    if (!Number.isInteger(length) || length < 0) {
      throw new RecordFileError('INVALID_LENGTH', `Field '${name}' has invalid length ${String(length)}`, {
        metadata: { field: name, length },
      });
    }
    this.name = name;
    this.description = description;
    this.type = type;
    this.length = length;
  }

  /** Zero-based position among the fields of the owning record. */
  get index(): number {
    return this._index;
  }

  /** Offset of the first character of this field within the record line. */
  get offset(): number {
    return this._offset;
  }

  get lowerBound(): number {
    return this._offset;
  }

  /** Exclusive end of this field within the record line. */
  get upperBound(): number {
    return this._offset + this.length;
  }

  /** `true` once the field belongs to a record. */
  get attached(): boolean {
    return this._attached;
  }

  /** Last decoded slice, verbatim. */
  get rawValue(): string {
    return this._rawValue;
  }

  /** Last decoded slice, blank-trimmed, overpunch-decoded for `overpunch` fields. */
  get value(): string {
    return this._value;
  }

  /** Sign of the last overpunch-decoded value; `0` for any other kind or when no symbol was found. */
  get sign(): Sign {
    return this._sign;
  }

  /**
   * Assign the field's position. Called once by `Record.append()`.
   * @internal
   */
  attach(index: number, offset: number): void {
    if (this._attached) {
      throw new RecordFileError('FIELD_ALREADY_ATTACHED', `Field '${this.name}' already belongs to a record`, {
        metadata: { field: this.name, index: this._index },
      });
    }
    this._index = index;
    this._offset = offset;
    this._attached = true;
  }

  /** Store a slice of the record line as this field's raw and normalized value. */
  decode(slice: string): void {
    this._rawValue = slice;
    const trimmed = trimBlanks(slice);

    if (this.type.kind === FieldKind.OVERPUNCH) {
      const { digits, sign } = decodeOverpunch(trimmed);
      this._value = digits;
      this._sign = sign;
    } else {
      this._value = trimmed;
      this._sign = 0;
    }
  }

  /** Clear the decoded values. */
  reset(): void {
    this._rawValue = '';
    this._value = '';
    this._sign = 0;
  }

  /**
   * Convert the normalized value according to the field kind.
   *
   * Numeric kinds yield a `number` (negated for a negative overpunch sign), `date`
   * yields a `Date` parsed with the type's format. Empty or unparsable values of
   * those kinds yield `null`. `string` and `void` fields yield the value itself.
   */
  convert(): ConvertedValue {
    const value = this._value;

    switch (this.type.kind) {
      case FieldKind.STRING:
      case FieldKind.VOID:
        return value;
      case FieldKind.DATE: {
        if (value === '') return null;
        const parsed = dayjs(value, this.type.format, true);
        return parsed.isValid() ? parsed.toDate() : null;
      }
      case FieldKind.INTEGER:
      case FieldKind.DECIMAL:
      case FieldKind.OVERPUNCH: {
        if (value === '') return null;
        const parsed = Number(value);
        if (!Number.isFinite(parsed)) return null;
        return this._sign === -1 ? -parsed : parsed;
      }
    }
  }

  /** Structural equality on the definition (name, description, length, type). Values are ignored. */
  equals(other: Field): boolean {
    return (
      this.name === other.name &&
      this.description === other.description &&
      this.length === other.length &&
      this.type.equals(other.type)
    );
  }

  /** Fresh, unattached field with the same definition. */
  copy(): Field {
    return new Field(this.name, this.description, this.type, this.length);
  }

  toString(): string {
    return `${this.name}[${String(this.lowerBound)}:${String(this.upperBound)}]=<${this._value}>`;
  }
}
