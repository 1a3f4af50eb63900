import { RecordFileError } from './RecordFileError.js';

/**
 * Closed set of atomic field kinds.
 *
 * The kind only drives value normalization (overpunch decoding) and typed
 * conversion; it never rejects field content.
 */
export const FieldKind = {
  STRING: 'STRING',
  DECIMAL: 'DECIMAL',
  INTEGER: 'INTEGER',
  DATE: 'DATE',
  OVERPUNCH: 'OVERPUNCH',
  VOID: 'VOID',
} as const;

export type FieldKind = (typeof FieldKind)[keyof typeof FieldKind];

const KIND_BY_DESCRIPTION: ReadonlyMap<string, FieldKind> = new Map([
  ['decimal', FieldKind.DECIMAL],
  ['integer', FieldKind.INTEGER],
  ['date', FieldKind.DATE],
  ['string', FieldKind.STRING],
  ['overpunch', FieldKind.OVERPUNCH],
  ['', FieldKind.VOID],
]);

export interface FieldTypeOptions {
  /** dayjs parse pattern used by `Field.convert()` for `date` fields. Default: `'YYYYMMDD'`. */
  readonly format?: string;
}

/** Map a type description to its kind. Exact, case-sensitive match. */
export function kindOf(description: string): FieldKind {
  const kind = KIND_BY_DESCRIPTION.get(description);
  if (kind === undefined) {
    throw new RecordFileError('UNKNOWN_FIELD_TYPE', `Unknown field type description '${description}'`, {
      metadata: { description },
    });
  }
  return kind;
}

/**
 * Named field type, shared by every field that declares it.
 *
 * @example
 * ```typescript
 * const alnum = new FieldType('A/N', 'string');
 * alnum.kind; // 'STRING'
 * ```
 */
export class FieldType {
  readonly name: string;
  readonly description: string;
  readonly kind: FieldKind;
  readonly format: string;

  constructor(name: string, description: string, options?: FieldTypeOptions) {
    this.name = name;
    this.description = description;
    this.kind = kindOf(description);
    this.format = options?.format ?? 'YYYYMMDD';
    Object.freeze(this);
  }

  /** Structural equality on name, description and kind. */
  equals(other: FieldType): boolean {
    return this.name === other.name && this.description === other.description && this.kind === other.kind;
  }

  /** `true` for kinds whose value converts to a number. */
  get isNumeric(): boolean {
    return this.kind === FieldKind.INTEGER || this.kind === FieldKind.DECIMAL || this.kind === FieldKind.OVERPUNCH;
  }
}
