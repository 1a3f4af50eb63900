/** Entry of the schema's field-type table. */
export interface FieldTypeDefinition {
  /** Name fields refer to in their `type` (e.g. `'A/N'`). */
  readonly name: string;
  /** One of `string`, `decimal`, `integer`, `date`, `overpunch`, or empty. */
  readonly description: string;
  /** Date pattern for `date` types. */
  readonly format?: string;
}

/** One field of a record type, in schema order. */
export interface FieldDefinition {
  readonly name: string;
  readonly description: string;
  /** Name of an entry of `LayoutDefinition.fieldTypes`. */
  readonly type: string;
  readonly length: number;
}

/** One record type and its ordered fields. */
export interface RecordDefinition {
  /** Record-type key the classifier returns for lines of this type. */
  readonly name: string;
  readonly description: string;
  readonly fields: readonly FieldDefinition[];
}

/**
 * Already-parsed schema of a record-based file.
 *
 * This is what a schema loader (XML, JSON, code) hands to `Layout.build()`; the
 * core does not parse any file format itself.
 */
export interface LayoutDefinition {
  readonly name?: string;
  readonly description?: string;
  /** Free-form attributes carried along with the schema (version, source, ...). */
  readonly meta?: Readonly<{ [key: string]: string }>;
  readonly fieldTypes: readonly FieldTypeDefinition[];
  readonly records: readonly RecordDefinition[];
}
