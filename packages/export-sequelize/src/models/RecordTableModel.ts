import { DataTypes } from 'sequelize';
import type { Sequelize, ModelStatic, Model, ModelAttributes, DataType } from 'sequelize';
import { FieldKind, type FieldType, type Record } from '@fixedrec/core';

/** Column holding the writer's tag, first in every table. */
export const TAG_COLUMN = 'tag';

export type RecordTableModel = ModelStatic<Model>;

/** One column per field, in field order. `index` is the field's position in its record. */
export interface ColumnMapping {
  readonly column: string;
  readonly index: number;
  readonly type: FieldType;
}

/** Table of a record type. Purely numeric record names get a `REC` prefix. */
export function tableNameFor(recordName: string): string {
  return /^\d+$/.test(recordName) ? `REC${recordName}` : recordName;
}

/**
 * Column names for the fields of `record`.
 *
 * A repeated field name gets `_2`, `_3`… suffixes in order of appearance.
 * Names are compared case-insensitively, and the tag column counts as taken.
 */
export function columnsFor(record: Record): ColumnMapping[] {
  const taken = new Set([TAG_COLUMN]);
  const mappings: ColumnMapping[] = [];

  for (const field of record) {
    let column = field.name;
    for (let n = 2; taken.has(column.toLowerCase()); n++) {
      column = `${field.name}_${String(n)}`;
    }
    taken.add(column.toLowerCase());
    mappings.push({ column, index: field.index, type: field.type });
  }

  return mappings;
}

function columnType(type: FieldType): DataType {
  switch (type.kind) {
    case FieldKind.INTEGER:
      return DataTypes.INTEGER;
    case FieldKind.DECIMAL:
    case FieldKind.OVERPUNCH:
      return DataTypes.REAL;
    default:
      return DataTypes.TEXT;
  }
}

export function defineRecordTableModel(sequelize: Sequelize, record: Record, columns: readonly ColumnMapping[]): RecordTableModel {
  const tableName = tableNameFor(record.name);
  const attributes: ModelAttributes = {
    [TAG_COLUMN]: { type: DataTypes.TEXT, allowNull: false, defaultValue: '' },
  };
  for (const { column, type } of columns) {
    attributes[column] = { type: columnType(type), allowNull: true };
  }

  const model = sequelize.define(tableName, attributes, {
    tableName,
    timestamps: false,
    freezeTableName: true,
  });
  model.removeAttribute('id');
  return model;
}
