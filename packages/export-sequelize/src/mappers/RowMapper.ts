import type { Field, Record } from '@fixedrec/core';
import type { ColumnMapping } from '../models/RecordTableModel.js';
import { TAG_COLUMN } from '../models/RecordTableModel.js';

export type ColumnValue = string | number | null;

export type RecordRow = {
  [column: string]: ColumnValue;
};

/**
 * Copy the current values of `record` into a row.
 *
 * Fields are matched to columns by position, so any record of the same type
 * maps onto the columns, whether the template they were derived from, a copy
 * or another build of the layout. A column whose field was removed gets `null`.
 *
 * Numeric columns receive the converted number (signed for overpunch), or
 * `null` when the value is empty or not a number; every other column receives
 * the blank-trimmed value.
 */
export function toRow(tag: string, columns: readonly ColumnMapping[], record: Record): RecordRow {
  const byIndex = new Map<number, Field>();
  for (const field of record) {
    byIndex.set(field.index, field);
  }

  const row: RecordRow = { [TAG_COLUMN]: tag };
  for (const { column, index } of columns) {
    const field = byIndex.get(index);
    if (!field) {
      row[column] = null;
    } else if (field.type.isNumeric) {
      const converted = field.convert();
      row[column] = typeof converted === 'number' ? converted : null;
    } else {
      row[column] = field.value;
    }
  }

  return row;
}
