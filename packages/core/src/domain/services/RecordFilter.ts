import type { Layout } from '../model/Layout.js';
import type { Record } from '../model/Record.js';
import { RecordFileError } from '../model/RecordFileError.js';
import { FieldFilter } from './FieldFilter.js';

const CONDITION_DELIMITER = ';';

/** Conjunction of field conditions, written `'F1 = A;F2 > 10'`. */
export class RecordFilter {
  readonly conditions: readonly FieldFilter[];

  constructor(conditions: readonly FieldFilter[]) {
    this.conditions = conditions;
  }

  static parse(expression: string): RecordFilter {
    const conditions = expression
      .split(CONDITION_DELIMITER)
      .filter((part) => part.trim() !== '')
      .map((part) => FieldFilter.parse(part));
    return new RecordFilter(conditions);
  }

  /** `true` when every condition holds. A record lacking a filtered field never matches. */
  matches(record: Record): boolean {
    return this.conditions.every((c) => c.matches(record));
  }

  /** Fail when a condition names a field that no record type of `layout` declares. */
  check(layout: Layout): void {
    for (const condition of this.conditions) {
      if (!layout.containsField(condition.field)) {
        throw new RecordFileError('FIELD_NOT_FOUND', `Filtered field '${condition.field}' is not found in the layout`, {
          metadata: { field: condition.field },
        });
      }
    }
  }

  toString(): string {
    return this.conditions.map((c) => c.toString()).join(CONDITION_DELIMITER);
  }
}
