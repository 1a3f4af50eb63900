import type { Record } from '../model/Record.js';
import { RecordFileError } from '../model/RecordFileError.js';

/** Comparison operators accepted in a field condition. */
export type FieldFilterOperator = '=' | '!=' | '~' | '!~' | '<' | '>';

const OPERATORS: readonly FieldFilterOperator[] = ['=', '!=', '~', '!~', '<', '>'];

const EXPRESSION = /^\s*(\w+)\s+(=|!=|~|!~|<|>)\s+(.+?)\s*$/;

function isOperator(op: string): op is FieldFilterOperator {
  return (OPERATORS as readonly string[]).includes(op);
}

/**
 * A single condition on a field value, e.g. `AMOUNT > 100` or `CODE ~ ^AF`.
 *
 * `=`/`!=` compare strings, `~`/`!~` test a regular expression, `<`/`>` compare
 * numbers (a non-numeric value never matches). When a record holds several
 * fields with the name, the condition holds if any of them satisfies it.
 */
export class FieldFilter {
  readonly field: string;
  readonly operator: FieldFilterOperator;
  readonly operand: string;
  private readonly pattern: RegExp | null;

  constructor(field: string, operator: string, operand: string) {
    const op = operator.trim();
    if (!isOperator(op)) {
      throw new RecordFileError('INVALID_FILTER', `'${operator}' is not a field filter operator`, {
        metadata: { operator },
      });
    }
    this.field = field.trim();
    this.operator = op;
    this.operand = operand.trim();
    this.pattern = op === '~' || op === '!~' ? FieldFilter.compile(this.operand) : null;
  }

  /** Parse `'FIELD op value'`; the operator must be surrounded by blanks. */
  static parse(expression: string): FieldFilter {
    const match = EXPRESSION.exec(expression);
    if (!match) {
      throw new RecordFileError('INVALID_FILTER', `Unable to find a filter operator in '${expression}'`, {
        metadata: { expression },
      });
    }
    const [, field = '', op = '', operand = ''] = match;
    return new FieldFilter(field, op, operand);
  }

  matches(record: Record): boolean {
    return record.lookupByName(this.field).some((f) => this.test(f.value));
  }

  toString(): string {
    return `${this.field}${this.operator}${this.operand}`;
  }

  private test(value: string): boolean {
    switch (this.operator) {
      case '=':
        return value === this.operand;
      case '!=':
        return value !== this.operand;
      case '~':
        return this.pattern?.test(value) ?? false;
      case '!~':
        return !(this.pattern?.test(value) ?? false);
      case '<':
      case '>':
        return this.compareNumbers(value);
    }
  }

  private compareNumbers(value: string): boolean {
    if (value === '') return false;
    const left = Number(value);
    const right = Number(this.operand);
    if (Number.isNaN(left) || Number.isNaN(right)) return false;
    return this.operator === '<' ? left < right : left > right;
  }

  private static compile(source: string): RegExp {
    try {
      return new RegExp(source);
    } catch (err) {
      throw new RecordFileError('INVALID_FILTER', `Invalid regular expression '${source}'`, {
        cause: err,
        metadata: { pattern: source },
      });
    }
  }
}
