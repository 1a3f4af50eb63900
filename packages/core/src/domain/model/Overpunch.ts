/** Sign carried by a decoded value: `1` positive, `-1` negative, `0` when no overpunch symbol was found. */
export type Sign = 1 | -1 | 0;

export interface OverpunchResult {
  /** Input with its trailing overpunch symbol replaced by the digit it encodes. */
  readonly digits: string;
  readonly sign: Sign;
}

// `{` and A-I encode +0..+9, `}` and J-R encode -0..-9.
const OVERPUNCH_TABLE: ReadonlyMap<string, { readonly digit: string; readonly sign: Sign }> = new Map([
  ['{', { digit: '0', sign: 1 }],
  ['A', { digit: '1', sign: 1 }],
  ['B', { digit: '2', sign: 1 }],
  ['C', { digit: '3', sign: 1 }],
  ['D', { digit: '4', sign: 1 }],
  ['E', { digit: '5', sign: 1 }],
  ['F', { digit: '6', sign: 1 }],
  ['G', { digit: '7', sign: 1 }],
  ['H', { digit: '8', sign: 1 }],
  ['I', { digit: '9', sign: 1 }],
  ['}', { digit: '0', sign: -1 }],
  ['J', { digit: '1', sign: -1 }],
  ['K', { digit: '2', sign: -1 }],
  ['L', { digit: '3', sign: -1 }],
  ['M', { digit: '4', sign: -1 }],
  ['N', { digit: '5', sign: -1 }],
  ['O', { digit: '6', sign: -1 }],
  ['P', { digit: '7', sign: -1 }],
  ['Q', { digit: '8', sign: -1 }],
  ['R', { digit: '9', sign: -1 }],
]);

/**
 * Decode a signed overpunch numeric string.
 *
 * Only the final character is translated; every other character passes through.
 * The digits never carry a minus sign, even for a negative symbol: the sign is
 * reported separately.
 *
 * @example
 * ```typescript
 * decodeOverpunch('123A'); // { digits: '1231', sign: 1 }
 * decodeOverpunch('004}'); // { digits: '0040', sign: -1 }
 * ```
 */
export function decodeOverpunch(value: string): OverpunchResult {
  if (value === '') return { digits: value, sign: 0 };

  const last = value.charAt(value.length - 1);
  const entry = OVERPUNCH_TABLE.get(last);
  if (entry === undefined) return { digits: value, sign: 0 };

  return { digits: value.slice(0, -1) + entry.digit, sign: entry.sign };
}

/** `true` when the last character of `value` is an overpunch symbol. */
export function isOverpunched(value: string): boolean {
  return value !== '' && OVERPUNCH_TABLE.has(value.charAt(value.length - 1));
}
