/**
 * Maps a raw line to the record-type key of its layout entry.
 *
 * Must be pure: it is called once per line, before decoding.
 */
export type LineClassifier = (line: string) => string;

/** Classifier reading the key at a fixed position of the line, e.g. `byPrefix(4)` for the first 4 characters. */
export function byPrefix(length: number, offset = 0): LineClassifier {
  return (line) => line.slice(offset, offset + length);
}
