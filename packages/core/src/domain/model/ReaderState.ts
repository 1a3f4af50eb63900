/**
 * Finite state machine for the reader lifecycle.
 *
 * Valid transitions:
 * - `NOT_STARTED` → `POSITIONED` | `EXHAUSTED` | `FAILED` | `CLOSED`
 * - `POSITIONED` → `POSITIONED` | `EXHAUSTED` | `FAILED` | `CLOSED`
 * - `EXHAUSTED`, `FAILED` → `CLOSED`
 * - `CLOSED` → (terminal)
 */
export const ReaderState = {
  NOT_STARTED: 'NOT_STARTED',
  POSITIONED: 'POSITIONED',
  EXHAUSTED: 'EXHAUSTED',
  FAILED: 'FAILED',
  CLOSED: 'CLOSED',
} as const;

export type ReaderState = (typeof ReaderState)[keyof typeof ReaderState];

const VALID_TRANSITIONS: { readonly [S in ReaderState]: readonly ReaderState[] } = {
  [ReaderState.NOT_STARTED]: [ReaderState.POSITIONED, ReaderState.EXHAUSTED, ReaderState.FAILED, ReaderState.CLOSED],
  [ReaderState.POSITIONED]: [ReaderState.POSITIONED, ReaderState.EXHAUSTED, ReaderState.FAILED, ReaderState.CLOSED],
  [ReaderState.EXHAUSTED]: [ReaderState.CLOSED],
  [ReaderState.FAILED]: [ReaderState.CLOSED],
  [ReaderState.CLOSED]: [],
};

/** Check whether a state transition is valid according to the reader lifecycle FSM. */
export function canTransition(from: ReaderState, to: ReaderState): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}
