export type BracketOddsErrorCode =
  | 'MALFORMED_INPUT'
  | 'STRUCTURAL'
  | 'HEADER_MISMATCH'
  | 'CONVERGENCE_EXHAUSTION';

export abstract class BracketOddsError extends Error {
  abstract readonly code: BracketOddsErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * A data row could not be parsed: bad probability, bad seed or wrong field count.
 */
export class MalformedInputError extends BracketOddsError {
  readonly code = 'MALFORMED_INPUT';

  constructor(
    message: string,
    readonly line: number,
    readonly column?: string,
  ) {
    super(`Line ${line}${column ? ` (${column})` : ''}: ${message}`);
  }
}

/**
 * The bracket shape cannot be simulated: seed groups, field sizes or division names.
 */
export class StructuralError extends BracketOddsError {
  readonly code = 'STRUCTURAL';
}

export class HeaderMismatchError extends BracketOddsError {
  readonly code = 'HEADER_MISMATCH';

  constructor(
    readonly expected: string,
    readonly actual: string,
  ) {
    super(`Header line doesn't match expected format.\n  expected: ${expected}\n  actual:   ${actual}`);
  }
}

/**
 * A conditioned search ran out of attempts before producing the requested champion.
 */
export class ConvergenceExhaustion extends BracketOddsError {
  readonly code = 'CONVERGENCE_EXHAUSTION';

  constructor(
    readonly champion: string,
    readonly attempts: number,
    readonly acceptedRuns: number,
    reason?: string,
  ) {
    super(
      reason ??
        `Gave up looking for champion "${champion}" after ${attempts.toLocaleString()} attempts ` +
          `(${acceptedRuns.toLocaleString()} matching runs collected)`,
    );
  }
}

export function isBracketOddsError(err: unknown): err is BracketOddsError {
  return err instanceof BracketOddsError;
}
