import type { ProbabilityTable, Round, RoundProbability } from '../core/types';
import { ROUNDS_IN_ORDER, BELOW_THRESHOLD_MARKER, BELOW_THRESHOLD_PROBABILITY } from '../core/constants';
import { MalformedInputError } from '../core/errors';

const DECIMAL = /^(\d+(\.\d*)?|\.\d+)$/;

/**
 * Parse one probability cell. Empty means the entrant has no odds for that round.
 */
export function parseProbability(raw: string, line: number, column: string): RoundProbability {
  const value = raw.trim();
  if (value === '') return null;
  if (value === BELOW_THRESHOLD_MARKER) return BELOW_THRESHOLD_PROBABILITY;

  if (!DECIMAL.test(value)) {
    throw new MalformedInputError(`"${value}" is not a probability`, line, column);
  }
  const parsed = parseFloat(value);
  if (parsed > 1) {
    throw new MalformedInputError(`${value} is outside [0, 1]`, line, column);
  }
  return parsed;
}

/**
 * Build a per-round record, visiting rounds in play order.
 */
export function mapRounds<T>(fn: (round: Round, index: number) => T): Record<Round, T> {
  return {
    'first-four': fn('first-four', 0),
    'round-of-32': fn('round-of-32', 1),
    'round-of-16': fn('round-of-16', 2),
    'elite-8': fn('elite-8', 3),
    'final-4': fn('final-4', 4),
    finals: fn('finals', 5),
    champions: fn('champions', 6),
  };
}

/**
 * Turn cumulative per-round odds into round-to-round conditional odds.
 *
 *   conditional[1] = independent[1]
 *   conditional[i] = independent[i] / independent[i-1]
 *
 * With no previous value the raw value is used as-is. A previous value of 0 means
 * the entrant can never be alive in round i, so its conditional is 0.
 */
export function deriveConditional(
  independent: Record<Round, RoundProbability>,
): Record<Round, RoundProbability> {
  return mapRounds((round, i) => {
    const current = independent[round];
    const previous = i === 0 ? null : independent[ROUNDS_IN_ORDER[i - 1]];
    if (previous === null || current === null) return current;
    if (previous === 0) return 0;
    return Math.min(1, current / previous);
  });
}

export function buildProbabilityTable(values: RoundProbability[]): ProbabilityTable {
  const independent = mapRounds<RoundProbability>((_round, i) => values[i] ?? null);
  return { independent, conditional: deriveConditional(independent) };
}

export function getConditionalProbability(table: ProbabilityTable, round: Round): RoundProbability {
  return table.conditional[round];
}
