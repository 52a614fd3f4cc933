import type { Round } from './types';

export const ROUNDS_IN_ORDER: Round[] = [
  'first-four',
  'round-of-32',
  'round-of-16',
  'elite-8',
  'final-4',
  'finals',
  'champions',
];

/** Display label for each round; also the input header column name. */
export const ROUND_NAMES: Record<Round, string> = {
  'first-four': 'FIRST FOUR',
  'round-of-32': 'ROUND OF 32',
  'round-of-16': 'ROUND OF 16',
  'elite-8': 'ELITE 8',
  'final-4': 'FINAL 4',
  'finals': 'FINALS',
  'champions': 'CHAMPIONS',
};

export const SEMIFINAL_ROUND: Round = 'finals';
export const CHAMPIONSHIP_ROUND: Round = 'champions';

// Rounds played inside a division in the reference bracket: play-in plus four standard rounds
export const DEFAULT_DIVISION_ROUNDS = 5;
export const MAX_DIVISION_ROUNDS = ROUNDS_IN_ORDER.indexOf(SEMIFINAL_ROUND);

export const HEADER_COLUMNS: string[] = [
  'REGION',
  'SEED',
  'TEAM',
  ...ROUNDS_IN_ORDER.map(round => ROUND_NAMES[round]),
];

export const HEADER_LINE = HEADER_COLUMNS.join(',');

// Source data reports tiny odds as "<0.1"
export const BELOW_THRESHOLD_MARKER = '<0.1';
export const BELOW_THRESHOLD_PROBABILITY = 0.0001;
