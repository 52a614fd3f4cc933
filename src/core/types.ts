// === TOURNAMENT STRUCTURE ===

export type Round =
  | 'first-four'
  | 'round-of-32'
  | 'round-of-16'
  | 'elite-8'
  | 'final-4'
  | 'finals'
  | 'champions';

/** Probability value for one round; `null` means the source row left the column empty. */
export type RoundProbability = number | null;

export interface ProbabilityTable {
  /** Cumulative probability of reaching each round, as given in the input. */
  independent: Record<Round, RoundProbability>;
  /** Probability of surviving each round given the previous one was survived. */
  conditional: Record<Round, RoundProbability>;
}

export interface Entrant {
  id: string;
  name: string;
  division: string;
  seed: number;
  probabilities: ProbabilityTable;
}

export type Rng = () => number;

// === SIMULATION RESULTS ===

export interface RoundSurvivors {
  round: Round;
  survivors: Entrant[];
}

export interface DivisionRun {
  division: string;
  rounds: RoundSurvivors[];
  winner: Entrant;
}

/** Outcome of one full tournament resolution. Never mutated once produced. */
export interface BracketRun {
  divisions: DivisionRun[];
  finalists: [Entrant, Entrant];
  champion: Entrant;
}

export type CountMap = Record<string, number>;

/** division -> round -> entrant name -> times seen as a survivor */
export type DivisionRoundCounts = Record<string, Partial<Record<Round, CountMap>>>;

export interface ChampionshipOddsRow {
  name: string;
  division: string;
  seed: number;
  count: number;
  /** 0-100 */
  percent: number;
}

export interface ChampionshipOdds {
  totalSims: number;
  championshipCounts: CountMap;
  /** Entrants at or above the report threshold, most frequent first. */
  rows: ChampionshipOddsRow[];
}

export interface ConditionedTally {
  champion: string;
  acceptedRuns: number;
  attempts: number;
  divisionCounts: DivisionRoundCounts;
  finalistCounts: CountMap;
}
