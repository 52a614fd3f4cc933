import type { ChampionshipOdds, ConditionedTally, Round } from '../core/types';

/**
 * Plain-name record of one simulated bracket.
 */
export interface RunSummary {
  divisions: {
    division: string;
    rounds: { round: Round; label: string; survivors: string[] }[];
  }[];
  finalists: string[];
  champion: string;
}

interface ReportBase {
  title: string;
  generatedAt: string;
  input: string;
}

export interface BracketReport extends ReportBase {
  kind: 'bracket';
  summary: RunSummary;
}

export interface ChampionshipOddsReport extends ReportBase {
  kind: 'championship-odds';
  odds: ChampionshipOdds;
}

export interface ConditionedReport extends ReportBase {
  kind: 'conditioned';
  tally: ConditionedTally;
}

export type OutputReport = BracketReport | ChampionshipOddsReport | ConditionedReport;
