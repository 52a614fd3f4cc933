import fs from 'fs';
import { CONFIG } from '../config';
import { loadTournament } from '../data/loader';
import type { TournamentOptions } from '../bracket/types';
import { simulateBracket } from '../engine/bracket-propagator';
import { resolveRng } from '../engine/rng';
import { runChampionshipOdds, runConditionedSimulation } from '../engine/simulator';
import type { SimulationExecutor } from '../engine/simulator';
import { upsertEntrants, recordChampionshipOdds, recordConditionedTally } from '../storage/database';
import { generateBracketReport, generateConditionedReport, generateOddsReport } from '../output/report-generator';
import { renderReport } from '../output/cli-renderer';
import { exportReportToJson } from '../output/json-exporter';
import type { OutputReport } from '../output/types';
import { ProgressReporter } from './progress-reporter';

/** Exactly one of these is active per invocation. */
export type RunMode =
  | { kind: 'bracket' }
  | { kind: 'championship-odds' }
  | { kind: 'conditioned'; champion: string };

export interface RunOptions {
  input?: string;
  output?: string;
  mode?: RunMode;
  simulations?: number;
  maxAttemptsPerRun?: number;
  seed?: number;
  exportJson?: boolean;
  /** Directory for the JSON export; defaults to CONFIG.OUTPUT_DIR. */
  exportDir?: string;
  persist?: boolean;
  silent?: boolean;
  executor?: SimulationExecutor;
  tournament?: TournamentOptions;
}

export interface PipelineResult {
  report: OutputReport;
  text: string;
  outputPath: string;
  exportPath?: string;
}

/**
 * Run a full pipeline:
 * 1. Load entrants and build the tournament
 * 2. Simulate in the selected mode
 * 3. Store results
 * 4. Render, write and optionally export the report
 */
export async function runSimulation(options: RunOptions = {}): Promise<PipelineResult> {
  const input = options.input ?? CONFIG.DEFAULT_INPUT;
  const outputPath = options.output ?? CONFIG.DEFAULT_OUTPUT;
  const mode = options.mode ?? { kind: 'bracket' };
  const persist = options.persist ?? CONFIG.PERSIST_RESULTS;
  const log = options.silent ? () => {} : (line: string) => console.log(line);

  log(`Loading bracket data from ${input}...`);
  const tournament = loadTournament(input, options.tournament);
  const entrants = tournament.getEntrants();
  log(`Loaded ${entrants.length} teams in ${tournament.divisions.size} regions.`);

  if (persist) upsertEntrants(entrants);

  let report: OutputReport;
  switch (mode.kind) {
    case 'bracket': {
      const run = simulateBracket(tournament, resolveRng(options.seed));
      report = generateBracketReport(run, input);
      break;
    }

    case 'championship-odds': {
      const progress = new ProgressReporter('championship odds simulations', { log });
      progress.start();
      try {
        const odds = await runChampionshipOdds(tournament, {
          simulations: options.simulations,
          seed: options.seed,
          executor: options.executor,
        });
        if (persist) recordChampionshipOdds(odds);
        report = generateOddsReport(odds, input);
      } finally {
        progress.stop();
      }
      break;
    }

    case 'conditioned': {
      const runs = options.simulations ?? CONFIG.DESIRED_CHAMPION_RUNS;
      log(`Desired champion: ${mode.champion}`);
      log(`Simulation will stop after ${runs} runs generate desired champion`);

      const progress = new ProgressReporter('desired champion simulations', { log });
      progress.start();
      try {
        const tally = await runConditionedSimulation(tournament, mode.champion, {
          simulations: runs,
          seed: options.seed,
          executor: options.executor,
          maxAttemptsPerRun: options.maxAttemptsPerRun,
        });
        if (persist) recordConditionedTally(tally);
        report = generateConditionedReport(tally, input);
      } finally {
        progress.stop();
      }
      break;
    }
  }

  const text = renderReport(report);
  log(text);
  fs.writeFileSync(outputPath, text, 'utf-8');

  let exportPath: string | undefined;
  if (options.exportJson) {
    exportPath = exportReportToJson(report, undefined, options.exportDir);
    log(`Report exported to: ${exportPath}`);
  }

  return { report, text, outputPath, exportPath };
}
