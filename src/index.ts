#!/usr/bin/env node
import { runSimulation } from './pipeline/runner';
import { parseArgs, parseOptionalInt, selectMode } from './pipeline/cli-args';
import { destroyPool } from './engine/simulator';
import { closeDatabase } from './storage/database';
import { CONFIG } from './config';

function printUsage(): void {
  console.log(`
Bracket Odds: Monte Carlo tournament bracket simulator

Usage:
  npm run dev -- simulate [options]      Simulate from a probability table

Simulate options:
  --input <file>              Input CSV (default: ${CONFIG.DEFAULT_INPUT})
  --output <file>             File to save output (default: ${CONFIG.DEFAULT_OUTPUT})
  --champion-mode             Run ${CONFIG.CHAMPION_SIMULATION_RUNS.toLocaleString()} simulations and print each team's odds of winning
  --find-champion <team>      Keep simulating until <team> wins ${CONFIG.DESIRED_CHAMPION_RUNS.toLocaleString()} times
  --sims <count>              Override the number of simulations
  --max-attempts <count>      Attempts allowed per matching run (default: ${CONFIG.MAX_ATTEMPTS_PER_RUN})
  --seed <number>             RNG seed for reproducibility
  --export                    Export the report to JSON

Examples:
  npm run dev -- simulate --input data/data.csv
  npm run dev -- simulate --champion-mode
  npm run dev -- simulate --find-champion "Harbor City"
  `);
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const command = args[0];
  const flags = parseArgs(args.slice(1));

  try {
    switch (command) {
      case 'simulate': {
        await runSimulation({
          input: flags.input,
          output: flags.output,
          mode: selectMode(flags),
          simulations: parseOptionalInt(flags.sims, 'sims'),
          maxAttemptsPerRun: parseOptionalInt(flags['max-attempts'], 'max-attempts'),
          seed: parseOptionalInt(flags.seed, 'seed'),
          exportJson: flags.export === 'true',
        });
        break;
      }

      default:
        printUsage();
    }
  } finally {
    closeDatabase();
    await destroyPool();
  }
}

main().catch(err => {
  console.error('Fatal error:', err instanceof Error ? err.message : err);
  closeDatabase();
  process.exit(1);
});
