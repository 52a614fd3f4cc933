import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { CONFIG } from '../config';
import type {
  ChampionshipOdds,
  ConditionedTally,
  CountMap,
  DivisionRoundCounts,
  Entrant,
  Round,
  RoundProbability,
} from '../core/types';
import { ROUNDS_IN_ORDER } from '../core/constants';
import { mapRounds } from '../engine/probability-table';

let db: Database.Database | null = null;

export function getDatabase(): Database.Database {
  if (db) return db;
  return initDatabase(CONFIG.DB_PATH);
}

/**
 * Open (or reopen) the database at the given path. ':memory:' is accepted.
 */
export function initDatabase(filePath: string): Database.Database {
  closeDatabase();

  if (filePath !== ':memory:') {
    const dir = path.dirname(filePath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  db = new Database(filePath);
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');

  initializeSchema(db);
  return db;
}

function initializeSchema(database: Database.Database): void {
  const schemaPath = path.join(CONFIG.ROOT_DIR, 'src', 'storage', 'schema.sql');
  const schema = fs.readFileSync(schemaPath, 'utf-8');
  database.exec(schema);
}

export function closeDatabase(): void {
  if (db) {
    db.close();
    db = null;
  }
}

// === Entrant Operations ===

interface EntrantRow {
  id: string;
  name: string;
  division: string;
  seed: number;
  independent_json: string;
  conditional_json: string;
}

export function upsertEntrants(entrants: readonly Entrant[]): void {
  const database = getDatabase();
  const stmt = database.prepare(`
    INSERT OR REPLACE INTO entrants (id, name, division, seed, independent_json, conditional_json, loaded_at)
    VALUES (?, ?, ?, ?, ?, ?, ?)
  `);
  const upsert = database.transaction((list: readonly Entrant[]) => {
    const loadedAt = Date.now();
    for (const e of list) {
      stmt.run(
        e.id,
        e.name,
        e.division,
        e.seed,
        JSON.stringify(e.probabilities.independent),
        JSON.stringify(e.probabilities.conditional),
        loadedAt,
      );
    }
  });
  upsert(entrants);
}

function parseRoundOdds(json: string): Record<Round, RoundProbability> {
  const parsed: unknown = JSON.parse(json);
  const entries: [string, unknown][] = typeof parsed === 'object' && parsed !== null ? Object.entries(parsed) : [];
  const values = new Map(entries);
  return mapRounds(round => {
    const value = values.get(round);
    return typeof value === 'number' ? value : null;
  });
}

export function getEntrants(): Entrant[] {
  const database = getDatabase();
  const rows = database
    .prepare<[], EntrantRow>('SELECT * FROM entrants ORDER BY division, seed, name')
    .all();

  return rows.map(row => ({
    id: row.id,
    name: row.name,
    division: row.division,
    seed: row.seed,
    probabilities: {
      independent: parseRoundOdds(row.independent_json),
      conditional: parseRoundOdds(row.conditional_json),
    },
  }));
}

// === Aggregate Result Operations ===

interface CountRow {
  entrant_name: string;
  count: number;
}

interface SimulationRunRow {
  id: number;
  mode: 'championship-odds' | 'conditioned';
  champion: string | null;
  total_runs: number;
  attempts: number;
  created_at: number;
}

function insertRun(mode: SimulationRunRow['mode'], champion: string | null, totalRuns: number, attempts: number): number {
  const info = getDatabase()
    .prepare(`
      INSERT INTO simulation_runs (mode, champion, total_runs, attempts, created_at)
      VALUES (?, ?, ?, ?, ?)
    `)
    .run(mode, champion, totalRuns, attempts, Date.now());
  return Number(info.lastInsertRowid);
}

function toCountMap(rows: CountRow[]): CountMap {
  const counts: CountMap = {};
  for (const row of rows) counts[row.entrant_name] = row.count;
  return counts;
}

export function recordChampionshipOdds(odds: ChampionshipOdds): number {
  const database = getDatabase();
  const record = database.transaction((result: ChampionshipOdds) => {
    const runId = insertRun('championship-odds', null, result.totalSims, result.totalSims);
    const stmt = database.prepare('INSERT INTO champion_counts (run_id, entrant_name, count) VALUES (?, ?, ?)');
    for (const [name, count] of Object.entries(result.championshipCounts)) {
      stmt.run(runId, name, count);
    }
    return runId;
  });
  return record(odds);
}

export function getChampionshipCounts(runId: number): CountMap {
  const rows = getDatabase()
    .prepare<[number], CountRow>('SELECT entrant_name, count FROM champion_counts WHERE run_id = ?')
    .all(runId);
  return toCountMap(rows);
}

export function recordConditionedTally(tally: ConditionedTally): number {
  const database = getDatabase();
  const record = database.transaction((result: ConditionedTally) => {
    const runId = insertRun('conditioned', result.champion, result.acceptedRuns, result.attempts);

    const finalistStmt = database.prepare(
      'INSERT INTO finalist_counts (run_id, entrant_name, count) VALUES (?, ?, ?)',
    );
    for (const [name, count] of Object.entries(result.finalistCounts)) {
      finalistStmt.run(runId, name, count);
    }

    const survivorStmt = database.prepare(
      'INSERT INTO survivor_counts (run_id, division, round, entrant_name, count) VALUES (?, ?, ?, ?, ?)',
    );
    for (const [division, rounds] of Object.entries(result.divisionCounts)) {
      for (const round of ROUNDS_IN_ORDER) {
        for (const [name, count] of Object.entries(rounds[round] ?? {})) {
          survivorStmt.run(runId, division, round, name, count);
        }
      }
    }
    return runId;
  });
  return record(tally);
}

export function getConditionedFinalists(runId: number): CountMap {
  const rows = getDatabase()
    .prepare<[number], CountRow>('SELECT entrant_name, count FROM finalist_counts WHERE run_id = ?')
    .all(runId);
  return toCountMap(rows);
}

export function getConditionedSurvivors(runId: number): DivisionRoundCounts {
  const rows = getDatabase()
    .prepare<[number], CountRow & { division: string; round: string }>(
      'SELECT division, round, entrant_name, count FROM survivor_counts WHERE run_id = ?',
    )
    .all(runId);

  const counts: DivisionRoundCounts = {};
  for (const row of rows) {
    const round = ROUNDS_IN_ORDER.find(r => r === row.round);
    if (!round) continue;
    const rounds = counts[row.division] ?? {};
    counts[row.division] = rounds;
    const entrants = rounds[round] ?? {};
    rounds[round] = entrants;
    entrants[row.entrant_name] = row.count;
  }
  return counts;
}

export function getSimulationRuns(limit: number = 20): SimulationRunRow[] {
  return getDatabase()
    .prepare<[number], SimulationRunRow>('SELECT * FROM simulation_runs ORDER BY id DESC LIMIT ?')
    .all(limit);
}
