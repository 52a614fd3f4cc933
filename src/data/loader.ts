import fs from 'fs';
import { parse } from 'csv-parse/sync';
import type { Entrant } from '../core/types';
import { HEADER_COLUMNS, HEADER_LINE, ROUNDS_IN_ORDER, ROUND_NAMES } from '../core/constants';
import { HeaderMismatchError, MalformedInputError } from '../core/errors';
import { buildProbabilityTable, parseProbability } from '../engine/probability-table';
import { buildTournament, makeEntrantId } from '../bracket/bracket-builder';
import type { Tournament } from '../bracket/tournament';
import type { TournamentOptions } from '../bracket/types';

const SEED_PATTERN = /^\d+$/;

interface CsvRow {
  fields: string[];
  line: number;
}

function toCsvRow(value: unknown): CsvRow {
  if (typeof value === 'object' && value !== null && 'record' in value && 'info' in value) {
    const { record, info } = value;
    if (Array.isArray(record) && typeof info === 'object' && info !== null && 'lines' in info && typeof info.lines === 'number') {
      return { fields: record.map(String), line: info.lines };
    }
  }
  throw new Error('CSV parser returned an unexpected record shape');
}

function csvErrorLine(err: unknown): number {
  if (typeof err === 'object' && err !== null && 'lines' in err && typeof err.lines === 'number') {
    return err.lines;
  }
  return 1;
}

/**
 * Read CSV text into rows of trimmed fields, each tagged with its line number.
 * Rows with only empty fields are dropped.
 */
function readCsvRows(text: string): CsvRow[] {
  let parsed: unknown;
  try {
    parsed = parse(text, {
      bom: true,
      info: true,
      trim: true,
      skip_empty_lines: true,
      relax_column_count: true,
    });
  } catch (err) {
    throw new MalformedInputError(err instanceof Error ? err.message : String(err), csvErrorLine(err));
  }

  if (!Array.isArray(parsed)) {
    throw new Error('CSV parser returned an unexpected result');
  }
  return parsed.map(toCsvRow).filter(row => row.fields.some(field => field !== ''));
}

/**
 * Build an entrant from one row's fields: REGION,SEED,TEAM and up to seven round probabilities.
 */
export function parseEntrantFields(fields: readonly string[], lineNumber: number): Entrant {
  if (fields.length < 3 || fields.length > HEADER_COLUMNS.length) {
    throw new MalformedInputError(
      `expected between 3 and ${HEADER_COLUMNS.length} fields, got ${fields.length}`,
      lineNumber,
    );
  }

  const [division, seedField, name, ...odds] = fields;
  if (division === '') throw new MalformedInputError('region is empty', lineNumber, 'REGION');
  if (name === '') throw new MalformedInputError('team name is empty', lineNumber, 'TEAM');

  const seed = parseInt(seedField, 10);
  if (!SEED_PATTERN.test(seedField) || seed < 1) {
    throw new MalformedInputError(`"${seedField}" is not a positive integer seed`, lineNumber, 'SEED');
  }

  const values = ROUNDS_IN_ORDER.map((round, i) =>
    parseProbability(odds[i] ?? '', lineNumber, ROUND_NAMES[round]),
  );

  return {
    id: makeEntrantId(division, seed, name),
    name,
    division,
    seed,
    probabilities: buildProbabilityTable(values),
  };
}

/**
 * Parse a single data row given as CSV text.
 */
export function parseEntrantLine(line: string, lineNumber: number): Entrant {
  const [row] = readCsvRows(line);
  if (!row) throw new MalformedInputError('row is empty', lineNumber);
  return parseEntrantFields(row.fields, lineNumber);
}

/**
 * Parse a whole CSV document. The header must match exactly; blank lines are skipped.
 */
export function parseEntrants(text: string): Entrant[] {
  const [header, ...rows] = readCsvRows(text);
  const actual = header ? header.fields.join(',') : '';
  if (actual !== HEADER_LINE) {
    throw new HeaderMismatchError(HEADER_LINE, actual);
  }

  return rows.map(row => parseEntrantFields(row.fields, row.line));
}

export function loadEntrants(filePath: string): Entrant[] {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Input file not found: ${filePath}`);
  }
  return parseEntrants(fs.readFileSync(filePath, 'utf-8'));
}

export function loadTournament(filePath: string, options: TournamentOptions = {}): Tournament {
  return buildTournament(loadEntrants(filePath), options);
}
