import { describe, it, expect, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { exportReportToJson } from '../../src/output/json-exporter';
import { generateOddsReport } from '../../src/output/report-generator';

describe('exportReportToJson', () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) fs.rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it('writes the report as pretty JSON, creating the directory', () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'bracket-odds-'));
    const outputDir = path.join(dir, 'nested');
    const report = generateOddsReport(
      { totalSims: 10, championshipCounts: { Alpha: 10 }, rows: [] },
      'data.csv',
      new Date('2026-03-19T12:00:00.000Z'),
    );

    const filePath = exportReportToJson(report, 'odds.json', outputDir);

    expect(filePath).toBe(path.join(outputDir, 'odds.json'));
    const written = fs.readFileSync(filePath, 'utf-8');
    expect(written).toBe(JSON.stringify(report, null, 2));
  });

  it('names the file after the report kind by default', () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'bracket-odds-'));
    const report = generateOddsReport({ totalSims: 1, championshipCounts: {}, rows: [] }, 'data.csv');
    const filePath = exportReportToJson(report, undefined, dir);
    expect(path.basename(filePath)).toMatch(/^championship-odds-\d+\.json$/);
  });
});
