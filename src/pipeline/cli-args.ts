import type { RunMode } from './runner';

export function parseArgs(args: string[]): Record<string, string> {
  const parsed: Record<string, string> = {};
  for (let i = 0; i < args.length; i++) {
    if (args[i].startsWith('--')) {
      const key = args[i].slice(2);
      const next = args[i + 1];
      if (next && !next.startsWith('--')) {
        parsed[key] = next;
        i++;
      } else {
        parsed[key] = 'true';
      }
    }
  }
  return parsed;
}

export function selectMode(flags: Record<string, string>): RunMode {
  const championMode = flags['champion-mode'] === 'true';
  const target = flags['find-champion'];

  if (championMode && target !== undefined) {
    throw new Error('--champion-mode and --find-champion cannot be combined');
  }
  if (target !== undefined) {
    if (target === 'true') throw new Error('--find-champion needs a team name');
    return { kind: 'conditioned', champion: target };
  }
  return championMode ? { kind: 'championship-odds' } : { kind: 'bracket' };
}

export function parseOptionalInt(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) return undefined;
  const parsed = parseInt(value, 10);
  if (Number.isNaN(parsed)) throw new Error(`--${flag} expects a number, got "${value}"`);
  return parsed;
}
