import path from 'node:path';
import { parseArgs } from 'node:util';
import { z } from 'zod';
import { GeotagRunError } from './geotag-run.js';

export const DEFAULT_MAX_GAP_SECONDS = 3600;

export const USAGE = `usage: geotag [photoDir] [--max-gap <seconds>] [--dry-run]

  photoDir          folder holding the photos and a gpx/ subfolder (default: cwd)
  --max-gap <s>     largest time difference bridged by interpolation (default: ${DEFAULT_MAX_GAP_SECONDS})
  --dry-run         report what would happen without modifying files
  -h, --help        show this message

Photos that cannot be placed are moved into <photoDir>/no_gps/.`;

export interface CliArgs {
  photoDir: string;
  maxGapSeconds: number;
  dryRun: boolean;
  help: boolean;
}

const maxGapSchema = z.coerce.number().int().min(0);

const OPTIONS = {
  'max-gap': { type: 'string' },
  'dry-run': { type: 'boolean', default: false },
  help: { type: 'boolean', short: 'h', default: false },
} as const;

function tokenize(argv: string[]) {
  try {
    return parseArgs({ args: argv, allowPositionals: true, options: OPTIONS });
  } catch (err) {
    throw new GeotagRunError(err instanceof Error ? err.message : String(err));
  }
}

export function parseCliArgs(argv: string[], cwd: string = process.cwd()): CliArgs {
  const { values, positionals } = tokenize(argv);
  if (positionals.length > 1) {
    throw new GeotagRunError(`expected one photo directory, got ${positionals.length}`);
  }

  const rawGap = values['max-gap'];
  let maxGapSeconds = DEFAULT_MAX_GAP_SECONDS;
  if (rawGap !== undefined) {
    const gap = maxGapSchema.safeParse(rawGap);
    if (!gap.success) {
      throw new GeotagRunError(`invalid --max-gap: ${rawGap}`);
    }
    maxGapSeconds = gap.data;
  }

  return {
    photoDir: path.resolve(cwd, positionals[0] ?? '.'),
    maxGapSeconds,
    dryRun: values['dry-run'] ?? false,
    help: values.help ?? false,
  };
}
