/**
 * API settings
 *
 * Read from the environment (with `.env` loaded by dotenv) and validated on
 * startup. The photo directory may also be given as the first CLI argument.
 */

import path from 'node:path';
import { z } from 'zod';
import { parseUtcOffset } from '@geotagger/adapters';

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65_535).default(8000),
  PHOTO_DIR: z.string().min(1).optional(),
  GPX_SUBDIR: z.string().min(1).default('gpx'),
  MAX_GAP_SECONDS: z.coerce.number().int().min(0).default(3600),
  CAMERA_UTC_OFFSET: z
    .string()
    .refine((v) => parseUtcOffset(v) !== null, { message: 'expected an offset such as +09:00' })
    .optional(),
  CORS_ORIGIN: z.string().min(1).default('*'),
});

export interface ApiSettings {
  port: number;
  photoDir: string;
  gpxDir: string;
  maxGapSeconds: number;
  cameraUtcOffsetMinutes?: number;
  corsOrigin: string;
}

export function loadSettings(
  env: NodeJS.ProcessEnv = process.env,
  argv: string[] = process.argv.slice(2),
): ApiSettings {
  const parsed = envSchema.parse(env);
  const positional = argv.find((arg) => !arg.startsWith('-'));
  const photoDir = path.resolve(positional ?? parsed.PHOTO_DIR ?? process.cwd());
  const offset = parsed.CAMERA_UTC_OFFSET ? parseUtcOffset(parsed.CAMERA_UTC_OFFSET) : null;

  return {
    port: parsed.PORT,
    photoDir,
    gpxDir: path.join(photoDir, parsed.GPX_SUBDIR),
    maxGapSeconds: parsed.MAX_GAP_SECONDS,
    ...(offset !== null ? { cameraUtcOffsetMinutes: offset } : {}),
    corsOrigin: parsed.CORS_ORIGIN,
  };
}
