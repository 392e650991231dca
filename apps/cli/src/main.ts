#!/usr/bin/env node
import 'dotenv/config';
import path from 'node:path';
import {
  ExifToolPhotoMetadataAdapter,
  FsPhotoLibrary,
  GpxDirectoryTrackLogReader,
  parseUtcOffset,
} from '@geotagger/adapters';
import { USAGE, parseCliArgs } from './args.js';
import { runGeotag } from './geotag-run.js';

/**
 * Env vars:
 *   CAMERA_UTC_OFFSET  offset such as +09:00 for capture times stored without a zone
 */
async function main(): Promise<void> {
  const args = parseCliArgs(process.argv.slice(2));
  if (args.help) {
    console.log(USAGE);
    return;
  }

  const offsetEnv = process.env['CAMERA_UTC_OFFSET'];
  const offset = offsetEnv ? parseUtcOffset(offsetEnv) : null;
  if (offsetEnv && offset === null) {
    console.warn(`[geotag] ignoring CAMERA_UTC_OFFSET=${offsetEnv}`);
  }

  const metadata = new ExifToolPhotoMetadataAdapter({ cameraUtcOffsetMinutes: offset ?? undefined });
  try {
    await runGeotag(
      { maxGapMs: args.maxGapSeconds * 1000, dryRun: args.dryRun },
      {
        library: new FsPhotoLibrary(args.photoDir),
        tracks: new GpxDirectoryTrackLogReader(path.join(args.photoDir, 'gpx')),
        metadata,
      },
    );
  } finally {
    await metadata.close();
  }
}

main().catch((err: unknown) => {
  console.error(`[geotag] ${err instanceof Error ? err.message : String(err)}`);
  process.exitCode = 1;
});
