/**
 * One batch pass over a photo folder: match every photo against the folder's
 * track logs, write the positions back and move unplaceable photos aside.
 */

import { randomUUID } from 'node:crypto';
import path from 'node:path';
import {
  createPhotoRecord,
  markError,
  markWritten,
  matchPhotos,
  summarizeStatuses,
} from '@geotagger/domain';
import type {
  MatchSummary,
  PhotoLibraryPort,
  PhotoMetadataPort,
  PhotoRecord,
  TrackLogReaderPort,
  TrackPoint,
} from '@geotagger/domain';

export interface GeotagRunOptions {
  maxGapMs: number;
  /** Report what would happen without touching any file. */
  dryRun: boolean;
}

export interface GeotagRunDeps {
  library: PhotoLibraryPort;
  tracks: TrackLogReaderPort;
  metadata: PhotoMetadataPort;
}

export interface GeotagRunStats {
  total: number;
  alreadyGps: number;
  tagged: number;
  noTime: number;
  noMatch: number;
  errors: number;
  quarantined: number;
}

/** A precondition that stops the run before any photo is touched. */
export class GeotagRunError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GeotagRunError';
  }
}

interface Unplaced {
  filePath: string;
  reason: string;
}

const RULE = '─'.repeat(60);

function formatPoint(point: TrackPoint): string {
  return point.time.toISOString();
}

/** Matched photos left unwritten by a dry run count as tagged. */
function toRunStats(summary: MatchSummary, quarantined: number, moveFailures: number): GeotagRunStats {
  const { byStatus } = summary;
  return {
    total: summary.total,
    alreadyGps: byStatus.has_gps,
    tagged: byStatus.written + byStatus.matched,
    noTime: byStatus.no_time,
    noMatch: byStatus.no_match,
    errors: byStatus.error + moveFailures,
    quarantined,
  };
}

export async function runGeotag(opts: GeotagRunOptions, deps: GeotagRunDeps): Promise<GeotagRunStats> {
  const { library, tracks, metadata } = deps;

  // ─── Preconditions ──────────────────────────────────────────────────────────
  if (!(await library.isAvailable())) {
    throw new GeotagRunError(`photo directory not found: ${library.rootDir}`);
  }
  if (!(await tracks.isAvailable())) {
    throw new GeotagRunError(`gpx directory not found: ${tracks.location}`);
  }

  console.log(`[geotag] photos:  ${library.rootDir}`);
  console.log(`[geotag] tracks:  ${tracks.location}`);
  console.log(`[geotag] max gap: ${opts.maxGapMs / 1000}s`);
  if (opts.dryRun) console.log('[geotag] dry run, no file will be modified');

  const version = await metadata.version();
  if (version === null) {
    throw new GeotagRunError('exiftool is not available');
  }
  console.log(`[geotag] exiftool ${version}`);

  const { points } = await tracks.read();
  const first = points[0];
  const last = points[points.length - 1];
  if (!first || !last) {
    throw new GeotagRunError('no usable track points');
  }
  console.log(`[geotag] ${points.length} track points, ${formatPoint(first)} to ${formatPoint(last)}`);

  const files = await library.listPhotos();
  console.log(`[geotag] ${files.length} image files`);
  if (files.length === 0) return toRunStats(summarizeStatuses([]), 0, 0);

  // ─── Match and write ────────────────────────────────────────────────────────
  const photos: PhotoRecord[] = [];
  const unplaced: Unplaced[] = [];
  for (const [i, filePath] of files.entries()) {
    const photo = createPhotoRecord(randomUUID(), path.basename(filePath), await metadata.read(filePath));
    photos.push(photo);
    console.log(`[${i + 1}/${files.length}] ${photo.filename}`);
    matchPhotos([photo], points, opts.maxGapMs);

    switch (photo.status) {
      case 'has_gps':
        console.log('  gps already present, skipped');
        break;
      case 'no_time':
        unplaced.push({ filePath, reason: 'no capture time' });
        console.log('  no capture time');
        break;
      case 'no_match':
        unplaced.push({ filePath, reason: 'no track match' });
        console.log('  outside the track or across a gap, no match');
        break;
      case 'matched': {
        const { matchedCoordinate, matchedElevationM = 0 } = photo;
        if (!matchedCoordinate) break;
        console.log(
          `  → ${matchedCoordinate.lat.toFixed(6)}, ${matchedCoordinate.lng.toFixed(6)}, ${matchedElevationM.toFixed(1)}m`,
        );
        if (opts.dryRun) break;
        if (await metadata.writeCoordinate(filePath, matchedCoordinate, matchedElevationM)) {
          markWritten(photo);
          console.log('  gps written');
        } else {
          markError(photo, 'gps write failed');
          console.warn(`[geotag] gps write failed: ${photo.filename}`);
        }
        break;
      }
      default:
        break;
    }
  }

  // ─── Quarantine ─────────────────────────────────────────────────────────────
  let quarantined = 0;
  let moveFailures = 0;
  for (const { filePath, reason } of unplaced) {
    const name = path.basename(filePath);
    if (opts.dryRun) {
      console.log(`[dry run] ${name} → no_gps/ (${reason})`);
      continue;
    }
    try {
      await library.quarantine(filePath);
      quarantined++;
      console.log(`${name} → no_gps/ (${reason})`);
    } catch (err) {
      moveFailures++;
      console.error(`[geotag] cannot move ${name}:`, err instanceof Error ? err.message : err);
    }
  }

  const stats = toRunStats(summarizeStatuses(photos), quarantined, moveFailures);
  printSummary(stats);
  return stats;
}

function printSummary(stats: GeotagRunStats): void {
  console.log(RULE);
  console.log(`  images:            ${stats.total}`);
  console.log(`  gps already there: ${stats.alreadyGps}`);
  console.log(`  tagged:            ${stats.tagged}`);
  console.log(`  no capture time:   ${stats.noTime}`);
  console.log(`  no track match:    ${stats.noMatch}`);
  if (stats.errors > 0) console.log(`  errors:            ${stats.errors}`);
  console.log(RULE);
}
