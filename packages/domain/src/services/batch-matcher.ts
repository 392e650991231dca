import type { MatchSummary, PhotoRecord, PhotoStatus } from '../entities/photo-record.js';
import type { TrackPoint } from '../entities/track-point.js';
import { DEFAULT_MAX_GAP_MS, interpolate } from './interpolator.js';

/**
 * Assigns a position or a skip status to every record, in place.
 *
 * Existing GPS always wins, then a missing capture time; everything else is
 * interpolated against the whole track. Prior statuses are ignored, so a
 * second call after the track grows re-evaluates every record.
 */
export function matchPhotos(
  photos: PhotoRecord[],
  trackPoints: readonly TrackPoint[],
  maxGapMs: number = DEFAULT_MAX_GAP_MS,
): void {
  for (const photo of photos) {
    if (photo.existingCoordinate) {
      photo.status = 'has_gps';
      continue;
    }

    if (!photo.captureTime) {
      photo.status = 'no_time';
      continue;
    }

    const position = interpolate(trackPoints, photo.captureTime, maxGapMs);
    if (position) {
      photo.matchedCoordinate = position.coordinate;
      photo.matchedElevationM = position.elevationM;
      photo.status = 'matched';
    } else {
      photo.status = 'no_match';
    }
  }
}

export function emptyStatusCounts(): Record<PhotoStatus, number> {
  return {
    pending: 0,
    has_gps: 0,
    no_time: 0,
    matched: 0,
    no_match: 0,
    written: 0,
    error: 0,
  };
}

export function summarizeStatuses(photos: readonly PhotoRecord[]): MatchSummary {
  const byStatus = emptyStatusCounts();
  for (const photo of photos) {
    byStatus[photo.status] += 1;
  }
  return { total: photos.length, byStatus };
}
