import type { GeoCoordinate, TrackPoint } from '../entities/track-point.js';

/** Default tolerance between a photo and the nearest usable fix: one hour. */
export const DEFAULT_MAX_GAP_MS = 3_600_000;

export interface InterpolatedPosition {
  readonly coordinate: GeoCoordinate;
  readonly elevationM: number;
}

/**
 * Leftmost index whose point is not earlier than `timeMs`.
 * Returns `points.length` when every point is earlier.
 */
export function lowerBound(points: readonly TrackPoint[], timeMs: number): number {
  let lo = 0;
  let hi = points.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    const point = points[mid];
    if (point && point.time.getTime() < timeMs) {
      lo = mid + 1;
    } else {
      hi = mid;
    }
  }
  return lo;
}

function positionOf(point: TrackPoint): InterpolatedPosition {
  return {
    coordinate: { lat: point.lat, lng: point.lng },
    elevationM: point.elevationM,
  };
}

/**
 * Estimates where the logger was at `targetTime`.
 *
 * `trackPoints` must be sorted by time; out-of-order input is not detected
 * and gives an unspecified result. Targets outside the logged span are
 * clamped to the nearest end when within `maxGapMs`; targets between two
 * fixes further apart than `maxGapMs` get no position at all.
 *
 * Latitude, longitude and elevation are interpolated linearly and
 * independently.
 */
export function interpolate(
  trackPoints: readonly TrackPoint[],
  targetTime: Date,
  maxGapMs: number = DEFAULT_MAX_GAP_MS,
): InterpolatedPosition | null {
  const first = trackPoints[0];
  const last = trackPoints[trackPoints.length - 1];
  if (!first || !last) return null;

  const targetMs = targetTime.getTime();
  const idx = lowerBound(trackPoints, targetMs);
  const atIdx = trackPoints[idx];

  if (atIdx && atIdx.time.getTime() === targetMs) {
    return positionOf(atIdx);
  }

  if (idx === 0) {
    const gap = first.time.getTime() - targetMs;
    return gap <= maxGapMs ? positionOf(first) : null;
  }

  if (!atIdx) {
    const gap = targetMs - last.time.getTime();
    return gap <= maxGapMs ? positionOf(last) : null;
  }

  const before = trackPoints[idx - 1];
  const after = atIdx;
  if (!before) return null;
  const beforeMs = before.time.getTime();
  const totalGap = after.time.getTime() - beforeMs;

  if (totalGap > maxGapMs) return null;
  if (totalGap === 0) return positionOf(before);

  const ratio = (targetMs - beforeMs) / totalGap;
  return {
    coordinate: {
      lat: before.lat + (after.lat - before.lat) * ratio,
      lng: before.lng + (after.lng - before.lng) * ratio,
    },
    elevationM: before.elevationM + (after.elevationM - before.elevationM) * ratio,
  };
}
