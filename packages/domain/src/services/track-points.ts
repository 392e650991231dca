import type { TrackPoint } from '../entities/track-point.js';

export function isSortedByTime(points: readonly TrackPoint[]): boolean {
  for (let i = 1; i < points.length; i++) {
    const prev = points[i - 1];
    const cur = points[i];
    if (prev && cur && cur.time.getTime() < prev.time.getTime()) return false;
  }
  return true;
}

/**
 * Merges point lists from several logs into one time-ordered sequence.
 * The sort is stable: points sharing a timestamp keep their source order.
 */
export function sortTrackPoints(...sources: ReadonlyArray<readonly TrackPoint[]>): TrackPoint[] {
  return sources.flat().sort((a, b) => a.time.getTime() - b.time.getTime());
}
