import type { GeoCoordinate } from './track-point.js';

export type PhotoStatus =
  | 'pending'
  | 'has_gps'
  | 'no_time'
  | 'matched'
  | 'no_match'
  | 'written'
  | 'error';

/**
 * One photo in a geotagging session.
 *
 * Only the batch matcher and the write-back helpers in
 * `services/photo-status.ts` change a record after it is built.
 */
export interface PhotoRecord {
  readonly id: string;
  readonly filename: string;
  readonly captureTime?: Date;
  existingCoordinate?: GeoCoordinate;
  matchedCoordinate?: GeoCoordinate;
  matchedElevationM?: number;
  status: PhotoStatus;
  errorReason?: string;
}

export interface MatchSummary {
  total: number;
  byStatus: Record<PhotoStatus, number>;
}
