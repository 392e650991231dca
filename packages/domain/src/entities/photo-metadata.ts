import type { GeoCoordinate } from './track-point.js';

/** What the metadata reader could recover from a photo file. */
export interface PhotoMetadata {
  readonly captureTime?: Date;
  readonly existingCoordinate?: GeoCoordinate;
}
