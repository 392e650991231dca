import type { PhotoMetadata } from '../entities/photo-metadata.js';
import type { PhotoRecord } from '../entities/photo-record.js';
import type { GeoCoordinate } from '../entities/track-point.js';

/** A fresh `pending` record carrying whatever the file's metadata held. */
export function createPhotoRecord(id: string, filename: string, metadata: PhotoMetadata): PhotoRecord {
  return {
    id,
    filename,
    captureTime: metadata.captureTime,
    existingCoordinate: metadata.existingCoordinate,
    status: 'pending',
  };
}

/** Places a photo by hand; the result is written back like any match. */
export function applyManualCoordinate(
  photo: PhotoRecord,
  coordinate: GeoCoordinate,
  elevationM = 0,
): void {
  photo.matchedCoordinate = coordinate;
  photo.matchedElevationM = elevationM;
  photo.status = 'matched';
  delete photo.errorReason;
}

/**
 * Records a successful write-back. The written position becomes the
 * photo's own GPS, so a later batch pass reports it as `has_gps`.
 */
export function markWritten(photo: PhotoRecord): void {
  if (photo.status !== 'matched' || !photo.matchedCoordinate) {
    throw new Error(`photo ${photo.filename} has no matched position to write`);
  }
  photo.existingCoordinate = photo.matchedCoordinate;
  photo.status = 'written';
}

export function markError(photo: PhotoRecord, reason: string): void {
  photo.status = 'error';
  photo.errorReason = reason;
}
