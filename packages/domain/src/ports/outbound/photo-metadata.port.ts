import type { PhotoMetadata } from '../../entities/photo-metadata.js';
import type { GeoCoordinate } from '../../entities/track-point.js';

export interface PhotoMetadataPort {
  /** Never rejects; unreadable files yield empty metadata. */
  read(filePath: string): Promise<PhotoMetadata>;
  /** Resolves false when the file could not be updated. */
  writeCoordinate(filePath: string, coordinate: GeoCoordinate, elevationM: number): Promise<boolean>;
  /** Version of the underlying metadata tool, or null when it is unusable. */
  version(): Promise<string | null>;
  close(): Promise<void>;
}
