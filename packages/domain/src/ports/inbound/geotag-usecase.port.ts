import type { PhotoRecord } from '../../entities/photo-record.js';
import type { TrackLog } from '../../entities/track-point.js';

// ---------------------------------------------------------------------------
// Scan
// ---------------------------------------------------------------------------

export interface ScanOptions {
  maxGapMs?: number;
}

export interface ScanResult {
  photos: PhotoRecord[];
  trackLog: TrackLog;
  gpxAvailable: boolean;
}

// ---------------------------------------------------------------------------
// Write-back
// ---------------------------------------------------------------------------

export type GeotagReason =
  | 'file not found'
  | 'gps already present'
  | 'no capture time'
  | 'no track match'
  | 'gps written'
  | 'gps write failed';

export interface GeotagOutcome {
  filename: string;
  success: boolean;
  reason: GeotagReason;
  lat?: number;
  lng?: number;
  ele?: number;
}

export interface ManualGeotagItem {
  filename: string;
  lat: number;
  lng: number;
  ele?: number;
}

// ---------------------------------------------------------------------------
// Status
// ---------------------------------------------------------------------------

export interface GeotagStatus {
  photoDir: string;
  gpxDir: string;
  gpxAvailable: boolean;
  metadataToolOk: boolean;
  metadataToolVersion: string | null;
}

// ---------------------------------------------------------------------------
// Inbound port
// ---------------------------------------------------------------------------

export interface GeotagUseCasePort {
  getStatus(): Promise<GeotagStatus>;
  readTrackLog(): Promise<TrackLog>;
  /** Absolute path of a library photo, or null when it does not exist. */
  resolvePhoto(filename: string): Promise<string | null>;
  scan(opts?: ScanOptions): Promise<ScanResult>;
  autoGeotag(filenames: string[], opts?: ScanOptions): Promise<GeotagOutcome[]>;
  manualGeotag(item: ManualGeotagItem): Promise<GeotagOutcome>;
  batchManualGeotag(items: ManualGeotagItem[]): Promise<GeotagOutcome[]>;
}
