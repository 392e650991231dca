import { randomUUID } from 'node:crypto';
import path from 'node:path';
import {
  applyManualCoordinate,
  createPhotoRecord,
  markError,
  markWritten,
  matchPhotos,
} from '@geotagger/domain';
import type {
  GeoCoordinate,
  GeotagOutcome,
  GeotagStatus,
  GeotagUseCasePort,
  ManualGeotagItem,
  PhotoLibraryPort,
  PhotoMetadata,
  PhotoMetadataPort,
  PhotoRecord,
  ScanOptions,
  ScanResult,
  TrackLog,
  TrackLogReaderPort,
  TrackPoint,
} from '@geotagger/domain';
import { HttpError } from '../errors/http-error.js';

export interface GeotagServiceDeps {
  library: PhotoLibraryPort;
  tracks: TrackLogReaderPort;
  metadata: PhotoMetadataPort;
  defaultMaxGapMs: number;
}

export function toPhotoRecord(filePath: string, metadata: PhotoMetadata): PhotoRecord {
  return createPhotoRecord(randomUUID(), path.basename(filePath), metadata);
}

export class GeotagService implements GeotagUseCasePort {
  constructor(private readonly deps: GeotagServiceDeps) {}

  async getStatus(): Promise<GeotagStatus> {
    const [gpxAvailable, version] = await Promise.all([
      this.deps.tracks.isAvailable(),
      this.deps.metadata.version(),
    ]);
    return {
      photoDir: this.deps.library.rootDir,
      gpxDir: this.deps.tracks.location,
      gpxAvailable,
      metadataToolOk: version !== null,
      metadataToolVersion: version,
    };
  }

  readTrackLog(): Promise<TrackLog> {
    return this.deps.tracks.read();
  }

  resolvePhoto(filename: string): Promise<string | null> {
    return this.deps.library.resolve(filename);
  }

  async scan(opts: ScanOptions = {}): Promise<ScanResult> {
    const { library, tracks, metadata } = this.deps;
    if (!(await library.isAvailable())) {
      throw new HttpError(400, `photo directory not found: ${library.rootDir}`);
    }

    const [filePaths, trackLog, gpxAvailable] = await Promise.all([
      library.listPhotos(),
      tracks.read(),
      tracks.isAvailable(),
    ]);

    const photos = await Promise.all(
      filePaths.map(async (filePath) => toPhotoRecord(filePath, await metadata.read(filePath))),
    );
    matchPhotos(photos, trackLog.points, opts.maxGapMs ?? this.deps.defaultMaxGapMs);

    console.log(
      `[geotag] scanned ${photos.length} photos against ${trackLog.points.length} track points`,
    );
    return { photos, trackLog, gpxAvailable };
  }

  async autoGeotag(filenames: string[], opts: ScanOptions = {}): Promise<GeotagOutcome[]> {
    if (!(await this.deps.tracks.isAvailable())) {
      throw new HttpError(400, `gpx directory not found: ${this.deps.tracks.location}`);
    }
    const { points } = await this.deps.tracks.read();
    if (points.length === 0) {
      throw new HttpError(400, 'no usable track points');
    }

    const maxGapMs = opts.maxGapMs ?? this.deps.defaultMaxGapMs;
    return Promise.all(filenames.map((filename) => this.autoGeotagOne(filename, points, maxGapMs)));
  }

  async manualGeotag(item: ManualGeotagItem): Promise<GeotagOutcome> {
    const filePath = await this.deps.library.resolve(item.filename);
    if (!filePath) {
      throw new HttpError(404, 'file not found');
    }
    const outcome = await this.writeManual(filePath, item);
    if (!outcome.success) {
      throw new HttpError(500, outcome.reason);
    }
    return outcome;
  }

  batchManualGeotag(items: ManualGeotagItem[]): Promise<GeotagOutcome[]> {
    return Promise.all(
      items.map(async (item): Promise<GeotagOutcome> => {
        const filePath = await this.deps.library.resolve(item.filename);
        if (!filePath) {
          return { filename: item.filename, success: false, reason: 'file not found' };
        }
        return this.writeManual(filePath, item);
      }),
    );
  }

  // ─── Private ────────────────────────────────────────────────────────────────

  private async autoGeotagOne(
    filename: string,
    points: readonly TrackPoint[],
    maxGapMs: number,
  ): Promise<GeotagOutcome> {
    const filePath = await this.deps.library.resolve(filename);
    if (!filePath) {
      return { filename, success: false, reason: 'file not found' };
    }

    const photo = toPhotoRecord(filePath, await this.deps.metadata.read(filePath));
    matchPhotos([photo], points, maxGapMs);

    if (photo.status === 'has_gps' && photo.existingCoordinate) {
      return {
        filename,
        success: false,
        reason: 'gps already present',
        lat: photo.existingCoordinate.lat,
        lng: photo.existingCoordinate.lng,
      };
    }
    if (photo.status === 'no_time') {
      return { filename, success: false, reason: 'no capture time' };
    }
    const { matchedCoordinate, matchedElevationM } = photo;
    if (photo.status !== 'matched' || !matchedCoordinate || matchedElevationM === undefined) {
      return { filename, success: false, reason: 'no track match' };
    }

    return this.writeBack(filePath, photo, matchedCoordinate, matchedElevationM);
  }

  private writeManual(filePath: string, item: ManualGeotagItem): Promise<GeotagOutcome> {
    const photo = toPhotoRecord(filePath, {});
    const coordinate = { lat: item.lat, lng: item.lng };
    const ele = item.ele ?? 0;
    applyManualCoordinate(photo, coordinate, ele);
    return this.writeBack(filePath, photo, coordinate, ele);
  }

  private async writeBack(
    filePath: string,
    photo: PhotoRecord,
    coordinate: GeoCoordinate,
    ele: number,
  ): Promise<GeotagOutcome> {
    const ok = await this.deps.metadata.writeCoordinate(filePath, coordinate, ele);
    if (ok) {
      markWritten(photo);
    } else {
      markError(photo, 'gps write failed');
    }
    return {
      filename: photo.filename,
      success: ok,
      reason: ok ? 'gps written' : 'gps write failed',
      lat: coordinate.lat,
      lng: coordinate.lng,
      ele,
    };
  }
}
