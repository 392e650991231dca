/**
 * In-process implementations of the outbound ports.
 *
 * Used by the API and CLI tests in place of the filesystem and exiftool.
 */

import path from 'node:path';
import type {
  GeoCoordinate,
  PhotoLibraryPort,
  PhotoMetadata,
  PhotoMetadataPort,
  TrackLog,
  TrackLogReaderPort,
  TrackPoint,
  TrackSegment,
} from '@geotagger/domain';
import { sortTrackPoints } from '@geotagger/domain';
import { QUARANTINE_DIR_NAME } from '../fs/fs-photo-library.js';

export class InMemoryPhotoLibrary implements PhotoLibraryPort {
  readonly quarantined: string[] = [];
  private readonly files: Set<string>;

  constructor(
    readonly rootDir: string,
    filenames: string[],
    private readonly available = true,
  ) {
    this.files = new Set(filenames);
  }

  async isAvailable(): Promise<boolean> {
    return this.available;
  }

  async listPhotos(): Promise<string[]> {
    return [...this.files].sort().map((name) => path.join(this.rootDir, name));
  }

  async resolve(filename: string): Promise<string | null> {
    return this.files.has(filename) ? path.join(this.rootDir, filename) : null;
  }

  async quarantine(filePath: string): Promise<string> {
    const name = path.basename(filePath);
    if (!this.files.delete(name)) {
      throw new Error(`not in library: ${filePath}`);
    }
    this.quarantined.push(name);
    return path.join(this.rootDir, QUARANTINE_DIR_NAME, name);
  }
}

export class InMemoryTrackLogReader implements TrackLogReaderPort {
  constructor(
    private readonly points: TrackPoint[],
    private readonly segments: TrackSegment[] = [],
    readonly location = '/photos/gpx',
    private readonly available = true,
  ) {}

  async isAvailable(): Promise<boolean> {
    return this.available;
  }

  async read(): Promise<TrackLog> {
    if (!this.available) return { points: [], segments: [], files: [] };
    return {
      points: sortTrackPoints(this.points),
      segments: this.segments,
      files: [...new Set(this.segments.map((s) => s.sourceFile))],
    };
  }
}

export interface RecordedWrite {
  filePath: string;
  coordinate: GeoCoordinate;
  elevationM: number;
}

export interface InMemoryPhotoMetadataOptions {
  /** Filenames whose writes fail. */
  failWrites?: string[];
  version?: string | null;
}

/** Metadata keyed by filename; writes are recorded, not applied. */
export class InMemoryPhotoMetadata implements PhotoMetadataPort {
  readonly writes: RecordedWrite[] = [];
  closed = false;

  constructor(
    private readonly byFilename: Record<string, PhotoMetadata>,
    private readonly opts: InMemoryPhotoMetadataOptions = {},
  ) {}

  async read(filePath: string): Promise<PhotoMetadata> {
    return this.byFilename[path.basename(filePath)] ?? {};
  }

  async writeCoordinate(filePath: string, coordinate: GeoCoordinate, elevationM: number): Promise<boolean> {
    if (this.opts.failWrites?.includes(path.basename(filePath))) return false;
    this.writes.push({ filePath, coordinate, elevationM });
    return true;
  }

  async version(): Promise<string | null> {
    return this.opts.version === undefined ? '12.76' : this.opts.version;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
