import { ExifTool } from 'exiftool-vendored';
import type { GeoCoordinate, PhotoMetadata, PhotoMetadataPort } from '@geotagger/domain';
import { toGpsWriteTags, toPhotoMetadata } from './capture-time.js';

export interface ExifToolMetadataOptions {
  /** Minutes east of UTC assumed for capture times that carry no zone. */
  cameraUtcOffsetMinutes?: number;
  maxProcs?: number;
}

/** Edit photos in place; exiftool otherwise leaves a `<name>_original` copy beside each one. */
export const EXIFTOOL_WRITE_ARGS: string[] = ['-overwrite_original'];

/** exiftool-vendored keeps the literal EXIF text of parsed dates in `rawValue`. */
function rawDate(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (typeof value === 'object' && value !== null && 'rawValue' in value) {
    return typeof value.rawValue === 'string' ? value.rawValue : undefined;
  }
  return undefined;
}

export class ExifToolPhotoMetadataAdapter implements PhotoMetadataPort {
  private readonly exiftool: ExifTool;

  constructor(private readonly opts: ExifToolMetadataOptions = {}) {
    this.exiftool = new ExifTool({ maxProcs: opts.maxProcs ?? 4, writeArgs: EXIFTOOL_WRITE_ARGS });
  }

  async read(filePath: string): Promise<PhotoMetadata> {
    try {
      const tags = await this.exiftool.read(filePath);
      return toPhotoMetadata(
        {
          dateTimeOriginal: rawDate(tags.DateTimeOriginal),
          createDate: rawDate(tags.CreateDate),
          offsetTimeOriginal: tags.OffsetTimeOriginal,
          offsetTime: tags.OffsetTime,
          gpsLatitude: tags.GPSLatitude,
          gpsLongitude: tags.GPSLongitude,
        },
        this.opts.cameraUtcOffsetMinutes,
      );
    } catch (err) {
      console.warn(`[exiftool] cannot read ${filePath}:`, err instanceof Error ? err.message : err);
      return {};
    }
  }

  async writeCoordinate(
    filePath: string,
    coordinate: GeoCoordinate,
    elevationM: number,
  ): Promise<boolean> {
    try {
      await this.exiftool.write(filePath, { ...toGpsWriteTags(coordinate, elevationM) });
      return true;
    } catch (err) {
      console.error(`[exiftool] cannot write GPS to ${filePath}`, err);
      return false;
    }
  }

  async version(): Promise<string | null> {
    try {
      return await this.exiftool.version();
    } catch (err) {
      console.warn('[exiftool] unavailable', err instanceof Error ? err.message : err);
      return null;
    }
  }

  async close(): Promise<void> {
    await this.exiftool.end();
  }
}
