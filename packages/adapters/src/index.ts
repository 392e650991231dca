// ─── GPX Adapters ─────────────────────────────────────────────────────────────
export { parseGpx, parseGpxTime, GpxParseError } from './gpx/gpx-parser.js';
export type { ParsedGpx } from './gpx/gpx-parser.js';
export { GpxDirectoryTrackLogReader } from './gpx/gpx-track-log.reader.js';
export { toTrackFeatureCollection } from './gpx/track-geojson.js';
export type { TrackFeatureCollection, TrackFeatureProperties } from './gpx/track-geojson.js';

// ─── ExifTool Adapter ─────────────────────────────────────────────────────────
export { ExifToolPhotoMetadataAdapter, EXIFTOOL_WRITE_ARGS } from './exiftool/exiftool-photo-metadata.adapter.js';
export type { ExifToolMetadataOptions } from './exiftool/exiftool-photo-metadata.adapter.js';
export {
  parseCaptureTime,
  parseUtcOffset,
  toPhotoMetadata,
  toGpsWriteTags,
} from './exiftool/capture-time.js';
export type { CaptureTags, GpsWriteTags } from './exiftool/capture-time.js';

// ─── Filesystem ───────────────────────────────────────────────────────────────
export {
  FsPhotoLibrary,
  IMAGE_EXTENSIONS,
  QUARANTINE_DIR_NAME,
  isImageFile,
} from './fs/fs-photo-library.js';

// ─── In-memory (tests) ────────────────────────────────────────────────────────
export {
  InMemoryPhotoLibrary,
  InMemoryTrackLogReader,
  InMemoryPhotoMetadata,
} from './memory/in-memory.adapters.js';
export type { RecordedWrite, InMemoryPhotoMetadataOptions } from './memory/in-memory.adapters.js';
