import type { GeoCoordinate, PhotoMetadata } from '@geotagger/domain';
import { isCalendarDate } from '../time/calendar-date.js';

/** The subset of EXIF tags used to place a photo in time and space. */
export interface CaptureTags {
  dateTimeOriginal?: string;
  createDate?: string;
  offsetTimeOriginal?: string;
  offsetTime?: string;
  gpsLatitude?: unknown;
  gpsLongitude?: unknown;
}

const EMPTY_EXIF_DATE = '0000:00:00 00:00:00';

const EXIF_DATE =
  /^(\d{4})[:-](\d{2})[:-](\d{2})[ T](\d{2}):(\d{2}):(\d{2})(?:\.\d+)?\s*(Z|[+-]\d{2}(?::?\d{2})?)?$/i;

const UTC_OFFSET = /^([+-])(\d{1,2})(?::?(\d{2}))?$/;

/** Parses `+09:00`, `-0530`, `+9` or `Z` into minutes east of UTC. */
export function parseUtcOffset(value: string): number | null {
  const trimmed = value.trim();
  if (trimmed.toUpperCase() === 'Z') return 0;
  const match = UTC_OFFSET.exec(trimmed);
  if (!match) return null;
  const [, sign, hh, mm] = match;
  const hours = Number(hh);
  const minutes = mm ? Number(mm) : 0;
  if (hours > 14 || minutes > 59) return null;
  const total = hours * 60 + minutes;
  return sign === '-' ? -total : total;
}

/**
 * Resolves a photo's capture instant.
 *
 * Zone precedence: an offset written into the date itself, then
 * `OffsetTimeOriginal`, then `OffsetTime`, then `fallbackOffsetMinutes`,
 * and finally the host's local zone.
 */
export function parseCaptureTime(tags: CaptureTags, fallbackOffsetMinutes?: number): Date | null {
  const raw = (tags.dateTimeOriginal?.trim() || tags.createDate?.trim()) ?? '';
  if (!raw || raw === EMPTY_EXIF_DATE) return null;

  const match = EXIF_DATE.exec(raw);
  if (!match) return null;
  const [, y, mo, d, h, mi, s, zone] = match;
  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);
  const hour = Number(h);
  const minute = Number(mi);
  const second = Number(s);
  if (!isCalendarDate(year, month, day) || hour > 23 || minute > 59 || second > 59) {
    return null;
  }

  let offsetMinutes: number | null = zone ? parseUtcOffset(zone) : null;
  for (const candidate of [tags.offsetTimeOriginal, tags.offsetTime]) {
    if (offsetMinutes !== null) break;
    if (candidate) offsetMinutes = parseUtcOffset(candidate);
  }
  offsetMinutes ??= fallbackOffsetMinutes ?? null;

  if (offsetMinutes === null) {
    return new Date(year, month - 1, day, hour, minute, second);
  }
  return new Date(Date.UTC(year, month - 1, day, hour, minute, second) - offsetMinutes * 60_000);
}

function finiteNumber(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string' && value.trim() !== '') {
    const n = Number(value);
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

export function toPhotoMetadata(tags: CaptureTags, fallbackOffsetMinutes?: number): PhotoMetadata {
  const lat = finiteNumber(tags.gpsLatitude);
  const lng = finiteNumber(tags.gpsLongitude);
  const existingCoordinate: GeoCoordinate | undefined =
    lat !== null && lng !== null ? { lat, lng } : undefined;
  return {
    captureTime: parseCaptureTime(tags, fallbackOffsetMinutes) ?? undefined,
    existingCoordinate,
  };
}

export interface GpsWriteTags {
  GPSLatitude: number;
  GPSLatitudeRef: 'N' | 'S';
  GPSLongitude: number;
  GPSLongitudeRef: 'E' | 'W';
  GPSAltitude: number;
  GPSAltitudeRef: '0' | '1';
}

/** EXIF stores magnitudes with a hemisphere (or above/below sea level) reference. */
export function toGpsWriteTags(coordinate: GeoCoordinate, elevationM: number): GpsWriteTags {
  return {
    GPSLatitude: Math.abs(coordinate.lat),
    GPSLatitudeRef: coordinate.lat >= 0 ? 'N' : 'S',
    GPSLongitude: Math.abs(coordinate.lng),
    GPSLongitudeRef: coordinate.lng >= 0 ? 'E' : 'W',
    GPSAltitude: Math.abs(elevationM),
    GPSAltitudeRef: elevationM >= 0 ? '0' : '1',
  };
}
