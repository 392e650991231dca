import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { z } from 'zod';
import type { GeoCoordinate, TrackPoint, TrackSegment } from '@geotagger/domain';
import { sortTrackPoints } from '@geotagger/domain';
import { isCalendarDate } from '../time/calendar-date.js';

export class GpxParseError extends Error {
  constructor(
    readonly sourceFile: string,
    reason: string,
  ) {
    super(`cannot parse ${sourceFile}: ${reason}`);
    this.name = 'GpxParseError';
  }
}

export interface ParsedGpx {
  /** Timed track points and waypoints of one file, sorted by time. */
  points: TrackPoint[];
  segments: TrackSegment[];
}

// ─── Document shape ───────────────────────────────────────────────────────────

const ARRAY_TAGS = new Set(['trk', 'trkseg', 'trkpt', 'wpt']);

const pointSchema = z.object({
  '@_lat': z.coerce.number().min(-90).max(90),
  '@_lon': z.coerce.number().min(-180).max(180),
  ele: z.coerce.number().optional(),
  time: z.string().optional(),
});

const segmentSchema = z.object({
  trkpt: z.array(z.unknown()).optional(),
});

const trackSchema = z.object({
  name: z.string().optional(),
  trkseg: z.array(z.unknown()).optional(),
});

const documentSchema = z.object({
  gpx: z.union([
    z.object({
      trk: z.array(z.unknown()).optional(),
      wpt: z.array(z.unknown()).optional(),
    }),
    z.literal(''),
  ]),
});

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  parseTagValue: false,
  parseAttributeValue: false,
  isArray: (tagName) => ARRAY_TAGS.has(tagName),
});

// ─── Times ────────────────────────────────────────────────────────────────────

const GPX_TIME =
  /^((\d{4})-(\d{2})-(\d{2})T\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)(Z|[+-]\d{2}:?\d{2})?$/i;

/**
 * Parses an ISO 8601 `<time>` value. Times without a zone designator are
 * taken as UTC, which is what GPS loggers record.
 */
export function parseGpxTime(text: string): Date | null {
  const match = GPX_TIME.exec(text.trim());
  if (!match) return null;
  const [, local, y, mo, d, zone] = match;
  if (!isCalendarDate(Number(y), Number(mo), Number(d))) return null;
  let designator = 'Z';
  if (zone && zone.toUpperCase() !== 'Z') {
    designator = zone.includes(':') ? zone : `${zone.slice(0, 3)}:${zone.slice(3)}`;
  }
  const ms = Date.parse(`${local}${designator}`);
  return Number.isNaN(ms) ? null : new Date(ms);
}

// ─── Parser ───────────────────────────────────────────────────────────────────

type GpxPoint = z.infer<typeof pointSchema>;

function readPoints(items: unknown[] | undefined): GpxPoint[] {
  const points: GpxPoint[] = [];
  for (const item of items ?? []) {
    const parsed = pointSchema.safeParse(item);
    if (parsed.success) points.push(parsed.data);
  }
  return points;
}

function toTrackPoint(point: GpxPoint): TrackPoint | null {
  if (point.time === undefined) return null;
  const time = parseGpxTime(point.time);
  if (!time) return null;
  return {
    time,
    lat: point['@_lat'],
    lng: point['@_lon'],
    elevationM: point.ele ?? 0,
  };
}

/**
 * Extracts timed fixes and drawable segments from one GPX document.
 *
 * Every `trkpt` contributes to its segment's line; only points carrying a
 * parseable `<time>` become track points. Timed waypoints count as fixes too.
 */
export function parseGpx(xml: string, sourceFile: string): ParsedGpx {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    throw new GpxParseError(sourceFile, `${validation.err.msg} (line ${validation.err.line})`);
  }

  const doc = documentSchema.safeParse(parser.parse(xml));
  if (!doc.success) {
    throw new GpxParseError(sourceFile, 'missing <gpx> root element');
  }
  const { gpx } = doc.data;
  const tracks = gpx === '' ? [] : (gpx.trk ?? []);
  const waypoints = gpx === '' ? [] : (gpx.wpt ?? []);

  const fallbackName = sourceFile.replace(/\.gpx$/i, '');
  const points: TrackPoint[] = [];
  const segments: TrackSegment[] = [];

  for (const rawTrack of tracks) {
    const track = trackSchema.safeParse(rawTrack);
    if (!track.success) continue;
    const name = track.data.name?.trim() || fallbackName;

    for (const rawSegment of track.data.trkseg ?? []) {
      const segment = segmentSchema.safeParse(rawSegment);
      if (!segment.success) continue;

      const coordinates: GeoCoordinate[] = [];
      for (const point of readPoints(segment.data.trkpt)) {
        coordinates.push({ lat: point['@_lat'], lng: point['@_lon'] });
        const fix = toTrackPoint(point);
        if (fix) points.push(fix);
      }
      if (coordinates.length > 0) {
        segments.push({ name, sourceFile, coordinates });
      }
    }
  }

  for (const waypoint of readPoints(waypoints)) {
    const fix = toTrackPoint(waypoint);
    if (fix) points.push(fix);
  }

  return { points: sortTrackPoints(points), segments };
}
