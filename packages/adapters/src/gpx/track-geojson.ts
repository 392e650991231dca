import type { Feature, FeatureCollection, LineString } from 'geojson';
import type { TrackSegment } from '@geotagger/domain';

export interface TrackFeatureProperties {
  name: string;
}

export type TrackFeatureCollection = FeatureCollection<LineString, TrackFeatureProperties>;

/** One LineString per segment, in GeoJSON's [lng, lat] order. */
export function toTrackFeatureCollection(segments: readonly TrackSegment[]): TrackFeatureCollection {
  const features: Feature<LineString, TrackFeatureProperties>[] = segments.map((segment) => ({
    type: 'Feature',
    properties: { name: segment.name },
    geometry: {
      type: 'LineString',
      coordinates: segment.coordinates.map((c) => [c.lng, c.lat]),
    },
  }));
  return { type: 'FeatureCollection', features };
}
