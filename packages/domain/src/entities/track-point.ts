export interface GeoCoordinate {
  readonly lat: number;
  readonly lng: number;
}

export interface TrackPoint {
  readonly time: Date;
  readonly lat: number;
  readonly lng: number;
  readonly elevationM: number;
}

/** Contiguous run of logged positions, kept for drawing the route. */
export interface TrackSegment {
  readonly name: string;
  readonly sourceFile: string;
  readonly coordinates: GeoCoordinate[];
}

export interface TrackLog {
  /** Every timed point across all source files, sorted by time. */
  readonly points: TrackPoint[];
  readonly segments: TrackSegment[];
  readonly files: string[];
}
