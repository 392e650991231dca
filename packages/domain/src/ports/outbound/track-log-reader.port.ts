import type { TrackLog } from '../../entities/track-point.js';

export interface TrackLogReaderPort {
  /** Where the logs are read from, for display. */
  readonly location: string;
  /** True when the track source (e.g. the gpx directory) exists. */
  isAvailable(): Promise<boolean>;
  /** Reads every log in the source; unreadable logs are skipped. */
  read(): Promise<TrackLog>;
}
