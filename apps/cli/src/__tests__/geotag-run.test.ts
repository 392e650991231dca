/**
 * Batch run tests
 *
 * Drives runGeotag against in-memory ports; console output is silenced.
 */

import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import {
  InMemoryPhotoLibrary,
  InMemoryPhotoMetadata,
  InMemoryTrackLogReader,
} from '@geotagger/adapters';
import type { InMemoryPhotoMetadataOptions } from '@geotagger/adapters';
import type { PhotoMetadata, TrackPoint } from '@geotagger/domain';

import { GeotagRunError, runGeotag } from '../geotag-run.js';
import type { GeotagRunOptions } from '../geotag-run.js';

// ─── Fixtures ─────────────────────────────────────────────────────────────────

const TRACK: TrackPoint[] = [
  { time: new Date('2024-05-01T10:00:00Z'), lat: 37.5, lng: 127.0, elevationM: 10 },
  { time: new Date('2024-05-01T10:10:00Z'), lat: 37.52, lng: 127.05, elevationM: 20 },
];

const FILES = ['IMG_0001.JPG', 'IMG_0002.JPG', 'IMG_0003.JPG', 'IMG_0004.JPG'];

const METADATA: Record<string, PhotoMetadata> = {
  'IMG_0001.JPG': { captureTime: new Date('2024-05-01T10:05:00Z') },
  'IMG_0002.JPG': { captureTime: new Date('2024-05-01T08:00:00Z') },
  'IMG_0003.JPG': {},
  'IMG_0004.JPG': {
    captureTime: new Date('2024-05-01T10:05:00Z'),
    existingCoordinate: { lat: 35.1, lng: 129.0 },
  },
};

const RUN: GeotagRunOptions = { maxGapMs: 3_600_000, dryRun: false };

interface HarnessOptions {
  files?: string[];
  libraryAvailable?: boolean;
  points?: TrackPoint[];
  tracksAvailable?: boolean;
  metadata?: InMemoryPhotoMetadataOptions;
}

function harness(opts: HarnessOptions = {}) {
  const library = new InMemoryPhotoLibrary('/photos', opts.files ?? FILES, opts.libraryAvailable ?? true);
  const tracks = new InMemoryTrackLogReader(
    opts.points ?? TRACK,
    [],
    '/photos/gpx',
    opts.tracksAvailable ?? true,
  );
  const metadata = new InMemoryPhotoMetadata(METADATA, opts.metadata);
  return { library, tracks, metadata };
}

beforeEach(() => {
  jest.spyOn(console, 'log').mockImplementation(() => undefined);
  jest.spyOn(console, 'warn').mockImplementation(() => undefined);
});

afterEach(() => {
  jest.restoreAllMocks();
});

// ═══════════════════════════════════════════════════════════════════════════════
// Test Suites
// ═══════════════════════════════════════════════════════════════════════════════

describe('runGeotag', () => {
  it('tags matched photos and moves unplaceable ones aside', async () => {
    const deps = harness();
    const stats = await runGeotag(RUN, deps);

    expect(stats).toEqual({
      total: 4,
      alreadyGps: 1,
      tagged: 1,
      noTime: 1,
      noMatch: 1,
      errors: 0,
      quarantined: 2,
    });
    expect(deps.library.quarantined).toEqual(['IMG_0002.JPG', 'IMG_0003.JPG']);
    expect(await deps.library.listPhotos()).toEqual(['/photos/IMG_0001.JPG', '/photos/IMG_0004.JPG']);

    expect(deps.metadata.writes).toHaveLength(1);
    const [write] = deps.metadata.writes;
    expect(write?.filePath).toBe('/photos/IMG_0001.JPG');
    expect(write?.coordinate.lat).toBeCloseTo(37.51, 9);
    expect(write?.coordinate.lng).toBeCloseTo(127.025, 9);
    expect(write?.elevationM).toBeCloseTo(15, 9);
  });

  it('leaves every file alone in a dry run', async () => {
    const deps = harness();
    const stats = await runGeotag({ ...RUN, dryRun: true }, deps);

    expect(stats.tagged).toBe(1);
    expect(stats.quarantined).toBe(0);
    expect(deps.metadata.writes).toEqual([]);
    expect(deps.library.quarantined).toEqual([]);
    expect(console.log).toHaveBeenCalledWith('[dry run] IMG_0002.JPG → no_gps/ (no track match)');
    expect(console.log).toHaveBeenCalledWith('[dry run] IMG_0003.JPG → no_gps/ (no capture time)');
  });

  it('bridges a wider gap when asked', async () => {
    const deps = harness();
    const stats = await runGeotag({ ...RUN, maxGapMs: 7_200_000 }, deps);

    expect(stats.tagged).toBe(2);
    expect(stats.noMatch).toBe(0);
    expect(deps.library.quarantined).toEqual(['IMG_0003.JPG']);
    expect(deps.metadata.writes[1]?.coordinate).toEqual({ lat: 37.5, lng: 127.0 });
  });

  it('counts a failed write as an error', async () => {
    const deps = harness({ metadata: { failWrites: ['IMG_0001.JPG'] } });
    const stats = await runGeotag(RUN, deps);

    expect(stats.tagged).toBe(0);
    expect(stats.errors).toBe(1);
    expect(console.warn).toHaveBeenCalledWith('[geotag] gps write failed: IMG_0001.JPG');
  });

  it('counts a photo that cannot be moved as an error', async () => {
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const deps = harness();
    const quarantine = deps.library.quarantine.bind(deps.library);
    jest.spyOn(deps.library, 'quarantine').mockImplementation(async (filePath: string) => {
      if (filePath.endsWith('IMG_0003.JPG')) throw new Error('read-only folder');
      return quarantine(filePath);
    });

    const stats = await runGeotag(RUN, deps);

    expect(stats).toEqual({
      total: 4,
      alreadyGps: 1,
      tagged: 1,
      noTime: 1,
      noMatch: 1,
      errors: 1,
      quarantined: 1,
    });
    expect(deps.library.quarantined).toEqual(['IMG_0002.JPG']);
    expect(console.error).toHaveBeenCalledWith('[geotag] cannot move IMG_0003.JPG:', 'read-only folder');
  });

  it('prints the summary built from the photo statuses', async () => {
    await runGeotag(RUN, harness());
    expect(console.log).toHaveBeenCalledWith('  tagged:            1');
    expect(console.log).toHaveBeenCalledWith('  no track match:    1');
    expect(console.log).not.toHaveBeenCalledWith(expect.stringMatching(/^ {2}errors:/));
  });

  it('returns zero counts for an empty folder', async () => {
    const stats = await runGeotag(RUN, harness({ files: [] }));
    expect(stats).toEqual({
      total: 0,
      alreadyGps: 0,
      tagged: 0,
      noTime: 0,
      noMatch: 0,
      errors: 0,
      quarantined: 0,
    });
  });

  describe('preconditions', () => {
    it('requires the photo directory', async () => {
      await expect(runGeotag(RUN, harness({ libraryAvailable: false }))).rejects.toThrow(
        new GeotagRunError('photo directory not found: /photos'),
      );
    });

    it('requires the gpx directory', async () => {
      await expect(runGeotag(RUN, harness({ tracksAvailable: false }))).rejects.toThrow(
        'gpx directory not found: /photos/gpx',
      );
    });

    it('requires exiftool', async () => {
      const deps = harness({ metadata: { version: null } });
      await expect(runGeotag(RUN, deps)).rejects.toThrow('exiftool is not available');
      expect(deps.metadata.writes).toEqual([]);
    });

    it('requires track points', async () => {
      const deps = harness({ points: [] });
      await expect(runGeotag(RUN, deps)).rejects.toThrow('no usable track points');
      expect(deps.library.quarantined).toEqual([]);
    });
  });
});
