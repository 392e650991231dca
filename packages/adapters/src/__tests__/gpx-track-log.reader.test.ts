import { describe, it, expect, jest, beforeAll, afterAll } from '@jest/globals';
import { mkdtemp, mkdir, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { GpxDirectoryTrackLogReader } from '../gpx/gpx-track-log.reader.js';

function gpxWithPoints(name: string, ...isoTimes: string[]): string {
  const points = isoTimes
    .map((t, i) => `<trkpt lat="${10 + i}" lon="${20 + i}"><time>${t}</time></trkpt>`)
    .join('');
  return `<gpx version="1.1"><trk><name>${name}</name><trkseg>${points}</trkseg></trk></gpx>`;
}

let root: string;

beforeAll(async () => {
  root = await mkdtemp(path.join(os.tmpdir(), 'gpx-reader-'));
  const gpxDir = path.join(root, 'gpx');
  await mkdir(gpxDir);
  await writeFile(path.join(gpxDir, 'b.gpx'), gpxWithPoints('second', '2024-05-01T10:00:00Z', '2024-05-01T10:20:00Z'));
  await writeFile(path.join(gpxDir, 'a.gpx'), gpxWithPoints('first', '2024-05-01T10:10:00Z'));
  await writeFile(path.join(gpxDir, 'broken.gpx'), '<gpx><trk></gpx>');
  await writeFile(path.join(gpxDir, 'notes.txt'), 'not a track');
});

afterAll(async () => {
  await rm(root, { recursive: true, force: true });
});

describe('GpxDirectoryTrackLogReader', () => {
  it('merges every readable log into one time-ordered sequence', async () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    const reader = new GpxDirectoryTrackLogReader(path.join(root, 'gpx'));

    const log = await reader.read();

    expect(log.files).toEqual(['a.gpx', 'b.gpx']);
    expect(log.points.map((p) => p.time.toISOString())).toEqual([
      '2024-05-01T10:00:00.000Z',
      '2024-05-01T10:10:00.000Z',
      '2024-05-01T10:20:00.000Z',
    ]);
    expect(log.points.map((p) => p.lat)).toEqual([10, 10, 11]);
    expect(log.segments.map((s) => s.name)).toEqual(['first', 'second']);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0]?.[0]).toBe('[gpx] skipping broken.gpx:');
    warn.mockRestore();
  });

  it('reports availability of the directory', async () => {
    expect(await new GpxDirectoryTrackLogReader(path.join(root, 'gpx')).isAvailable()).toBe(true);
    expect(await new GpxDirectoryTrackLogReader(path.join(root, 'missing')).isAvailable()).toBe(false);
  });

  it('returns an empty log for a missing directory', async () => {
    const log = await new GpxDirectoryTrackLogReader(path.join(root, 'missing')).read();
    expect(log).toEqual({ points: [], segments: [], files: [] });
  });
});
