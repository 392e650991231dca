import { readdir, readFile, stat } from 'node:fs/promises';
import path from 'node:path';
import type { TrackLog, TrackLogReaderPort, TrackPoint, TrackSegment } from '@geotagger/domain';
import { sortTrackPoints } from '@geotagger/domain';
import { parseGpx } from './gpx-parser.js';

export class GpxDirectoryTrackLogReader implements TrackLogReaderPort {
  constructor(readonly location: string) {}

  async isAvailable(): Promise<boolean> {
    try {
      return (await stat(this.location)).isDirectory();
    } catch {
      return false;
    }
  }

  async read(): Promise<TrackLog> {
    if (!(await this.isAvailable())) {
      return { points: [], segments: [], files: [] };
    }

    const entries = await readdir(this.location, { withFileTypes: true });
    const files = entries
      .filter((e) => e.isFile() && e.name.toLowerCase().endsWith('.gpx'))
      .map((e) => e.name)
      .sort();

    const pointLists: TrackPoint[][] = [];
    const segments: TrackSegment[] = [];
    const parsedFiles: string[] = [];

    for (const file of files) {
      try {
        const xml = await readFile(path.join(this.location, file), 'utf8');
        const parsed = parseGpx(xml, file);
        pointLists.push(parsed.points);
        segments.push(...parsed.segments);
        parsedFiles.push(file);
      } catch (err) {
        console.warn(`[gpx] skipping ${file}:`, err instanceof Error ? err.message : err);
      }
    }

    return {
      points: sortTrackPoints(...pointLists),
      segments,
      files: parsedFiles,
    };
  }
}
