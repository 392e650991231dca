import {
  ExifToolPhotoMetadataAdapter,
  FsPhotoLibrary,
  GpxDirectoryTrackLogReader,
} from '@geotagger/adapters';
import { buildApp } from './app.js';
import { loadSettings } from './config/settings.js';
import { GeotagService } from './services/geotag.service.js';

async function main() {
  const settings = loadSettings();

  const metadata = new ExifToolPhotoMetadataAdapter({
    cameraUtcOffsetMinutes: settings.cameraUtcOffsetMinutes,
  });
  const version = await metadata.version();
  if (version) {
    console.log(`[server] exiftool ${version}`);
  } else {
    console.warn('[server] exiftool unavailable, metadata reads will come back empty');
  }

  const geotag = new GeotagService({
    library: new FsPhotoLibrary(settings.photoDir),
    tracks: new GpxDirectoryTrackLogReader(settings.gpxDir),
    metadata,
    defaultMaxGapMs: settings.maxGapSeconds * 1000,
  });

  const app = buildApp({
    geotag,
    defaultMaxGapSeconds: settings.maxGapSeconds,
    corsOrigin: settings.corsOrigin,
  });

  const httpServer = app.listen(settings.port, () => {
    console.log(`[server] photo dir ${settings.photoDir}`);
    console.log(`[server] listening on http://0.0.0.0:${settings.port}`);
  });

  const shutdown = async () => {
    console.log('[server] shutting down...');
    httpServer.close();
    await metadata.close();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err) => {
      console.error('[server] shutdown failed', err);
      process.exit(1);
    });
  };
  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);
}

main().catch((err) => {
  console.error('[server] fatal startup error', err);
  process.exit(1);
});
