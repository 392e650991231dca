import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { toTrackFeatureCollection } from '@geotagger/adapters';
import type { GeotagUseCasePort, PhotoRecord } from '@geotagger/domain';

const maxGapSchema = z.coerce.number().int().min(0).max(7 * 24 * 3600);

const scanQuerySchema = z.object({
  maxGap: maxGapSchema.optional(),
});

const autoGeotagBodySchema = z.object({
  filenames: z.array(z.string().min(1)).min(1).max(1000),
  maxGap: maxGapSchema.optional(),
});

const manualItemSchema = z.object({
  filename: z.string().min(1),
  lat: z.number().min(-90).max(90),
  lng: z.number().min(-180).max(180),
  ele: z.number().optional().default(0),
});

const batchManualBodySchema = z.object({
  items: z.array(manualItemSchema).min(1).max(1000),
});

/** Photo as sent to the browser; file paths stay on the server. */
export function toPhotoDto(photo: PhotoRecord) {
  return {
    id: photo.id,
    filename: photo.filename,
    captureTime: photo.captureTime?.toISOString() ?? null,
    hasGps: photo.existingCoordinate !== undefined,
    lat: photo.existingCoordinate?.lat ?? null,
    lng: photo.existingCoordinate?.lng ?? null,
    status: photo.status,
    matchedLat: photo.matchedCoordinate?.lat,
    matchedLng: photo.matchedCoordinate?.lng,
    matchedEle: photo.matchedElevationM,
  };
}

export function createGeotagRouter(geotag: GeotagUseCasePort, defaultMaxGapSeconds: number): Router {
  const router = Router();
  const toMaxGapMs = (seconds: number | undefined) => (seconds ?? defaultMaxGapSeconds) * 1000;

  /** GET /api/status — library location and metadata tool health */
  router.get('/status', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const status = await geotag.getStatus();
      res.json({
        photoDir: status.photoDir,
        gpxDir: status.gpxDir,
        gpxAvailable: status.gpxAvailable,
        exiftoolOk: status.metadataToolOk,
        exiftoolVersion: status.metadataToolVersion,
      });
    } catch (err) {
      next(err);
    }
  });

  /** POST /api/scan — read every photo and match it against the track logs */
  router.post('/scan', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = scanQuerySchema.parse(req.query);
      const result = await geotag.scan({ maxGapMs: toMaxGapMs(query.maxGap) });
      res.json({
        photos: result.photos.map(toPhotoDto),
        gpxGeojson: toTrackFeatureCollection(result.trackLog.segments),
        trackpointCount: result.trackLog.points.length,
        gpxAvailable: result.gpxAvailable,
      });
    } catch (err) {
      next(err);
    }
  });

  /** GET /api/gpx-track — track segments as GeoJSON */
  router.get('/gpx-track', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const log = await geotag.readTrackLog();
      res.json(toTrackFeatureCollection(log.segments));
    } catch (err) {
      next(err);
    }
  });

  /** POST /api/auto-geotag — match selected photos and write their positions */
  router.post('/auto-geotag', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = autoGeotagBodySchema.parse(req.body);
      const results = await geotag.autoGeotag(body.filenames, { maxGapMs: toMaxGapMs(body.maxGap) });
      res.json({ results });
    } catch (err) {
      next(err);
    }
  });

  /** POST /api/manual-geotag — write a hand-picked position to one photo */
  router.post('/manual-geotag', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = manualItemSchema.parse(req.body);
      const outcome = await geotag.manualGeotag(body);
      res.json({ success: true, filename: outcome.filename, lat: outcome.lat, lng: outcome.lng });
    } catch (err) {
      next(err);
    }
  });

  /** POST /api/batch-manual-geotag */
  router.post('/batch-manual-geotag', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = batchManualBodySchema.parse(req.body);
      const results = await geotag.batchManualGeotag(body.items);
      res.json({ results });
    } catch (err) {
      next(err);
    }
  });

  /** GET /api/photo/:filename — the original file */
  router.get('/photo/:filename', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const filePath = await geotag.resolvePhoto(req.params['filename'] ?? '');
      if (!filePath) {
        res.status(404).json({ error: 'file not found' });
        return;
      }
      res.sendFile(filePath, (err) => {
        if (err) next(err);
      });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
