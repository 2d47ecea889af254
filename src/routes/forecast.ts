// src/routes/forecast.ts: multipart forecast endpoint + spot listing
// Order: 1) validate form 2) resolve coordinates 3) resolve image 4) run pipeline.
import express, { type NextFunction, type Request, type Response } from 'express';
import { z } from 'zod';
import { SKILL_LEVELS, type Coordinates, type ForecastImage } from '@/types/forecast';
import type { ForecastServices } from '@/services/pipeline-deps';
import { ForecastInputError } from '@/services/orchestrator';
import { normalizeUpload } from '@/services/image-processing';
import { logger } from '@/services/logger';
import { correlationIdOf } from '@/middleware/correlation';
import { createImageUpload, handleUploadError } from '@/middleware/upload';
import {
  createErrorResponse,
  createSuccessResponse,
  fieldErrorsFromZod,
} from '@/utils/errorResponse';

const optionalNumber = z.preprocess(
  (v) => (typeof v === 'string' && v.trim() === '' ? undefined : v),
  z.coerce.number().finite().optional(),
);

const forecastFormSchema = z.object({
  location: z.string().trim().min(1, 'location is required'),
  skillLevel: z.enum(SKILL_LEVELS),
  latitude: optionalNumber,
  longitude: optionalNumber,
  imageSource: z.string().trim().min(1).default('upload'),
});

type ForecastForm = z.infer<typeof forecastFormSchema>;

class RequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RequestError';
  }
}

function resolveCoordinates(form: ForecastForm, services: ForecastServices): Coordinates {
  if (form.latitude !== undefined && form.longitude !== undefined) {
    return { latitude: form.latitude, longitude: form.longitude };
  }
  if (form.latitude !== undefined || form.longitude !== undefined) {
    throw new RequestError('latitude and longitude must be given together');
  }
  const spot = services.catalog.get(form.location);
  if (!spot) {
    throw new RequestError(`Unknown location "${form.location}"; latitude and longitude are required`);
  }
  return { latitude: spot.latitude, longitude: spot.longitude };
}

export function createForecastRouter(services: ForecastServices, options: { maxUploadBytes: number }) {
  const router = express.Router();
  const upload = createImageUpload(options.maxUploadBytes);

  router.get('/spots', (_req: Request, res: Response) => {
    res.json(createSuccessResponse(services.catalog.list()));
  });

  router.post('/', upload, async (req: Request, res: Response, next: NextFunction) => {
    const parsed = forecastFormSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      res
        .status(400)
        .json(createErrorResponse('Invalid forecast request', fieldErrorsFromZod(parsed.error.issues), 'bad_request'));
      return;
    }
    const form = parsed.data;

    if (!services.imageSupplier.modes().includes(form.imageSource)) {
      res
        .status(400)
        .json(
          createErrorResponse(
            `Unknown imageSource "${form.imageSource}". Expected one of: ${services.imageSupplier.modes().join(', ')}`,
            undefined,
            'bad_request',
          ),
        );
      return;
    }

    try {
      const coordinates = resolveCoordinates(form, services);

      let uploaded: ForecastImage | undefined;
      if (req.file) {
        try {
          uploaded = await normalizeUpload(req.file.buffer);
        } catch (err: unknown) {
          logger.warn('forecast_route:unreadable_upload', {
            error: err instanceof Error ? err.message : String(err),
          });
          res.status(400).json(createErrorResponse('Uploaded file is not a readable image', undefined, 'invalid_image'));
          return;
        }
      }

      const image = await services.imageSupplier.resolve(form.location, form.imageSource, uploaded);
      if (!image) {
        res
          .status(422)
          .json(createErrorResponse('No image available for this location', undefined, 'image_unavailable'));
        return;
      }

      const result = await services.pipeline.run({
        location: form.location,
        coordinates,
        skillLevel: form.skillLevel,
        image,
      });
      res.json(result);
    } catch (err: unknown) {
      if (err instanceof RequestError || err instanceof ForecastInputError) {
        const issues = err instanceof ForecastInputError ? err.issues : undefined;
        res.status(400).json(createErrorResponse(err.message, issues, 'bad_request'));
        return;
      }
      logger.error('forecast_route:failed', {
        correlationId: correlationIdOf(res),
        error: err instanceof Error ? err.message : String(err),
      });
      next(err);
    }
  });

  router.use(handleUploadError);

  return router;
}
