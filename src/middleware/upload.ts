// src/middleware/upload.ts: single in-memory image upload for forecast requests
import multer from 'multer';
import type { ErrorRequestHandler, Request } from 'express';
import { logger } from '@/services/logger';
import { createErrorResponse } from '@/utils/errorResponse';

export const IMAGE_FIELD = 'image';

const ALLOWED_TYPES = ['image/jpeg', 'image/jpg', 'image/png', 'image/webp'];

const fileFilter = (_req: Request, file: Express.Multer.File, cb: multer.FileFilterCallback) => {
  const isAllowed =
    ALLOWED_TYPES.includes(file.mimetype) || /\.(jpe?g|png|webp)$/i.test(file.originalname);

  if (isAllowed) {
    cb(null, true);
  } else {
    logger.debug('upload:rejected_type', { mimetype: file.mimetype, name: file.originalname });
    cb(new Error(`Invalid file type. Allowed types: ${ALLOWED_TYPES.join(', ')}`));
  }
};

/** Bytes stay in memory; nothing is written to disk. */
export function createImageUpload(maxBytes: number) {
  return multer({
    storage: multer.memoryStorage(),
    fileFilter,
    limits: {
      fileSize: maxBytes,
      files: 1,
    },
  }).single(IMAGE_FIELD);
}

export const handleUploadError: ErrorRequestHandler = (error: unknown, _req, res, next) => {
  if (error instanceof multer.MulterError) {
    logger.warn('upload:multer_error', { code: error.code, field: error.field });
    if (error.code === 'LIMIT_FILE_SIZE') {
      res.status(400).json(createErrorResponse('File too large.', undefined, 'bad_request'));
      return;
    }
    if (error.code === 'LIMIT_UNEXPECTED_FILE' || error.code === 'LIMIT_FILE_COUNT') {
      res
        .status(400)
        .json(createErrorResponse(`Unexpected file field. Expected a single "${IMAGE_FIELD}" file.`, undefined, 'bad_request'));
      return;
    }
    res.status(400).json(createErrorResponse(error.message, undefined, 'bad_request'));
    return;
  }

  if (error instanceof Error && error.message.startsWith('Invalid file type')) {
    res.status(400).json(createErrorResponse(error.message, undefined, 'invalid_image'));
    return;
  }

  next(error);
};
