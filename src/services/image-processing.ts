// src/services/image-processing.ts: sharp-based checks and normalisation for forecast images
import sharp from 'sharp';
import type { ForecastImage } from '@/types/forecast';

const MIME_BY_FORMAT: Record<string, ForecastImage['mimeType']> = {
  jpeg: 'image/jpeg',
  png: 'image/png',
  webp: 'image/webp',
};

/** Reads the header only; throws for anything that is not a JPEG, PNG or WebP raster. */
export async function decodeImage(data: Buffer): Promise<ForecastImage> {
  const { format } = await sharp(data).metadata();
  const mimeType = format ? MIME_BY_FORMAT[format] : undefined;
  if (!mimeType) throw new Error(`Unsupported image format: ${format ?? 'unknown'}`);
  return { data, mimeType };
}

/** Uploads are re-encoded to a bounded JPEG before they reach the model. */
export async function normalizeUpload(data: Buffer): Promise<ForecastImage> {
  const jpeg = await sharp(data)
    .rotate()
    .resize(1920, 1920, {
      fit: 'inside',
      withoutEnlargement: true,
    })
    .jpeg({ quality: 85 })
    .toBuffer();
  return { data: jpeg, mimeType: 'image/jpeg' };
}
