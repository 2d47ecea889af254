/**
 * Resolves the image handed to the model for a forecast.
 *
 * Sources are registered per mode ("upload", "sample"). A live webcam source
 * can be registered under its own mode later without touching callers: every
 * source resolves to an in-memory image or null.
 */
import { promises as fs } from 'fs';
import path from 'path';
import type { AxiosInstance } from 'axios';
import type { ForecastImage } from '@/types/forecast';
import { logger } from './logger';
import { decodeImage } from './image-processing';
import { DEFAULT_PROVIDER_TIMEOUT_MS } from './providers/http';
import type { SpotCatalog } from './spot-catalog';

export interface ImageSource {
  resolve(location: string, upload?: ForecastImage): Promise<ForecastImage | null>;
}

/** Caller-supplied bytes, returned verbatim. */
export class UploadImageSource implements ImageSource {
  async resolve(_location: string, upload?: ForecastImage): Promise<ForecastImage | null> {
    return upload ?? null;
  }
}

export interface SampleImageSourceOptions {
  /** Directory relative sample paths are resolved against. Defaults to the working directory. */
  baseDir?: string;
  timeoutMs?: number;
}

/** Static still per catalog spot, from disk or a remote URL. */
export class SampleImageSource implements ImageSource {
  constructor(
    private readonly catalog: SpotCatalog,
    private readonly http: AxiosInstance,
    private readonly options: SampleImageSourceOptions = {},
  ) {}

  async resolve(location: string): Promise<ForecastImage | null> {
    const spot = this.catalog.get(location);
    if (!spot) return null;

    try {
      const bytes = await this.load(spot.sample);
      return await decodeImage(bytes);
    } catch (err: unknown) {
      logger.warn('sample_image:load_failed', {
        location,
        sample: spot.sample,
        error: err instanceof Error ? err.message : String(err),
      });
      return null;
    }
  }

  private async load(ref: string): Promise<Buffer> {
    if (/^https?:\/\//i.test(ref)) {
      const res = await this.http.get<ArrayBuffer>(ref, {
        responseType: 'arraybuffer',
        timeout: this.options.timeoutMs ?? DEFAULT_PROVIDER_TIMEOUT_MS,
      });
      if (res.status !== 200) throw new Error(`HTTP ${res.status} from ${ref}`);
      return Buffer.from(res.data);
    }
    return fs.readFile(path.resolve(this.options.baseDir ?? process.cwd(), ref));
  }
}

export class ImageSupplier {
  private readonly sources = new Map<string, ImageSource>();

  constructor(sources: Record<string, ImageSource> = {}) {
    for (const [mode, source] of Object.entries(sources)) {
      this.register(mode, source);
    }
  }

  register(mode: string, source: ImageSource): void {
    this.sources.set(mode, source);
  }

  modes(): string[] {
    return [...this.sources.keys()];
  }

  /** Never rejects; null means "no image available" and the caller decides what to do. */
  async resolve(location: string, mode: string, upload?: ForecastImage): Promise<ForecastImage | null> {
    const source = this.sources.get(mode);
    if (!source) {
      logger.warn('image:unknown_mode', { mode });
      return null;
    }
    try {
      return await source.resolve(location, upload);
    } catch (err: unknown) {
      logger.warn('image:resolve_failed', {
        location,
        mode,
        error: err instanceof Error ? err.message : String(err),
      });
      return null;
    }
  }
}
