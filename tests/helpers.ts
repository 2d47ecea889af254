// tests/helpers.ts: in-process stand-ins for provider HTTP, the model client and images
import { AxiosError, type AxiosAdapter, type AxiosInstance, type InternalAxiosRequestConfig } from 'axios';
import sharp from 'sharp';
import { createProviderHttp } from '@/services/providers/http';
import type { CompletionResponse, MultimodalCompletionClient } from '@/services/llm-client';
import type { ForecastImage } from '@/types/forecast';

export interface FakeReply {
  status: number;
  data: unknown;
}

export type FakeRoute = FakeReply | ((config: InternalAxiosRequestConfig) => FakeReply | Promise<FakeReply>);

export interface FakeHttp {
  http: AxiosInstance;
  calls: InternalAxiosRequestConfig[];
}

/**
 * Provider HTTP client whose transport is answered in process, keyed by URL.
 * Unknown URLs fail like a refused connection.
 */
export function fakeHttp(routes: Record<string, FakeRoute> = {}): FakeHttp {
  const calls: InternalAxiosRequestConfig[] = [];
  const adapter: AxiosAdapter = async (config) => {
    calls.push(config);
    const route = routes[config.url ?? ''];
    if (!route) {
      throw new AxiosError('connect ECONNREFUSED', 'ECONNREFUSED', config);
    }
    const reply = typeof route === 'function' ? await route(config) : route;
    return {
      data: reply.data,
      status: reply.status,
      statusText: String(reply.status),
      headers: {},
      config,
    };
  };
  const http = createProviderHttp();
  http.defaults.adapter = adapter;
  return { http, calls };
}

export function timeoutRoute(): FakeRoute {
  return (config) => {
    throw new AxiosError('timeout of 10000ms exceeded', AxiosError.ECONNABORTED, config);
  };
}

export class FakeCompletionClient implements MultimodalCompletionClient {
  readonly calls: Array<readonly [string, ForecastImage]> = [];

  constructor(private readonly respond: (prompt: string) => string = () => 'Clean 1.8m swell, go early.') {}

  async complete(input: readonly [string, ForecastImage]): Promise<CompletionResponse> {
    this.calls.push(input);
    return { text: this.respond(input[0]) };
  }
}

export async function makeJpeg(width = 4, height = 4): Promise<Buffer> {
  return sharp({
    create: { width, height, channels: 3, background: { r: 20, g: 120, b: 200 } },
  })
    .jpeg()
    .toBuffer();
}

export async function makePng(): Promise<Buffer> {
  return sharp({
    create: { width: 2, height: 2, channels: 4, background: { r: 255, g: 255, b: 255, alpha: 1 } },
  })
    .png()
    .toBuffer();
}

export async function makeImage(): Promise<ForecastImage> {
  return { data: await makeJpeg(), mimeType: 'image/jpeg' };
}
