// src/services/providers/http.ts: bounded GET for data providers, returning ProviderResult instead of throwing
import axios, { type AxiosInstance } from 'axios';
import { fromTransportError, providerErr, providerOk, type ProviderResult } from './provider-result';

export const DEFAULT_PROVIDER_TIMEOUT_MS = 10_000;

export interface ProviderGetOptions {
  params?: Record<string, string | number>;
  headers?: Record<string, string>;
  timeoutMs?: number;
}

export function createProviderHttp(): AxiosInstance {
  return axios.create({
    headers: { Accept: 'application/json' },
    // status handling lives in getJson so non-200 is a result, not an exception
    validateStatus: () => true,
  });
}

export async function getJson(
  http: AxiosInstance,
  url: string,
  options: ProviderGetOptions = {},
): Promise<ProviderResult<unknown>> {
  try {
    const res = await http.get<unknown>(url, {
      params: options.params,
      headers: options.headers,
      timeout: options.timeoutMs ?? DEFAULT_PROVIDER_TIMEOUT_MS,
      responseType: 'json',
    });
    if (res.status !== 200) {
      return providerErr('http_status', `HTTP ${res.status} from ${url}`, res.status >= 500 || res.status === 429);
    }
    if (res.data === null || typeof res.data !== 'object') {
      return providerErr('parse', `Non-JSON body from ${url}`);
    }
    return providerOk(res.data);
  } catch (err) {
    return fromTransportError(err);
  }
}
