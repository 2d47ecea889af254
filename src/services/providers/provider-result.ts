/**
 * Result of one upstream provider call. Adapters match on `ok` / `error.code`
 * to pick a fallback; provider errors never escape as exceptions.
 */
import { AxiosError } from 'axios';

export type ProviderErrorCode = 'not_configured' | 'http_status' | 'transport' | 'timeout' | 'parse';

export interface ProviderError {
  code: ProviderErrorCode;
  message: string;
  retryable: boolean;
}

export type ProviderResult<T> = { ok: true; data: T } | { ok: false; error: ProviderError };

export function providerOk<T>(data: T): ProviderResult<T> {
  return { ok: true, data };
}

export function providerErr<T = never>(
  code: ProviderErrorCode,
  message: string,
  retryable = false,
): ProviderResult<T> {
  return { ok: false, error: { code, message, retryable } };
}

/** Classify a thrown transport error (axios or otherwise). */
export function fromTransportError<T = never>(err: unknown): ProviderResult<T> {
  if (err instanceof AxiosError) {
    if (err.code === AxiosError.ECONNABORTED || err.code === AxiosError.ETIMEDOUT) {
      return providerErr('timeout', err.message, true);
    }
    return providerErr('transport', err.message, true);
  }
  const message = err instanceof Error ? err.message : String(err);
  const m = message.toLowerCase();
  if (m.includes('timeout')) return providerErr('timeout', message, true);
  return providerErr('transport', message, m.includes('econnreset') || m.includes('econnrefused'));
}
