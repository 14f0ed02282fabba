import type { z } from 'zod';
import { errorMessage } from '../../shared/errors.js';
import { fatal, retryable, success } from '../types.js';
import type { FetchFn, ProviderResult } from '../types.js';

/** 429 and 5xx are worth trying again (or on another provider); other 4xx are not. */
export function isRetryableStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

async function send(
  http: FetchFn,
  url: string,
  init: RequestInit,
  signal: AbortSignal,
  label: string,
): Promise<ProviderResult<Response>> {
  let resp: Response;
  try {
    resp = await http(url, { ...init, signal });
  } catch (err) {
    // An abort belongs to the caller (cancel or timeout), not to the provider.
    if (signal.aborted) throw signal.reason ?? err;
    return retryable(`${label} request failed: ${errorMessage(err)}`);
  }
  if (!resp.ok) {
    const reason = `${label} responded ${resp.status}`;
    return isRetryableStatus(resp.status) ? retryable(reason) : fatal(reason);
  }
  return success(resp);
}

/** Send a request and validate the JSON body against `schema`. */
export async function requestJson<T>(
  http: FetchFn,
  url: string,
  init: RequestInit,
  schema: z.ZodType<T>,
  signal: AbortSignal,
  label: string,
): Promise<ProviderResult<T>> {
  const sent = await send(http, url, init, signal, label);
  if (sent.kind !== 'success') return sent;
  let body: unknown;
  try {
    body = await sent.value.json();
  } catch {
    return fatal(`${label} returned a body that is not JSON`);
  }
  const parsed = schema.safeParse(body);
  return parsed.success ? success(parsed.data) : fatal(`${label} returned an unexpected body`);
}

/** Send a request and return the raw response body. */
export async function requestBytes(
  http: FetchFn,
  url: string,
  init: RequestInit,
  signal: AbortSignal,
  label: string,
): Promise<ProviderResult<Buffer>> {
  const sent = await send(http, url, init, signal, label);
  if (sent.kind !== 'success') return sent;
  try {
    return success(Buffer.from(await sent.value.arrayBuffer()));
  } catch (err) {
    if (signal.aborted) throw signal.reason ?? err;
    return retryable(`${label} body read failed: ${errorMessage(err)}`);
  }
}
