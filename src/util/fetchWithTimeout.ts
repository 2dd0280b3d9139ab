import { Readable } from 'stream';
import fetch, { Response, RequestInit } from 'node-fetch';

export interface FetchResponse extends Response {}

type FetchAbortSignal = NonNullable<RequestInit['signal']>;

export interface FetchWithTimeoutOptions extends Omit<RequestInit, 'signal'> {
  timeout?: number;
  signal?: AbortSignal;
}

/**
 * The timeout covers the wait for response headers. A caller's signal stays
 * linked until the body closes, so aborting mid-body tears down the socket.
 */
const fetchWithTimeout = async (
  url: string,
  options: FetchWithTimeoutOptions = {}
): Promise<FetchResponse> => {
  const { timeout = 30000, signal: externalSignal, ...fetchOptions } = options;

  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeout);
  const onExternalAbort = () => controller.abort();
  const unlink = () => externalSignal?.removeEventListener('abort', onExternalAbort);
  if (externalSignal?.aborted) {
    controller.abort();
  } else {
    externalSignal?.addEventListener('abort', onExternalAbort);
  }

  try {
    const response = await fetch(url, {
      ...fetchOptions,
      signal: controller.signal as FetchAbortSignal,
    });
    const { body } = response;
    if (body instanceof Readable) {
      body.once('close', unlink);
    } else {
      unlink();
    }
    return response;
  } catch (error) {
    unlink();
    if (error instanceof Error && error.name === 'AbortError') {
      throw new Error(externalSignal?.aborted ? 'Request aborted' : 'Request timed out');
    }
    throw error;
  } finally {
    clearTimeout(timeoutId);
  }
};

export default fetchWithTimeout;
