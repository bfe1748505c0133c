import got, { type Response } from 'got';
import { RemoteApiError } from '../errors';
import type { HostThrottle } from './throttle';

export type RemoteRequest =
  | {
      method: 'GET';
      url: string;
      headers: Record<string, string>;
      searchParams: Record<string, string | number>;
      timeoutMs: number;
    }
  | {
      method: 'POST';
      url: string;
      headers: Record<string, string>;
      json: unknown;
      timeoutMs: number;
    };

function isJsonResponse(response: Response<string>): boolean {
  const contentType = response.headers['content-type'] ?? '';
  return contentType.includes('application/json');
}

function send(request: RemoteRequest): Promise<Response<string>> {
  const common = {
    headers: request.headers,
    timeout: { request: request.timeoutMs },
    retry: { limit: 0 },
    throwHttpErrors: false
  };

  return request.method === 'GET'
    ? got.get(request.url, { ...common, searchParams: request.searchParams })
    : got.post(request.url, { ...common, json: request.json });
}

/**
 * Performs one call and returns the decoded JSON body of a 200 answer.
 * Every other outcome becomes a RemoteApiError carrying the raw body.
 */
export async function requestJson(request: RemoteRequest, throttle: HostThrottle): Promise<unknown> {
  let response: Response<string>;
  try {
    response = await throttle.schedule(request.url, () => send(request));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error({ url: request.url, err: message }, 'Remote request failed');
    throw new RemoteApiError(request.url, 0, message);
  }

  if (response.statusCode !== 200) {
    throw new RemoteApiError(request.url, response.statusCode, response.body);
  }

  if (!isJsonResponse(response)) {
    throw new RemoteApiError(request.url, response.statusCode, response.body);
  }

  try {
    return JSON.parse(response.body);
  } catch {
    throw new RemoteApiError(request.url, response.statusCode, response.body);
  }
}
