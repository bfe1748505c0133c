export const API_BASE = import.meta.env.VITE_API_BASE ?? 'http://localhost:3001';

export class ApiRequestError extends Error {
  readonly status: number;
  readonly code?: string;

  constructor(message: string, status: number, code?: string) {
    super(message);
    this.name = 'ApiRequestError';
    this.status = status;
    this.code = code;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

async function readError(response: Response): Promise<ApiRequestError> {
  let payload: unknown = null;
  try {
    payload = await response.json();
  } catch {
    payload = null;
  }

  if (isRecord(payload) && typeof payload.error === 'string') {
    const code = typeof payload.code === 'string' ? payload.code : undefined;
    const detail =
      code === 'REMOTE_API_ERROR' && typeof payload.body === 'string' && payload.body ? `\n${payload.body}` : '';
    return new ApiRequestError(`${payload.error}${detail}`, response.status, code);
  }
  return new ApiRequestError(`Request failed: ${response.status}`, response.status);
}

export async function getJson<T>(path: string, params?: URLSearchParams): Promise<T> {
  const query = params ? `?${params.toString()}` : '';
  const response = await fetch(`${API_BASE}${path}${query}`);
  if (!response.ok) throw await readError(response);
  return response.json();
}

export async function postJson<T>(path: string, body: unknown): Promise<T> {
  const response = await fetch(`${API_BASE}${path}`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body)
  });
  if (!response.ok) throw await readError(response);
  return response.json();
}

export async function deleteJson<T>(path: string): Promise<T> {
  const response = await fetch(`${API_BASE}${path}`, { method: 'DELETE' });
  if (!response.ok) throw await readError(response);
  return response.json();
}

export async function postForBlob(path: string, body: unknown): Promise<Blob> {
  const response = await fetch(`${API_BASE}${path}`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body)
  });
  if (!response.ok) throw await readError(response);
  return response.blob();
}
