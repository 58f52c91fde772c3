export const API_URL: string = import.meta.env['VITE_API_URL'] ||
  (typeof window !== 'undefined' && window.location.hostname !== 'localhost' ? '/api' : 'http://localhost:3000/api');

/** Origin of the server behind `apiUrl`; a relative URL resolves against the page. */
export function serverOrigin(apiUrl: string, pageOrigin: string): string {
  return new URL(apiUrl, pageOrigin).origin;
}

export class ApiError extends Error {
  readonly status: number;
  readonly code: string | null;

  constructor(status: number, message: string, code: string | null) {
    super(message);
    this.name = 'ApiError';
    this.status = status;
    this.code = code;
  }
}

async function readError(response: Response): Promise<ApiError> {
  let message = `Request failed with status ${response.status}`;
  let code: string | null = null;

  try {
    const body: unknown = await response.json();
    if (typeof body === 'object' && body !== null) {
      if ('error' in body && typeof body.error === 'string') message = body.error;
      if ('code' in body && typeof body.code === 'string') code = body.code;
    }
  } catch (err) {
    console.warn('[api] Error response was not JSON:', err);
  }

  return new ApiError(response.status, message, code);
}

export async function apiRequest<T>(path: string, init?: { method?: string; body?: unknown }): Promise<T> {
  const response = await fetch(`${API_URL}${path}`, {
    method: init?.method ?? 'GET',
    headers: init?.body !== undefined ? { 'Content-Type': 'application/json' } : undefined,
    body: init?.body !== undefined ? JSON.stringify(init.body) : undefined,
  });

  if (!response.ok) {
    throw await readError(response);
  }

  return response.json();
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
