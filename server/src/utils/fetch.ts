/**
 * HTTP helpers shared by providers and speech services
 */

/**
 * Raised when a request outlives its time budget
 */
export class TimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Request timeout after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Raised for non-2xx responses; keeps the status so callers can branch on it
 */
export class HttpError extends Error {
  readonly status: number;
  readonly statusText: string;
  readonly body: string;

  constructor(status: number, statusText: string, body: string) {
    super(`HTTP ${status} ${statusText}: ${body}`);
    this.name = 'HttpError';
    this.status = status;
    this.statusText = statusText;
    this.body = body;
  }
}

/**
 * Performs a fetch and reads its body under one time budget
 * The timer stays armed until `read` settles, so a stalled body also ends in TimeoutError.
 */
export async function fetchWithTimeout<T>(
  url: string,
  options: RequestInit,
  timeout: number,
  read: (response: Response) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  let timeoutId: ReturnType<typeof setTimeout> | undefined;
  const expired = new Promise<never>((_resolve, reject) => {
    timeoutId = setTimeout(() => {
      controller.abort();
      reject(new TimeoutError(timeout));
    }, timeout);
  });

  try {
    const request = fetch(url, {
      ...options,
      signal: controller.signal,
    }).then(read);
    return await Promise.race([request, expired]);
  } catch (error) {
    if (error instanceof Error && error.name === 'AbortError') {
      throw new TimeoutError(timeout);
    }
    throw error;
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Throws HttpError when the response is not ok
 */
export async function ensureOk(response: Response): Promise<Response> {
  if (!response.ok) {
    const errorText = await response.text().catch(() => 'Unknown error');
    throw new HttpError(response.status, response.statusText, errorText);
  }
  return response;
}

/**
 * Body reader for JSON APIs: rejects non-2xx answers, then parses the body
 */
export async function readJson<T>(response: Response): Promise<T> {
  await ensureOk(response);
  return response.json() as Promise<T>;
}
