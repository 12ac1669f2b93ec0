import { request } from 'undici';

export interface PostOptions {
  /** Used in error messages instead of the URL, which may embed a token */
  label: string;
  headers?: Record<string, string>;
  body: string;
  timeoutMs?: number;
}

export async function post(url: string, options: PostOptions): Promise<void> {
  const timeout = options.timeoutMs ?? 10000;
  const { statusCode, body } = await request(url, {
    method: 'POST',
    headers: options.headers,
    body: options.body,
    headersTimeout: timeout,
    bodyTimeout: timeout,
  });

  const text = await body.text();
  if (statusCode >= 400) {
    throw new Error(`${options.label} responded ${statusCode}: ${text.slice(0, 200)}`);
  }
}
