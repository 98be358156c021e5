// pattern: Imperative Shell

/**
 * fetch-backed HttpSender.
 */

import type { HttpRequest, HttpResponse, HttpSender, QueryValue } from './types.ts';

export function buildUrl(
  baseUrl: string | undefined,
  path: string,
  query?: Readonly<Record<string, QueryValue>>,
): URL {
  let url: URL;
  if (/^https?:\/\//i.test(path)) {
    url = new URL(path);
  } else {
    if (!baseUrl) {
      throw new Error(`relative request path ${path} requires a base_url`);
    }
    const base = baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`;
    url = new URL(path.replace(/^\/+/, ''), base);
  }

  if (query) {
    for (const [key, value] of Object.entries(query)) {
      if (value !== undefined) {
        url.searchParams.set(key, String(value));
      }
    }
  }
  return url;
}

function parseBody(text: string, contentType: string | undefined): unknown {
  if (!text) {
    return undefined;
  }
  if (contentType?.includes('json')) {
    try {
      return JSON.parse(text);
    } catch {
      // Malformed JSON is surfaced as text; connectors decide whether that is an error.
      return undefined;
    }
  }
  return undefined;
}

export function createFetchSender(options: {
  base_url?: string;
  default_headers?: Readonly<Record<string, string>>;
  fetch?: typeof fetch;
} = {}): HttpSender {
  const fetchImpl = options.fetch ?? globalThis.fetch;

  return async (request: HttpRequest, signal?: AbortSignal): Promise<HttpResponse> => {
    const url = buildUrl(options.base_url, request.url, request.query);
    const headers: Record<string, string> = {
      accept: 'application/json',
      ...options.default_headers,
      ...request.headers,
    };

    let body: string | undefined;
    if (request.body !== undefined) {
      if (typeof request.body === 'string') {
        body = request.body;
      } else {
        body = JSON.stringify(request.body);
        headers['content-type'] ??= 'application/json';
      }
    }

    const response = await fetchImpl(url, {
      method: request.method,
      headers,
      body,
      signal,
    });

    const responseHeaders: Record<string, string> = {};
    response.headers.forEach((value, key) => {
      responseHeaders[key.toLowerCase()] = value;
    });

    const text = request.method === 'HEAD' ? '' : await response.text();

    return {
      status: response.status,
      headers: responseHeaders,
      text,
      data: parseBody(text, responseHeaders['content-type']),
    };
  };
}
