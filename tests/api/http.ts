import express from 'express';
import { AddressInfo } from 'net';

export interface TestResponse {
  status: number;
  headers: Headers;
  text: string;
  /** Parsed JSON body; undefined when the body is not JSON. */
  body: unknown;
}

/** Send one request to `app` on an ephemeral port and close the server. */
export async function request(
  app: express.Application,
  method: string,
  path: string,
  options: { body?: unknown; rawBody?: string; headers?: Record<string, string> } = {},
): Promise<TestResponse> {
  const server = await new Promise<ReturnType<express.Application['listen']>>((resolve) => {
    const listening = app.listen(0, () => resolve(listening));
  });
  try {
    const address: AddressInfo | string | null = server.address();
    const port = typeof address === 'object' && address !== null ? address.port : 0;
    const init: RequestInit = {
      method,
      headers: { 'Content-Type': 'application/json', ...options.headers },
    };
    if (options.rawBody !== undefined) init.body = options.rawBody;
    else if (options.body !== undefined) init.body = JSON.stringify(options.body);

    const res = await fetch(`http://127.0.0.1:${port}${path}`, init);
    const text = await res.text();
    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch {
      body = undefined;
    }
    return { status: res.status, headers: res.headers, text, body };
  } finally {
    await new Promise<void>((resolve) => server.close(() => resolve()));
  }
}
