/**
 * In-process stand-in for the portal, served through the client's `fetch` option.
 *
 * Routes are keyed by method and absolute URL. Each route holds a queue of
 * replies; the last reply is repeated once the queue is down to one.
 */

import type { FetchLike } from '../shared/utils/http-client.js';

export interface FakeReply {
  status?: number;
  body?: string;
  headers?: Array<[string, string]>;
}

export interface RecordedRequest {
  method: string;
  url: string;
  headers: Headers;
  body: string | undefined;
}

type Reply = FakeReply | Error;

export class FakeSite {
  readonly requests: RecordedRequest[] = [];
  private routes = new Map<string, Reply[]>();

  on(method: 'GET' | 'POST', url: string, ...replies: Reply[]): this {
    this.routes.set(`${method} ${url}`, replies);
    return this;
  }

  get(url: string, ...replies: Reply[]): this {
    return this.on('GET', url, ...replies);
  }

  post(url: string, ...replies: Reply[]): this {
    return this.on('POST', url, ...replies);
  }

  requestsTo(url: string): RecordedRequest[] {
    return this.requests.filter((request) => request.url === url);
  }

  readonly fetch: FetchLike = async (input, init) => {
    const method = init.method ?? 'GET';
    this.requests.push({
      method,
      url: input,
      headers: new Headers(init.headers),
      body: typeof init.body === 'string' ? init.body : undefined
    });

    const queue = this.routes.get(`${method} ${input}`);
    if (!queue || queue.length === 0) {
      return new Response(`No fake route for ${method} ${input}`, { status: 404 });
    }

    const reply = queue.length > 1 ? queue.shift() : queue[0];
    if (reply instanceof Error) {
      throw reply;
    }

    const headers = new Headers();
    for (const [name, value] of reply?.headers ?? []) {
      headers.append(name, value);
    }
    return new Response(reply?.body ?? '', { status: reply?.status ?? 200, headers });
  };
}

export function redirect(location: string, status: number = 302, cookies: string[] = []): FakeReply {
  return {
    status,
    headers: [['Location', location], ...cookies.map((cookie): [string, string] => ['Set-Cookie', cookie])]
  };
}

export function html(body: string, status: number = 200): FakeReply {
  return { status, body, headers: [['Content-Type', 'text/html; charset=UTF-8']] };
}

export function json(data: unknown, status: number = 200): FakeReply {
  return { status, body: JSON.stringify(data), headers: [['Content-Type', 'application/json']] };
}
