/**
 * Shared HTTP Client
 *
 * Session transport for the portal client:
 * - Cookie jar management with tough-cookie
 * - Fixed request timeout
 * - Identifying User-Agent on every request
 * - Manual redirect handling, so cookies set on intermediate hops are kept
 *
 * ## CookieFetch
 *
 * ```typescript
 * const http = createCookieFetch({ timeout: 10000 });
 * const page = await http.get('https://bibliotheek.be/mijn-bibliotheek/aanmelden', { redirect: 'manual' });
 * console.log(page.status, page.location);
 * await http.post('https://mijn.bibliotheek.be/openbibid/rest/auth/login', { email: 'foo', password: 'bar' });
 * ```
 *
 * Transport failures (DNS, refused connection, timeout) are raised as
 * `CanNotConnectError`. Nothing is retried here.
 */

import { CookieJar, Cookie } from 'tough-cookie';
import { CanNotConnectError } from '../errors.js';
import { getErrorMessage } from './helpers.js';
import { createLogger, type Logger } from './logger.js';

// ============================================================================
// Types
// ============================================================================

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface HttpClientConfig {
  /** Request timeout in ms (default: 30000) */
  timeout?: number;
  /** Custom user agent */
  userAgent?: string;
  /** Accept language header */
  acceptLanguage?: string;
  /** Logger for request tracing (debug level) */
  logger?: Logger;
  /** Fetch implementation (default: global fetch) */
  fetch?: FetchLike;
}

export interface RequestOptions {
  method?: 'GET' | 'POST';
  headers?: Record<string, string>;
  body?: string;
  redirect?: 'follow' | 'manual';
}

export interface HttpResponse {
  status: number;
  /** URL of the response that was finally returned (after followed redirects) */
  url: string;
  headers: Headers;
  /** Absolute redirect target, when the response carries a Location header */
  location?: string;
  body: string;
}

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_USER_AGENT = 'mijnbib-client/0.8 (+https://www.npmjs.com/package/mijnbib-client)';
const DEFAULT_ACCEPT_LANGUAGE = 'nl-BE';
const DEFAULT_TIMEOUT = 30000;
const MAX_REDIRECTS = 10;

function isRedirect(status: number): boolean {
  return status >= 300 && status < 400;
}

// ============================================================================
// CookieFetch - Fetch wrapper with cookie jar
// ============================================================================

export class CookieFetch {
  private cookieJar: CookieJar;
  private config: Required<Omit<HttpClientConfig, 'logger' | 'fetch'>>;
  private extraHeaders: Map<string, string> = new Map();
  private fetchImpl: FetchLike;
  private logger: Logger;

  constructor(config: HttpClientConfig = {}) {
    this.cookieJar = new CookieJar();
    this.config = {
      timeout: config.timeout ?? DEFAULT_TIMEOUT,
      userAgent: config.userAgent ?? DEFAULT_USER_AGENT,
      acceptLanguage: config.acceptLanguage ?? DEFAULT_ACCEPT_LANGUAGE
    };
    this.fetchImpl = config.fetch ?? ((input, init) => fetch(input, init));
    this.logger = config.logger ?? createLogger('HTTP');
  }

  /**
   * Make an HTTP request with automatic cookie handling.
   * With `redirect: 'follow'` (default) redirects are chased hop by hop.
   */
  async request(url: string, options: RequestOptions = {}): Promise<HttpResponse> {
    let method = options.method ?? 'GET';
    let body = options.body;
    let currentUrl = url;

    for (let hop = 0; hop <= MAX_REDIRECTS; hop++) {
      const response = await this.send(currentUrl, method, body, options.headers);

      if (options.redirect === 'manual' || !isRedirect(response.status) || !response.location) {
        return response;
      }

      this.logger.debug(`   [Redirect] ${response.status} -> ${response.location}`);
      // 303, and 301/302 after a POST, continue as a plain GET
      if (response.status === 303 || ((response.status === 301 || response.status === 302) && method === 'POST')) {
        method = 'GET';
        body = undefined;
      }
      currentUrl = response.location;
    }

    throw new CanNotConnectError(`Too many redirects while opening ${url}`, url);
  }

  /**
   * GET request
   */
  async get(url: string, options: Omit<RequestOptions, 'method' | 'body'> = {}): Promise<HttpResponse> {
    return this.request(url, { ...options, method: 'GET' });
  }

  /**
   * POST form data (application/x-www-form-urlencoded)
   */
  async post(
    url: string,
    formData: Record<string, string>,
    options: Omit<RequestOptions, 'method' | 'body'> = {}
  ): Promise<HttpResponse> {
    const body = new URLSearchParams(formData).toString();
    return this.request(url, { ...options, method: 'POST', body });
  }

  /**
   * Set a header sent on every following request, until removed
   */
  setHeader(name: string, value: string): void {
    this.extraHeaders.set(name, value);
  }

  removeHeader(name: string): void {
    this.extraHeaders.delete(name);
  }

  getHeader(name: string): string | undefined {
    return this.extraHeaders.get(name);
  }

  /**
   * Get all cookies for a URL
   */
  async getCookies(url: string): Promise<Cookie[]> {
    return this.cookieJar.getCookies(url);
  }

  /**
   * Get cookie string for a URL
   */
  async getCookieString(url: string): Promise<string> {
    return this.cookieJar.getCookieString(url);
  }

  /**
   * Clear all cookies
   */
  clearCookies(): void {
    this.cookieJar = new CookieJar();
  }

  private async send(
    url: string,
    method: 'GET' | 'POST',
    body: string | undefined,
    requestHeaders: Record<string, string> | undefined
  ): Promise<HttpResponse> {
    const headers: Record<string, string> = {
      'User-Agent': this.config.userAgent,
      'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,application/json;q=0.9,*/*;q=0.8',
      'Accept-Language': this.config.acceptLanguage,
      ...Object.fromEntries(this.extraHeaders),
      ...(requestHeaders || {})
    };

    const cookieString = await this.cookieJar.getCookieString(url);
    if (cookieString) {
      headers['Cookie'] = cookieString;
    }

    if (method === 'POST' && !headers['Content-Type']) {
      headers['Content-Type'] = 'application/x-www-form-urlencoded; charset=UTF-8';
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.config.timeout);

    try {
      this.logger.debug(`   [${method}] ${url}`);

      const response = await this.fetchImpl(url, {
        method,
        headers,
        body,
        redirect: 'manual',
        signal: controller.signal
      });

      await this.storeCookies(response, url);

      const rawLocation = response.headers.get('location');
      const location = rawLocation ? new URL(rawLocation, url).toString() : undefined;
      const text = await response.text();

      this.logger.debug(`   [Response] ${response.status} ${url}`);

      return { status: response.status, url, headers: response.headers, location, body: text };
    } catch (error: unknown) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new CanNotConnectError(`Request timeout after ${this.config.timeout}ms: ${url}`, url, { cause: error });
      }
      throw new CanNotConnectError(`Error while opening ${url} (${getErrorMessage(error)})`, url, { cause: error });
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private async storeCookies(response: Response, url: string): Promise<void> {
    for (const header of response.headers.getSetCookie()) {
      const cookie = Cookie.parse(header);
      if (!cookie) {
        this.logger.debug(`   [Cookie] Ignoring unparsable Set-Cookie header from ${url}`);
        continue;
      }
      try {
        await this.cookieJar.setCookie(cookie, url);
        this.logger.debug(`   [Cookie] Set: ${cookie.key}`);
      } catch (error: unknown) {
        this.logger.debug(`   [Cookie] Rejected ${cookie.key}: ${getErrorMessage(error)}`);
      }
    }
  }
}

// ============================================================================
// Factory Functions
// ============================================================================

/**
 * Create a new CookieFetch instance
 */
export function createCookieFetch(config?: HttpClientConfig): CookieFetch {
  return new CookieFetch(config);
}
