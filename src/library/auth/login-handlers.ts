/**
 * Login Handlers
 *
 * Two ways into the portal, both leaving an authenticated cookie jar behind
 * in the shared `CookieFetch`:
 *
 * ## OAuth flow (default)
 *
 * 1. GET `{base}/mijn-bibliotheek/aanmelden` (no redirects) → Location carries
 *    `hint`, `oauth_token`, `oauth_callback`. A Location without query means
 *    the session is already authenticated.
 * 2. GET the authorize URL from step 1 (no redirects) → session cookie
 * 3. POST credentials + tokens to `https://mijn.bibliotheek.be/openbibid/rest/auth/login`
 *    → 303 with Location carrying `oauth_verifier`
 * 4. GET that Location, following redirects → overview page
 * 5. Validate: the page must show the "Profiel" marker
 *
 * ## Form flow
 *
 * Replays the classic login form: GET the login page, fill `email` and
 * `password` into its first form, submit, validate.
 */

import {
  AuthenticationError,
  ConfigurationError,
  IncompatibleSourceError,
  TemporarySiteError
} from '../../shared/errors.js';
import type { CookieFetch, HttpResponse } from '../../shared/utils/http-client.js';
import { createLogger, truncateForLog, type Logger } from '../../shared/utils/logger.js';
import { BIBLIOTHEEK_MARKERS, BIBLIOTHEEK_URLS, type LoginMethod, type MijnbibCredentials } from '../types/index.js';
import { parseLoginForm } from './form-parser.js';

// ============================================================================
// Types
// ============================================================================

export interface LoginHandler {
  /** Resolves once the transport holds an authenticated session */
  login(): Promise<void>;
}

export interface LoginHandlerOptions {
  credentials: MijnbibCredentials;
  /** Login entry URL, e.g. https://bibliotheek.be/mijn-bibliotheek/aanmelden */
  url: string;
  http: CookieFetch;
  logger?: Logger;
}

interface OAuthParams {
  hint: string;
  oauthToken: string;
  oauthCallback: string;
}

// ============================================================================
// Shared behaviour
// ============================================================================

export abstract class BaseLoginHandler implements LoginHandler {
  protected credentials: MijnbibCredentials;
  protected url: string;
  protected http: CookieFetch;
  protected logger: Logger;

  constructor(options: LoginHandlerOptions, component: string) {
    this.credentials = options.credentials;
    this.url = options.url;
    this.http = options.http;
    this.logger = options.logger ?? createLogger(component);
  }

  abstract login(): Promise<void>;

  /**
   * Raise TemporarySiteError for 5xx, IncompatibleSourceError for any
   * other status the step does not accept.
   */
  protected expectStatus(response: HttpResponse, step: string, expected: string, accept: (status: number) => boolean): void {
    if (accept(response.status)) {
      return;
    }
    const message = `Expected status code ${expected} during log in (${step}). Got '${response.status}'`;
    if (response.status >= 500) {
      throw new TemporarySiteError(message);
    }
    throw new IncompatibleSourceError(message, response.body);
  }

  /**
   * The overview page shows "Profiel" only to logged-in users
   */
  static validateLoggedIn(html: string): void {
    if (html.includes(BIBLIOTHEEK_MARKERS.LOGGED_IN)) {
      return;
    }
    if (BIBLIOTHEEK_MARKERS.PRIVACY_CHANGED.some((marker) => html.includes(marker))) {
      throw new AuthenticationError('Login not accepted (likely need to accept privacy statement again)');
    }
    throw new AuthenticationError('Login not accepted');
  }

  protected validate(html: string): void {
    this.logger.debug('Checking if login is successful ...');
    BaseLoginHandler.validateLoggedIn(html);
    this.logger.debug('Login was successful');
  }
}

const isRedirect = (status: number): boolean => status >= 300 && status < 400;

// ============================================================================
// OAuth flow
// ============================================================================

export class OAuthLoginHandler extends BaseLoginHandler {
  constructor(options: LoginHandlerOptions) {
    super(options, 'OAuthLogin');
  }

  async login(): Promise<void> {
    this.logger.debug(`Logging in at ${this.url} as ${truncateForLog(this.credentials.username)}`);

    // Step 1: initiate, read the authorize redirect
    const start = await this.http.get(this.url, { redirect: 'manual' });
    this.logger.debug(`login (1) status code: ${start.status}`);
    this.expectStatus(start, 'initiate', 'redirect', isRedirect);

    const authorizeUrl = this.requireLocation(start, 'initiate');
    const authorize = new URL(authorizeUrl);
    if (authorize.search === '') {
      this.logger.info('Already authenticated. No need to log in again.');
      const overview = await this.http.get(authorizeUrl);
      this.expectStatus(overview, 'validate', '200', (status) => status === 200);
      this.validate(overview.body);
      return;
    }

    const params = this.readOAuthParams(authorize, start.body);
    this.logger.debug(`login (1) oauth_callback: ${params.oauthCallback}`);

    // Step 2: authorize, picks up the session cookie
    const authorizePage = await this.http.get(authorizeUrl, { redirect: 'manual' });
    this.logger.debug(`login (2) status code: ${authorizePage.status}`);
    this.expectStatus(authorizePage, 'authorize', '200', (status) => status === 200);

    // Step 3: submit credentials
    const submit = await this.http.post(
      BIBLIOTHEEK_URLS.OAUTH_LOGIN,
      {
        hint: params.hint,
        token: params.oauthToken,
        callback: params.oauthCallback,
        email: this.credentials.username,
        password: this.credentials.password
      },
      { redirect: 'manual' }
    );
    this.logger.debug(`login (3) status code: ${submit.status}`);
    if (submit.status === 200) {
      // The login form is shown again
      throw new AuthenticationError('Login not accepted. Correct credentials?');
    }
    this.expectStatus(submit, 'submit credentials', 'redirect', isRedirect);

    const callbackUrl = this.requireLocation(submit, 'submit credentials');
    if (!new URL(callbackUrl).searchParams.has('oauth_verifier')) {
      throw new IncompatibleSourceError(
        `Expected 'oauth_verifier' in login redirect, got '${callbackUrl}'`,
        submit.body
      );
    }

    // Step 4: complete the callback
    const overview = await this.http.get(callbackUrl);
    this.logger.debug(`login (4) status code: ${overview.status}, landed on ${overview.url}`);
    this.expectStatus(overview, 'callback', '200', (status) => status === 200);

    // Step 5
    this.validate(overview.body);
  }

  private requireLocation(response: HttpResponse, step: string): string {
    if (!response.location) {
      throw new IncompatibleSourceError(`Expected a Location header during log in (${step})`, response.body);
    }
    return response.location;
  }

  private readOAuthParams(authorize: URL, body: string): OAuthParams {
    const hint = authorize.searchParams.get('hint');
    const oauthToken = authorize.searchParams.get('oauth_token');
    const oauthCallback = authorize.searchParams.get('oauth_callback');

    if (!hint || !oauthToken || !oauthCallback) {
      const missing = [
        !hint && 'hint',
        !oauthToken && 'oauth_token',
        !oauthCallback && 'oauth_callback'
      ].filter((name): name is string => typeof name === 'string');
      throw new IncompatibleSourceError(
        `Missing ${missing.join(', ')} in login redirect '${authorize.toString()}'`,
        body
      );
    }

    return { hint, oauthToken, oauthCallback };
  }
}

// ============================================================================
// Form flow
// ============================================================================

export class FormLoginHandler extends BaseLoginHandler {
  constructor(options: LoginHandlerOptions) {
    super(options, 'FormLogin');
  }

  async login(): Promise<void> {
    this.logger.debug(`Opening login page ${this.url} as ${truncateForLog(this.credentials.username)}`);

    const page = await this.http.get(this.url);
    this.expectStatus(page, 'open login page', '200', (status) => status === 200);

    const form = parseLoginForm(page.body);
    if (!form) {
      throw new IncompatibleSourceError('Can not find login form', page.body);
    }

    const action = new URL(form.action || page.url, page.url).toString();
    const response = await this.http.post(action, {
      ...form.hiddenFields,
      email: this.credentials.username,
      password: this.credentials.password
    });
    this.expectStatus(response, 'submit form', '200', (status) => status === 200);

    this.validate(response.body);
  }
}

// ============================================================================
// Factory
// ============================================================================

export function createLoginHandler(method: LoginMethod, options: LoginHandlerOptions): LoginHandler {
  switch (method) {
    case 'oauth':
      return new OAuthLoginHandler(options);
    case 'form':
      return new FormLoginHandler(options);
    default:
      throw new ConfigurationError(`loginBy needs to be either 'oauth' or 'form', got '${String(method)}'`);
  }
}
