/**
 * MijnBibliotheekClient - Unified HTTP Client
 *
 * This is the recommended way to read a bibliotheek.be account. Uses pure
 * HTTP requests and HTML/JSON parsing; no browser needed.
 *
 * ## Flow
 *
 * 1. `login()` runs once, lazily, before the first data request
 * 2. Pages are fetched through the same cookie session
 * 3. Raw payloads go to the page parser for that page kind
 *
 * ## Limitations
 *
 * - One instance, one caller: login state is not guarded against concurrent
 *   calls. Serialize calls on a shared instance, or create one per caller.
 * - A 500 while extending several loans at once is reported as a total
 *   failure, even though some of them may have been extended.
 *
 * @example
 * ```typescript
 * import { createMijnBibliotheekClient } from 'mijnbib-client';
 *
 * const client = createMijnBibliotheekClient({ username: 'johndoe', password: 'test-secret' });
 * const accounts = await client.getAccounts();
 * const loans = await client.getLoans(accounts[0].id);
 * ```
 */

import {
  ExtendLoanError,
  IncompatibleSourceError,
  InvalidExtendLoanUrlError,
  ItemAccessError,
  TemporarySiteError
} from '../shared/errors.js';
import { getErrorMessage } from '../shared/utils/helpers.js';
import { createCookieFetch, type CookieFetch, type HttpResponse } from '../shared/utils/http-client.js';
import { createLogger, truncateForLog, type Logger } from '../shared/utils/logger.js';
import { createLoginHandler, type LoginHandler } from './auth/login-handlers.js';
import { createPageParsers } from './parsers/index.js';
import {
  BIBLIOTHEEK_CONFIG,
  BIBLIOTHEEK_URLS,
  type Account,
  type Activity,
  type AllInfo,
  type ExtendLoansResult,
  type ExtendResult,
  type Loan,
  type MijnbibClientConfig,
  type MijnbibCredentials,
  type PageParsers,
  type Reservation
} from './types/index.js';

const EXTEND_URL_PATTERN = /\/lidmaatschappen\/([^/?#]+)\/uitleningen\/verlengen\b/;

/**
 * Base URL for a city subdomain, or the shared portal when none is given
 */
export function buildBaseUrl(city?: string): string {
  const subdomain = city?.trim().toLowerCase();
  return subdomain
    ? `https://${subdomain}.${BIBLIOTHEEK_URLS.BASE_DOMAIN}`
    : `https://${BIBLIOTHEEK_URLS.BASE_DOMAIN}`;
}

// ============================================================================
// MijnBibliotheekClient
// ============================================================================

export class MijnBibliotheekClient {
  readonly baseUrl: string;
  private credentials: MijnbibCredentials;
  private httpClient: CookieFetch;
  private loginHandler: LoginHandler;
  private parsers: PageParsers;
  private logger: Logger;
  private loggedIn: boolean = false;

  constructor(credentials: MijnbibCredentials, config: MijnbibClientConfig = {}) {
    this.credentials = credentials;
    this.baseUrl = buildBaseUrl(config.city);
    this.logger = createLogger('MijnBibliotheek', { level: config.logLevel });

    this.httpClient = createCookieFetch({
      timeout: config.timeout ?? BIBLIOTHEEK_CONFIG.DEFAULT_TIMEOUT,
      logger: this.logger.child('HTTP'),
      fetch: config.fetch
    });

    this.loginHandler = createLoginHandler(config.loginBy ?? 'oauth', {
      credentials,
      url: this.baseUrl + BIBLIOTHEEK_URLS.LOGIN_PATH,
      http: this.httpClient,
      logger: this.logger.child('Login')
    });

    this.parsers = createPageParsers(this.logger, config.parsers);
  }

  // ==========================================================================
  // Public API
  // ==========================================================================

  /**
   * Log in. Called automatically by the other methods when needed.
   *
   * @throws AuthenticationError, CanNotConnectError, TemporarySiteError, IncompatibleSourceError
   */
  async login(): Promise<void> {
    if (this.loggedIn) {
      this.logger.debug('Already logged in');
      return;
    }

    this.logger.debug(`Will log in at ${this.baseUrl} as ${truncateForLog(this.credentials.username)}`);
    await this.loginHandler.login();
    this.loggedIn = true;
  }

  isAuthenticated(): boolean {
    return this.loggedIn;
  }

  /**
   * All memberships visible to the logged-in user
   */
  async getAccounts(): Promise<Account[]> {
    await this.login();

    const membershipsUrl = this.baseUrl + BIBLIOTHEEK_URLS.MEMBERSHIPS_PATH;
    const membershipsBody = await this.fetchJson(membershipsUrl, 'memberships');
    const memberships = this.runParser('accounts', membershipsBody, () =>
      this.parsers.accounts.parseMemberships(membershipsBody)
    );

    const accounts: Account[] = [];
    for (const membership of memberships) {
      let activity: Activity | null = null;
      if (membership.hasError) {
        // the activities endpoint is unreliable for these accounts
        this.logger.warn(`Account ${membership.id} reports error, skipping counts and amounts`);
      } else {
        const activityUrl = this.baseUrl + BIBLIOTHEEK_URLS.activitiesPath(membership.id);
        const activityBody = await this.fetchJson(activityUrl, 'activity');
        activity = this.runParser('account activity', activityBody, () =>
          this.parsers.accounts.parseActivity(activityBody)
        );
      }
      accounts.push(this.parsers.accounts.buildAccount(membership, activity, this.baseUrl));
    }

    this.logger.debug(`Number of accounts found: ${accounts.length}`);
    return accounts;
  }

  /**
   * Current loans of one account
   *
   * @throws ItemAccessError when the page can not be opened (404: likely a bad account id)
   */
  async getLoans(accountId: string): Promise<Loan[]> {
    await this.login();

    const url = this.baseUrl + BIBLIOTHEEK_URLS.loansPath(accountId);
    const html = await this.openAccountPage(url, 'Loans');
    return this.runParser('loans', html, () => this.parsers.loans.parse(html, this.baseUrl, accountId));
  }

  /**
   * Current reservations (holds) of one account
   *
   * @throws ItemAccessError when the page can not be opened (404: likely a bad account id)
   */
  async getReservations(accountId: string): Promise<Reservation[]> {
    await this.login();

    const url = this.baseUrl + BIBLIOTHEEK_URLS.reservationsPath(accountId);
    const html = await this.openAccountPage(url, 'Reservations');
    return this.runParser('reservations', html, () => this.parsers.reservations.parse(html));
  }

  /**
   * Accounts with their loans and reservations, keyed by account id.
   * Loans and reservations are only fetched when the account reports a
   * confirmed non-zero count.
   */
  async getAllInfo(): Promise<AllInfo> {
    const info: AllInfo = {};
    const accounts = await this.getAccounts();

    for (const account of accounts) {
      const loans = hasItems(account.loansCount) ? await this.getLoans(account.id) : [];
      const reservations = hasItems(account.reservationsCount) ? await this.getReservations(account.id) : [];
      info[account.id] = { accountDetails: account, loans, reservations };
    }

    return info;
  }

  /**
   * Extend loan(s) via an extend URL such as
   * `https://bibliotheek.be/mijn-bibliotheek/lidmaatschappen/123/uitleningen/verlengen?loan-ids=456%2C789`.
   *
   * With `execute` false (default) nothing is sent and a simulated result is
   * returned. Treat `success` as a strong hint rather than a guarantee; the
   * site's answers are ambiguous.
   *
   * @throws InvalidExtendLoanUrlError, ExtendLoanError
   */
  async extendLoans(extendUrl: string, execute: boolean = false): Promise<ExtendLoansResult> {
    await this.login();

    const accountId = this.accountIdFromExtendUrl(extendUrl);
    this.logger.debug(`Will extend loan via url: ${extendUrl}`);

    // without a matching Referer the site answers with a 500
    this.httpClient.setHeader('Referer', this.baseUrl + BIBLIOTHEEK_URLS.loansPath(accountId));
    try {
      if (!execute) {
        this.logger.warn('SIMULATING extending the loan(s). No request sent.');
        return { success: false, simulated: true, loans: null, details: null };
      }

      const response = await this.httpClient.get(extendUrl);
      if (response.status === 500) {
        // the site crashes on unknown ids and on id combinations across accounts
        throw new ExtendLoanError(`Could not extend loans using url: ${extendUrl}`);
      }
      if (response.status !== 200) {
        throw new ExtendLoanError(
          `Could not extend loans using url: ${extendUrl} (status code '${response.status}')`
        );
      }

      const details = this.parseExtendDetails(response.body);
      const loans = this.parseLoansAfterExtend(response.body, accountId);
      const success = details === null || details.likelySuccess;
      if (success) {
        this.logger.debug('Looks like extending the loan(s) was successful');
      }

      return { success, simulated: false, loans, details };
    } finally {
      this.httpClient.removeHeader('Referer');
    }
  }

  /**
   * Extend loan(s) given as (account id, extend id) pairs.
   * The first pair's account id is used for the URL path.
   */
  async extendLoansByIds(
    accountExtendIds: ReadonlyArray<readonly [accountId: string, extendId: string]>,
    execute: boolean = false
  ): Promise<ExtendLoansResult> {
    if (accountExtendIds.length === 0) {
      throw new RangeError('List must not be empty.');
    }

    const [accountId] = accountExtendIds[0];
    const ids = accountExtendIds.map(([account, extendId]) => `${account}|${extendId}`).join(',');
    const url = `${this.baseUrl}${BIBLIOTHEEK_URLS.extendPath(accountId)}?loan-ids=${encodeURIComponent(ids)}`;
    return this.extendLoans(url, execute);
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private async fetchJson(url: string, what: string): Promise<string> {
    this.logger.debug(`Opening ${what} (${url}) ...`);
    const response = await this.httpClient.get(url, { headers: { Accept: 'application/json' } });
    if (response.status >= 500) {
      throw new TemporarySiteError(`Site reports status code '${response.status}' for ${what} (${url})`);
    }
    if (response.status !== 200) {
      throw new IncompatibleSourceError(
        `Expected status code 200 for ${what}. Got '${response.status}' (${url})`,
        response.body
      );
    }
    return response.body;
  }

  private async openAccountPage(url: string, what: string): Promise<string> {
    this.logger.debug(`Opening page (${url}) ...`);
    const response: HttpResponse = await this.httpClient.get(url);

    if (response.status === 404) {
      throw new ItemAccessError(
        `${what} url can not be opened. Likely incorrect or nonexisting account ID in the url '${url}'`
      );
    }
    if (response.status >= 500) {
      throw new TemporarySiteError(`${what} url can not be opened. Site reports status code '${response.status}'`);
    }
    if (response.status !== 200) {
      throw new ItemAccessError(`${what} url can not be opened. Reason unknown. Status code '${response.status}'`);
    }
    return response.body;
  }

  /**
   * Run a parser; anything it throws other than our own site errors becomes
   * an IncompatibleSourceError carrying the payload.
   */
  private runParser<T>(what: string, body: string, parse: () => T): T {
    try {
      return parse();
    } catch (error: unknown) {
      if (error instanceof TemporarySiteError || error instanceof IncompatibleSourceError) {
        throw error;
      }
      throw new IncompatibleSourceError(`Problem scraping ${what} (${getErrorMessage(error)})`, body, {
        cause: error
      });
    }
  }

  private parseExtendDetails(html: string): ExtendResult | null {
    try {
      return this.parsers.extendResponse.parse(html);
    } catch (error: unknown) {
      this.logger.warn(`Could not parse loan extending result. Error: ${getErrorMessage(error)}`);
      return null;
    }
  }

  private parseLoansAfterExtend(html: string, accountId: string): Loan[] | null {
    try {
      return this.parsers.loans.parse(html, this.baseUrl, accountId);
    } catch (error: unknown) {
      this.logger.warn(`Could not parse loans after extending. Error: ${getErrorMessage(error)}`);
      return null;
    }
  }

  private accountIdFromExtendUrl(extendUrl: string): string {
    const match = EXTEND_URL_PATTERN.exec(extendUrl);
    if (!match || !extendUrl.includes('loan-ids=')) {
      throw new InvalidExtendLoanUrlError(`Probably invalid extend loan URL: ${extendUrl}`);
    }
    try {
      return decodeURIComponent(match[1]);
    } catch (error: unknown) {
      throw new InvalidExtendLoanUrlError(`Probably invalid extend loan URL: ${extendUrl}`, { cause: error });
    }
  }
}

function hasItems(count: number | null): boolean {
  return count !== null && count > 0;
}

// ============================================================================
// Factory Function
// ============================================================================

/**
 * Create a new MijnBibliotheekClient instance
 */
export function createMijnBibliotheekClient(
  credentials: MijnbibCredentials,
  config?: MijnbibClientConfig
): MijnBibliotheekClient {
  return new MijnBibliotheekClient(credentials, config);
}
