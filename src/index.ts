/**
 * mijnbib-client - bibliotheek.be Client Library
 *
 * A TypeScript library for reading a Flemish public library account
 * (mijn.bibliotheek.be): memberships, loans and reservations, and for
 * extending loans. Pure HTTP; no browser needed.
 *
 * @example
 * ```typescript
 * import { createMijnBibliotheekClient } from 'mijnbib-client';
 *
 * const client = createMijnBibliotheekClient(
 *   { username: 'johndoe', password: 'test-secret' },
 *   { city: 'gent' }
 * );
 *
 * const accounts = await client.getAccounts();
 * const loans = await client.getLoans(accounts[0].id);
 * const extendable = loans.filter((loan) => loan.extendable);
 * await client.extendLoansByIds(extendable.map((loan) => [loan.accountId, loan.extendId] as const), true);
 * ```
 */

// ============================================================================
// Library Client Exports
// ============================================================================

export * from './library/index.js';

// ============================================================================
// Shared Infrastructure Exports (Advanced)
// ============================================================================

export {
  MijnbibError,
  AuthenticationError,
  CanNotConnectError,
  ConfigurationError,
  ExtendLoanError,
  IncompatibleSourceError,
  InvalidExtendLoanUrlError,
  ItemAccessError,
  TemporarySiteError
} from './shared/errors.js';

export {
  CookieFetch,
  createCookieFetch,
  DEFAULT_USER_AGENT,
  type FetchLike,
  type HttpClientConfig,
  type HttpResponse,
  type RequestOptions
} from './shared/utils/http-client.js';

export { Logger, createLogger, type LogLevel, type LoggerConfig } from './shared/utils/logger.js';

// ============================================================================
// Configuration
// ============================================================================

export { loadEnv, loadClientSettings, type ClientSettings } from './config.js';
