/**
 * bibliotheek.be Client (HTTP-Only)
 *
 * Recommended usage:
 * ```typescript
 * import { createMijnBibliotheekClient } from 'mijnbib-client';
 *
 * const client = createMijnBibliotheekClient(
 *   { username: 'johndoe', password: 'test-secret' },
 *   { city: 'gent' }
 * );
 *
 * const info = await client.getAllInfo();
 * ```
 */

// Main client (recommended)
export { MijnBibliotheekClient, createMijnBibliotheekClient, buildBaseUrl } from './client.js';

// Advanced: login flows (for custom session handling)
export {
  BaseLoginHandler,
  OAuthLoginHandler,
  FormLoginHandler,
  createLoginHandler,
  type LoginHandler,
  type LoginHandlerOptions
} from './auth/login-handlers.js';
export { parseLoginForm, parseHiddenFields, type ParsedLoginForm } from './auth/form-parser.js';

// Advanced: page parsers (replaceable through the client's `parsers` option)
export {
  AccountsListParser,
  LoansListPageParser,
  ReservationsPageParser,
  ExtendResponsePageParser,
  createPageParsers,
  parseAmount,
  parseCount,
  parseDate,
  type LoanPageNode
} from './parsers/index.js';

// Types
export type {
  Account,
  AccountInfo,
  AllInfo,
  Loan,
  Reservation,
  ExtendDetail,
  ExtendResult,
  ExtendLoansResult,
  Membership,
  Activity,
  MijnbibCredentials,
  MijnbibClientConfig,
  LoginMethod,
  AccountsParser,
  LoansParser,
  ReservationsParser,
  ExtendResponseParser,
  PageParsers
} from './types/index.js';

export {
  BIBLIOTHEEK_URLS,
  BIBLIOTHEEK_MARKERS,
  BIBLIOTHEEK_SELECTORS,
  BIBLIOTHEEK_CONFIG
} from './types/index.js';

// Default export
import { MijnBibliotheekClient } from './client.js';
export default MijnBibliotheekClient;
