// Centralized types for the bibliotheek.be client

import type { LogLevel } from '../../shared/utils/logger.js';
import type { FetchLike } from '../../shared/utils/http-client.js';

// ============================================================================
// Records
// ============================================================================

/**
 * A membership: one user linked to one library.
 *
 * A logged-in user sees their own memberships plus the ones they manage
 * (e.g. children's accounts). Loans always belong to exactly one account.
 */
export interface Account {
  /** e.g. "Dijk92 - Bibliotheek Gent" */
  readonly libraryName: string;
  /** e.g. "John Doe" */
  readonly user: string;
  /** Site-assigned, opaque */
  readonly id: string;
  /** null when the number could not be determined */
  readonly loansCount: number | null;
  readonly loansUrl: string;
  /** null when the number could not be determined */
  readonly reservationsCount: number | null;
  readonly reservationsUrl: string;
  readonly openAmounts: number;
  readonly openAmountsUrl: string;
}

/**
 * A borrowed item with its loan period.
 *
 * There is no loan id on the site. `id` identifies the item (not the loan)
 * and is stable across historic loans of the same item.
 */
export interface Loan {
  readonly title: string;
  /** ISO date (YYYY-MM-DD) */
  readonly loanFrom: string | null;
  /** ISO date (YYYY-MM-DD) */
  readonly loanTill: string | null;
  readonly author: string;
  /** Item type as labelled by the library, e.g. "Boek" */
  readonly type: string;
  /** null when extendability could not be determined */
  readonly extendable: boolean | null;
  /** Empty unless `extendable` is true */
  readonly extendUrl: string;
  /** Empty unless `extendable` is true */
  readonly extendId: string;
  readonly branchName: string;
  readonly id: string;
  readonly url: string;
  readonly coverUrl: string;
  readonly accountId: string;
}

/**
 * A reserved item (hold). The site exposes no reservation id; `url`
 * identifies the reserved item.
 */
export interface Reservation {
  readonly title: string;
  readonly type: string;
  readonly url: string;
  readonly author: string;
  /** Pickup location, e.g. "Gent" */
  readonly location: string;
  readonly available: boolean;
  /** Set only when available */
  readonly availableTill: string | null;
  readonly requestOn: string | null;
  /** Cleared by the site once the item is available */
  readonly validTill: string | null;
}

export interface ExtendDetail {
  readonly title: string;
  /** ISO date (YYYY-MM-DD) */
  readonly until: string;
}

export interface ExtendResult {
  readonly likelySuccess: boolean;
  readonly count: number;
  readonly details: readonly ExtendDetail[];
}

export interface ExtendLoansResult {
  readonly success: boolean;
  /** True when no request was sent (`execute` was false) */
  readonly simulated: boolean;
  /** Loan list from the page the extension landed on; null when simulated or unparsable */
  readonly loans: Loan[] | null;
  /** Site's status messages; null when simulated or unparsable */
  readonly details: ExtendResult | null;
}

export interface AccountInfo {
  readonly accountDetails: Account;
  readonly loans: Loan[];
  readonly reservations: Reservation[];
}

export type AllInfo = Record<string, AccountInfo>;

// ============================================================================
// Raw payloads (JSON endpoints)
// ============================================================================

export interface Membership {
  readonly id: string;
  readonly hasError: boolean;
  readonly libraryName: string;
  readonly name: string;
  readonly library: string;
}

export interface Activity {
  readonly loansCount: number | null;
  readonly reservationsCount: number | null;
  readonly openAmounts: number;
}

// ============================================================================
// Configuration
// ============================================================================

export interface MijnbibCredentials {
  username: string;
  password: string;
}

export type LoginMethod = 'oauth' | 'form';

export interface MijnbibClientConfig {
  /** City subdomain, e.g. "gent" (default: none, i.e. https://bibliotheek.be) */
  city?: string;
  /** Login flow (default: 'oauth') */
  loginBy?: LoginMethod;
  /** Request timeout in ms (default: 30000) */
  timeout?: number;
  /** Log level (default: LOG_LEVEL env var, else 'warn') */
  logLevel?: LogLevel;
  /** Replace one or more page parsers */
  parsers?: Partial<PageParsers>;
  /** Fetch implementation (default: global fetch) */
  fetch?: FetchLike;
}

// Parser contracts, one per page kind
export interface AccountsParser {
  parseMemberships(json: string): Membership[];
  parseActivity(json: string): Activity;
  buildAccount(membership: Membership, activity: Activity | null, baseUrl: string): Account;
}

export interface LoansParser {
  parse(html: string, baseUrl: string, accountId: string): Loan[];
}

export interface ReservationsParser {
  parse(html: string): Reservation[];
}

export interface ExtendResponseParser {
  /** Null when the page carries no status messages at all */
  parse(html: string): ExtendResult | null;
}

export interface PageParsers {
  accounts: AccountsParser;
  loans: LoansParser;
  reservations: ReservationsParser;
  extendResponse: ExtendResponseParser;
}

// ============================================================================
// Site constants
// ============================================================================

export const BIBLIOTHEEK_URLS = {
  BASE_DOMAIN: 'bibliotheek.be',
  LOGIN_PATH: '/mijn-bibliotheek/aanmelden',
  OAUTH_LOGIN: 'https://mijn.bibliotheek.be/openbibid/rest/auth/login',
  MEMBERSHIPS_PATH: '/api/my-library/memberships',
  activitiesPath: (accountId: string) => `/api/my-library/${accountId}/activities`,
  accountPath: (accountId: string) => `/mijn-bibliotheek/lidmaatschappen/${accountId}`,
  loansPath: (accountId: string) => `/mijn-bibliotheek/lidmaatschappen/${accountId}/uitleningen`,
  reservationsPath: (accountId: string) => `/mijn-bibliotheek/lidmaatschappen/${accountId}/reservaties`,
  openAmountsPath: (accountId: string) => `/mijn-bibliotheek/lidmaatschappen/${accountId}/te-betalen`,
  extendPath: (accountId: string) => `/mijn-bibliotheek/lidmaatschappen/${accountId}/uitleningen/verlengen`
} as const;

export const BIBLIOTHEEK_MARKERS = {
  LOGGED_IN: 'Profiel',
  PRIVACY_CHANGED: ['privacyverklaring is gewijzigd', 'akkoord met de privacyverklaring'],
  SITE_ERROR:
    'Er is een fout opgetreden bij het ophalen van informatie uit het bibliotheeksysteem. Probeer het later opnieuw.',
  NOT_EXTENDABLE: 'Verlengen niet mogelijk',
  AVAILABLE: 'Klaar om af te halen',
  REQUESTED_ON: 'Aangevraagd op',
  VALID_TILL: 'Aanvraag geldig tot',
  EXTEND_SUCCESS: 'werden succesvol verlengd',
  EXTEND_FAILURE: 'Er ging iets fout bij het verlengen',
  EXTEND_SCRIPT: /Statusbericht|Foutmelding/
} as const;

export const BIBLIOTHEEK_SELECTORS = {
  LOANS_WRAPPER: 'div.my-library-user-library-account-loans__loan-wrapper',
  LOAN_TITLE_LINK: 'h3.my-library-user-library-account-loans__loan-title a',
  LOAN_AUTHOR: 'div.author',
  LOAN_TYPE: 'div.my-library-user-library-account-loans__loan-type-label',
  LOAN_COVER: 'img.my-library-user-library-account-loans__loan-cover-img',
  LOAN_FROM_TO: 'div.my-library-user-library-account-loans__loan-from-to',
  LOAN_EXTEND: 'div.card--extend-loan',
  HOLDS_WRAPPER: 'div.my-library-user-library-account-holds__hold-wrapper',
  HOLD_TYPE: 'div.catalog-item-small-teaser__content span',
  HOLD_TITLE_LINK: 'h2.catalog-item-small-teaser__title a',
  HOLD_AUTHOR: 'div.catalog-item-small-teaser__authors',
  HOLD_LOCATION: 'div.my-library-user-library-account-holds__hold-third',
  HOLD_STATUS: 'div.my-library-user-library-account-holds__hold-fourth',
  EXTEND_MESSAGES: 'ul.messages__list',
  EXTEND_MESSAGES_LEGACY: 'div.messages--text'
} as const;

export const BIBLIOTHEEK_CONFIG = {
  DEFAULT_TIMEOUT: 30000,
  DEFAULT_BRANCH: '??',
  DATE_FORMAT: 'DD/MM/YYYY'
} as const;
