export { AccountsListParser } from './accounts-parser.js';
export { LoansListPageParser, itemIdFromUrl, queryParam, resolveUrl, type LoanPageNode } from './loans-parser.js';
export { ReservationsPageParser } from './reservations-parser.js';
export { ExtendResponsePageParser, decodeStringEscapes } from './extend-response-parser.js';
export { parseAmount, parseCount, parseDate } from './values.js';

import type { Logger } from '../../shared/utils/logger.js';
import type { PageParsers } from '../types/index.js';
import { AccountsListParser } from './accounts-parser.js';
import { ExtendResponsePageParser } from './extend-response-parser.js';
import { LoansListPageParser } from './loans-parser.js';
import { ReservationsPageParser } from './reservations-parser.js';

/**
 * Default parser set, with overrides taking precedence
 */
export function createPageParsers(logger: Logger, overrides: Partial<PageParsers> = {}): PageParsers {
  return {
    accounts: overrides.accounts ?? new AccountsListParser(logger.child('AccountsParser')),
    loans: overrides.loans ?? new LoansListPageParser(logger.child('LoansParser')),
    reservations: overrides.reservations ?? new ReservationsPageParser(logger.child('ReservationsParser')),
    extendResponse: overrides.extendResponse ?? new ExtendResponsePageParser(logger.child('ExtendResponseParser'))
  };
}
