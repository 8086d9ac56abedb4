/**
 * Loans Parser
 *
 * Parses the loans page of one account. Branch names and loan cards are
 * interleaved siblings inside the loans wrapper:
 *
 * ```html
 * <div class="my-library-user-library-account-loans__loan-wrapper">
 *   <h2>Gent Hoofdbibliotheek</h2>
 *   <div class="card my-library-user-library-account-loans__loan">...</div>
 *   <div class="card my-library-user-library-account-loans__loan">...</div>
 *   <h2>Brugge</h2>
 *   <div class="card my-library-user-library-account-loans__loan">...</div>
 * </div>
 * ```
 *
 * Cards carry no branch reference, so the wrapper's children are turned into
 * a sequence of header and card nodes and scanned with a running branch name.
 * Every field of a card is extracted on its own; a missing field is logged
 * and defaulted, never fatal.
 */

import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import { TemporarySiteError } from '../../shared/errors.js';
import { normalizeWhitespace } from '../../shared/utils/helpers.js';
import { createLogger, type Logger } from '../../shared/utils/logger.js';
import {
  BIBLIOTHEEK_CONFIG,
  BIBLIOTHEEK_MARKERS,
  BIBLIOTHEEK_SELECTORS,
  BIBLIOTHEEK_URLS,
  type Loan,
  type LoansParser
} from '../types/index.js';
import { parseDate } from './values.js';

export type LoanPageNode =
  | { kind: 'header'; text: string }
  | { kind: 'card'; html: string }
  | { kind: 'unknown'; tagName: string };

interface Extendability {
  extendable: boolean | null;
  extendUrl: string;
  extendId: string;
}

const UNKNOWN_EXTENDABILITY: Extendability = { extendable: null, extendUrl: '', extendId: '' };

/**
 * Resolve a possibly relative URL against the site base.
 * Without a usable base the href is returned as is.
 */
export function resolveUrl(href: string, baseUrl: string): string {
  try {
    return new URL(href, baseUrl || undefined).toString();
  } catch {
    return href;
  }
}

/**
 * Decoded value of a query parameter, or null when the url has none (or is not absolute).
 */
export function queryParam(url: string, name: string): string | null {
  try {
    return new URL(url).searchParams.get(name);
  } catch {
    return null;
  }
}

/**
 * Item id: last `|` separated segment of the resolver link's `extid`, e.g.
 * `https://city.bibliotheek.be/resolver.ashx?extid=%7Cwise-oostvlaanderen%7C1144255` gives `1144255`.
 */
export function itemIdFromUrl(url: string): string {
  const extid = queryParam(url, 'extid');
  const segments = extid ? extid.split('|') : url.split('%7C');
  return segments[segments.length - 1];
}

export class LoansListPageParser implements LoansParser {
  private logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? createLogger('LoansParser');
  }

  parse(html: string, baseUrl: string, accountId: string): Loan[] {
    const loans: Loan[] = [];
    let branchName: string = BIBLIOTHEEK_CONFIG.DEFAULT_BRANCH;

    for (const node of this.toNodes(html)) {
      switch (node.kind) {
        case 'header':
          branchName = node.text;
          break;
        case 'card':
          loans.push(this.parseLoanCard(node.html, baseUrl, branchName, accountId));
          break;
        case 'unknown':
          this.logger.warn(`Unexpected html structure. Did not find loan nor branch (<${node.tagName}>).`);
          break;
      }
    }

    this.logger.debug(`Number of loans found: ${loans.length}`);
    return loans;
  }

  /**
   * Split the loans wrapper into header and card nodes.
   * Raises TemporarySiteError when the site shows its "try again later" banner instead.
   */
  toNodes(html: string): LoanPageNode[] {
    const $ = cheerio.load(html);
    const wrapper = $(BIBLIOTHEEK_SELECTORS.LOANS_WRAPPER).first();

    if (wrapper.length === 0) {
      if (normalizeWhitespace($.root().text()).includes(BIBLIOTHEEK_MARKERS.SITE_ERROR)) {
        throw new TemporarySiteError(
          `Loans or reservations can not be retrieved. Site reports: ${BIBLIOTHEEK_MARKERS.SITE_ERROR}`
        );
      }
      return [];
    }

    const nodes: LoanPageNode[] = [];
    wrapper.children().each((_, element) => {
      const tagName = element.tagName.toLowerCase();
      if (tagName === 'h2') {
        nodes.push({ kind: 'header', text: normalizeWhitespace($(element).text()) });
      } else if (tagName === 'div') {
        nodes.push({ kind: 'card', html: $.html(element) });
      } else {
        nodes.push({ kind: 'unknown', tagName });
      }
    });
    return nodes;
  }

  /**
   * Parse a single loan card fragment
   */
  parseLoanCard(cardHtml: string, baseUrl: string, branchName: string, accountId: string): Loan {
    const $ = cheerio.load(cardHtml, null, false);

    let title = '';
    let url = '';
    let id = '';
    const titleLink = $(BIBLIOTHEEK_SELECTORS.LOAN_TITLE_LINK).first();
    if (titleLink.length > 0) {
      title = normalizeWhitespace(titleLink.text());
      url = titleLink.attr('href') ?? '';
      id = itemIdFromUrl(url);
    } else {
      this.logger.warn('Unexpected html structure. Ignoring loan title, url and id');
    }

    // Not every item has an author or a type label
    const author = normalizeWhitespace($(BIBLIOTHEEK_SELECTORS.LOAN_AUTHOR).first().text());
    const type = normalizeWhitespace($(BIBLIOTHEEK_SELECTORS.LOAN_TYPE).first().text());
    const coverUrl = $(BIBLIOTHEEK_SELECTORS.LOAN_COVER).first().attr('src') ?? '';

    const { loanFrom, loanTill } = this.parseLoanPeriod($);
    const extendability = this.parseExtendability($, baseUrl, accountId);

    return {
      title,
      loanFrom,
      loanTill,
      author,
      type,
      ...extendability,
      branchName,
      id,
      url,
      coverUrl,
      accountId
    };
  }

  private parseLoanPeriod($: CheerioAPI): { loanFrom: string | null; loanTill: string | null } {
    // <span>Van</span> <span>25/11/2023</span> <span>Tot en met</span> <span>23/12/2023</span>
    const spans = $(BIBLIOTHEEK_SELECTORS.LOAN_FROM_TO).first().find('span');
    const loanFrom = spans.length > 1 ? parseDate($(spans[1]).text()) : null;
    const loanTill = spans.length > 3 ? parseDate($(spans[3]).text()) : null;

    if (loanFrom === null || loanTill === null) {
      this.logger.warn('Unexpected html structure. Ignoring loan start and end date');
    }
    return { loanFrom, loanTill };
  }

  private parseExtendability($: CheerioAPI, baseUrl: string, accountId: string): Extendability {
    const extendBlock = $(BIBLIOTHEEK_SELECTORS.LOAN_EXTEND).first();
    if (extendBlock.length === 0) {
      return UNKNOWN_EXTENDABILITY;
    }

    if (normalizeWhitespace(extendBlock.text()).includes(BIBLIOTHEEK_MARKERS.NOT_EXTENDABLE)) {
      return { extendable: false, extendUrl: '', extendId: '' };
    }

    // UI with a "Verleng" link
    const link = extendBlock.find('a').first();
    if (link.length > 0) {
      const href = link.attr('href');
      if (!href) {
        return UNKNOWN_EXTENDABILITY;
      }
      const extendUrl = resolveUrl(href, baseUrl);
      const extendId = queryParam(extendUrl, 'loan-ids');
      if (!extendId) {
        return UNKNOWN_EXTENDABILITY;
      }
      return { extendable: true, extendUrl, extendId };
    }

    // UI with only a selection checkbox
    const inputId = extendBlock.find('input').first().attr('id');
    if (inputId) {
      const extendUrl = resolveUrl(`${BIBLIOTHEEK_URLS.extendPath(accountId)}?loan-ids=${inputId}`, baseUrl);
      return { extendable: true, extendUrl, extendId: inputId };
    }

    return UNKNOWN_EXTENDABILITY;
  }
}
