/**
 * Reservations Parser
 *
 * Each hold card in the holds wrapper has four sections: request dates,
 * item teaser (title, author, type), pickup location and status.
 */

import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import { normalizeWhitespace } from '../../shared/utils/helpers.js';
import { createLogger, type Logger } from '../../shared/utils/logger.js';
import {
  BIBLIOTHEEK_MARKERS,
  BIBLIOTHEEK_SELECTORS,
  type Reservation,
  type ReservationsParser
} from '../types/index.js';
import { parseDate } from './values.js';

export class ReservationsPageParser implements ReservationsParser {
  private logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? createLogger('ReservationsParser');
  }

  parse(html: string): Reservation[] {
    const $ = cheerio.load(html);
    const wrapper = $(BIBLIOTHEEK_SELECTORS.HOLDS_WRAPPER).first();
    if (wrapper.length === 0) {
      return [];
    }

    const cards: string[] = [];
    wrapper.children().each((_, element) => {
      cards.push($.html(element));
    });

    const holds = cards.map((card) => this.parseHoldCard(card));
    this.logger.debug(`Number of holds found: ${holds.length}`);
    return holds;
  }

  /**
   * Parse a single hold card fragment
   */
  parseHoldCard(cardHtml: string): Reservation {
    const $ = cheerio.load(cardHtml, null, false);

    // Some holds have no type
    const type = normalizeWhitespace($(BIBLIOTHEEK_SELECTORS.HOLD_TYPE).first().text());

    const requestOn = this.parseLabelledDate($, BIBLIOTHEEK_MARKERS.REQUESTED_ON);
    if (requestOn === null) {
      this.logger.warn('Unexpected html structure. Ignoring hold request date');
    }
    // Once available, the site no longer shows this date
    const validTill = this.parseLabelledDate($, BIBLIOTHEEK_MARKERS.VALID_TILL);

    let title = '';
    let url = '';
    const titleLink = $(BIBLIOTHEEK_SELECTORS.HOLD_TITLE_LINK).first();
    if (titleLink.length > 0) {
      title = normalizeWhitespace(titleLink.text());
      url = titleLink.attr('href') ?? '';
    } else {
      this.logger.warn('Unexpected html structure. Ignoring hold title and url');
    }

    const author = normalizeWhitespace($(BIBLIOTHEEK_SELECTORS.HOLD_AUTHOR).first().text());

    let location = '';
    const locationTag = $(BIBLIOTHEEK_SELECTORS.HOLD_LOCATION).first().find('strong').first();
    if (locationTag.length > 0) {
      location = normalizeWhitespace(locationTag.text());
    } else {
      this.logger.warn('Unexpected html structure. Ignoring hold location.');
    }

    const { available, availableTill } = this.parseAvailability($);

    return {
      title,
      type,
      url,
      author,
      location,
      available,
      availableTill,
      requestOn,
      validTill
    };
  }

  private parseLabelledDate($: CheerioAPI, label: string): string | null {
    const paragraph = $('p')
      .filter((_, element) => $(element).text().includes(label))
      .first();
    if (paragraph.length === 0) {
      return null;
    }
    return parseDate(normalizeWhitespace(paragraph.text()).replace(label, ''));
  }

  private parseAvailability($: CheerioAPI): { available: boolean; availableTill: string | null } {
    const status = $(BIBLIOTHEEK_SELECTORS.HOLD_STATUS).first();
    const heading = status.find('h3').first();
    if (heading.length === 0) {
      this.logger.warn('Unexpected html structure. Ignoring hold availability.');
      return { available: false, availableTill: null };
    }

    const available = normalizeWhitespace(heading.text()).includes(BIBLIOTHEEK_MARKERS.AVAILABLE);
    if (!available) {
      return { available, availableTill: null };
    }

    // <p>Je kan dit item afhalen tot <strong>15/03/2024</strong></p>
    const availableTill = parseDate(status.find('strong').first().text());
    if (availableTill === null) {
      this.logger.warn('Unexpected html structure. Ignoring hold availability end date.');
    }
    return { available, availableTill };
  }
}
