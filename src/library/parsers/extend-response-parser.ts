/**
 * Extend Response Parser
 *
 * After an extension the site lands on the loans page and renders its status
 * messages through a Drupal BigPipe placeholder: a `<script>` holding a JSON
 * command list whose `data` member is the escaped message HTML.
 *
 * ```html
 * <script type="application/vnd.drupal-ajax">
 * [{"command":"insert",...,"data":"<div data-drupal-messages> ... <\/div>\n","settings":null}]
 * </script>
 * ```
 *
 * Decoding is best-effort and never throws: a page without the status script
 * gives null, anything unexpected inside it an unsuccessful result with no
 * details.
 */

import * as cheerio from 'cheerio';
import { findBetween, getErrorMessage, normalizeWhitespace } from '../../shared/utils/helpers.js';
import { createLogger, type Logger } from '../../shared/utils/logger.js';
import {
  BIBLIOTHEEK_MARKERS,
  BIBLIOTHEEK_SELECTORS,
  type ExtendDetail,
  type ExtendResponseParser,
  type ExtendResult
} from '../types/index.js';
import { parseDate } from './values.js';

const NO_EXTENSIONS: ExtendResult = { likelySuccess: false, count: 0, details: [] };

const SIMPLE_ESCAPES: Record<string, string> = {
  '"': '"',
  '\\': '\\',
  '/': '/',
  "'": "'",
  b: '\b',
  f: '\f',
  n: '\n',
  r: '\r',
  t: '\t'
};

/**
 * Undo string escaping: `\uXXXX`, `\xXX` and the single-character escapes.
 * Unknown escapes are kept verbatim.
 */
export function decodeStringEscapes(text: string): string {
  return text.replace(/\\(u[0-9a-fA-F]{4}|x[0-9a-fA-F]{2}|.)/g, (sequence: string, escape: string) => {
    if (escape.length > 1) {
      return String.fromCharCode(parseInt(escape.slice(1), 16));
    }
    return SIMPLE_ESCAPES[escape] ?? sequence;
  });
}

export class ExtendResponsePageParser implements ExtendResponseParser {
  private logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? createLogger('ExtendResponseParser');
  }

  parse(html: string): ExtendResult | null {
    const blob = this.extractHtmlFromScript(html);
    if (blob === null) {
      this.logger.warn('No status message found in extend response');
      return null;
    }
    return this.parseStatusBlob(blob);
  }

  /**
   * Return the message HTML carried in the status script, or null when the
   * page has no such script.
   */
  extractHtmlFromScript(html: string): string | null {
    const $ = cheerio.load(html);
    const script = $('script')
      .filter((_, element) => BIBLIOTHEEK_MARKERS.EXTEND_SCRIPT.test($(element).text()))
      .first();
    if (script.length === 0) {
      return null;
    }

    const snippet = findBetween(script.text(), '"data":"', '","settings');
    return decodeStringEscapes(snippet.replace(/\\\//g, '/'));
  }

  /**
   * Parse the status message list:
   *
   * ```html
   * <ul class="messages__list">
   *   <li class="messages__item">Deze uitleningen werden succesvol verlengd:</li>
   *   <li class="messages__item">"<em class="placeholder">Het schip der doden</em>" tot 08/01/2024.</li>
   * </ul>
   * ```
   *
   * Older pages put the heading in a `<p>` inside `div.messages--text`, with
   * every `<li>` being an extended loan.
   */
  parseStatusBlob(html: string): ExtendResult {
    const $ = cheerio.load(html, null, false);

    let heading: string;
    let entries: string[];
    const list = $(BIBLIOTHEEK_SELECTORS.EXTEND_MESSAGES).first();
    const legacy = $(BIBLIOTHEEK_SELECTORS.EXTEND_MESSAGES_LEGACY).first();

    if (list.length > 0) {
      const items = list.find('li');
      heading = normalizeWhitespace(items.first().text());
      entries = items.slice(1).toArray().map((element) => $.html(element));
    } else if (legacy.length > 0) {
      heading = normalizeWhitespace(legacy.find('p').first().text());
      entries = legacy.find('li').toArray().map((element) => $.html(element));
    } else {
      this.logger.warn('Unexpected html structure. Reporting 0 extensions; could be wrong');
      return NO_EXTENSIONS;
    }

    const firstItem = $('li').first();
    if (normalizeWhitespace(firstItem.text()).includes(BIBLIOTHEEK_MARKERS.EXTEND_FAILURE)) {
      // Messages might mix successes and failures; report none at all
      return NO_EXTENSIONS;
    }

    if (!heading.includes(BIBLIOTHEEK_MARKERS.EXTEND_SUCCESS)) {
      return NO_EXTENSIONS;
    }

    try {
      const details = entries.map((entry) => this.parseEntry(entry));
      return { likelySuccess: true, count: details.length, details };
    } catch (error: unknown) {
      this.logger.debug(`Could not parse extend response status blob: ${getErrorMessage(error)}`);
      this.logger.warn('Unexpected html structure. Reporting 0 extensions; could be wrong');
      return NO_EXTENSIONS;
    }
  }

  private parseEntry(entryHtml: string): ExtendDetail {
    const $ = cheerio.load(entryHtml, null, false);
    const title = $('em').first();
    if (title.length === 0) {
      throw new Error(`No title in '${entryHtml}'`);
    }

    const words = normalizeWhitespace($.root().text()).split(' ');
    const lastWord = words[words.length - 1].replace(/^\.+|\.+$/g, '');
    const until = parseDate(lastWord);
    if (until === null) {
      throw new Error(`No valid date in '${entryHtml}'`);
    }

    return { title: normalizeWhitespace(title.text()), until };
  }
}
