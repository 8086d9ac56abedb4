/**
 * Login Form Parser
 *
 * Extracts the first form of the login page: its action and every hidden
 * input, so the form can be replayed as a plain POST.
 */

import * as cheerio from 'cheerio';

export interface ParsedLoginForm {
  /** Raw action attribute (may be relative or empty) */
  action: string;
  hiddenFields: Record<string, string>;
}

/**
 * Parse all hidden input fields of a form
 */
export function parseHiddenFields(html: string): Record<string, string> {
  const $ = cheerio.load(html);
  const fields: Record<string, string> = {};

  $('input[type="hidden"]').each((_, element) => {
    const name = $(element).attr('name');
    if (name) {
      fields[name] = $(element).attr('value') ?? '';
    }
  });

  return fields;
}

/**
 * Parse the first form on the page, or null when there is none
 */
export function parseLoginForm(html: string): ParsedLoginForm | null {
  const $ = cheerio.load(html);
  const form = $('form').first();
  if (form.length === 0) {
    return null;
  }

  return {
    action: form.attr('action') ?? '',
    hiddenFields: parseHiddenFields($.html(form))
  };
}
