/**
 * Accounts Parser
 *
 * The memberships endpoint returns memberships grouped per library region:
 *
 * ```json
 * { "Dijk92 - Bibliotheek Gent": [ { "id": "123456", "hasError": false, "libraryName": "...", "name": "John Doe", ... } ] }
 * ```
 *
 * Each membership without error has an activities endpoint with its counters:
 *
 * ```json
 * { "numberOfLoans": 5, "numberOfHolds": 2, "openAmount": "3,20" }
 * ```
 */

import { IncompatibleSourceError } from '../../shared/errors.js';
import { getErrorMessage } from '../../shared/utils/helpers.js';
import { createLogger, type Logger } from '../../shared/utils/logger.js';
import {
  BIBLIOTHEEK_URLS,
  type Account,
  type AccountsParser,
  type Activity,
  type Membership
} from '../types/index.js';
import { parseAmount, parseCount } from './values.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseJson(json: string, what: string): unknown {
  try {
    return JSON.parse(json);
  } catch (error: unknown) {
    throw new IncompatibleSourceError(`Invalid JSON for ${what} (${getErrorMessage(error)})`, json, { cause: error });
  }
}

function asText(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return '';
}

export class AccountsListParser implements AccountsParser {
  private logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? createLogger('AccountsParser');
  }

  parseMemberships(json: string): Membership[] {
    const data = parseJson(json, 'memberships');
    if (!isRecord(data)) {
      throw new IncompatibleSourceError('Expected an object of memberships per library', json);
    }

    const memberships: Membership[] = [];
    for (const [region, entries] of Object.entries(data)) {
      if (!Array.isArray(entries)) {
        throw new IncompatibleSourceError(`Expected a list of memberships for '${region}'`, json);
      }

      for (const entry of entries) {
        if (!isRecord(entry) || typeof entry.hasError !== 'boolean') {
          throw new IncompatibleSourceError(`Membership in '${region}' has no 'hasError' flag`, json);
        }

        const id = asText(entry.id);
        if (!id) {
          throw new IncompatibleSourceError(`Membership in '${region}' has no id`, json);
        }

        memberships.push({
          id,
          hasError: entry.hasError,
          libraryName: asText(entry.libraryName),
          name: asText(entry.name),
          library: asText(entry.library)
        });
      }
    }

    this.logger.debug(`Number of memberships found: ${memberships.length}`);
    return memberships;
  }

  parseActivity(json: string): Activity {
    const data = parseJson(json, 'activity');
    if (!isRecord(data)) {
      throw new IncompatibleSourceError('Expected an activity object', json);
    }

    const openAmounts = data.openAmount === undefined ? 0 : parseAmount(data.openAmount);
    if (openAmounts === null) {
      throw new IncompatibleSourceError(`Unexpected open amount '${asText(data.openAmount)}'`, json);
    }

    return {
      loansCount: parseCount(data.numberOfLoans),
      reservationsCount: parseCount(data.numberOfHolds),
      openAmounts
    };
  }

  buildAccount(membership: Membership, activity: Activity | null, baseUrl: string): Account {
    const counters = membership.hasError || activity === null
      ? { loansCount: null, reservationsCount: null, openAmounts: 0 }
      : activity;

    return {
      libraryName: membership.libraryName,
      user: membership.name,
      id: membership.id,
      loansCount: counters.loansCount,
      loansUrl: baseUrl + BIBLIOTHEEK_URLS.loansPath(membership.id),
      reservationsCount: counters.reservationsCount,
      reservationsUrl: baseUrl + BIBLIOTHEEK_URLS.reservationsPath(membership.id),
      openAmounts: counters.openAmounts,
      openAmountsUrl: baseUrl + BIBLIOTHEEK_URLS.openAmountsPath(membership.id)
    };
  }
}
