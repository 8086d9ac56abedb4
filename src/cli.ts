/**
 * mijnbib CLI
 *
 * Commands:
 *   mijnbib login                    - Log in and report the result
 *   mijnbib accounts                 - List accounts
 *   mijnbib loans [accountId]        - List loans of an account
 *   mijnbib reservations [accountId] - List reservations of an account
 *   mijnbib all                      - Accounts with their loans and reservations
 *
 * Credentials come from the environment (see config.ts). The account id
 * defaults to MIJNBIB_ACCOUNT_ID.
 */

import { parseArgs } from 'node:util';
import { loadClientSettings } from './config.js';
import { ConfigurationError, MijnbibError } from './shared/errors.js';
import { getErrorMessage } from './shared/utils/helpers.js';
import { createMijnBibliotheekClient, type MijnBibliotheekClient } from './library/client.js';
import type { MijnbibClientConfig, MijnbibCredentials } from './library/types/index.js';

const COMMANDS = ['login', 'accounts', 'loans', 'reservations', 'all'] as const;

export type Command = (typeof COMMANDS)[number];

export type CliOptions =
  | { help: true }
  | { help: false; command: Command; accountId?: string; verbose: boolean };

export type CliClient = Pick<
  MijnBibliotheekClient,
  'login' | 'isAuthenticated' | 'getAccounts' | 'getLoans' | 'getReservations' | 'getAllInfo'
>;

export interface CliDeps {
  env?: Record<string, string | undefined>;
  out?: (line: string) => void;
  err?: (line: string) => void;
  createClient?: (credentials: MijnbibCredentials, config: MijnbibClientConfig) => CliClient;
}

export const USAGE = `Usage: mijnbib <command> [accountId] [--verbose]

Commands:
  login          log in, and report if success or not
  accounts       retrieve accounts
  loans          retrieve loans for account id
  reservations   retrieve reservations for account id
  all            retrieve all information for all accounts

Options:
  -v, --verbose  show debug logging
  -h, --help     show this help

Environment: MIJNBIB_USERNAME, MIJNBIB_PASSWORD, MIJNBIB_CITY, MIJNBIB_ACCOUNT_ID,
MIJNBIB_LOGIN_BY, MIJNBIB_TIMEOUT, LOG_LEVEL`;

function isCommand(value: string): value is Command {
  return COMMANDS.some((command) => command === value);
}

function readArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      options: {
        verbose: { type: 'boolean', short: 'v' },
        help: { type: 'boolean', short: 'h' }
      },
      allowPositionals: true
    });
  } catch (error: unknown) {
    throw new ConfigurationError(getErrorMessage(error), { cause: error });
  }
}

/**
 * Parse command line arguments (without the node and script entries)
 */
export function parseCliArgs(argv: string[]): CliOptions {
  const { values, positionals } = readArgs(argv);
  if (values.help) {
    return { help: true };
  }

  const [command = '', accountId, ...rest] = positionals;
  if (!isCommand(command)) {
    throw new ConfigurationError(command ? `Unknown command '${command}'` : 'No command given');
  }
  if (rest.length > 0) {
    throw new ConfigurationError(`Unexpected arguments: ${rest.join(' ')}`);
  }

  return { help: false, command, accountId, verbose: values.verbose ?? false };
}

function requireAccountId(command: Command, accountId: string | undefined): string {
  if (!accountId) {
    throw new ConfigurationError(`Command '${command}' needs an account id (argument or MIJNBIB_ACCOUNT_ID)`);
  }
  return accountId;
}

/**
 * Run one command and return its JSON-serializable result
 */
export async function runCommand(client: CliClient, command: Command, accountId?: string): Promise<unknown> {
  switch (command) {
    case 'login':
      await client.login();
      return { loggedIn: client.isAuthenticated() };
    case 'accounts':
      return client.getAccounts();
    case 'loans':
      return client.getLoans(requireAccountId(command, accountId));
    case 'reservations':
      return client.getReservations(requireAccountId(command, accountId));
    case 'all':
      return client.getAllInfo();
  }
}

/**
 * CLI entry point. Resolves with the process exit code; library errors are
 * reported on stderr, anything else is rethrown.
 */
export async function main(argv: string[], deps: CliDeps = {}): Promise<number> {
  const out = deps.out ?? console.log;
  const err = deps.err ?? console.error;
  const createClient = deps.createClient ?? createMijnBibliotheekClient;

  try {
    const options = parseCliArgs(argv);
    if (options.help) {
      out(USAGE);
      return 0;
    }

    const settings = loadClientSettings(deps.env ?? process.env);
    const config: MijnbibClientConfig = options.verbose
      ? { ...settings.config, logLevel: 'debug' }
      : settings.config;

    const client = createClient(settings.credentials, config);
    const result = await runCommand(client, options.command, options.accountId ?? settings.accountId);
    out(JSON.stringify(result, null, 2));
    return 0;
  } catch (error: unknown) {
    if (error instanceof MijnbibError) {
      err(`${error.name}: ${error.message}`);
      return 1;
    }
    throw error;
  }
}
