/**
 * Environment configuration
 *
 * Environment:
 *   - MIJNBIB_USERNAME: login email or username
 *   - MIJNBIB_PASSWORD: password
 *   - MIJNBIB_CITY: city subdomain, e.g. "gent" (optional)
 *   - MIJNBIB_ACCOUNT_ID: default account for the CLI (optional)
 *   - MIJNBIB_LOGIN_BY: "oauth" (default) or "form"
 *   - MIJNBIB_TIMEOUT: request timeout in ms (optional)
 *   - LOG_LEVEL: silent | error | warn | info | debug
 */

import dotenv from 'dotenv';
import { ConfigurationError } from './shared/errors.js';
import { isLogLevel } from './shared/utils/logger.js';
import type { LoginMethod, MijnbibClientConfig, MijnbibCredentials } from './library/types/index.js';

export interface ClientSettings {
  credentials: MijnbibCredentials;
  config: MijnbibClientConfig;
  accountId?: string;
}

type Env = Record<string, string | undefined>;

const REQUIRED_KEYS = ['MIJNBIB_USERNAME', 'MIJNBIB_PASSWORD'] as const;

/**
 * Load environment variables from .env and .env.local
 */
export function loadEnv(): void {
  dotenv.config();
  dotenv.config({ path: '.env.local' });
}

function isLoginMethod(value: string): value is LoginMethod {
  return value === 'oauth' || value === 'form';
}

/**
 * Read client settings from the environment.
 *
 * @throws ConfigurationError when credentials are missing or a value is malformed
 */
export function loadClientSettings(env: Env = process.env): ClientSettings {
  const missing = REQUIRED_KEYS.filter((key) => !env[key]);
  if (missing.length > 0) {
    throw new ConfigurationError(`Missing required env vars: ${missing.join(', ')}`);
  }

  const config: MijnbibClientConfig = {};

  const city = env.MIJNBIB_CITY?.trim();
  if (city) {
    config.city = city;
  }

  const loginBy = env.MIJNBIB_LOGIN_BY?.trim().toLowerCase();
  if (loginBy) {
    if (!isLoginMethod(loginBy)) {
      throw new ConfigurationError(`MIJNBIB_LOGIN_BY needs to be either 'oauth' or 'form', got '${loginBy}'`);
    }
    config.loginBy = loginBy;
  }

  const timeout = env.MIJNBIB_TIMEOUT?.trim();
  if (timeout) {
    const ms = Number(timeout);
    if (!Number.isInteger(ms) || ms <= 0) {
      throw new ConfigurationError(`MIJNBIB_TIMEOUT must be a positive number of milliseconds, got '${timeout}'`);
    }
    config.timeout = ms;
  }

  const logLevel = env.LOG_LEVEL?.trim().toLowerCase();
  if (logLevel) {
    if (!isLogLevel(logLevel)) {
      throw new ConfigurationError(`Unknown LOG_LEVEL '${logLevel}'`);
    }
    config.logLevel = logLevel;
  }

  return {
    credentials: {
      username: env.MIJNBIB_USERNAME ?? '',
      password: env.MIJNBIB_PASSWORD ?? ''
    },
    config,
    accountId: env.MIJNBIB_ACCOUNT_ID?.trim() || undefined
  };
}
