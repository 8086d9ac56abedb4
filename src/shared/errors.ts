/**
 * Error taxonomy
 *
 * Every failure the client reports is one of these classes, so callers can
 * tell a rejected login from an unreachable site or a site that changed its
 * markup:
 *
 * - `AuthenticationError` - credentials rejected, or privacy statement must be accepted again
 * - `CanNotConnectError` - the endpoint could not be reached (network, timeout)
 * - `TemporarySiteError` - the site answered with a server-side failure (maintenance)
 * - `IncompatibleSourceError` - the response did not match the expected shape
 * - `ItemAccessError` - a specific page (loans, reservations) could not be opened
 * - `ExtendLoanError` - the loan extension request failed server-side
 */

export class MijnbibError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

// ============================================================================
// Client-side errors
// ============================================================================

export class AuthenticationError extends MijnbibError {}

/**
 * Raised when an item (loans or reservations page) could not be opened.
 * Usually a bad account id, occasionally a server-side cause.
 */
export class ItemAccessError extends MijnbibError {}

export class ConfigurationError extends MijnbibError {}

// ============================================================================
// Server-side errors
// ============================================================================

export class CanNotConnectError extends MijnbibError {
  readonly url: string;

  constructor(message: string, url: string, options?: { cause?: unknown }) {
    super(message, options);
    this.url = url;
  }
}

export class TemporarySiteError extends MijnbibError {}

/**
 * Raised for any mismatch between a response and the expected contract.
 * `htmlBody` holds the payload that failed to parse.
 */
export class IncompatibleSourceError extends MijnbibError {
  readonly htmlBody: string;

  constructor(message: string, htmlBody: string, options?: { cause?: unknown }) {
    super(message, options);
    this.htmlBody = htmlBody;
  }
}

export class ExtendLoanError extends MijnbibError {}

export class InvalidExtendLoanUrlError extends ExtendLoanError {}
