/**
 * errors.ts: The error taxonomy of the crawl pipeline.
 *
 *   AuthError            fatal to the batch
 *   ConfigError          fatal at startup, before any browser is launched
 *   NotFoundError        a bounded wait expired; recovered by the caller
 *   ElementMissingError  a card lacks a field; that card is skipped
 *   StoreError           a Record Store call failed; that organization's pass is lost
 *
 * Each class carries a `kind` literal so callers can switch on it.
 */

export type AuthErrorReason = 'MissingCredentials' | 'Timeout' | 'Rejected';

export class AuthError extends Error {
  readonly kind = 'auth' as const;

  constructor(
    readonly reason: AuthErrorReason,
    message: string,
  ) {
    super(message);
    this.name = 'AuthError';
  }
}

export class ConfigError extends Error {
  readonly kind = 'config' as const;

  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join(', ')}`);
    this.name = 'ConfigError';
  }
}

export class NotFoundError extends Error {
  readonly kind = 'not-found' as const;

  constructor(
    readonly selector: string,
    readonly timeoutMs: number,
  ) {
    super(`"${selector}" did not appear within ${timeoutMs} ms`);
    this.name = 'NotFoundError';
  }
}

export class ElementMissingError extends Error {
  readonly kind = 'element-missing' as const;

  constructor(
    readonly selector: string,
    readonly attribute?: string,
  ) {
    super(
      attribute
        ? `"${selector}" has no "${attribute}" attribute`
        : `"${selector}" not found in card`,
    );
    this.name = 'ElementMissingError';
  }
}

export class StoreError extends Error {
  readonly kind = 'store' as const;

  constructor(
    readonly operation: string,
    detail: string,
  ) {
    super(`${operation} failed: ${detail}`);
    this.name = 'StoreError';
  }
}
