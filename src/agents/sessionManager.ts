/**
 * sessionManager.ts: Logs a browser session into the networking site.
 *
 * Flow:
 *   1. Refuse early when either credential is missing.
 *   2. Open the login page and wait (bounded) for both form fields.
 *   3. Type the credentials and submit.
 *   4. Poll the session location until it matches the logged-in pattern.
 *
 * Every failure comes back as an `AuthError` in a `Result`; the orchestrator
 * treats any of them as fatal for the batch.  There is no retry here.
 */

import type { BrowserSession } from '../core/browserManager';
import type { Credentials, LoginOptions } from '../core/config';
import { AuthError } from '../core/errors';
import { err, ok, type Result } from '../core/result';
import { pollUntil, type PollOptions } from '../core/wait';
import { waitFor } from '../scrapers/documentQuery';
import { LOGIN_SELECTORS } from '../scrapers/selectors';
import { Logger, describeError } from '../core/logger';

const logger = new Logger('SessionManager');

export interface AuthenticateOptions extends LoginOptions {
  /** Poll interval for the field waits and the post-submit check. */
  pollIntervalMs?: PollOptions['intervalMs'];
}

/** True when `url` looks like a logged-in landing page. */
export function isLoggedInLocation(url: string, pattern: string): boolean {
  return url.includes(pattern);
}

export async function authenticate(
  session: BrowserSession,
  credentials: Credentials,
  options: AuthenticateOptions,
): Promise<Result<void, AuthError>> {
  const { username, password } = credentials;
  if (!username || !password) {
    logger.error('Cannot log in: NETWORK_USERNAME and NETWORK_PASSWORD must both be set');
    return err(
      new AuthError('MissingCredentials', 'Username and password are both required'),
    );
  }

  logger.info('Starting login flow…');

  try {
    await session.page.goto(options.url);

    const wait = { intervalMs: options.pollIntervalMs };
    const usernameField = await waitFor(
      session,
      LOGIN_SELECTORS.username,
      'present',
      options.waitTimeoutMs,
      wait,
    );
    if (!usernameField.ok) {
      return err(new AuthError('Timeout', usernameField.error.message));
    }

    const passwordField = await waitFor(
      session,
      LOGIN_SELECTORS.password,
      'present',
      options.waitTimeoutMs,
      wait,
    );
    if (!passwordField.ok) {
      return err(new AuthError('Timeout', passwordField.error.message));
    }

    await usernameField.value.type(username);
    await passwordField.value.type(password);

    const submit = await waitFor(
      session,
      LOGIN_SELECTORS.submit,
      'clickable',
      options.waitTimeoutMs,
      wait,
    );
    if (!submit.ok) {
      return err(new AuthError('Timeout', submit.error.message));
    }
    await submit.value.click();

    const landed = await pollUntil(
      async () => {
        const url = session.page.currentUrl();
        return isLoggedInLocation(url, options.loggedInPattern) ? url : null;
      },
      { timeoutMs: options.waitTimeoutMs, intervalMs: options.pollIntervalMs },
    );

    if (!landed) {
      const location = session.page.currentUrl();
      logger.error(`Login rejected, ended up on ${location}`);
      return err(
        new AuthError(
          'Rejected',
          `Location "${location}" does not match "${options.loggedInPattern}"`,
        ),
      );
    }

    logger.info('Login successful!');
    return ok(undefined);
  } catch (error) {
    // A navigation or typing failure mid-flow leaves us not logged in.
    logger.error(`Login flow failed: ${describeError(error)}`, error);
    return err(new AuthError('Rejected', describeError(error)));
  }
}
