/**
 * browserManager.ts: Owns the lifecycle of the one browser session a batch uses.
 *
 *   acquire(options)         launch Chromium with the configured switches, open a tab
 *   release(session)         close it; runs once, never throws
 *   withSession(options, fn) the loan pattern: `fn` gets a session, release is
 *                            guaranteed on every exit path
 *
 * Puppeteer is reached through a `SessionLauncher` so tests can hand in an
 * in-process fake instead of Chromium.
 */

import puppeteer from 'puppeteer-core';
import type { BrowserLaunchOptions } from './config';
import { PuppeteerSessionPage } from './puppeteerPage';
import type { SessionPage } from './types';
import { Logger, describeError } from './logger';

const logger = new Logger('BrowserManager');

/** A launched browser: the tab we drive plus a way to shut the whole thing down. */
export interface LaunchedBrowser {
  page: SessionPage;
  close(): Promise<void>;
}

export type SessionLauncher = (
  options: BrowserLaunchOptions,
) => Promise<LaunchedBrowser>;

export interface BrowserSession {
  readonly id: number;
  readonly page: SessionPage;
  readonly released: boolean;
}

/** Translate launch options into Chromium command-line switches. */
export function buildLaunchArgs(options: BrowserLaunchOptions): string[] {
  const args: string[] = [];
  if (options.headless) args.push('--headless');
  if (options.disableGpu) args.push('--disable-gpu');
  if (options.noSandbox) args.push('--no-sandbox');
  if (options.disableSharedMemory) args.push('--disable-dev-shm-usage');
  return args;
}

/** Default launcher: a real Chromium via puppeteer-core. */
export const launchPuppeteer: SessionLauncher = async (options) => {
  const browser = await puppeteer.launch({
    // Headless mode is driven by the explicit switch in `args`.
    headless: false,
    args: buildLaunchArgs(options),
    executablePath: options.executablePath,
    channel: options.executablePath ? undefined : 'chrome',
  });

  try {
    const page = await browser.newPage();
    return {
      page: new PuppeteerSessionPage(page),
      close: () => browser.close(),
    };
  } catch (err) {
    await browser.close();
    throw err;
  }
};

class ManagedSession implements BrowserSession {
  released = false;

  constructor(
    readonly id: number,
    readonly browser: LaunchedBrowser,
  ) {}

  get page(): SessionPage {
    return this.browser.page;
  }
}

export class BrowserManager {
  private nextId = 1;
  private readonly sessions = new Map<number, ManagedSession>();

  constructor(private readonly launcher: SessionLauncher = launchPuppeteer) {}

  // ── Core API ───────────────────────────────────────────

  async acquire(options: BrowserLaunchOptions): Promise<BrowserSession> {
    const args = buildLaunchArgs(options);
    logger.info(`Launching browser (${args.length ? args.join(' ') : 'default flags'})`);

    const launched = await this.launcher(options);
    const session = new ManagedSession(this.nextId++, launched);
    this.sessions.set(session.id, session);

    logger.info(`Browser session #${session.id} ready`);
    return session;
  }

  /**
   * Close a session.  A second call for the same session is a no-op, and a
   * failing close is logged rather than thrown.
   */
  async release(session: BrowserSession): Promise<void> {
    const managed = this.sessions.get(session.id);
    if (!managed || managed.released) {
      logger.debug(`Session #${session.id} already released`);
      return;
    }

    managed.released = true;
    this.sessions.delete(session.id);

    try {
      await managed.browser.close();
      logger.info(`Browser session #${session.id} closed`);
    } catch (err) {
      logger.error(
        `Closing browser session #${session.id} failed: ${describeError(err)}`,
        err,
      );
    }
  }

  /**
   * Execute `fn` with a fresh session, then release it whether `fn`
   * resolves or throws.
   */
  async withSession<T>(
    options: BrowserLaunchOptions,
    fn: (session: BrowserSession) => Promise<T>,
  ): Promise<T> {
    const session = await this.acquire(options);
    try {
      return await fn(session);
    } finally {
      await this.release(session);
    }
  }

  /** Sessions acquired and not yet released. */
  openSessionCount(): number {
    return this.sessions.size;
  }
}
