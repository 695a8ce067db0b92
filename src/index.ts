/**
 * index.ts: public API of roster-watch.
 *
 * The CLI lives in rosterScanner.ts; everything a library caller needs to run
 * a batch with its own store or reporter is re-exported here.
 */

export { RosterScanner, exitCodeFor, resolveOrganizations } from './rosterScanner';
export type { RosterScannerDeps, ScannerConfig } from './rosterScanner';

export { authenticate, isLoggedInLocation } from './agents/sessionManager';
export type { AuthenticateOptions } from './agents/sessionManager';

export { BrowserManager, buildLaunchArgs, launchPuppeteer } from './core/browserManager';
export type { BrowserSession, LaunchedBrowser, SessionLauncher } from './core/browserManager';
export { PuppeteerElement, PuppeteerSessionPage } from './core/puppeteerPage';

export { loadConfig, requireSupabase } from './core/config';
export type {
  BrowserLaunchOptions,
  CrawlOptions,
  CrawlerConfig,
  Credentials,
  LoginOptions,
  SupabaseSettings,
} from './core/config';

export {
  AuthError,
  ConfigError,
  ElementMissingError,
  NotFoundError,
  StoreError,
} from './core/errors';
export type { AuthErrorReason } from './core/errors';

export { Logger, describeError } from './core/logger';
export type { LogLevel } from './core/logger';
export { ok, err } from './core/result';
export type { Result, Ok, Err } from './core/result';
export { sleep, pollUntil, DEFAULT_POLL_INTERVAL_MS } from './core/wait';
export type { PollOptions } from './core/wait';
export type * from './core/types';

export * from './scrapers';

export { classify, classifyAll } from './services/changeDetector';
export type { Clock } from './services/changeDetector';
export { ChangeHistoryService, parseDateBound } from './services/changeHistory';
export type { DailyCount, HistoryQuery, OrganizationTotals } from './services/changeHistory';
export { LogBatchReporter, formatOutcomeLines } from './services/presentation';
export type { BatchReporter } from './services/presentation';
export { MemoryRecordStore } from './services/memoryRecordStore';
export { SupabaseRecordStore } from './services/supabaseService';
export { DEFAULT_PAGE_SIZE, computeStats, identityKey } from './services/recordStore';
export type { InsertOutcome, RecordStore } from './services/recordStore';
