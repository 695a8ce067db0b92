#!/usr/bin/env node
/**
 * rosterScanner.ts: The batch orchestrator that ties every layer together.
 *
 * One run walks this state machine:
 *
 *   idle → authenticating → ( navigating → crawling → diffing → persisting )*
 *        → completed | failed | cancelled
 *
 *   1. SESSION  → BrowserManager launches one browser for the whole batch
 *   2. LOGIN    → SessionManager; any AuthError ends the batch
 *   3. CRAWL    → OrganizationCrawler, one organization at a time
 *   4. DIFF     → ChangeDetector against the RecordStore
 *   5. PERSIST  → RecordStore.insertChange, one event at a time
 *
 * Failures are contained at organization granularity: a crawl failure or a
 * store error for one organization is logged, that organization is marked
 * failed, and the next one is attempted.  Events written before a store error
 * stay written and counted.  Partial success is still `completed`.
 */

import { config as loadDotenv } from 'dotenv';
import { authenticate } from './agents/sessionManager';
import { BrowserManager, type BrowserSession } from './core/browserManager';
import { loadConfig, requireSupabase, type CrawlerConfig } from './core/config';
import { ConfigError } from './core/errors';
import { Logger, describeError } from './core/logger';
import type {
  BatchState,
  BatchSummary,
  ChangeEvent,
  OrganizationOutcome,
  TrackedOrganization,
} from './core/types';
import { sleep } from './core/wait';
import { OrganizationCrawler } from './scrapers/organizationCrawler';
import { classifyAll, type Clock } from './services/changeDetector';
import { ChangeHistoryService } from './services/changeHistory';
import { LogBatchReporter } from './services/presentation';
import type { RecordStore } from './services/recordStore';
import { SupabaseRecordStore } from './services/supabaseService';

const logger = new Logger('RosterScanner');

export type ScannerConfig = Pick<CrawlerConfig, 'credentials' | 'login' | 'browser' | 'crawl'>;

export interface RosterScannerDeps {
  store: RecordStore;
  /** Defaults to a puppeteer-backed manager. */
  browserManager?: BrowserManager;
  /** Defaults to a crawler built from `config.crawl`. */
  crawler?: Pick<OrganizationCrawler, 'crawl'>;
  clock?: Clock;
  /** Poll interval for every bounded wait; tests shorten it. */
  pollIntervalMs?: number;
  onStateChange?: (state: BatchState, organization?: string) => void;
}

export class RosterScanner {
  private current: BatchState = 'idle';
  private readonly store: RecordStore;
  private readonly browserManager: BrowserManager;
  private readonly crawler: Pick<OrganizationCrawler, 'crawl'>;
  private readonly clock: Clock;

  constructor(
    private readonly config: ScannerConfig,
    private readonly deps: RosterScannerDeps,
  ) {
    this.store = deps.store;
    this.browserManager = deps.browserManager ?? new BrowserManager();
    this.clock = deps.clock ?? (() => new Date());
    this.crawler =
      deps.crawler ??
      new OrganizationCrawler({
        ...config.crawl,
        pollIntervalMs: deps.pollIntervalMs,
        clock: this.clock,
      });
  }

  get state(): BatchState {
    return this.current;
  }

  /**
   * Crawl and diff every organization in order.
   *
   * @param signal - Cooperative cancellation, honoured between organizations
   *   and between reveal steps.
   */
  async run(
    organizations: TrackedOrganization[],
    signal?: AbortSignal,
  ): Promise<BatchSummary> {
    const startedAt = this.clock().toISOString();
    const outcomes: OrganizationOutcome[] = [];
    const events: ChangeEvent[] = [];
    this.transition('idle');

    if (organizations.length === 0) {
      logger.info('No tracked organizations configured, nothing to do');
      return this.finish('completed', startedAt, outcomes, events);
    }

    let status: BatchSummary['status'];
    let failure: string | undefined;

    try {
      status = await this.browserManager.withSession<BatchSummary['status']>(
        this.config.browser,
        async (session) => {
          this.transition('authenticating');
          const login = await authenticate(session, this.config.credentials, {
            ...this.config.login,
            pollIntervalMs: this.deps.pollIntervalMs,
          });
          if (!login.ok) {
            failure = `${login.error.reason}: ${login.error.message}`;
            return 'failed';
          }

          for (const [index, org] of organizations.entries()) {
            if (signal?.aborted) {
              logger.warn(`Cancelled before ${org.name}; ${organizations.length - index} organization(s) skipped`);
              return 'cancelled';
            }

            logger.info(`Organization ${index + 1}/${organizations.length}: ${org.name}`);
            const outcome = await this.processOrganization(session, org, events, signal);
            outcomes.push(outcome);

            // Rate-limit courtesy between organizations.
            await sleep(this.config.crawl.settleDelayMs * 2);
          }

          return signal?.aborted ? 'cancelled' : 'completed';
        },
      );
    } catch (error) {
      // Browser launch failures land here; the session (if any) is already released.
      logger.error(`Batch aborted: ${describeError(error)}`, error);
      status = 'failed';
      failure = describeError(error);
    }

    return this.finish(status, startedAt, outcomes, events, failure);
  }

  // ── Per-organization cycle ─────────────────────────────

  private async processOrganization(
    session: BrowserSession,
    org: TrackedOrganization,
    events: ChangeEvent[],
    signal?: AbortSignal,
  ): Promise<OrganizationOutcome> {
    const outcome: OrganizationOutcome = {
      organization: org.name,
      status: 'ok',
      membersSeen: 0,
      eventsDetected: 0,
      eventsPersisted: 0,
    };

    try {
      let crawlFailure: string | undefined;
      const records = await this.crawler.crawl(session, org, {
        signal,
        onPhase: (phase) => this.transition(phase, org.name),
        onFailure: (reason) => {
          crawlFailure = reason;
        },
      });
      if (crawlFailure !== undefined) {
        outcome.status = 'failed';
        outcome.error = crawlFailure;
        return outcome;
      }
      outcome.membersSeen = records.length;

      this.transition('diffing', org.name);
      const detected = await classifyAll(records, this.store, this.clock);
      outcome.eventsDetected = detected.length;

      this.transition('persisting', org.name);
      for (const event of detected) {
        const result = await this.store.insertChange(event);
        if (result === 'inserted') {
          outcome.eventsPersisted++;
          events.push(event);
        }
      }

      logger.info(
        `${org.name}: ${outcome.membersSeen} member(s), ` +
          `${outcome.eventsDetected} change(s) detected, ${outcome.eventsPersisted} stored`,
      );
    } catch (error) {
      outcome.status = 'failed';
      outcome.error = describeError(error);
      logger.warn(`${org.name} failed; its remaining events are lost for this pass: ${outcome.error}`);
    }

    return outcome;
  }

  // ── Helpers ──────────────────────────────────────────────

  private transition(state: BatchState, organization?: string): void {
    this.current = state;
    logger.debug(organization ? `→ ${state} (${organization})` : `→ ${state}`);
    this.deps.onStateChange?.(state, organization);
  }

  private finish(
    status: BatchSummary['status'],
    startedAt: string,
    outcomes: OrganizationOutcome[],
    events: ChangeEvent[],
    error?: string,
  ): BatchSummary {
    this.transition(status);
    return {
      status,
      organizationsAttempted: outcomes.length,
      totalEventsPersisted: outcomes.reduce((sum, o) => sum + o.eventsPersisted, 0),
      outcomes,
      events,
      startedAt,
      finishedAt: this.clock().toISOString(),
      error,
    };
  }
}

/** 0 on success (including partial), 1 on a failed batch, 130 when interrupted. */
export function exitCodeFor(summary: BatchSummary): number {
  switch (summary.status) {
    case 'completed':
      return 0;
    case 'cancelled':
      return 130;
    default:
      return 1;
  }
}

/**
 * Pick the batch list: the configured organizations when there are any,
 * otherwise the store's active ones.
 */
export async function resolveOrganizations(
  config: Pick<CrawlerConfig, 'trackedOrganizations'>,
  store: Pick<RecordStore, 'listActiveOrganizations'>,
): Promise<TrackedOrganization[]> {
  if (config.trackedOrganizations.length > 0) {
    return config.trackedOrganizations;
  }
  return store.listActiveOrganizations();
}

// ─── CLI entry point ───────────────────────────────────────
//
//   roster-watch                              crawl every tracked organization
//   roster-watch history [org] [from] [to]    print stored change events as JSON

const USAGE =
  'Usage: roster-watch [crawl]\n' +
  '       roster-watch history [ORGANIZATION] [FROM_DATE] [TO_DATE]';

async function main(argv: string[]): Promise<number> {
  loadDotenv();
  const config = loadConfig();
  const store = new SupabaseRecordStore(requireSupabase(config));
  const [command = 'crawl', ...rest] = argv;

  if (command === 'history') {
    const [organization, from, to] = rest;
    const history = new ChangeHistoryService(store);
    const query = { organization: organization || undefined, from, to };
    const [events, stats] = await Promise.all([history.history(query), history.stats(query)]);
    console.log(JSON.stringify({ stats, events }, null, 2));
    return 0;
  }

  if (command !== 'crawl') {
    console.error(USAGE);
    return 1;
  }

  const organizations = await resolveOrganizations(config, store);
  const controller = new AbortController();
  process.once('SIGINT', () => {
    logger.warn('Interrupt received, stopping after the current step');
    controller.abort();
  });

  const scanner = new RosterScanner(config, { store });
  const summary = await scanner.run(organizations, controller.signal);
  await new LogBatchReporter().publish(summary);
  return exitCodeFor(summary);
}

if (require.main === module) {
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      if (error instanceof ConfigError) {
        logger.error(error.message);
      } else {
        logger.error(`Run failed: ${describeError(error)}`, error);
      }
      process.exitCode = 1;
    });
}
