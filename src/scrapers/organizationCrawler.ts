/**
 * organizationCrawler.ts: Turns one organization page into member records.
 *
 *   1. NAVIGATE  → the organization's page, then settle
 *   2. SWITCH    → click the People tab once it is clickable, then settle
 *   3. COLLECT   → PaginationDriver reveals and re-reads member cards
 *
 * `crawl()` never throws.  A card with a missing field is skipped; anything
 * worse (navigation failure, no People tab) is logged, reported through
 * `onFailure`, and the organization yields an empty list so the batch moves on.
 */

import type { BrowserSession } from '../core/browserManager';
import type { CrawlOptions } from '../core/config';
import { ElementMissingError } from '../core/errors';
import { err, ok, type Result } from '../core/result';
import type { MemberRecord, PageElement, TrackedOrganization } from '../core/types';
import { sleep } from '../core/wait';
import {
  attributeOf,
  findAll,
  snapshotCard,
  textOf,
  waitFor,
  type CardSnapshot,
} from './documentQuery';
import { collectUntil } from './paginationDriver';
import { CARD_SELECTORS, ORGANIZATION_SELECTORS, SITE_ORIGIN } from './selectors';
import { Logger, describeError } from '../core/logger';

const logger = new Logger('OrganizationCrawler');

export type CrawlPhase = 'navigating' | 'crawling';

export interface CrawlHooks {
  signal?: AbortSignal;
  onPhase?: (phase: CrawlPhase) => void;
  /** Called once when the crawl gives up; not called on cancellation. */
  onFailure?: (reason: string) => void;
}

export interface OrganizationCrawlerOptions extends CrawlOptions {
  pollIntervalMs?: number;
  /** Source of `observedAt`; injectable for tests. */
  clock?: () => Date;
}

/**
 * Reduce a profile link to a stable identifier: origin + path, no query
 * string, fragment or trailing slash.  Relative links resolve against the site.
 */
export function normalizeProfileId(href: string): string {
  try {
    const url = new URL(href.trim(), SITE_ORIGIN);
    return `${url.origin}${url.pathname.replace(/\/+$/, '')}`;
  } catch {
    return href.trim();
  }
}

/**
 * Read one member card.  Name, role line and profile link are all required:
 * a card whose role line has not rendered is skipped rather than read as a
 * member without a role.
 */
export function recordFromCard(
  card: CardSnapshot,
  organization: string,
  observedAt: string,
): Result<MemberRecord, ElementMissingError> {
  const name = textOf(card, CARD_SELECTORS.name);
  if (!name.ok) return name;
  if (!name.value) return err(new ElementMissingError(CARD_SELECTORS.name));

  const href = attributeOf(card, CARD_SELECTORS.profileLink, 'href');
  if (!href.ok) return href;

  const role = textOf(card, CARD_SELECTORS.role);
  if (!role.ok) return role;

  return ok({
    name: name.value,
    organization,
    role: role.value,
    profileId: normalizeProfileId(href.value),
    observedAt,
  });
}

/** Every reveal step re-queries the cards, so each handle is dropped once read. */
async function release(element: PageElement): Promise<void> {
  try {
    await element.dispose();
  } catch (error) {
    logger.debug(`Could not dispose a card handle: ${describeError(error)}`);
  }
}

export class OrganizationCrawler {
  private readonly clock: () => Date;

  constructor(private readonly options: OrganizationCrawlerOptions) {
    this.clock = options.clock ?? (() => new Date());
  }

  async crawl(
    session: BrowserSession,
    org: TrackedOrganization,
    hooks: CrawlHooks = {},
  ): Promise<MemberRecord[]> {
    try {
      hooks.onPhase?.('navigating');
      logger.info(`Opening ${org.name} at ${org.sourceUrl}`);
      await session.page.goto(org.sourceUrl);
      await sleep(this.options.settleDelayMs);

      const peopleTab = await waitFor(
        session,
        ORGANIZATION_SELECTORS.peopleTab,
        'clickable',
        this.options.waitTimeoutMs,
        { intervalMs: this.options.pollIntervalMs, signal: hooks.signal },
      );
      if (!peopleTab.ok) {
        if (hooks.signal?.aborted) {
          logger.info(`Cancelled while waiting for the People tab of ${org.name}`);
          return [];
        }
        const reason = `People tab never became clickable: ${peopleTab.error.message}`;
        logger.warn(`${org.name}: ${reason}`);
        hooks.onFailure?.(reason);
        return [];
      }

      await peopleTab.value.click();
      await sleep(this.options.settleDelayMs);

      hooks.onPhase?.('crawling');
      const records = await collectUntil(
        session,
        (s) => this.extractCards(s, org.name),
        {
          maxSteps: this.options.maxRevealSteps,
          resultCap: this.options.resultCap,
          settleMs: this.options.settleDelayMs,
          signal: hooks.signal,
        },
      );

      logger.info(`Found ${records.length} member(s) for ${org.name}`);
      return records;
    } catch (error) {
      logger.warn(`Crawl of ${org.name} failed: ${describeError(error)}`);
      hooks.onFailure?.(describeError(error));
      return [];
    }
  }

  /** Read every currently rendered card, skipping the ones that don't parse. */
  async extractCards(
    session: BrowserSession,
    organization: string,
  ): Promise<MemberRecord[]> {
    const elements = await findAll(session, ORGANIZATION_SELECTORS.memberCard);
    const observedAt = this.clock().toISOString();
    const records: MemberRecord[] = [];

    for (const [index, element] of elements.entries()) {
      let card: CardSnapshot | null = null;
      try {
        card = await snapshotCard(element);
      } catch (error) {
        // Detached between the query and the read.
        logger.debug(`Card ${index} vanished before it could be read: ${describeError(error)}`);
      } finally {
        await release(element);
      }
      if (!card) continue;

      const record = recordFromCard(card, organization, observedAt);
      if (!record.ok) {
        logger.debug(`Skipping card ${index} of ${organization}: ${record.error.message}`);
        continue;
      }
      records.push(record.value);
    }

    return records;
  }
}
