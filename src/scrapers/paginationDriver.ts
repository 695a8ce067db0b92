/**
 * paginationDriver.ts: Incremental reveal ("scroll to load more").
 *
 * The personnel view renders more cards as the document is scrolled.  One
 * reveal step = scroll to the end + settle.  `collectUntil` repeats that and
 * re-reads the rendered cards, keeping each profile once.
 *
 * The caps are deliberate: a crawl stops after `maxSteps` reveals or
 * `resultCap` records, whichever comes first.  It is an under-approximation
 * of the listing, not a completeness guarantee.
 */

import type { BrowserSession } from '../core/browserManager';
import type { MemberRecord } from '../core/types';
import { sleep } from '../core/wait';
import { Logger } from '../core/logger';

const logger = new Logger('PaginationDriver');

export type RecordExtractor = (session: BrowserSession) => Promise<MemberRecord[]>;

export interface CollectOptions {
  maxSteps: number;
  resultCap: number;
  settleMs: number;
  /** Checked before every reveal step. */
  signal?: AbortSignal;
}

/** Trigger one reveal step and give the page time to render it. */
export async function revealMore(
  session: BrowserSession,
  settleMs: number,
): Promise<void> {
  await session.page.scrollToEnd();
  await sleep(settleMs);
}

export async function collectUntil(
  session: BrowserSession,
  extract: RecordExtractor,
  options: CollectOptions,
): Promise<MemberRecord[]> {
  const collected: MemberRecord[] = [];
  const seen = new Set<string>();

  if (options.resultCap <= 0) return collected;

  for (let step = 1; step <= options.maxSteps; step++) {
    if (options.signal?.aborted) {
      logger.info(`Cancelled before reveal step ${step}`);
      break;
    }

    await revealMore(session, options.settleMs);
    const rendered = await extract(session);

    let fresh = 0;
    for (const record of rendered) {
      if (seen.has(record.profileId)) continue;
      seen.add(record.profileId);
      collected.push(record);
      fresh++;
      if (collected.length >= options.resultCap) break;
    }

    logger.debug(
      `Reveal step ${step}/${options.maxSteps}: ${rendered.length} rendered, ${fresh} new, ${collected.length} total`,
    );

    if (collected.length >= options.resultCap) {
      logger.info(`Reached the cap of ${options.resultCap} records`);
      break;
    }
  }

  return collected.slice(0, options.resultCap);
}
