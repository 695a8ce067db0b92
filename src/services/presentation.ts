/**
 * presentation.ts: Where a finished batch goes.
 *
 * `BatchReporter` is the outbound contract: it receives the summary once the
 * run is over.  The default reporter writes it to the log; a dashboard or a
 * notifier implements the same interface.
 */

import type { BatchSummary } from '../core/types';
import { Logger } from '../core/logger';

export interface BatchReporter {
  publish(summary: BatchSummary): Promise<void>;
}

/** One line per organization, e.g. `Acme Corp: 12 member(s), 3 event(s) stored`. */
export function formatOutcomeLines(summary: BatchSummary): string[] {
  return summary.outcomes.map((o) =>
    o.status === 'ok'
      ? `${o.organization}: ${o.membersSeen} member(s), ${o.eventsPersisted} event(s) stored`
      : `${o.organization}: FAILED (${o.error ?? 'unknown error'})`,
  );
}

export class LogBatchReporter implements BatchReporter {
  constructor(private readonly logger: Logger = new Logger('BatchReport')) {}

  async publish(summary: BatchSummary): Promise<void> {
    const headline =
      `Batch ${summary.status}: ${summary.organizationsAttempted} organization(s) attempted, ` +
      `${summary.totalEventsPersisted} change event(s) stored`;

    if (summary.status === 'failed') {
      this.logger.error(`${headline}: ${summary.error ?? 'no detail'}`);
    } else {
      this.logger.info(headline);
    }

    for (const line of formatOutcomeLines(summary)) {
      this.logger.info(`  ${line}`);
    }
  }
}
