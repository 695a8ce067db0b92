/**
 * changeDetector.ts: Decides whether a freshly scraped member is news.
 *
 *   no stored role            → new appearance   (oldRole: null, isNew: true)
 *   stored role ≠ scraped     → role change      (oldRole: stored, isNew: false)
 *   stored role = scraped     → nothing
 *
 * Roles are compared as literal strings.  "Engineer" and "engineer " are
 * different roles; extraction only trims.
 */

import type { ChangeEvent, MemberRecord } from '../core/types';
import type { RecordStore } from './recordStore';

export type Clock = () => Date;

export async function classify(
  record: MemberRecord,
  store: Pick<RecordStore, 'findLatest'>,
  clock: Clock = () => new Date(),
): Promise<ChangeEvent | null> {
  const identity = {
    name: record.name,
    organization: record.organization,
    profileId: record.profileId,
  };

  const prior = await store.findLatest(identity);
  if (prior && prior.role === record.role) return null;

  return {
    identity,
    oldRole: prior ? prior.role : null,
    newRole: record.role,
    changeDate: clock().toISOString(),
    isNew: prior === null,
  };
}

/**
 * Classify a whole crawl pass.  Records are looked up one at a time, in
 * order, against the same store.
 */
export async function classifyAll(
  records: MemberRecord[],
  store: Pick<RecordStore, 'findLatest'>,
  clock?: Clock,
): Promise<ChangeEvent[]> {
  const events: ChangeEvent[] = [];
  for (const record of records) {
    const event = await classify(record, store, clock);
    if (event) events.push(event);
  }
  return events;
}
