/**
 * changeHistory.ts: Read side for whoever presents the results.
 *
 * Turns human date bounds ("2026-10-01") into store filters and answers the
 * questions a dashboard asks: what changed, how much, where, and per day.
 * Date-only bounds cover the whole UTC day.
 */

import { DateTime } from 'luxon';
import { ConfigError } from '../core/errors';
import type { ChangeEvent, ChangeFilter, ChangeStats } from '../core/types';
import { DEFAULT_PAGE_SIZE, type RecordStore } from './recordStore';

export interface HistoryQuery {
  organization?: string;
  from?: string;
  to?: string;
  offset?: number;
  limit?: number;
}

export interface DailyCount {
  /** YYYY-MM-DD, UTC. */
  date: string;
  changes: number;
}

export interface OrganizationTotals {
  organization: string;
  totalChanges: number;
  uniquePeople: number;
}

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Parse one bound.  A bare date expands to the start (or end) of that UTC
 * day; a full timestamp is kept as given.
 *
 * @throws ConfigError for anything luxon cannot read.
 */
export function parseDateBound(value: string, edge: 'start' | 'end'): string {
  const parsed = DateTime.fromISO(value.trim(), { zone: 'utc' });
  if (!parsed.isValid) {
    throw new ConfigError([`${edge === 'start' ? 'from' : 'to'}: "${value}" is not an ISO-8601 date`]);
  }

  const bound = DATE_ONLY.test(value.trim())
    ? edge === 'start'
      ? parsed.startOf('day')
      : parsed.endOf('day')
    : parsed;
  return bound.toJSDate().toISOString();
}

export class ChangeHistoryService {
  constructor(
    private readonly store: RecordStore,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  toFilter(query: HistoryQuery = {}): ChangeFilter {
    return {
      organization: query.organization,
      from: query.from ? parseDateBound(query.from, 'start') : undefined,
      to: query.to ? parseDateBound(query.to, 'end') : undefined,
      offset: query.offset,
      limit: query.limit,
    };
  }

  history(query: HistoryQuery = {}): Promise<ChangeEvent[]> {
    return this.store.listChanges(this.toFilter(query));
  }

  stats(query: HistoryQuery = {}): Promise<ChangeStats> {
    return this.store.summarize(this.toFilter(query));
  }

  /** Changes per UTC day for the last `days` days (today included), oldest first. */
  async dailyTrend(organization: string, days: number): Promise<DailyCount[]> {
    const from = DateTime.fromJSDate(this.clock(), { zone: 'utc' })
      .startOf('day')
      .minus({ days: Math.max(0, days - 1) });

    const events = await this.collectAll({
      organization,
      from: from.toJSDate().toISOString(),
    });

    const counts = new Map<string, number>();
    for (const event of events) {
      const day = event.changeDate.slice(0, 10);
      counts.set(day, (counts.get(day) ?? 0) + 1);
    }

    return [...counts.entries()]
      .map(([date, changes]) => ({ date, changes }))
      .sort((a, b) => a.date.localeCompare(b.date));
  }

  /** Totals per organization within the range, busiest first. */
  async byOrganization(from?: string, to?: string): Promise<OrganizationTotals[]> {
    const filter = this.toFilter({ from, to });
    const events = await this.collectAll({ from: filter.from, to: filter.to });

    const grouped = new Map<string, { total: number; people: Set<string> }>();
    for (const event of events) {
      const entry = grouped.get(event.identity.organization) ?? { total: 0, people: new Set<string>() };
      entry.total++;
      entry.people.add(event.identity.name);
      grouped.set(event.identity.organization, entry);
    }

    return [...grouped.entries()]
      .map(([organization, { total, people }]) => ({
        organization,
        totalChanges: total,
        uniquePeople: people.size,
      }))
      .sort((a, b) => b.totalChanges - a.totalChanges || a.organization.localeCompare(b.organization));
  }

  /** Page through the store until a short page comes back. */
  private async collectAll(filter: ChangeFilter): Promise<ChangeEvent[]> {
    const all: ChangeEvent[] = [];
    for (let offset = 0; ; offset += DEFAULT_PAGE_SIZE) {
      const page = await this.store.listChanges({ ...filter, offset, limit: DEFAULT_PAGE_SIZE });
      all.push(...page);
      if (page.length < DEFAULT_PAGE_SIZE) return all;
    }
  }
}
