import type {
  ChangeEvent,
  ChangeFilter,
  ChangeStats,
  LatestRole,
  MemberIdentity,
  TrackedOrganization,
} from '../core/types';
import {
  DEFAULT_PAGE_SIZE,
  computeStats,
  identityKey,
  type InsertOutcome,
  type RecordStore,
} from './recordStore';

function toMillis(iso: string): number {
  return Date.parse(iso);
}

function matchesFilter(event: ChangeEvent, filter: ChangeFilter): boolean {
  if (filter.organization && event.identity.organization !== filter.organization) {
    return false;
  }
  const at = toMillis(event.changeDate);
  if (filter.from && at < toMillis(filter.from)) return false;
  if (filter.to && at > toMillis(filter.to)) return false;
  return true;
}

/** Newest first; among equal dates, the later insertion first. */
function newestFirst(events: ChangeEvent[]): ChangeEvent[] {
  return events
    .map((event, index) => ({ event, index }))
    .sort(
      (a, b) =>
        toMillis(b.event.changeDate) - toMillis(a.event.changeDate) || b.index - a.index,
    )
    .map(({ event }) => event);
}

export class MemoryRecordStore implements RecordStore {
  private readonly events: ChangeEvent[] = [];
  private readonly organizations = new Map<string, TrackedOrganization>();
  private nextOrganizationId = 1;

  constructor(seed: { events?: ChangeEvent[]; organizations?: TrackedOrganization[] } = {}) {
    for (const event of seed.events ?? []) this.events.push(event);
    for (const org of seed.organizations ?? []) {
      this.organizations.set(org.name, { ...org, id: org.id ?? String(this.nextOrganizationId++) });
    }
  }

  async findLatest(identity: MemberIdentity): Promise<LatestRole | null> {
    const key = identityKey(identity);
    const [latest] = newestFirst(this.events.filter((e) => identityKey(e.identity) === key));
    return latest ? { role: latest.newRole, changeDate: latest.changeDate } : null;
  }

  async insertChange(event: ChangeEvent): Promise<InsertOutcome> {
    const latest = await this.findLatest(event.identity);
    if (latest && latest.role === event.newRole) return 'duplicate';

    this.events.push(event);
    return 'inserted';
  }

  async listActiveOrganizations(): Promise<TrackedOrganization[]> {
    return [...this.organizations.values()]
      .filter((org) => org.active)
      .sort((a, b) => a.name.localeCompare(b.name));
  }

  async upsertOrganization(name: string, sourceUrl: string): Promise<TrackedOrganization> {
    const existing = this.organizations.get(name);
    const org: TrackedOrganization = {
      id: existing?.id ?? String(this.nextOrganizationId++),
      name,
      sourceUrl,
      active: true,
    };
    this.organizations.set(name, org);
    return org;
  }

  async deactivateOrganization(name: string): Promise<boolean> {
    const existing = this.organizations.get(name);
    if (!existing) return false;
    this.organizations.set(name, { ...existing, active: false });
    return true;
  }

  async listChanges(filter: ChangeFilter = {}): Promise<ChangeEvent[]> {
    const offset = filter.offset ?? 0;
    const limit = filter.limit ?? DEFAULT_PAGE_SIZE;
    return newestFirst(this.events.filter((e) => matchesFilter(e, filter))).slice(
      offset,
      offset + limit,
    );
  }

  async summarize(filter: ChangeFilter = {}): Promise<ChangeStats> {
    return computeStats(this.events.filter((e) => matchesFilter(e, filter)));
  }
}
