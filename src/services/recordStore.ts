/**
 * recordStore.ts: The persistence boundary of the pipeline.
 *
 * The crawler and detector only talk to this interface.  Two implementations
 * ship: `SupabaseRecordStore` for production and `MemoryRecordStore` for
 * tests and dry runs.
 */

import type {
  ChangeEvent,
  ChangeFilter,
  ChangeStats,
  LatestRole,
  MemberIdentity,
  TrackedOrganization,
} from '../core/types';

export type InsertOutcome = 'inserted' | 'duplicate';

export const DEFAULT_PAGE_SIZE = 100;

export interface RecordStore {
  /** Most recent stored role for an identity (latest `changeDate` wins). */
  findLatest(identity: MemberIdentity): Promise<LatestRole | null>;

  /**
   * Persist an event.  Re-inserting an event whose `newRole` already is the
   * latest stored role for that identity is a no-op reported as `duplicate`.
   *
   * @throws StoreError
   */
  insertChange(event: ChangeEvent): Promise<InsertOutcome>;

  listActiveOrganizations(): Promise<TrackedOrganization[]>;

  /** Create an organization, or re-activate and update an existing one. */
  upsertOrganization(name: string, sourceUrl: string): Promise<TrackedOrganization>;

  /** Soft delete.  Resolves `false` when no organization has that name. */
  deactivateOrganization(name: string): Promise<boolean>;

  /** Stored events, newest first. */
  listChanges(filter?: ChangeFilter): Promise<ChangeEvent[]>;

  summarize(filter?: ChangeFilter): Promise<ChangeStats>;
}

/** Shared by both stores so they agree on what "the same identity" means. */
export function identityKey(identity: MemberIdentity): string {
  return JSON.stringify([identity.name, identity.organization, identity.profileId]);
}

/** Count distinct people and organizations in a set of events. */
export function computeStats(events: ChangeEvent[]): ChangeStats {
  return {
    totalChanges: events.length,
    uniquePeople: new Set(events.map((e) => e.identity.name)).size,
    uniqueOrganizations: new Set(events.map((e) => e.identity.organization)).size,
  };
}
