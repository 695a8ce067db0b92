/**
 * supabaseService.ts: `RecordStore` backed by Supabase (PostgREST).
 *
 * Tables (snake_case columns, mapped to camelCase here):
 *
 *   role_changes           name, organization, profile_id, old_role, new_role,
 *                          change_date, is_new
 *   tracked_organizations  id, name (unique), source_url, is_active
 *
 * Rows coming back are validated with zod before they reach the pipeline, so
 * a schema drift surfaces as a `StoreError` instead of an `undefined` deep in
 * the diff.
 *
 * Dedup is read-then-write: `insertChange` checks the latest stored role for
 * the identity first.  That is not atomic, which is fine while only one crawl
 * process runs at a time.
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import type { SupabaseSettings } from '../core/config';
import { StoreError } from '../core/errors';
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
  type InsertOutcome,
  type RecordStore,
} from './recordStore';
import { Logger } from '../core/logger';

const logger = new Logger('SupabaseRecordStore');

const CHANGES_TABLE = 'role_changes';
const ORGANIZATIONS_TABLE = 'tracked_organizations';

const CHANGE_COLUMNS =
  'name, organization, profile_id, old_role, new_role, change_date, is_new';
const ORGANIZATION_COLUMNS = 'id, name, source_url, is_active';

// ─── Row schemas ──────────────────────────────────────────

const changeRowSchema = z.object({
  name: z.string(),
  organization: z.string(),
  profile_id: z.string(),
  old_role: z.string().nullable(),
  new_role: z.string(),
  change_date: z.string(),
  is_new: z.boolean(),
});

const latestRowSchema = changeRowSchema.pick({ new_role: true, change_date: true });

const organizationRowSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String),
  name: z.string(),
  source_url: z.string(),
  is_active: z.boolean(),
});

type ChangeRow = z.infer<typeof changeRowSchema>;

function parseRows<T extends z.ZodTypeAny>(
  schema: T,
  data: unknown,
  operation: string,
): z.infer<T>[] {
  const parsed = z.array(schema).safeParse(data ?? []);
  if (!parsed.success) {
    throw new StoreError(operation, `unexpected row shape (${parsed.error.issues[0]?.message ?? 'unknown'})`);
  }
  return parsed.data;
}

function toEvent(row: ChangeRow): ChangeEvent {
  return {
    identity: {
      name: row.name,
      organization: row.organization,
      profileId: row.profile_id,
    },
    oldRole: row.old_role,
    newRole: row.new_role,
    changeDate: new Date(row.change_date).toISOString(),
    isNew: row.is_new,
  };
}

function toOrganization(row: z.infer<typeof organizationRowSchema>): TrackedOrganization {
  return {
    id: row.id,
    name: row.name,
    sourceUrl: row.source_url,
    active: row.is_active,
  };
}

export class SupabaseRecordStore implements RecordStore {
  private readonly client: SupabaseClient;

  /**
   * @param source - Connection settings, or an existing client (scripts that
   *   already hold one can share it).
   */
  constructor(source: SupabaseSettings | SupabaseClient) {
    this.client =
      'serviceRoleKey' in source
        ? createClient(source.url, source.serviceRoleKey, {
            auth: { persistSession: false },
          })
        : source;
  }

  // ── Change events ────────────────────────────────────────

  async findLatest(identity: MemberIdentity): Promise<LatestRole | null> {
    const { data, error } = await this.client
      .from(CHANGES_TABLE)
      .select('new_role, change_date')
      .eq('name', identity.name)
      .eq('organization', identity.organization)
      .eq('profile_id', identity.profileId)
      // Several rows per identity is normal history; the newest one wins.
      .order('change_date', { ascending: false })
      .order('id', { ascending: false })
      .limit(1);

    if (error) throw new StoreError('findLatest', error.message);

    const [row] = parseRows(latestRowSchema, data, 'findLatest');
    return row ? { role: row.new_role, changeDate: row.change_date } : null;
  }

  async insertChange(event: ChangeEvent): Promise<InsertOutcome> {
    const latest = await this.findLatest(event.identity);
    if (latest && latest.role === event.newRole) {
      logger.debug(`Skipping duplicate event for ${event.identity.name} (${event.newRole})`);
      return 'duplicate';
    }

    const { error } = await this.client.from(CHANGES_TABLE).insert({
      name: event.identity.name,
      organization: event.identity.organization,
      profile_id: event.identity.profileId,
      old_role: event.oldRole,
      new_role: event.newRole,
      change_date: event.changeDate,
      is_new: event.isNew,
    });

    if (error) throw new StoreError('insertChange', error.message);
    return 'inserted';
  }

  async listChanges(filter: ChangeFilter = {}): Promise<ChangeEvent[]> {
    const offset = filter.offset ?? 0;
    const limit = filter.limit ?? DEFAULT_PAGE_SIZE;

    const { data, error } = await this.filteredChanges(CHANGE_COLUMNS, filter)
      .order('change_date', { ascending: false })
      // Same tie-break as findLatest, so offset pages neither skip nor repeat rows.
      .order('id', { ascending: false })
      .range(offset, offset + limit - 1);

    if (error) throw new StoreError('listChanges', error.message);
    return parseRows(changeRowSchema, data, 'listChanges').map(toEvent);
  }

  async summarize(filter: ChangeFilter = {}): Promise<ChangeStats> {
    const { data, error } = await this.filteredChanges(CHANGE_COLUMNS, filter);

    if (error) throw new StoreError('summarize', error.message);
    return computeStats(parseRows(changeRowSchema, data, 'summarize').map(toEvent));
  }

  // ── Tracked organizations ────────────────────────────────

  async listActiveOrganizations(): Promise<TrackedOrganization[]> {
    const { data, error } = await this.client
      .from(ORGANIZATIONS_TABLE)
      .select(ORGANIZATION_COLUMNS)
      .eq('is_active', true)
      .order('name', { ascending: true });

    if (error) throw new StoreError('listActiveOrganizations', error.message);
    return parseRows(organizationRowSchema, data, 'listActiveOrganizations').map(toOrganization);
  }

  async upsertOrganization(name: string, sourceUrl: string): Promise<TrackedOrganization> {
    const { data, error } = await this.client
      .from(ORGANIZATIONS_TABLE)
      .upsert(
        {
          name,
          source_url: sourceUrl,
          is_active: true,
          updated_at: new Date().toISOString(),
        },
        { onConflict: 'name', ignoreDuplicates: false },
      )
      .select(ORGANIZATION_COLUMNS);

    if (error) throw new StoreError('upsertOrganization', error.message);

    const [row] = parseRows(organizationRowSchema, data, 'upsertOrganization');
    if (!row) throw new StoreError('upsertOrganization', 'no row returned');

    logger.info(`Upserted tracked organization "${name}" → ${row.id}`);
    return toOrganization(row);
  }

  async deactivateOrganization(name: string): Promise<boolean> {
    const { data, error } = await this.client
      .from(ORGANIZATIONS_TABLE)
      .update({ is_active: false, updated_at: new Date().toISOString() })
      .eq('name', name)
      .select('id');

    if (error) throw new StoreError('deactivateOrganization', error.message);
    return Array.isArray(data) && data.length > 0;
  }

  // ── Helpers ──────────────────────────────────────────────

  private filteredChanges(columns: string, filter: ChangeFilter) {
    let query = this.client.from(CHANGES_TABLE).select(columns);
    if (filter.organization) query = query.eq('organization', filter.organization);
    if (filter.from) query = query.gte('change_date', filter.from);
    if (filter.to) query = query.lte('change_date', filter.to);
    return query;
  }
}
