import { createClient } from '@supabase/supabase-js';
import { describe, expect, it } from 'vitest';
import { StoreError } from '../src/core/errors';
import type { ChangeEvent } from '../src/core/types';
import { SupabaseRecordStore } from '../src/services/supabaseService';

interface RecordedRequest {
  url: URL;
  method: string;
  body: unknown;
}

/**
 * A store whose client talks to an in-process fetch. Each request takes the
 * next queued row set; once the queue is empty it gets an empty 201.
 */
function stubbedStore(responses: unknown[][] = []) {
  const requests: RecordedRequest[] = [];
  const fetchStub: typeof fetch = async (input, init) => {
    requests.push({
      url: new URL(input instanceof Request ? input.url : input.toString()),
      method: init?.method ?? 'GET',
      body: typeof init?.body === 'string' ? JSON.parse(init.body) : undefined,
    });
    const rows = responses.shift();
    if (rows === undefined) return new Response(null, { status: 201 });
    return new Response(JSON.stringify(rows), {
      status: 200,
      headers: { 'Content-Type': 'application/json' },
    });
  };
  const client = createClient('https://project.supabase.test', 'test-secret', {
    auth: { persistSession: false, autoRefreshToken: false },
    global: { fetch: fetchStub },
  });
  return { store: new SupabaseRecordStore(client), requests };
}

const alice: ChangeEvent = {
  identity: { name: 'Alice', organization: 'OrgX', profileId: 'https://www.linkedin.com/in/alice' },
  oldRole: 'Engineer',
  newRole: 'Senior Engineer',
  changeDate: '2026-10-19T08:00:00.000Z',
  isNew: false,
};

const aliceRow = {
  name: 'Alice',
  organization: 'OrgX',
  profile_id: 'https://www.linkedin.com/in/alice',
  old_role: 'Engineer',
  new_role: 'Senior Engineer',
  change_date: '2026-10-19T08:00:00+00:00',
  is_new: false,
};

describe('SupabaseRecordStore', () => {
  it('pages history newest first with the id as tie-break', async () => {
    const { store, requests } = stubbedStore([[aliceRow]]);

    const events = await store.listChanges({ organization: 'OrgX', offset: 20, limit: 10 });

    expect(events).toEqual([alice]);
    const [request] = requests;
    expect(request?.url.pathname).toBe('/rest/v1/role_changes');
    expect(request?.url.searchParams.get('organization')).toBe('eq.OrgX');
    expect(request?.url.searchParams.get('order')).toBe('change_date.desc,id.desc');
    expect(request?.url.searchParams.get('offset')).toBe('20');
    expect(request?.url.searchParams.get('limit')).toBe('10');
  });

  it('reads the latest role with the same ordering as history', async () => {
    const { store, requests } = stubbedStore([[{ new_role: 'Engineer', change_date: '2026-10-01T00:00:00+00:00' }]]);

    const latest = await store.findLatest(alice.identity);

    expect(latest).toEqual({ role: 'Engineer', changeDate: '2026-10-01T00:00:00+00:00' });
    expect(requests[0]?.url.searchParams.get('order')).toBe('change_date.desc,id.desc');
    expect(requests[0]?.url.searchParams.get('limit')).toBe('1');
    expect(requests[0]?.url.searchParams.get('profile_id')).toBe('eq.https://www.linkedin.com/in/alice');
  });

  it('writes a change whose role differs from the stored one', async () => {
    const { store, requests } = stubbedStore([[{ new_role: 'Engineer', change_date: '2026-10-01T00:00:00+00:00' }]]);

    expect(await store.insertChange(alice)).toBe('inserted');

    expect(requests.map((r) => r.method)).toEqual(['GET', 'POST']);
    expect(requests[1]?.body).toEqual({
      name: 'Alice',
      organization: 'OrgX',
      profile_id: 'https://www.linkedin.com/in/alice',
      old_role: 'Engineer',
      new_role: 'Senior Engineer',
      change_date: '2026-10-19T08:00:00.000Z',
      is_new: false,
    });
  });

  it('skips the write when the stored role already matches', async () => {
    const { store, requests } = stubbedStore([
      [{ new_role: 'Senior Engineer', change_date: '2026-10-01T00:00:00+00:00' }],
    ]);

    expect(await store.insertChange(alice)).toBe('duplicate');
    expect(requests).toHaveLength(1);
  });

  it('rejects rows that do not match the table shape', async () => {
    const { store } = stubbedStore([[{ name: 'Alice' }]]);

    await expect(store.listChanges()).rejects.toBeInstanceOf(StoreError);
  });
});
