import { describe, expect, it } from 'vitest';
import { classify, classifyAll } from '../src/services/changeDetector';
import { MemoryRecordStore } from '../src/services/memoryRecordStore';
import { member } from './helpers/fakePage';

/** A clock that advances one minute per reading. */
function tickingClock(start = '2026-10-19T08:00:00.000Z') {
  let at = Date.parse(start);
  return () => {
    const now = new Date(at);
    at += 60_000;
    return now;
  };
}

describe('classify', () => {
  it('reports a first sighting, nothing for a repeat, then the role change', async () => {
    const store = new MemoryRecordStore();
    const clock = tickingClock();
    const identity = { name: 'Alice', organization: 'OrgX', profileId: 'P1' };

    const first = await classify(member('Alice', 'P1', { role: 'Engineer' }), store, clock);
    expect(first).toEqual({
      identity,
      oldRole: null,
      newRole: 'Engineer',
      changeDate: '2026-10-19T08:00:00.000Z',
      isNew: true,
    });
    if (first) await store.insertChange(first);

    const second = await classify(member('Alice', 'P1', { role: 'Engineer' }), store, clock);
    expect(second).toBeNull();

    const third = await classify(member('Alice', 'P1', { role: 'Senior Engineer' }), store, clock);
    expect(third).toEqual({
      identity,
      oldRole: 'Engineer',
      newRole: 'Senior Engineer',
      changeDate: '2026-10-19T08:01:00.000Z',
      isNew: false,
    });
  });

  it('compares roles literally', async () => {
    const store = new MemoryRecordStore();
    await store.insertChange({
      identity: { name: 'Alice', organization: 'OrgX', profileId: 'P1' },
      oldRole: null,
      newRole: 'Engineer',
      changeDate: '2026-10-01T00:00:00.000Z',
      isNew: true,
    });

    const event = await classify(member('Alice', 'P1', { role: 'engineer' }), store);

    expect(event?.oldRole).toBe('Engineer');
    expect(event?.newRole).toBe('engineer');
  });

  it('treats the same name at another profile as a different person', async () => {
    const store = new MemoryRecordStore();
    await store.insertChange({
      identity: { name: 'Alice', organization: 'OrgX', profileId: 'P1' },
      oldRole: null,
      newRole: 'Engineer',
      changeDate: '2026-10-01T00:00:00.000Z',
      isNew: true,
    });

    const event = await classify(member('Alice', 'P2', { role: 'Engineer' }), store);

    expect(event?.isNew).toBe(true);
  });
});

describe('classifyAll', () => {
  it('keeps only the news, in crawl order', async () => {
    const store = new MemoryRecordStore();
    await store.insertChange({
      identity: { name: 'Bob', organization: 'OrgX', profileId: 'P2' },
      oldRole: null,
      newRole: 'Designer',
      changeDate: '2026-10-01T00:00:00.000Z',
      isNew: true,
    });

    const events = await classifyAll(
      [
        member('Alice', 'P1', { role: 'Engineer' }),
        member('Bob', 'P2', { role: 'Designer' }),
        member('Carol', 'P3', { role: '' }),
      ],
      store,
      tickingClock(),
    );

    expect(events.map((e) => [e.identity.name, e.oldRole, e.newRole])).toEqual([
      ['Alice', null, 'Engineer'],
      ['Carol', null, ''],
    ]);
  });
});
