import { describe, expect, it } from 'vitest';
import type { MemberRecord } from '../src/core/types';
import { collectUntil } from '../src/scrapers/paginationDriver';
import { FakePage, member, sessionFor } from './helpers/fakePage';

const alice = member('Alice', 'P1');
const bob = member('Bob', 'P2');
const carol = member('Carol', 'P3');

/** An extractor that returns the next batch on every call, repeating the last one. */
function renders(...passes: MemberRecord[][]) {
  let call = 0;
  return async () => passes[Math.min(call++, passes.length - 1)] ?? [];
}

describe('collectUntil', () => {
  it('truncates to the cap, keeping the first cards encountered', async () => {
    const page = new FakePage();

    const records = await collectUntil(sessionFor(page), renders([alice, bob, carol]), {
      maxSteps: 5,
      resultCap: 2,
      settleMs: 0,
    });

    expect(records.map((r) => r.name)).toEqual(['Alice', 'Bob']);
    expect(page.scrolls).toBe(1);
  });

  it('emits a profile once even when it stays rendered across steps', async () => {
    const page = new FakePage();

    const records = await collectUntil(
      sessionFor(page),
      renders([alice], [alice, bob], [alice, bob, carol]),
      { maxSteps: 3, resultCap: 10, settleMs: 0 },
    );

    expect(records.map((r) => r.profileId)).toEqual(['P1', 'P2', 'P3']);
  });

  it('stops after the maximum number of reveal steps', async () => {
    const page = new FakePage();

    const records = await collectUntil(sessionFor(page), renders([alice]), {
      maxSteps: 4,
      resultCap: 10,
      settleMs: 0,
    });

    expect(records).toEqual([alice]);
    expect(page.scrolls).toBe(4);
  });

  it('does nothing for a zero cap', async () => {
    const page = new FakePage();

    const records = await collectUntil(sessionFor(page), renders([alice]), {
      maxSteps: 3,
      resultCap: 0,
      settleMs: 0,
    });

    expect(records).toEqual([]);
    expect(page.scrolls).toBe(0);
  });

  it('stops between steps once cancelled', async () => {
    const page = new FakePage();
    const controller = new AbortController();

    const records = await collectUntil(
      sessionFor(page),
      async () => {
        controller.abort();
        return [alice];
      },
      { maxSteps: 5, resultCap: 10, settleMs: 0, signal: controller.signal },
    );

    expect(records).toEqual([alice]);
    expect(page.scrolls).toBe(1);
  });
});
