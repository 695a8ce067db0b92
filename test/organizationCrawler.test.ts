import { describe, expect, it } from 'vitest';
import type { TrackedOrganization } from '../src/core/types';
import { parseCard } from '../src/scrapers/documentQuery';
import {
  OrganizationCrawler,
  normalizeProfileId,
  recordFromCard,
  type CrawlPhase,
} from '../src/scrapers/organizationCrawler';
import { ORGANIZATION_SELECTORS } from '../src/scrapers/selectors';
import { FakeElement, FakePage, cardElement, cardHtml, sessionFor } from './helpers/fakePage';

const OBSERVED_AT = '2026-10-19T08:00:00.000Z';

/** A member card with the site's screen-reader text and source indentation. */
const RENDERED_CARD = `
<li class="reusable-search__result-container">
  <div class="entity-result">
    <span class="entity-result__title-text t-16">
      <a class="app-aware-link" href="https://www.linkedin.com/in/alice-smith?miniProfileUrn=urn%3Ali%3Afs_miniProfile%3Aabc">
        <span dir="ltr"><span aria-hidden="true"><!---->Alice Smith<!----></span><span class="visually-hidden"><!---->View Alice Smith’s profile<!----></span></span>
      </a>
    </span>
    <div class="entity-result__primary-subtitle t-14 t-black t-normal">
      <!---->Senior
        Engineer<!---->
    </div>
  </div>
</li>`;

const acme: TrackedOrganization = {
  name: 'Acme Corp',
  sourceUrl: 'https://www.linkedin.com/company/acme/',
  active: true,
};

function crawler(overrides: { maxRevealSteps?: number; resultCap?: number } = {}) {
  return new OrganizationCrawler({
    resultCap: overrides.resultCap ?? 10,
    maxRevealSteps: overrides.maxRevealSteps ?? 1,
    settleDelayMs: 0,
    waitTimeoutMs: 20,
    pollIntervalMs: 5,
    clock: () => new Date(OBSERVED_AT),
  });
}

function organizationPage(cards: FakeElement[], peopleTab = new FakeElement('<a>People</a>')): FakePage {
  return new FakePage()
    .set(ORGANIZATION_SELECTORS.peopleTab, [peopleTab])
    .set(ORGANIZATION_SELECTORS.memberCard, cards);
}

describe('normalizeProfileId', () => {
  it('resolves relative links and drops query, fragment and trailing slash', () => {
    expect(normalizeProfileId('/in/alice/?miniProfileUrn=abc#top')).toBe('https://www.linkedin.com/in/alice');
  });

  it('keeps absolute links on their own origin', () => {
    expect(normalizeProfileId(' https://www.linkedin.com/in/bob ')).toBe('https://www.linkedin.com/in/bob');
  });
});

describe('recordFromCard', () => {
  it('reads name, role and profile', () => {
    const card = parseCard(cardHtml({ name: 'Alice', role: 'Engineer', href: '/in/alice/' }));

    const record = recordFromCard(card, 'Acme Corp', OBSERVED_AT);

    expect(record.ok && record.value).toEqual({
      name: 'Alice',
      organization: 'Acme Corp',
      role: 'Engineer',
      profileId: 'https://www.linkedin.com/in/alice',
      observedAt: OBSERVED_AT,
    });
  });

  it('reads the text a visitor sees on a rendered card', () => {
    const record = recordFromCard(parseCard(RENDERED_CARD), 'Acme Corp', OBSERVED_AT);

    expect(record.ok && record.value).toEqual({
      name: 'Alice Smith',
      organization: 'Acme Corp',
      role: 'Senior Engineer',
      profileId: 'https://www.linkedin.com/in/alice-smith',
      observedAt: OBSERVED_AT,
    });
  });

  it('skips a card whose role line has not rendered', () => {
    const card = parseCard(cardHtml({ name: 'Alice', href: '/in/alice' }));

    const record = recordFromCard(card, 'Acme Corp', OBSERVED_AT);

    expect(record.ok).toBe(false);
    if (!record.ok) expect(record.error.selector).toBe('.entity-result__primary-subtitle');
  });

  it('rejects a card whose name is blank', () => {
    const card = parseCard(cardHtml({ name: '  ', role: 'Engineer', href: '/in/ghost' }));

    expect(recordFromCard(card, 'Acme Corp', OBSERVED_AT).ok).toBe(false);
  });

  it('rejects a card without a profile link', () => {
    const card = parseCard(cardHtml({ name: 'Alice', role: 'Engineer' }));

    const record = recordFromCard(card, 'Acme Corp', OBSERVED_AT);

    expect(record.ok).toBe(false);
    if (!record.ok) expect(record.error.selector).toBe('a.app-aware-link');
  });
});

describe('OrganizationCrawler', () => {
  it('skips malformed cards and keeps the rest', async () => {
    const page = organizationPage([
      cardElement({ name: 'Alice', role: 'Engineer', href: '/in/alice' }),
      cardElement({ role: 'Designer', href: '/in/nameless' }),
      cardElement({ name: 'Bob', role: 'Designer', href: '/in/bob' }),
      new FakeElement('', { detached: true }),
      cardElement({ name: 'Carol', role: 'Manager', href: '/in/carol' }),
    ]);

    const records = await crawler().crawl(sessionFor(page), acme);

    expect(records.map((r) => r.name)).toEqual(['Alice', 'Bob', 'Carol']);
    expect(records.every((r) => r.organization === 'Acme Corp' && r.observedAt === OBSERVED_AT)).toBe(true);
  });

  it('releases every card handle it reads, readable or not', async () => {
    const cards = [
      cardElement({ name: 'Alice', role: 'Engineer', href: '/in/alice' }),
      cardElement({ name: 'Bob', href: '/in/bob' }),
      new FakeElement('', { detached: true }),
    ];
    const page = organizationPage(cards);

    await crawler({ maxRevealSteps: 2 }).crawl(sessionFor(page), acme);

    expect(cards.map((c) => c.disposals)).toEqual([2, 2, 2]);
  });

  it('opens the organization page and switches to the People view', async () => {
    const tab = new FakeElement('<a>People</a>');
    const page = organizationPage([cardElement({ name: 'Alice', role: 'Engineer', href: '/in/alice' })], tab);
    const phases: CrawlPhase[] = [];

    await crawler().crawl(sessionFor(page), acme, { onPhase: (phase) => phases.push(phase) });

    expect(page.visited).toEqual(['https://www.linkedin.com/company/acme/']);
    expect(tab.clicks).toBe(1);
    expect(phases).toEqual(['navigating', 'crawling']);
  });

  it('respects the result cap across reveal steps', async () => {
    const page = organizationPage([
      cardElement({ name: 'Alice', role: 'Engineer', href: '/in/alice' }),
      cardElement({ name: 'Bob', role: 'Designer', href: '/in/bob' }),
      cardElement({ name: 'Carol', role: 'Manager', href: '/in/carol' }),
    ]);

    const records = await crawler({ resultCap: 2, maxRevealSteps: 5 }).crawl(sessionFor(page), acme);

    expect(records.map((r) => r.name)).toEqual(['Alice', 'Bob']);
    expect(page.scrolls).toBe(1);
  });

  it('reports a People tab that never becomes clickable', async () => {
    const page = organizationPage(
      [cardElement({ name: 'Alice', role: 'Engineer', href: '/in/alice' })],
      new FakeElement('<a aria-disabled="true">People</a>', { clickable: false }),
    );
    const failures: string[] = [];

    const records = await crawler().crawl(sessionFor(page), acme, {
      onFailure: (reason) => failures.push(reason),
    });

    expect(records).toEqual([]);
    expect(page.scrolls).toBe(0);
    expect(failures).toEqual([
      `People tab never became clickable: "a[data-control-name='page_member_main_nav_people_tab']" did not appear within 20 ms`,
    ]);
  });

  it('reports a navigation error instead of throwing', async () => {
    const page = organizationPage([]);
    page.gotoError = new Error('net::ERR_NAME_NOT_RESOLVED');
    const failures: string[] = [];

    const records = await crawler().crawl(sessionFor(page), acme, {
      onFailure: (reason) => failures.push(reason),
    });

    expect(records).toEqual([]);
    expect(failures).toEqual(['net::ERR_NAME_NOT_RESOLVED']);
  });

  it('does not report a failure when cancelled while waiting for the People tab', async () => {
    const page = organizationPage([], new FakeElement('<a>People</a>', { clickable: false }));
    const controller = new AbortController();
    controller.abort();
    const failures: string[] = [];

    const records = await crawler().crawl(sessionFor(page), acme, {
      signal: controller.signal,
      onFailure: (reason) => failures.push(reason),
    });

    expect(records).toEqual([]);
    expect(failures).toEqual([]);
  });
});
