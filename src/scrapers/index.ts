/**
 * scrapers/index.ts: Barrel export for the page-reading layer.
 */

export {
  waitFor,
  findAll,
  parseCard,
  snapshotCard,
  textOf,
  attributeOf,
} from './documentQuery';
export type { CardSnapshot, WaitForOptions } from './documentQuery';

export { collectUntil, revealMore } from './paginationDriver';
export type { CollectOptions, RecordExtractor } from './paginationDriver';

export {
  OrganizationCrawler,
  normalizeProfileId,
  recordFromCard,
} from './organizationCrawler';
export type {
  CrawlHooks,
  CrawlPhase,
  OrganizationCrawlerOptions,
} from './organizationCrawler';

export {
  CARD_SELECTORS,
  LOGIN_SELECTORS,
  ORGANIZATION_SELECTORS,
  SITE_ORIGIN,
} from './selectors';
