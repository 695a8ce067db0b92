/**
 * types.ts: Shared type definitions for the entire crawl pipeline.
 *
 * Every layer (crawler, detector, store, orchestrator) agrees on the shapes
 * below.  Store rows are snake_case; everything in memory is camelCase and
 * the Supabase service maps between the two.
 */

// ─── Tracked organization ─────────────────────────────────

/** An organization whose personnel listing we watch. */
export interface TrackedOrganization {
  /** Store-generated id.  Undefined for organizations that came from config. */
  id?: string;
  /** Canonical name (e.g. "Acme Corp"); used as `organization` on every record. */
  name: string;
  /** The organization's page on the networking site. */
  sourceUrl: string;
  /** Soft-delete flag.  Inactive organizations are never crawled. */
  active: boolean;
}

// ─── Member record ─────────────────────────────────────────

/** The triple used as the lookup key for change detection. */
export interface MemberIdentity {
  name: string;
  organization: string;
  /** Normalized profile link (origin + path, no query or fragment). */
  profileId: string;
}

/**
 * One member card as extracted during a crawl pass.
 *
 * Never persisted: records are diffed against the store and dropped.
 */
export interface MemberRecord extends MemberIdentity {
  /** Role text as rendered, whitespace collapsed. */
  role: string;
  /** ISO-8601 UTC timestamp of extraction. */
  observedAt: string;
}

// ─── Change event ──────────────────────────────────────────

export interface ChangeEvent {
  identity: MemberIdentity;
  /** `null` on a first sighting. */
  oldRole: string | null;
  newRole: string;
  /** ISO-8601 UTC timestamp of *detection*; the site does not expose when the change happened. */
  changeDate: string;
  isNew: boolean;
}

/** What the store remembers about an identity. */
export interface LatestRole {
  role: string;
  changeDate: string;
}

// ─── History queries ───────────────────────────────────────

export interface ChangeFilter {
  organization?: string;
  /** Inclusive lower bound, ISO-8601. */
  from?: string;
  /** Inclusive upper bound, ISO-8601. */
  to?: string;
  offset?: number;
  limit?: number;
}

export interface ChangeStats {
  totalChanges: number;
  uniquePeople: number;
  uniqueOrganizations: number;
}

// ─── Browser session surface ───────────────────────────────

export type WaitKind = 'present' | 'clickable';

/**
 * The slice of a rendered element the pipeline needs.
 *
 * Kept narrow so the crawler can be exercised against an in-process fake
 * instead of Chromium.
 */
export interface PageElement {
  /** The element's rendered markup (outerHTML). */
  outerHtml(): Promise<string>;
  click(): Promise<void>;
  type(text: string): Promise<void>;
  /** Release the underlying handle; the element is unusable afterwards. */
  dispose(): Promise<void>;
}

/** The slice of a browser tab the pipeline needs. */
export interface SessionPage {
  goto(url: string): Promise<void>;
  currentUrl(): string;
  /** Instantaneous lookup: the first match satisfying `kind`, or null. */
  firstMatch(selector: string, kind: WaitKind): Promise<PageElement | null>;
  /** Instantaneous query: every current match. */
  queryAll(selector: string): Promise<PageElement[]>;
  scrollToEnd(): Promise<void>;
}

// ─── Batch run ─────────────────────────────────────────────

export type BatchState =
  | 'idle'
  | 'authenticating'
  | 'navigating'
  | 'crawling'
  | 'diffing'
  | 'persisting'
  | 'completed'
  | 'failed'
  | 'cancelled';

export interface OrganizationOutcome {
  organization: string;
  status: 'ok' | 'failed';
  membersSeen: number;
  eventsDetected: number;
  eventsPersisted: number;
  error?: string;
}

/** What `RosterScanner.run()` resolves with. */
export interface BatchSummary {
  status: 'completed' | 'failed' | 'cancelled';
  organizationsAttempted: number;
  totalEventsPersisted: number;
  outcomes: OrganizationOutcome[];
  /** Every event written during the run, in write order. */
  events: ChangeEvent[];
  startedAt: string;
  finishedAt: string;
  /** Set when the batch failed as a whole (login, browser launch). */
  error?: string;
}
