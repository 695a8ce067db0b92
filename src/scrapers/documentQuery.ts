/**
 * documentQuery.ts: Every read of rendered content goes through here.
 *
 * The remote page renders asynchronously, so single elements are located with
 * a bounded wait (`waitFor`) rather than an instantaneous query.  Lists are
 * the exception: `findAll` returns whatever is there now, and an empty list
 * is an ordinary answer.
 *
 * Field reads work on a `CardSnapshot` (the card's markup parsed with
 * cheerio), so extraction is synchronous, browser-free and a missing field
 * fails one card instead of the crawl.  Text is read as a user sees it:
 * screen-reader-only spans are dropped and whitespace runs collapse to one
 * space.
 */

import * as cheerio from 'cheerio';
import { ElementMissingError, NotFoundError } from '../core/errors';
import { err, ok, type Result } from '../core/result';
import type { PageElement, WaitKind } from '../core/types';
import type { BrowserSession } from '../core/browserManager';
import { pollUntil } from '../core/wait';
import { Logger } from '../core/logger';

const logger = new Logger('DocumentQuery');

/** Text the site renders for assistive technology only. */
const SCREEN_READER_ONLY = '.visually-hidden';

export interface WaitForOptions {
  intervalMs?: number;
  signal?: AbortSignal;
}

/** A member card frozen at the moment it was read. */
export interface CardSnapshot {
  readonly html: string;
  readonly $: cheerio.CheerioAPI;
}

/**
 * Wait until `selector` matches an element satisfying `kind`, or the timeout
 * passes.
 */
export async function waitFor(
  session: BrowserSession,
  selector: string,
  kind: WaitKind,
  timeoutMs: number,
  options: WaitForOptions = {},
): Promise<Result<PageElement, NotFoundError>> {
  const element = await pollUntil(() => session.page.firstMatch(selector, kind), {
    timeoutMs,
    intervalMs: options.intervalMs,
    signal: options.signal,
  });

  if (!element) {
    logger.debug(`Gave up waiting for ${kind} "${selector}" after ${timeoutMs} ms`);
    return err(new NotFoundError(selector, timeoutMs));
  }
  return ok(element);
}

export function findAll(
  session: BrowserSession,
  selector: string,
): Promise<PageElement[]> {
  return session.page.queryAll(selector);
}

export function parseCard(html: string): CardSnapshot {
  return { html, $: cheerio.load(html) };
}

export async function snapshotCard(element: PageElement): Promise<CardSnapshot> {
  return parseCard(await element.outerHtml());
}

/** Rendered text of the first `subSelector` match inside the card. */
export function textOf(
  card: CardSnapshot,
  subSelector: string,
): Result<string, ElementMissingError> {
  const node = card.$(subSelector).first();
  if (node.length === 0) {
    return err(new ElementMissingError(subSelector));
  }

  const visible = node.clone();
  visible.find(SCREEN_READER_ONLY).remove();
  return ok(visible.text().replace(/\s+/g, ' ').trim());
}

/** Value of `attr` on the first `subSelector` match inside the card. */
export function attributeOf(
  card: CardSnapshot,
  subSelector: string,
  attr: string,
): Result<string, ElementMissingError> {
  const node = card.$(subSelector).first();
  if (node.length === 0) {
    return err(new ElementMissingError(subSelector));
  }

  const value = node.attr(attr);
  if (value === undefined) {
    return err(new ElementMissingError(subSelector, attr));
  }
  return ok(value);
}
