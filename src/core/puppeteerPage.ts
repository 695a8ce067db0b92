/**
 * puppeteerPage.ts: `SessionPage` / `PageElement` backed by a live Puppeteer tab.
 *
 * The rest of the pipeline only sees the narrow interfaces from types.ts, so
 * this is the one file that speaks Puppeteer's element API.
 */

import type { ElementHandle, Page } from 'puppeteer-core';
import type { PageElement, SessionPage, WaitKind } from './types';

const NAVIGATION_TIMEOUT_MS = 30_000;

export class PuppeteerElement implements PageElement {
  constructor(private readonly handle: ElementHandle<Element>) {}

  outerHtml(): Promise<string> {
    return this.handle.evaluate((el) => el.outerHTML);
  }

  click(): Promise<void> {
    return this.handle.click();
  }

  type(text: string): Promise<void> {
    return this.handle.type(text);
  }

  dispose(): Promise<void> {
    return this.handle.dispose();
  }

  /** Visible and not disabled: what "clickable" means to a user. */
  async isClickable(): Promise<boolean> {
    const visible = await this.handle.isVisible();
    if (!visible) return false;
    return this.handle.evaluate(
      (el) => !el.hasAttribute('disabled') && el.getAttribute('aria-disabled') !== 'true',
    );
  }
}

export class PuppeteerSessionPage implements SessionPage {
  constructor(private readonly page: Page) {}

  async goto(url: string): Promise<void> {
    await this.page.goto(url, {
      waitUntil: 'domcontentloaded',
      timeout: NAVIGATION_TIMEOUT_MS,
    });
  }

  currentUrl(): string {
    return this.page.url();
  }

  async firstMatch(selector: string, kind: WaitKind): Promise<PageElement | null> {
    const handle = await this.page.$(selector);
    if (!handle) return null;

    const element = new PuppeteerElement(handle);
    if (kind === 'clickable' && !(await element.isClickable())) {
      await element.dispose();
      return null;
    }
    return element;
  }

  async queryAll(selector: string): Promise<PageElement[]> {
    const handles = await this.page.$$(selector);
    return handles.map((handle) => new PuppeteerElement(handle));
  }

  async scrollToEnd(): Promise<void> {
    await this.page.evaluate(() => {
      window.scrollTo(0, document.body.scrollHeight);
    });
  }
}
