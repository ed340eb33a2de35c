import type { Locator } from 'playwright';
import { BrowserSession, launchBrowser } from './browser';
import { ElementNotFoundError } from './errors';
import { AppConfig } from './types';

export type LocatorKind = 'id' | 'name' | 'css' | 'linkText';

export interface LocatorStrategy {
  kind: LocatorKind;
  value: string;
}

/** Ordered most specific first; the first visible match wins. */
export type StrategyList = readonly LocatorStrategy[];

export interface PageElement {
  click(): Promise<void>;
  clear(): Promise<void>;
  type(text: string): Promise<void>;
  isVisible(): Promise<boolean>;
  /** Submits the form that encloses this element. */
  submitForm(): Promise<void>;
}

/**
 * The navigation context shared by the login and extraction phases.
 * One flow owns it at a time; callers must `close()` it on every exit path.
 */
export interface PortalSession {
  navigate(url: string): Promise<void>;
  currentUrl(): string;
  pageSource(): Promise<string>;
  /** @throws ElementNotFoundError when nothing matches the locator */
  findElement(locator: LocatorStrategy): Promise<PageElement>;
  screenshot(path: string): Promise<void>;
  wait(ms: number): Promise<void>;
  cookieHeader(url: string): Promise<string>;
  saveStorageState(path: string): Promise<void>;
  close(): Promise<void>;
}

export function describeLocator(locator: LocatorStrategy): string {
  return `${locator.kind}=${locator.value}`;
}

function quote(value: string): string {
  return JSON.stringify(value);
}

class PlaywrightElement implements PageElement {
  constructor(private readonly locator: Locator) {}

  async click(): Promise<void> {
    await this.locator.click();
  }

  async clear(): Promise<void> {
    await this.locator.fill('');
  }

  async type(text: string): Promise<void> {
    await this.locator.pressSequentially(text);
  }

  async isVisible(): Promise<boolean> {
    return this.locator.isVisible();
  }

  async submitForm(): Promise<void> {
    await this.locator.evaluate((el) => {
      el.closest('form')?.requestSubmit();
    });
  }
}

class PlaywrightPortalSession implements PortalSession {
  constructor(private readonly browserSession: BrowserSession) {}

  private get page() {
    return this.browserSession.page;
  }

  async navigate(url: string): Promise<void> {
    await this.page.goto(url, { waitUntil: 'domcontentloaded' });
  }

  currentUrl(): string {
    return this.page.url();
  }

  async pageSource(): Promise<string> {
    return this.page.content();
  }

  async findElement(locator: LocatorStrategy): Promise<PageElement> {
    const target = this.toLocator(locator).first();
    const count = await target.count();
    if (count === 0) {
      throw new ElementNotFoundError(`No element matches ${describeLocator(locator)}`);
    }
    return new PlaywrightElement(target);
  }

  async screenshot(path: string): Promise<void> {
    await this.page.screenshot({ path, fullPage: true });
  }

  async wait(ms: number): Promise<void> {
    await this.page.waitForTimeout(ms);
  }

  async cookieHeader(url: string): Promise<string> {
    const cookies = await this.browserSession.context.cookies(url);
    return cookies.map((cookie) => `${cookie.name}=${cookie.value}`).join('; ');
  }

  async saveStorageState(path: string): Promise<void> {
    await this.browserSession.context.storageState({ path });
  }

  async close(): Promise<void> {
    await this.browserSession.close();
  }

  private toLocator(locator: LocatorStrategy): Locator {
    switch (locator.kind) {
      case 'id':
        return this.page.locator(`[id=${quote(locator.value)}]`);
      case 'name':
        return this.page.locator(`[name=${quote(locator.value)}]`);
      case 'css':
        return this.page.locator(locator.value);
      case 'linkText':
        return this.page.locator('a', { hasText: locator.value });
    }
  }
}

export function createPortalSession(browserSession: BrowserSession): PortalSession {
  return new PlaywrightPortalSession(browserSession);
}

export async function openPortalSession(config: AppConfig): Promise<PortalSession> {
  const browserSession = await launchBrowser(config);
  return createPortalSession(browserSession);
}
