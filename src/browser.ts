import fs from 'fs';
import { chromium, Browser, BrowserContext, Page } from 'playwright';
import { AppConfig } from './types';

export interface BrowserSession {
  browser: Browser;
  context: BrowserContext;
  page: Page;
  close: () => Promise<void>;
}

// The portal renders its German UI, which the login markers rely on.
const PORTAL_LOCALE = 'de-DE';

export async function launchBrowser(config: AppConfig): Promise<BrowserSession> {
  const browser = await chromium.launch({
    headless: config.headless,
    slowMo: config.slowMo,
  });

  const storageState = fs.existsSync(config.sessionStatePath)
    ? config.sessionStatePath
    : undefined;

  try {
    const context = await browser.newContext({ storageState, locale: PORTAL_LOCALE });
    context.setDefaultTimeout(config.globalTimeout);
    context.setDefaultNavigationTimeout(config.globalTimeout);

    const page = await context.newPage();

    return {
      browser,
      context,
      page,
      close: async () => {
        await context.close().catch(() => undefined);
        await browser.close().catch(() => undefined);
      },
    };
  } catch (error) {
    await browser.close().catch(() => undefined);
    throw error;
  }
}

export const MISSING_BROWSER_HINT = 'Playwright browsers are missing. Run: npx playwright install chromium';

export function isMissingBrowserMessage(message: string): boolean {
  const lowered = message.toLowerCase();
  return lowered.includes('executable doesn') || lowered.includes('playwright install');
}

export function isMissingBrowserError(error: unknown): boolean {
  return error instanceof Error && isMissingBrowserMessage(error.message);
}
