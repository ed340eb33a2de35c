import { NavigationTimeoutError } from './errors';
import { PortalSession } from './session';

export interface PageSnapshot {
  url: string;
  source: string;
}

export interface WaitOptions {
  timeoutMs: number;
  intervalMs: number;
  label: string;
}

export async function takeSnapshot(session: PortalSession): Promise<PageSnapshot> {
  const url = session.currentUrl();
  // content() throws while a navigation is in flight; treat that as an empty page.
  const source = await session.pageSource().catch(() => '');
  return { url, source };
}

/**
 * Polls the session until `predicate` holds and returns the matching snapshot.
 * @throws NavigationTimeoutError once `timeoutMs` has elapsed
 */
export async function waitForPage(
  session: PortalSession,
  predicate: (snapshot: PageSnapshot) => boolean,
  options: WaitOptions
): Promise<PageSnapshot> {
  const start = Date.now();

  for (;;) {
    const snapshot = await takeSnapshot(session);
    if (predicate(snapshot)) {
      return snapshot;
    }

    if (Date.now() - start >= options.timeoutMs) {
      throw new NavigationTimeoutError(options.label, options.timeoutMs);
    }

    await session.wait(options.intervalMs);
  }
}

export function urlContains(fragment: string): (snapshot: PageSnapshot) => boolean {
  return (snapshot) => snapshot.url.includes(fragment);
}
