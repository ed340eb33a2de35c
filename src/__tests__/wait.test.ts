import { describe, it, expect } from 'vitest';
import { takeSnapshot, urlContains, waitForPage } from '../wait';
import { NavigationTimeoutError } from '../errors';
import { FakeSession, PORTAL_URL, SSO_URL } from './fakes/fake-session';

const options = { timeoutMs: 30, intervalMs: 2, label: 'portal redirect' };

describe('waitForPage', () => {
  it('returns the first snapshot that satisfies the predicate', async () => {
    const session = new FakeSession({
      pages: { portal: { url: PORTAL_URL, html: '<p>ok</p>' } },
      navigateTo: 'portal',
      initial: 'portal',
    });

    await expect(waitForPage(session, urlContains('lsf.tu-dortmund.de'), options)).resolves.toEqual({
      url: PORTAL_URL,
      source: '<p>ok</p>',
    });
  });

  it('throws a NavigationTimeoutError when the page never matches', async () => {
    const session = new FakeSession({
      pages: { sso: { url: SSO_URL, html: '' } },
      navigateTo: 'sso',
      initial: 'sso',
    });

    const waiting = waitForPage(session, urlContains('lsf.tu-dortmund.de'), options);

    await expect(waiting).rejects.toBeInstanceOf(NavigationTimeoutError);
    await expect(waiting).rejects.toThrow('Timed out after 30ms waiting for portal redirect');
  });
});

describe('takeSnapshot', () => {
  it('reads markup that cannot be captured as empty', async () => {
    const session = new FakeSession({
      pages: { portal: { url: PORTAL_URL, html: '<p>ok</p>' } },
      navigateTo: 'portal',
      initial: 'portal',
    });
    session.pageSource = async () => {
      throw new Error('Unable to retrieve content because the page is navigating');
    };

    await expect(takeSnapshot(session)).resolves.toEqual({ url: PORTAL_URL, source: '' });
  });
});
