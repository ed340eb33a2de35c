import fs from 'fs';
import path from 'path';
import { describe, it, expect } from 'vitest';
import { deleteSessionState, saveSessionState, sessionStateExists, validateSession } from '../auth';
import { FakeSession, LOGGED_IN_HTML, LOGGED_OUT_HTML, makeConfig, PORTAL_URL } from './fakes/fake-session';

describe('session state', () => {
  it('creates the state directory before saving', async () => {
    const config = makeConfig();
    const session = new FakeSession({ pages: { portal: { url: PORTAL_URL, html: '' } }, navigateTo: 'portal' });

    await saveSessionState(session, config);

    expect(session.storageStates).toEqual([config.sessionStatePath]);
    expect(fs.existsSync(path.dirname(config.sessionStatePath))).toBe(true);
  });

  it('deletes a saved state file', () => {
    const config = makeConfig();
    expect(deleteSessionState(config)).toBe(false);

    fs.mkdirSync(path.dirname(config.sessionStatePath), { recursive: true });
    fs.writeFileSync(config.sessionStatePath, '{}');
    expect(sessionStateExists(config)).toBe(true);

    expect(deleteSessionState(config)).toBe(true);
    expect(sessionStateExists(config)).toBe(false);
  });
});

describe('validateSession', () => {
  it('is valid when the portal shows the logout link', async () => {
    const session = new FakeSession({ pages: { portal: { url: PORTAL_URL, html: LOGGED_IN_HTML } }, navigateTo: 'portal' });

    await expect(validateSession(session, makeConfig())).resolves.toBe(true);
  });

  it('is invalid on the logged-out portal page', async () => {
    const session = new FakeSession({ pages: { portal: { url: PORTAL_URL, html: LOGGED_OUT_HTML } }, navigateTo: 'portal' });

    await expect(validateSession(session, makeConfig())).resolves.toBe(false);
  });
});
