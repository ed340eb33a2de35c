import fs from 'fs';
import path from 'path';
import type { Logger } from 'pino';
import { PortalSession } from './session';
import { AppConfig } from './types';
import { takeSnapshot } from './wait';
import { isAuthenticatedPortal } from './login/credential-injector';

export function sessionStateExists(config: AppConfig): boolean {
  return fs.existsSync(config.sessionStatePath);
}

export function ensureSessionStateDir(config: AppConfig): void {
  const dir = path.dirname(config.sessionStatePath);
  fs.mkdirSync(dir, { recursive: true });
}

export function deleteSessionState(config: AppConfig): boolean {
  if (!fs.existsSync(config.sessionStatePath)) {
    return false;
  }
  fs.rmSync(config.sessionStatePath);
  return true;
}

export async function saveSessionState(session: PortalSession, config: AppConfig): Promise<void> {
  ensureSessionStateDir(config);
  await session.saveStorageState(config.sessionStatePath);
}

/** Opens the deep link and reports whether the portal shows the logged-in marker. */
export async function validateSession(
  session: PortalSession,
  config: AppConfig,
  logger?: Logger
): Promise<boolean> {
  await session.navigate(config.targetUrl);
  const snapshot = await takeSnapshot(session);
  const valid = isAuthenticatedPortal(snapshot, config);
  logger?.debug({ url: snapshot.url, valid }, 'Session validation check');
  return valid;
}
