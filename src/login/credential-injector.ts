import type { Logger } from 'pino';
import { DebugArtifactSink } from '../debug-artifacts';
import { errorMessage, NavigationTimeoutError, tolerate } from '../errors';
import { PortalSession } from '../session';
import { generateTotp, TotpGenerator } from '../totp';
import { AppConfig, Credentials } from '../types';
import { PageSnapshot, waitForPage } from '../wait';
import {
  PASSWORD_STRATEGIES,
  resolveElement,
  SUBMIT_STRATEGIES,
  TOKEN_PROCEED_STRATEGIES,
  TOKEN_STRATEGIES,
  USERNAME_STRATEGIES,
} from './selectors';

export const AUTHENTICATED_MARKER = 'Abmelden';

export interface LoginDeps {
  session: PortalSession;
  config: AppConfig;
  credentials: Credentials;
  logger: Logger;
  captureDebug: DebugArtifactSink;
  totp?: TotpGenerator;
}

export type InjectionResult = { ok: true } | { ok: false; reason: string };

export function isAuthenticatedPortal(snapshot: PageSnapshot, config: AppConfig): boolean {
  return snapshot.url.includes(config.portalDomain) && snapshot.source.includes(AUTHENTICATED_MARKER);
}

function hasOtpIndicator(source: string): boolean {
  const lowered = source.toLowerCase();
  return lowered.includes('token') || lowered.includes('otp');
}

async function fail(deps: LoginDeps, prefix: string, reason: string): Promise<InjectionResult> {
  deps.logger.error({ reason }, 'Credential injection failed');
  await deps.captureDebug(prefix);
  return { ok: false, reason };
}

async function enterTotpCode(deps: LoginDeps, secret: string): Promise<void> {
  const { session, logger } = deps;
  const totp = deps.totp ?? generateTotp;

  logger.info('Two-factor code required');
  const code = totp(secret);

  const tokenField = await resolveElement(session, TOKEN_STRATEGIES, logger);
  if (!tokenField) {
    logger.warn('Two-factor prompt shown but no token field matched');
    return;
  }

  await tokenField.clear();
  await tokenField.type(code);

  const proceed = await resolveElement(session, TOKEN_PROCEED_STRATEGIES, logger);
  if (!proceed) {
    logger.warn('No control found to submit the two-factor code');
    return;
  }
  await proceed.click();
}

async function handleTwoFactor(deps: LoginDeps): Promise<void> {
  const { session, config, credentials, logger } = deps;

  const prompt = await tolerate(() =>
    waitForPage(
      session,
      (snapshot) => hasOtpIndicator(snapshot.source) || snapshot.url.includes(config.portalDomain),
      { timeoutMs: config.globalTimeout, intervalMs: config.pollInterval, label: 'two-factor prompt or portal' }
    )
  );

  if (!prompt.ok) {
    logger.debug({ err: prompt.error }, 'No two-factor prompt before timeout; continuing');
    return;
  }

  if (!hasOtpIndicator(prompt.value.source)) {
    return;
  }

  if (!credentials.totpSecret) {
    logger.warn('Two-factor prompt shown but no TOTP secret is configured');
    return;
  }

  const secret = credentials.totpSecret;
  const entered = await tolerate(() => enterTotpCode(deps, secret));
  if (!entered.ok) {
    logger.warn({ err: entered.error }, 'Entering the two-factor code failed; waiting for redirect anyway');
  }
}

async function runInjection(deps: LoginDeps): Promise<InjectionResult> {
  const { session, config, credentials, logger } = deps;
  const waitOptions = { timeoutMs: config.globalTimeout, intervalMs: config.pollInterval };

  const landing = await waitForPage(
    session,
    (snapshot) => snapshot.url.includes(config.ssoDomain) || snapshot.url.includes(config.portalDomain),
    { ...waitOptions, label: 'SSO or portal page' }
  );

  if (isAuthenticatedPortal(landing, config)) {
    logger.info('Portal session already authenticated');
    return { ok: true };
  }

  const userField = await resolveElement(session, USERNAME_STRATEGIES, logger);
  if (!userField) {
    return fail(deps, 'lsf_login_no_user', 'Username field not found');
  }
  await userField.clear();
  await userField.type(credentials.username);

  const passwordField = await resolveElement(session, PASSWORD_STRATEGIES, logger);
  if (!passwordField) {
    return fail(deps, 'lsf_login_no_password', 'Password field not found');
  }
  await passwordField.clear();
  await passwordField.type(credentials.password);

  const submit = await resolveElement(session, SUBMIT_STRATEGIES, logger);
  if (submit) {
    await submit.click();
  } else {
    logger.debug('No submit control matched; submitting the password form');
    await passwordField.submitForm();
  }

  await handleTwoFactor(deps);

  try {
    await waitForPage(session, (snapshot) => snapshot.url.includes(config.portalDomain), {
      ...waitOptions,
      label: 'portal redirect',
    });
  } catch (error) {
    if (error instanceof NavigationTimeoutError) {
      return fail(deps, 'lsf_injection_fail', error.message);
    }
    throw error;
  }

  logger.info('Logged in to portal');
  return { ok: true };
}

export async function injectCredentials(deps: LoginDeps): Promise<InjectionResult> {
  deps.logger.info('Injecting SSO credentials');

  try {
    return await runInjection(deps);
  } catch (error) {
    return fail(deps, 'lsf_injection_fail', errorMessage(error));
  }
}
