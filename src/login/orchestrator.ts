import { errorMessage, tolerate } from '../errors';
import { takeSnapshot, waitForPage } from '../wait';
import { AUTHENTICATED_MARKER, injectCredentials, isAuthenticatedPortal, LoginDeps } from './credential-injector';
import { LOGIN_LINK_STRATEGIES, resolveElement } from './selectors';

export type LoginState =
  | 'START'
  | 'CHECK_SESSION'
  | 'RESUMED'
  | 'ON_SSO'
  | 'ON_PORTAL_PRE_LOGIN'
  | 'INJECTING'
  | 'AUTHENTICATED'
  | 'FAILED';

type TerminalState = 'RESUMED' | 'AUTHENTICATED' | 'FAILED';
type ActiveState = Exclude<LoginState, TerminalState>;

interface Transition {
  next: LoginState;
  error?: string;
}

type StateHandler = (deps: LoginDeps) => Promise<Transition>;

export interface LoginResult {
  success: boolean;
  state: TerminalState;
  /** Every state visited, in order. */
  path: LoginState[];
  error?: string;
}

const SESSION_MARKERS = [AUTHENTICATED_MARKER, 'Anmelden', 'Login'];

function isTerminal(state: LoginState): state is TerminalState {
  return state === 'RESUMED' || state === 'AUTHENTICATED' || state === 'FAILED';
}

const transitions: Record<ActiveState, StateHandler> = {
  START: async ({ session, config, logger }) => {
    logger.info({ url: config.targetUrl }, 'Navigating to portal');
    await session.navigate(config.targetUrl);
    return { next: 'CHECK_SESSION' };
  },

  CHECK_SESSION: async ({ session, config, logger }) => {
    const settled = await tolerate(() =>
      waitForPage(
        session,
        (snapshot) =>
          snapshot.url.includes(config.ssoDomain) ||
          SESSION_MARKERS.some((marker) => snapshot.source.includes(marker)),
        { timeoutMs: config.globalTimeout, intervalMs: config.pollInterval, label: 'session check' }
      )
    );
    if (!settled.ok) {
      logger.debug({ err: settled.error }, 'Session check timed out; using current page state');
    }

    const snapshot = await takeSnapshot(session);
    if (isAuthenticatedPortal(snapshot, config)) {
      return { next: 'RESUMED' };
    }
    if (snapshot.url.includes(config.ssoDomain)) {
      return { next: 'ON_SSO' };
    }
    return { next: 'ON_PORTAL_PRE_LOGIN' };
  },

  ON_SSO: async () => ({ next: 'INJECTING' }),

  ON_PORTAL_PRE_LOGIN: async ({ session, logger }) => {
    const loginLink = await resolveElement(session, LOGIN_LINK_STRATEGIES, logger);
    if (!loginLink) {
      logger.warn('No login link found; expecting an automatic SSO redirect');
      return { next: 'INJECTING' };
    }

    const clicked = await tolerate(() => loginLink.click());
    if (clicked.ok) {
      logger.info('Clicked login link');
    } else {
      logger.warn({ err: clicked.error }, 'Login link click failed; continuing');
    }
    return { next: 'INJECTING' };
  },

  INJECTING: async (deps) => {
    const result = await injectCredentials(deps);
    return result.ok ? { next: 'AUTHENTICATED' } : { next: 'FAILED', error: result.reason };
  },
};

/**
 * Drives the portal login from the deep link to an authenticated page.
 * Never throws; failures come back as `success: false`.
 */
export async function login(deps: LoginDeps): Promise<LoginResult> {
  const { logger } = deps;
  const path: LoginState[] = [];
  let state: LoginState = 'START';
  let error: string | undefined;

  try {
    while (!isTerminal(state)) {
      path.push(state);
      logger.debug({ state }, 'Login state');
      const transition: Transition = await transitions[state](deps);
      state = transition.next;
      error = transition.error;
    }
  } catch (caught) {
    logger.error({ err: caught, state }, 'Unexpected login failure');
    state = 'FAILED';
    error = errorMessage(caught);
  }

  const finalState: TerminalState = isTerminal(state) ? state : 'FAILED';
  path.push(finalState);
  logger.info({ state: finalState }, 'Login finished');

  if (finalState === 'FAILED') {
    return { success: false, state: finalState, path, error: error ?? 'Login failed' };
  }
  return { success: true, state: finalState, path };
}
