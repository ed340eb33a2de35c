import type { Logger } from 'pino';
import { tolerate } from '../errors';
import { describeLocator, PageElement, PortalSession, StrategyList } from '../session';

export const USERNAME_STRATEGIES: StrategyList = [
  { kind: 'id', value: 'username' },
  { kind: 'name', value: 'j_username' },
  { kind: 'css', value: 'input#idToken1' },
  { kind: 'css', value: "input[type='text']" },
];

export const PASSWORD_STRATEGIES: StrategyList = [
  { kind: 'id', value: 'password' },
  { kind: 'name', value: 'j_password' },
  { kind: 'css', value: 'input#idToken2' },
  { kind: 'css', value: "input[type='password']" },
];

export const SUBMIT_STRATEGIES: StrategyList = [
  { kind: 'name', value: '_eventId_proceed' },
  { kind: 'id', value: 'loginButton_0' },
  { kind: 'css', value: "button[type='submit']" },
  { kind: 'css', value: "input[type='submit']" },
];

export const TOKEN_STRATEGIES: StrategyList = [
  { kind: 'id', value: 'token' },
  { kind: 'name', value: 'otp' },
  { kind: 'css', value: "input[inputmode='numeric']" },
];

export const TOKEN_PROCEED_STRATEGIES: StrategyList = [
  { kind: 'name', value: '_eventId_proceed' },
  { kind: 'css', value: "button[type='submit']" },
];

export const LOGIN_LINK_STRATEGIES: StrategyList = [
  { kind: 'linkText', value: 'Anmelden' },
  { kind: 'linkText', value: 'Login' },
  { kind: 'linkText', value: 'Einloggen' },
];

/**
 * Returns the first element that exists and is visible, trying `strategies` in order.
 * A strategy that fails to resolve is expected and only moves on to the next one.
 */
export async function resolveElement(
  session: PortalSession,
  strategies: StrategyList,
  logger?: Logger
): Promise<PageElement | null> {
  for (const strategy of strategies) {
    const attempt = await tolerate(async () => {
      const element = await session.findElement(strategy);
      return (await element.isVisible()) ? element : null;
    });

    if (!attempt.ok) {
      logger?.debug({ selector: describeLocator(strategy), err: attempt.error }, 'Selector did not resolve');
      continue;
    }

    if (attempt.value) {
      logger?.debug({ selector: describeLocator(strategy) }, 'Selector resolved');
      return attempt.value;
    }

    logger?.debug({ selector: describeLocator(strategy) }, 'Selector matched a hidden element');
  }

  return null;
}
