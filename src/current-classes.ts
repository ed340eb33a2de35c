import type { Logger } from 'pino';
import { errorMessage } from './errors';
import { runFlow } from './flow-runner';
import { currentClassesFlow } from './flows/current-classes.flow';
import { PageFetcher } from './http-fetch';
import { openPortalSession, PortalSession } from './session';
import { TotpGenerator } from './totp';
import { AppConfig, CurrentClassesResult, FlowContext } from './types';

export interface CurrentClassesDeps {
  openSession?: (config: AppConfig) => Promise<PortalSession>;
  fetchPage?: PageFetcher;
  totp?: TotpGenerator;
}

/**
 * Signs in and lists the classes of the active term.
 * Never throws; the session is closed on every path.
 */
export async function getCurrentClasses(
  config: AppConfig,
  logger: Logger,
  deps: CurrentClassesDeps = {}
): Promise<CurrentClassesResult> {
  const openSession = deps.openSession ?? openPortalSession;
  let session: PortalSession | undefined;

  try {
    session = await openSession(config);
    const ctx: FlowContext = {
      config,
      logger,
      session,
      totp: deps.totp,
      fetchPage: deps.fetchPage,
    };

    await runFlow(currentClassesFlow, ctx);

    const extraction = ctx.extraction;
    return {
      success: true,
      current_classes: (extraction?.classes ?? []).map((name) => ({ name })),
      term: extraction?.term ?? undefined,
    };
  } catch (error) {
    logger.error({ err: error }, 'Fetching current classes failed');
    return { success: false, error: errorMessage(error) };
  } finally {
    if (session) {
      await session.close().catch((error: unknown) => {
        logger.warn({ err: error }, 'Closing the browser session failed');
      });
    }
  }
}
