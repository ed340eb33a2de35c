import { extractCurrentClasses } from '../extract';
import { requireSession } from '../flow-runner';
import { createHttpFetcher } from '../http-fetch';
import { FlowDefinition } from '../types';
import { loginSteps } from './login.flow';

const LECTURES_VIEW_MARKER = 'state=wscheck';

export const currentClassesFlow: FlowDefinition = {
  name: 'current-classes',
  description: 'Sign in and list the classes of the active term',
  steps: [
    ...loginSteps,
    {
      name: 'open-lectures',
      description: 'Make sure the browser shows the "my lectures" view.',
      action: async (ctx) => {
        const session = requireSession(ctx);
        if (!session.currentUrl().includes(LECTURES_VIEW_MARKER)) {
          ctx.logger.info('Navigating to lectures page');
          await session.navigate(ctx.config.targetUrl);
        }
      },
    },
    {
      name: 'fetch-html',
      description: 'Fetch the lectures page over HTTP, falling back to the browser markup.',
      action: async (ctx) => {
        const session = requireSession(ctx);
        const { config, logger } = ctx;

        let html: string | null = null;
        if (config.httpFallback) {
          const fetchPage = ctx.fetchPage ?? createHttpFetcher({
            timeoutMs: config.globalTimeout,
            portalDomain: config.portalDomain,
            logger,
          });
          html = await fetchPage(config.targetUrl, session);
        }

        if (!html) {
          logger.info('Using browser page source');
          html = await session.pageSource();
        }
        ctx.pageHtml = html;
      },
    },
    {
      name: 'extract-classes',
      description: 'Extract the class names listed under the active term.',
      action: async (ctx) => {
        if (ctx.pageHtml === undefined) {
          throw new Error('No lectures page markup to extract from.');
        }

        const extraction = extractCurrentClasses(ctx.pageHtml, { term: ctx.config.term }, ctx.logger);
        ctx.extraction = extraction;
        ctx.flowData = {
          ...ctx.flowData,
          term: extraction.term,
          source: extraction.source,
          currentClasses: extraction.classes.map((name) => ({ name })),
        };
      },
    },
  ],
};
