import { saveSessionState } from '../auth';
import { createDebugArtifactSink } from '../debug-artifacts';
import { LoginFailedError } from '../errors';
import { requireSession } from '../flow-runner';
import { login } from '../login/orchestrator';
import { FlowDefinition, FlowStep } from '../types';

export const loginSteps: FlowStep[] = [
  {
    name: 'login',
    description: 'Open the lectures deep link and sign in through SSO when needed.',
    action: async (ctx) => {
      const session = requireSession(ctx);
      const result = await login({
        session,
        config: ctx.config,
        credentials: ctx.config.credentials,
        logger: ctx.logger,
        captureDebug: createDebugArtifactSink(session, ctx.config.debugDir, ctx.logger),
        totp: ctx.totp,
      });

      ctx.flowData = { ...ctx.flowData, login: { state: result.state, path: result.path } };
      if (!result.success) {
        throw new LoginFailedError(result.error ?? 'Login failed');
      }
    },
  },
  {
    name: 'save-session',
    description: 'Persist the browser storage state to reuse the session.',
    action: async (ctx) => {
      await saveSessionState(requireSession(ctx), ctx.config);
    },
  },
];

export const loginFlow: FlowDefinition = {
  name: 'login',
  description: 'Sign in to the LSF portal',
  steps: loginSteps,
};
