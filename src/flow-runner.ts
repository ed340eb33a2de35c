import { PortalSession } from './session';
import { FlowContext, FlowDefinition } from './types';

export interface RunOptions {
  dryRun?: boolean;
}

export interface RunResult {
  data: Record<string, unknown>;
  stepsCompleted: number;
}

export async function runFlow(
  flow: FlowDefinition,
  ctx: FlowContext,
  options: RunOptions = {}
): Promise<RunResult> {
  const { dryRun = false } = options;
  let stepsCompleted = 0;

  ctx.logger.info({ flow: flow.name, dryRun }, 'Starting flow');

  for (const step of flow.steps) {
    if (dryRun) {
      ctx.logger.info({ flow: flow.name, step: step.name }, 'Dry run step');
      if (step.description) {
        ctx.logger.info({ flow: flow.name, step: step.name }, step.description);
      }
      stepsCompleted += 1;
      continue;
    }

    if (!ctx.session) {
      throw new Error('FlowContext.session is required for non-dry-run execution.');
    }

    ctx.logger.info({ flow: flow.name, step: step.name }, 'Running step');
    await step.action(ctx);
    stepsCompleted += 1;
  }

  ctx.logger.info({ flow: flow.name, dryRun }, 'Flow complete');
  return { data: { ...ctx.flowData }, stepsCompleted };
}

export function requireSession(ctx: FlowContext): PortalSession {
  if (!ctx.session) {
    throw new Error('FlowContext.session is required for this step.');
  }
  return ctx.session;
}
