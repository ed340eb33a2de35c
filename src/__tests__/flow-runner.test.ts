import { describe, it, expect } from 'vitest';
import { runFlow } from '../flow-runner';
import { FlowDefinition } from '../types';
import { createTestLogger, FakeSession, makeConfig, PORTAL_URL } from './fakes/fake-session';

function recordingFlow(calls: string[]): FlowDefinition {
  return {
    name: 'recording',
    description: 'Records step order',
    steps: [
      {
        name: 'first',
        description: 'First step.',
        action: async (ctx) => {
          calls.push('first');
          ctx.flowData = { ...ctx.flowData, first: true };
        },
      },
      {
        name: 'second',
        action: async () => {
          calls.push('second');
        },
      },
    ],
  };
}

describe('runFlow', () => {
  it('counts steps without running them in dry-run mode', async () => {
    const calls: string[] = [];
    const { logger, events } = createTestLogger();

    const result = await runFlow(recordingFlow(calls), { config: makeConfig(), logger }, { dryRun: true });

    expect(result).toEqual({ data: {}, stepsCompleted: 2 });
    expect(calls).toEqual([]);
    expect(events.filter((event) => event.msg === 'Dry run step')).toHaveLength(2);
  });

  it('runs steps in order and returns the collected flow data', async () => {
    const calls: string[] = [];
    const { logger } = createTestLogger();
    const session = new FakeSession({
      pages: { portal: { url: PORTAL_URL, html: '' } },
      navigateTo: 'portal',
    });

    const result = await runFlow(recordingFlow(calls), { config: makeConfig(), logger, session });

    expect(calls).toEqual(['first', 'second']);
    expect(result).toEqual({ data: { first: true }, stepsCompleted: 2 });
  });

  it('requires a session outside dry-run mode', async () => {
    const { logger } = createTestLogger();

    await expect(runFlow(recordingFlow([]), { config: makeConfig(), logger })).rejects.toThrow(
      'FlowContext.session is required for non-dry-run execution.'
    );
  });
});
