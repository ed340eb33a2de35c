#!/usr/bin/env node
import fs from 'fs';
import { Command } from 'commander';
import { flows, getFlow } from './flows';
import { loadConfig, redactConfig, validateConfig } from './config';
import { createLogger } from './logger';
import { isMissingBrowserError, isMissingBrowserMessage, MISSING_BROWSER_HINT } from './browser';
import { AppConfig, FlowContext } from './types';
import { deleteSessionState, sessionStateExists, validateSession } from './auth';
import { runFlow } from './flow-runner';
import { writeOutput } from './output';
import { openPortalSession } from './session';
import { getCurrentClasses } from './current-classes';
import { extractCurrentClasses } from './extract';
import { ExtractionEmptyError } from './errors';

const TOOL_NAME = 'lsf-classes';
const TOOL_VERSION = '0.1.0';

function parseCliNumber(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

interface RunOverrides {
  headless?: boolean;
  slowMo?: string;
  timeout?: string;
}

function applyRunOverrides(config: AppConfig, options: RunOverrides): AppConfig {
  const next = { ...config };

  if (options.headless !== undefined) {
    next.headless = options.headless;
  }

  if (options.slowMo !== undefined) {
    next.slowMo = parseCliNumber(options.slowMo, config.slowMo);
  }

  if (options.timeout !== undefined) {
    next.globalTimeout = parseCliNumber(options.timeout, config.globalTimeout);
  }

  return next;
}

async function waitForEnter(): Promise<void> {
  if (!process.stdin.isTTY) {
    return;
  }

  return new Promise((resolve) => {
    process.stdin.resume();
    process.stdin.once('data', () => {
      resolve();
    });
  });
}

const program = new Command();

function globalSetup() {
  const { config: configPath, verbose } = program.opts<{
    config: string;
    verbose?: boolean;
  }>();
  const config = loadConfig({ path: configPath });
  const logger = createLogger(config, { level: verbose ? 'debug' : undefined });
  return { config, logger };
}

function reportConfigErrors(config: AppConfig): boolean {
  const errors = validateConfig(config);
  if (errors.length === 0) {
    return true;
  }

  console.error('Config errors:');
  for (const error of errors) {
    console.error(`- ${error.field}: ${error.message}`);
  }
  process.exitCode = 1;
  return false;
}

program
  .name(TOOL_NAME)
  .description('List the classes of the active term from the LSF portal')
  .version(TOOL_VERSION)
  .option('--config <path>', 'Path to config file', '.env')
  .option('--verbose', 'Enable debug logging');

program
  .command('list')
  .description('List available flows')
  .action(() => {
    const { logger } = globalSetup();
    logger.debug({ flowCount: flows.length }, 'Listing flows');

    console.log('Available flows:');
    for (const flow of flows) {
      console.log(`- ${flow.name}: ${flow.description}`);
    }
  });

program
  .command('config')
  .description('Show resolved configuration (redacted)')
  .option('--validate', 'Validate required config values')
  .action((options: { validate?: boolean }) => {
    const { config, logger } = globalSetup();
    const errors = validateConfig(config);

    logger.debug({ errorCount: errors.length }, 'Config validation complete');

    if (options.validate && reportConfigErrors(config)) {
      console.log('Config is valid.');
    }

    console.log(JSON.stringify(redactConfig(config), null, 2));
  });

program
  .command('validate-session')
  .description('Check if the saved session is still valid')
  .action(async () => {
    const { config, logger } = globalSetup();

    if (!sessionStateExists(config)) {
      logger.info('No session state file found.');
      process.exitCode = 1;
      return;
    }

    try {
      const session = await openPortalSession(config);
      try {
        const valid = await validateSession(session, config, logger);
        if (valid) {
          console.log('Session is valid.');
        } else {
          console.log('Session is invalid.');
          process.exitCode = 1;
        }
      } finally {
        await session.close();
      }
    } catch (error) {
      if (isMissingBrowserError(error)) {
        logger.error(MISSING_BROWSER_HINT);
      } else {
        logger.error({ err: error }, 'Session validation failed');
      }
      process.exitCode = 1;
    }
  });

program
  .command('clear-session')
  .description('Delete the saved browser session')
  .action(() => {
    const { config, logger } = globalSetup();
    const removed = deleteSessionState(config);
    logger.info({ path: config.sessionStatePath, removed }, 'Session state cleared');
  });

program
  .command('run')
  .description('Execute a named flow')
  .argument('<flow>', 'Flow name')
  .option('--headless', 'Run in headless mode (default: true)')
  .option('--no-headless', 'Run with visible browser')
  .option('--slow-mo <ms>', 'Slow down actions by N ms')
  .option('--timeout <ms>', 'Global timeout in ms')
  .option('--dry-run', 'Log actions without executing them')
  .option('--pause', 'Pause before closing the browser')
  .action(async (flowName: string, options: RunOverrides & { dryRun?: boolean; pause?: boolean }) => {
    const { config: baseConfig, logger } = globalSetup();
    const config = applyRunOverrides(baseConfig, options);

    const flow = getFlow(flowName);
    if (!flow) {
      logger.error({ flow: flowName }, 'Unknown flow');
      console.error('Available flows:');
      for (const available of flows) {
        console.error(`- ${available.name}`);
      }
      process.exitCode = 1;
      return;
    }

    if (options.dryRun) {
      const ctx: FlowContext = { config, logger };
      await runFlow(flow, ctx, { dryRun: true });
      return;
    }

    if (!reportConfigErrors(config)) {
      return;
    }

    logger.info({ flow: flow.name, sessionStateExists: sessionStateExists(config) }, 'Launching browser');

    try {
      const session = await openPortalSession(config);

      try {
        const ctx: FlowContext = { config, logger, session };
        const start = Date.now();
        const result = await runFlow(flow, ctx);
        const now = new Date();

        const outputPath = writeOutput(
          config,
          flow.name,
          {
            meta: {
              tool: TOOL_NAME,
              version: TOOL_VERSION,
              flow: flow.name,
              portalUrl: config.targetUrl,
              timestamp: now.toISOString(),
              durationMs: Date.now() - start,
              stepsCompleted: result.stepsCompleted,
              stepsTotal: flow.steps.length,
              success: true,
            },
            data: result.data,
            errors: [],
          },
          now
        );
        logger.info({ outputPath }, 'Output written');

        if (options.pause) {
          logger.info('Flow complete. Press Enter to close the browser.');
          await waitForEnter();
        }
      } finally {
        await session.close();
        logger.info({ flow: flow.name }, 'Browser closed.');
      }
    } catch (error) {
      if (isMissingBrowserError(error)) {
        logger.error(MISSING_BROWSER_HINT);
      } else {
        logger.error({ err: error }, 'Run failed');
      }
      process.exitCode = 1;
    }
  });

program
  .command('classes')
  .description('Sign in and print the classes of the active term as JSON')
  .option('--headless', 'Run in headless mode (default: true)')
  .option('--no-headless', 'Run with visible browser')
  .option('--timeout <ms>', 'Global timeout in ms')
  .action(async (options: RunOverrides) => {
    const { config: baseConfig, logger } = globalSetup();
    const config = applyRunOverrides(baseConfig, options);

    if (!reportConfigErrors(config)) {
      return;
    }

    const result = await getCurrentClasses(config, logger);
    console.log(JSON.stringify(result, null, 2));
    if (!result.success) {
      if (isMissingBrowserMessage(result.error)) {
        logger.error(MISSING_BROWSER_HINT);
      }
      process.exitCode = 1;
    }
  });

program
  .command('extract')
  .description('Extract the active term classes from a saved lectures page')
  .argument('<file>', 'Path to an HTML file')
  .option('--term <label>', 'Exact term header to look for first')
  .option('--strict', 'Fail when no semester header matches')
  .action((file: string, options: { term?: string; strict?: boolean }) => {
    const { config, logger } = globalSetup();

    try {
      const html = fs.readFileSync(file, 'utf-8');
      const result = extractCurrentClasses(html, { term: options.term ?? config.term }, logger);

      if (options.strict && result.source !== 'semester') {
        throw new ExtractionEmptyError(`No semester header matched in ${file}`);
      }

      console.log(
        JSON.stringify(
          { term: result.term, current_classes: result.classes.map((name) => ({ name })) },
          null,
          2
        )
      );
    } catch (error) {
      logger.error({ err: error, file }, 'Extraction failed');
      process.exitCode = 1;
    }
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
