import fs from 'fs';
import path from 'path';
import type { Logger } from 'pino';
import { PortalSession } from './session';

export type DebugArtifactSink = (prefix: string) => Promise<void>;

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

// Local time, matching the timestamps in the log output.
function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}

export function debugBasePath(debugDir: string, prefix: string, now = new Date()): string {
  return path.join(debugDir, `${prefix}_${formatTimestamp(now)}`);
}

/**
 * Saves `<prefix>_<timestamp>.png` and `.html` under `debugDir`.
 * Never throws: a failed dump is only logged.
 */
export async function dumpDebugInfo(
  session: PortalSession,
  debugDir: string,
  prefix: string,
  logger: Logger
): Promise<void> {
  const basePath = debugBasePath(debugDir, prefix);

  try {
    fs.mkdirSync(debugDir, { recursive: true });
    await session.screenshot(`${basePath}.png`);
    const html = await session.pageSource();
    fs.writeFileSync(`${basePath}.html`, html, 'utf-8');
    logger.info({ basePath }, 'Saved debug artifacts');
  } catch (error) {
    logger.error({ err: error, basePath }, 'Failed to dump debug artifacts');
  }
}

export function createDebugArtifactSink(
  session: PortalSession,
  debugDir: string,
  logger: Logger
): DebugArtifactSink {
  return (prefix) => dumpDebugInfo(session, debugDir, prefix, logger);
}
