import fs from 'fs';
import path from 'path';
import { AppConfig } from './types';

export interface OutputMeta {
  tool: string;
  version: string;
  flow: string;
  portalUrl: string;
  timestamp: string;
  durationMs: number;
  stepsCompleted: number;
  stepsTotal: number;
  success: boolean;
}

export interface OutputEnvelope {
  meta: OutputMeta;
  data: Record<string, unknown>;
  errors: string[];
}

function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function formatTime(date: Date): string {
  return date.toISOString().slice(11, 19).replace(/:/g, '');
}

/** Writes `<outputDir>/<flow>/<YYYY-MM-DD>/<flow>-<HHMMSS>.json` and returns its path. */
export function writeOutput(
  config: AppConfig,
  flowName: string,
  envelope: OutputEnvelope,
  now = new Date()
): string {
  const flowDir = path.join(config.outputDir, flowName, formatDate(now));
  fs.mkdirSync(flowDir, { recursive: true });

  const outputPath = path.join(flowDir, `${flowName}-${formatTime(now)}.json`);
  fs.writeFileSync(outputPath, JSON.stringify(envelope, null, 2), 'utf-8');

  return outputPath;
}
