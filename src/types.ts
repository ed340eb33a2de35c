import type { Logger } from 'pino';
import type { ExtractionResult } from './extract';
import type { PageFetcher } from './http-fetch';
import type { PortalSession } from './session';
import type { TotpGenerator } from './totp';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Credentials {
  username: string;
  password: string;
  totpSecret?: string;
}

export interface AppConfig {
  targetUrl: string;
  portalDomain: string;
  ssoDomain: string;
  term: string;
  credentials: Credentials;
  headless: boolean;
  slowMo: number;
  outputDir: string;
  logLevel: LogLevel;
  globalTimeout: number;
  pollInterval: number;
  httpFallback: boolean;
  sessionStatePath: string;
  debugDir: string;
}

export interface FlowContext {
  config: AppConfig;
  logger: Logger;
  session?: PortalSession;
  flowData?: Record<string, unknown>;
  totp?: TotpGenerator;
  fetchPage?: PageFetcher;
  pageHtml?: string;
  extraction?: ExtractionResult;
}

export interface FlowStep {
  name: string;
  description?: string;
  action: (ctx: FlowContext) => Promise<void>;
}

export interface FlowDefinition {
  name: string;
  description: string;
  steps: FlowStep[];
}

export interface ClassEntry {
  name: string;
}

export type CurrentClassesResult =
  | { success: true; current_classes: ClassEntry[]; term?: string }
  | { success: false; error: string };
