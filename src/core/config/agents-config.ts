import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { AppError } from '../../shared/errors/app-error';
import { LogLevel, logger } from '../../shared/logging/logger';
import { AgentConfig, AgentRole, AgentRoster } from '../ensemble/ensemble-types';

const httpUrlSchema = z.string().trim().url().refine((value) => {
  try {
    const parsed = new URL(value);
    return parsed.protocol === 'http:' || parsed.protocol === 'https:';
  } catch {
    return false;
  }
}, 'api_url must start with http:// or https://');

const timeoutSecSchema = z.number().int().min(1, 'timeout must be 1-600 seconds').max(600, 'timeout must be 1-600 seconds');
const maxRetriesSchema = z.number().int().min(0).max(10);

const agentEntrySchema = z.object({
  name: z.string().trim().min(1),
  api_url: httpUrlSchema,
  model: z.string().trim().min(1),
  timeout: timeoutSecSchema.optional(),
  max_retries: maxRetriesSchema.optional(),
  description: z.string().optional(),
});

const LOG_LEVELS = ['DEBUG', 'INFO', 'WARNING', 'ERROR', 'CRITICAL'] as const;
export type SettingsLogLevel = (typeof LOG_LEVELS)[number];

const systemSettingsSchema = z
  .object({
    max_retries: maxRetriesSchema.default(1),
    default_timeout: timeoutSecSchema.default(60),
    stream: z.boolean().default(false),
    log_level: z
      .string()
      .default('INFO')
      .transform((value) => value.trim().toUpperCase())
      .pipe(z.enum(LOG_LEVELS)),
  })
  .default({});

export const agentsFileSchema = z.object({
  reviewer_agent: agentEntrySchema,
  worker_agents: z.array(agentEntrySchema).min(1, 'At least one worker agent is required'),
  system_settings: systemSettingsSchema,
});

export type AgentsFile = z.input<typeof agentsFileSchema>;

export interface SystemSettings {
  maxRetries: number;
  defaultTimeoutSec: number;
  /** Accepted for compatibility; outbound calls never stream. */
  stream: boolean;
  logLevel: SettingsLogLevel;
}

export interface EnsembleConfig extends AgentRoster {
  readonly systemSettings: Readonly<SystemSettings>;
}

const PINO_LEVELS: Record<SettingsLogLevel, LogLevel> = {
  DEBUG: 'debug',
  INFO: 'info',
  WARNING: 'warn',
  ERROR: 'error',
  CRITICAL: 'fatal',
};

export function toPinoLevel(level: SettingsLogLevel): LogLevel {
  return PINO_LEVELS[level];
}

function looksLikeChatEndpoint(apiUrl: string): boolean {
  const pathname = new URL(apiUrl).pathname.replace(/\/$/, '');
  return pathname.endsWith('/api/chat') || pathname.endsWith('/chat/completions');
}

function toAgentConfig(
  entry: z.output<typeof agentEntrySchema>,
  role: AgentRole,
  settings: SystemSettings,
): AgentConfig {
  if (!looksLikeChatEndpoint(entry.api_url)) {
    logger.warn(
      { agent: entry.name, apiUrl: entry.api_url },
      'api_url usually ends with /api/chat or /chat/completions',
    );
  }
  return Object.freeze({
    name: entry.name,
    apiUrl: entry.api_url,
    model: entry.model,
    timeoutSec: entry.timeout ?? settings.defaultTimeoutSec,
    maxRetries: entry.max_retries ?? settings.maxRetries,
    role,
    ...(entry.description !== undefined ? { description: entry.description } : {}),
  });
}

/**
 * Validate a parsed agents file and resolve per-agent defaults from `system_settings`.
 *
 * @throws AppError CONFIG_INVALID listing every schema issue.
 */
export function parseAgentsConfig(raw: unknown): EnsembleConfig {
  const parsed = agentsFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new AppError('CONFIG_INVALID', `Invalid agents configuration: ${issues.join('; ')}`, parsed.error, {
      issues,
    });
  }

  const settings: SystemSettings = {
    maxRetries: parsed.data.system_settings.max_retries,
    defaultTimeoutSec: parsed.data.system_settings.default_timeout,
    stream: parsed.data.system_settings.stream,
    logLevel: parsed.data.system_settings.log_level,
  };
  if (settings.stream) {
    logger.warn('system_settings.stream is set but streaming is not supported; agents are called with stream=false');
  }

  const config: EnsembleConfig = Object.freeze({
    reviewer: toAgentConfig(parsed.data.reviewer_agent, 'reviewer', settings),
    workers: Object.freeze(parsed.data.worker_agents.map((entry) => toAgentConfig(entry, 'worker', settings))),
    systemSettings: Object.freeze(settings),
  });

  logger.info(
    { workerCount: config.workers.length, reviewer: config.reviewer.name },
    'Agents configuration validated',
  );
  return config;
}

export async function loadAgentsConfig(configPath: string): Promise<EnsembleConfig> {
  const resolved = path.resolve(configPath);
  let text: string;
  try {
    text = await readFile(resolved, 'utf8');
  } catch (error) {
    throw new AppError('CONFIG_INVALID', `Agents configuration file not found: ${resolved}`, error);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new AppError('CONFIG_INVALID', `Agents configuration is not valid JSON: ${resolved}`, error);
  }

  return parseAgentsConfig(raw);
}

export interface AgentSummaryEntry {
  name: string;
  model: string;
  apiUrl: string;
}

/** Roster overview without timeouts or retry budgets, for listing endpoints and the doctor. */
export function getAgentSummary(config: AgentRoster): { reviewer: AgentSummaryEntry; workers: AgentSummaryEntry[] } {
  const summarize = (agent: AgentConfig): AgentSummaryEntry => ({
    name: agent.name,
    model: agent.model,
    apiUrl: agent.apiUrl,
  });
  return {
    reviewer: summarize(config.reviewer),
    workers: config.workers.map(summarize),
  };
}
