import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

const { warnMock } = vi.hoisted(() => ({ warnMock: vi.fn() }));

vi.mock('../../../src/shared/logging/logger', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: warnMock,
    error: vi.fn(),
  },
}));

import {
  getAgentSummary,
  loadAgentsConfig,
  parseAgentsConfig,
  toPinoLevel,
} from '../../../src/core/config/agents-config';
import { AppError } from '../../../src/shared/errors/app-error';

const exampleConfigPath = path.resolve(__dirname, '../../../config/agents.example.json');

function minimalConfig(overrides: Record<string, unknown> = {}) {
  return {
    reviewer_agent: { name: 'R', api_url: 'http://localhost:11434/api/chat', model: 'big' },
    worker_agents: [{ name: 'W1', api_url: 'http://localhost:11434/api/chat', model: 'small' }],
    ...overrides,
  };
}

function configError(raw: unknown): AppError {
  try {
    parseAgentsConfig(raw);
  } catch (error) {
    if (error instanceof AppError) return error;
    throw error;
  }
  throw new Error('expected parseAgentsConfig to throw');
}

describe('parseAgentsConfig', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('fills agent defaults from system settings', () => {
    const config = parseAgentsConfig(
      minimalConfig({ system_settings: { max_retries: 3, default_timeout: 90, log_level: 'debug' } }),
    );

    expect(config.reviewer).toEqual({
      name: 'R',
      apiUrl: 'http://localhost:11434/api/chat',
      model: 'big',
      timeoutSec: 90,
      maxRetries: 3,
      role: 'reviewer',
    });
    expect(config.workers[0]).toMatchObject({ name: 'W1', timeoutSec: 90, maxRetries: 3, role: 'worker' });
    expect(config.systemSettings).toEqual({ maxRetries: 3, defaultTimeoutSec: 90, stream: false, logLevel: 'DEBUG' });
  });

  it('uses built-in defaults when system_settings is absent', () => {
    const config = parseAgentsConfig(minimalConfig());

    expect(config.systemSettings).toEqual({ maxRetries: 1, defaultTimeoutSec: 60, stream: false, logLevel: 'INFO' });
    expect(config.workers[0]).toMatchObject({ timeoutSec: 60, maxRetries: 1 });
  });

  it('lets per-agent values override the defaults', () => {
    const config = parseAgentsConfig(
      minimalConfig({
        worker_agents: [
          { name: 'W1', api_url: 'http://localhost:11434/api/chat', model: 'small', timeout: 5, max_retries: 0 },
        ],
      }),
    );

    expect(config.workers[0]).toMatchObject({ timeoutSec: 5, maxRetries: 0 });
  });

  it('freezes the resolved roster', () => {
    const config = parseAgentsConfig(minimalConfig());

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.workers)).toBe(true);
    expect(Object.isFrozen(config.reviewer)).toBe(true);
  });

  it('rejects an empty worker list', () => {
    const error = configError(minimalConfig({ worker_agents: [] }));

    expect(error.code).toBe('CONFIG_INVALID');
    expect(error.message).toBe('Invalid agents configuration: worker_agents: At least one worker agent is required');
  });

  it('rejects a missing reviewer', () => {
    const error = configError({ worker_agents: minimalConfig().worker_agents });

    expect(error.message).toBe('Invalid agents configuration: reviewer_agent: Required');
  });

  it('rejects non-http URLs and out-of-range timeouts', () => {
    const error = configError(
      minimalConfig({
        worker_agents: [{ name: 'W1', api_url: 'ftp://localhost/api/chat', model: 'small', timeout: 0 }],
      }),
    );

    expect(error.details?.issues).toEqual([
      'worker_agents.0.api_url: api_url must start with http:// or https://',
      'worker_agents.0.timeout: timeout must be 1-600 seconds',
    ]);
  });

  it('rejects unknown log levels', () => {
    const error = configError(minimalConfig({ system_settings: { log_level: 'verbose' } }));

    expect(error.code).toBe('CONFIG_INVALID');
    expect(error.message).toContain('system_settings.log_level');
  });

  it('warns about unusual endpoint paths and the stream flag', () => {
    parseAgentsConfig(
      minimalConfig({
        worker_agents: [{ name: 'W1', api_url: 'http://localhost:8080/generate', model: 'small' }],
        system_settings: { stream: true },
      }),
    );

    expect(warnMock).toHaveBeenCalledWith(
      { agent: 'W1', apiUrl: 'http://localhost:8080/generate' },
      'api_url usually ends with /api/chat or /chat/completions',
    );
    expect(warnMock).toHaveBeenCalledWith(
      'system_settings.stream is set but streaming is not supported; agents are called with stream=false',
    );
  });
});

describe('loadAgentsConfig', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(path.join(os.tmpdir(), 'agents-config-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('loads the shipped example configuration', async () => {
    const config = await loadAgentsConfig(exampleConfigPath);

    expect(config.reviewer).toMatchObject({ model: 'llama3:70b', timeoutSec: 180, maxRetries: 1 });
    expect(config.workers.map((worker) => [worker.model, worker.timeoutSec, worker.maxRetries])).toEqual([
      ['llama3:8b', 60, 1],
      ['mistral:7b', 60, 1],
      ['qwen2.5-coder:7b', 60, 2],
    ]);
  });

  it('reports a missing file', async () => {
    const missing = path.join(tempDir, 'nope.json');

    await expect(loadAgentsConfig(missing)).rejects.toMatchObject({
      code: 'CONFIG_INVALID',
      message: `Agents configuration file not found: ${missing}`,
    });
  });

  it('reports invalid JSON', async () => {
    const broken = path.join(tempDir, 'agents.json');
    await writeFile(broken, '{ "reviewer_agent": ', 'utf8');

    await expect(loadAgentsConfig(broken)).rejects.toMatchObject({
      code: 'CONFIG_INVALID',
      message: `Agents configuration is not valid JSON: ${broken}`,
    });
  });
});

describe('toPinoLevel', () => {
  it('maps configuration levels onto logger levels', () => {
    expect(toPinoLevel('DEBUG')).toBe('debug');
    expect(toPinoLevel('WARNING')).toBe('warn');
    expect(toPinoLevel('CRITICAL')).toBe('fatal');
  });
});

describe('getAgentSummary', () => {
  it('lists names, models and URLs only', () => {
    const summary = getAgentSummary(parseAgentsConfig(minimalConfig()));

    expect(summary).toEqual({
      reviewer: { name: 'R', model: 'big', apiUrl: 'http://localhost:11434/api/chat' },
      workers: [{ name: 'W1', model: 'small', apiUrl: 'http://localhost:11434/api/chat' }],
    });
  });
});
