import { getChatEndpointClient } from '../core/llm';
import { EnsembleConfig, loadAgentsConfig, toPinoLevel } from '../core/config/agents-config';
import { EnsembleEngine } from '../core/ensemble';
import { config } from '../shared/config/env';
import { AppError, isAppError } from '../shared/errors/app-error';
import { logger, setLogLevel } from '../shared/logging/logger';

export interface EnsembleApp {
  engine: EnsembleEngine;
  agents: EnsembleConfig;
}

export async function bootstrapApp(opts: { configPath?: string } = {}): Promise<EnsembleApp> {
  try {
    const agents = await loadAgentsConfig(opts.configPath ?? config.ENSEMBLE_CONFIG_PATH);
    setLogLevel(toPinoLevel(agents.systemSettings.logLevel));

    const engine = new EnsembleEngine({
      roster: agents,
      client: getChatEndpointClient(),
      retryBaseDelayMs: config.ENSEMBLE_RETRY_BASE_DELAY_MS,
      maxConcurrentRequests: config.ENSEMBLE_MAX_CONCURRENT_REQUESTS,
    });

    logger.info(
      {
        workers: agents.workers.map((agent) => agent.name),
        reviewer: agents.reviewer.name,
        maxConcurrentRequests: config.ENSEMBLE_MAX_CONCURRENT_REQUESTS || 'unbounded',
      },
      'Ensemble engine ready',
    );
    return { engine, agents };
  } catch (error) {
    if (isAppError(error, 'CONFIG_INVALID')) throw error;
    throw new AppError('BOOTSTRAP_FAILED', 'Application bootstrap failed', error);
  }
}
