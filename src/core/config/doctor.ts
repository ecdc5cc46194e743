/* eslint-disable no-console */
import { getChatEndpointClient } from '../llm';
import { invokeAgent } from '../ensemble/agentInvoker';
import { AgentConfig } from '../ensemble/ensemble-types';
import { ChatEndpointClient } from '../llm/llm-types';
import { config } from '../../shared/config/env';
import { EnsembleConfig, getAgentSummary, loadAgentsConfig } from './agents-config';

async function pingAgent(agent: AgentConfig, client: ChatEndpointClient): Promise<boolean> {
  const outcome = await invokeAgent(agent, [{ role: 'user', content: 'Reply with the single word: pong' }], {
    client,
    retryBaseDelayMs: config.ENSEMBLE_RETRY_BASE_DELAY_MS,
  });
  const elapsed = `${outcome.elapsedSec.toFixed(2)}s`;
  if (outcome.ok) {
    console.log(`✅ ${agent.role} ${agent.name}: responded in ${elapsed}`);
    return true;
  }
  console.log(`❌ ${agent.role} ${agent.name}: ${outcome.kind} after ${outcome.attempts} attempt(s), ${elapsed} (${outcome.detail})`);
  return false;
}

/**
 * Print the configured roster and, when `ping` is set, call every agent once.
 *
 * @returns False when the configuration is invalid or any ping failed.
 */
export async function runConfigDoctor(
  opts: { configPath?: string; ping?: boolean; client?: ChatEndpointClient } = {},
): Promise<boolean> {
  console.log('🩺 Running Configuration Doctor...');

  let agents: EnsembleConfig;
  try {
    agents = await loadAgentsConfig(opts.configPath ?? config.ENSEMBLE_CONFIG_PATH);
  } catch (error) {
    console.error(`❌ ${error instanceof Error ? error.message : String(error)}`);
    return false;
  }

  const summary = getAgentSummary(agents);
  console.log(`Reviewer: ${summary.reviewer.name} (${summary.reviewer.model}) -> ${summary.reviewer.apiUrl}`);
  summary.workers.forEach((worker, index) => {
    console.log(`Worker ${index + 1}: ${worker.name} (${worker.model}) -> ${worker.apiUrl}`);
  });
  console.log('✅ Configuration validated.');

  if (!opts.ping) return true;

  const client = opts.client ?? getChatEndpointClient();
  const results = await Promise.all([agents.reviewer, ...agents.workers].map((agent) => pingAgent(agent, client)));
  return results.every(Boolean);
}
