import { logger } from '../../shared/logging/logger';
import { AgentInvokerDeps, invokeAgent } from './agentInvoker';
import { AllWorkersFailedError } from './ensemble-errors';
import {
  AgentConfig,
  ConversationMessage,
  FanOutResult,
  InvocationOutcome,
  WorkerResult,
} from './ensemble-types';

function toWorkerResult(agent: AgentConfig, outcome: InvocationOutcome): WorkerResult {
  if (outcome.ok) {
    return {
      agentName: agent.name,
      content: outcome.content,
      isSuccess: true,
      elapsedSec: outcome.elapsedSec,
    };
  }
  return {
    agentName: agent.name,
    content: '',
    isSuccess: false,
    elapsedSec: outcome.elapsedSec,
    errorDetail: `${outcome.kind}: ${outcome.detail}`,
  };
}

/**
 * Query every worker concurrently and join on all of them.
 *
 * Each task writes only to its own slot of a pre-sized array, so the result order is the
 * configured order whatever order the endpoints answer in. Worker failures are folded into
 * their `WorkerResult`; this function does not reject for them.
 *
 * No cap is placed on in-flight calls: a roster of N workers opens N connections at once.
 */
export async function dispatchWorkers(
  workers: readonly AgentConfig[],
  messages: readonly ConversationMessage[],
  deps: AgentInvokerDeps,
): Promise<FanOutResult> {
  const startedAt = Date.now();
  logger.info({ workerCount: workers.length }, 'Worker fan-out started');

  const slots = new Array<WorkerResult>(workers.length);
  const tasks = workers.map((agent, index) =>
    invokeAgent(agent, messages, deps).then((outcome) => {
      slots[index] = toWorkerResult(agent, outcome);
    }),
  );
  await Promise.all(tasks);

  const successfulWorkers = slots.filter((result) => result.isSuccess).length;
  const failedWorkers = slots.length - successfulWorkers;

  logger.info(
    {
      successfulWorkers,
      failedWorkers,
      totalWorkers: slots.length,
      elapsedSec: Math.max(0, Date.now() - startedAt) / 1000,
    },
    'Worker fan-out joined',
  );

  return { workerResults: slots, successfulWorkers, failedWorkers };
}

/** Terminal check after the join: at least one worker must have answered. */
export function assertAnyWorkerSucceeded(result: FanOutResult): void {
  if (result.successfulWorkers === 0) {
    throw new AllWorkersFailedError(result.workerResults);
  }
}
