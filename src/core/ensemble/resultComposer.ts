import { AggregatedResponse, GenerateResponseBody, ReviewOutcome, WorkerResult } from './ensemble-types';

function roundSeconds(value: number): number {
  return Math.round(value * 100) / 100;
}

export function composeResponse(params: {
  workerResults: WorkerResult[];
  review: ReviewOutcome;
  /** Wall time of fan-out plus review, not the sum of worker times. */
  totalElapsedSec: number;
}): AggregatedResponse {
  const successfulWorkers = params.workerResults.filter((result) => result.isSuccess).length;
  return {
    finalAnswer: params.review.finalAnswer,
    reviewComment: params.review.reviewComment,
    workerResults: params.workerResults.map((result) => ({ ...result })),
    metadata: {
      processingTimeSeconds: params.totalElapsedSec,
      totalWorkers: params.workerResults.length,
      successfulWorkers,
      failedWorkers: params.workerResults.length - successfulWorkers,
    },
  };
}

export function toGenerateResponseBody(response: AggregatedResponse): GenerateResponseBody {
  return {
    final_answer: response.finalAnswer,
    review_comment: response.reviewComment,
    worker_responses: response.workerResults.map((result) => ({
      agent_name: result.agentName,
      response: result.isSuccess ? result.content : `Error: ${result.errorDetail ?? 'unknown failure'}`,
      is_success: result.isSuccess,
      processing_time: roundSeconds(result.elapsedSec),
    })),
    metadata: {
      processing_time_seconds: roundSeconds(response.metadata.processingTimeSeconds),
      successful_workers: response.metadata.successfulWorkers,
      total_workers: response.metadata.totalWorkers,
      failed_workers: response.metadata.failedWorkers,
    },
  };
}
