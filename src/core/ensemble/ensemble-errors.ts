import { AppError } from '../../shared/errors/app-error';
import type { InvocationFailureKind, WorkerResult } from './ensemble-types';

/** Raised when no worker produced an answer; the reviewer is never called. */
export class AllWorkersFailedError extends AppError {
  readonly workerResults: WorkerResult[];

  constructor(workerResults: WorkerResult[]) {
    super(
      'ALL_WORKERS_FAILED',
      `All ${workerResults.length} worker agents failed to respond`,
      undefined,
      {
        failures: workerResults.map((result) => ({
          agentName: result.agentName,
          errorDetail: result.errorDetail ?? '',
        })),
      },
    );
    this.name = 'AllWorkersFailedError';
    this.workerResults = workerResults;
  }
}

/** Raised when the reviewer call fails or its reply is empty. */
export class ReviewerError extends AppError {
  readonly reviewerName: string;
  readonly failureKind: InvocationFailureKind | 'empty_reply';

  constructor(reviewerName: string, failureKind: InvocationFailureKind | 'empty_reply', detail: string) {
    super('REVIEWER_FAILED', `Reviewer agent "${reviewerName}" failed: ${detail}`, undefined, {
      reviewerName,
      failureKind,
    });
    this.name = 'ReviewerError';
    this.reviewerName = reviewerName;
    this.failureKind = failureKind;
  }
}

export class RequestValidationError extends AppError {
  constructor(message: string, issues: string[]) {
    super('INVALID_REQUEST', message, undefined, { issues });
    this.name = 'RequestValidationError';
  }
}
