// Error types raised by the queue manager

import { QueueTier } from './types/queue.js';

export class QueueManagerError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'QueueManagerError';
  }
}

/**
 * Raised before any classification work when a submission is malformed
 * (negative or non-finite size, unknown user tier, unknown priority).
 */
export class InvalidSubmissionError extends QueueManagerError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid analysis submission: ${issues.join('; ')}`);
    this.name = 'InvalidSubmissionError';
    this.issues = issues;
  }
}

export class JobStoreError extends QueueManagerError {
  readonly queue?: QueueTier;

  constructor(operation: string, queue: QueueTier | undefined, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(
      queue ? `Job store ${operation} failed for ${queue}: ${detail}` : `Job store ${operation} failed: ${detail}`,
      { cause }
    );
    this.name = 'JobStoreError';
    this.queue = queue;
  }
}

export class ConfigurationError extends QueueManagerError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}
