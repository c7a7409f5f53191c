import { isAxiosError } from "axios";
import type { FailureKind } from "./types";

export class WorkflowError extends Error {
  constructor(
    readonly kind: FailureKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class TransientError extends WorkflowError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("transient", message, options);
  }
}

export class ValidationError extends WorkflowError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("validation", message, options);
  }
}

export class CancelledError extends Error {
  constructor(readonly instanceId: string) {
    super(`Instance ${instanceId} was cancelled`);
    this.name = "CancelledError";
  }
}

const RETRYABLE_STATUS = new Set([408, 425, 429]);

/**
 * Map anything thrown by an activity onto the failure taxonomy.
 * HTTP 4xx responses (other than timeouts and rate limits) are not worth
 * retrying; everything unrecognized is treated as transient.
 */
export const classifyError = (error: unknown): WorkflowError => {
  if (error instanceof WorkflowError) {
    return error;
  }

  if (isAxiosError(error)) {
    const status = error.response?.status;
    if (status === undefined) {
      return new TransientError(`${error.code ?? "network"}: ${error.message}`, {
        cause: error,
      });
    }
    if (status >= 500 || RETRYABLE_STATUS.has(status)) {
      return new TransientError(`HTTP ${status}: ${error.message}`, {
        cause: error,
      });
    }
    return new ValidationError(`HTTP ${status}: ${error.message}`, {
      cause: error,
    });
  }

  return new TransientError(errorMessage(error), { cause: error });
};

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
