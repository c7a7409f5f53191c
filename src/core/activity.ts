import { createHash } from "node:crypto";
import { setTimeout as sleep } from "node:timers/promises";
import type { ActivityPolicy, BackoffPolicy } from "../config/worker-config";
import { CeilingBudget, type CostBudget } from "../research/budget";
import {
  CancelledError,
  TransientError,
  ValidationError,
  WorkflowError,
  classifyError,
  errorMessage,
} from "./errors";
import type { ActivityLedgerEntry, WorkflowInstanceState } from "./types";

export interface ActivityOutcome<T> {
  value: T;
  costMicros?: number;
}

export type ActivityFn<T> = (signal: AbortSignal) => Promise<ActivityOutcome<T>>;

export interface RunOptions {
  /** Upper bound on what one attempt may be charged; refused up front if unaffordable. */
  maxCostMicros?: number;
}

export interface ActivityRunner {
  /** Spend left under the instance's cost ceiling. */
  readonly budget: CostBudget;
  run<T>(
    name: string,
    input: unknown,
    fn: ActivityFn<T>,
    options?: RunOptions,
  ): Promise<T>;
}

export interface InstanceRunnerOptions {
  ceilingMicros?: number;
  onAttemptFailed?: (name: string, error: WorkflowError) => void;
  /** Called whenever the ledger or the spent cost changes. */
  onCheckpoint?: () => void;
}

/** Deterministic JSON: object keys sorted at every depth. */
export const stableStringify = (value: unknown): string => {
  if (Array.isArray(value)) {
    return `[${value.map((item) => stableStringify(item)).join(",")}]`;
  }
  if (value !== null && typeof value === "object") {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([k, v]) => `${JSON.stringify(k)}:${stableStringify(v)}`);
    return `{${entries.join(",")}}`;
  }
  return JSON.stringify(value) ?? "null";
};

export const idempotencyKey = (
  instanceId: string,
  name: string,
  input: unknown,
): string => {
  const digest = createHash("sha256")
    .update(stableStringify(input))
    .digest("hex")
    .slice(0, 16);
  return `${instanceId}:${name}:${digest}`;
};

export const backoffDelay = (policy: BackoffPolicy, attempt: number): number =>
  Math.min(
    policy.maxMs,
    policy.initialMs * policy.multiplier ** Math.max(0, attempt - 1),
  );

const withTimeout = async <T>(
  name: string,
  timeoutMs: number,
  parent: AbortSignal,
  fn: ActivityFn<T>,
): Promise<ActivityOutcome<T>> => {
  const controller = new AbortController();
  const onAbort = () => controller.abort(parent.reason);
  parent.addEventListener("abort", onAbort, { once: true });

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new TransientError(
        `Activity ${name} timed out after ${timeoutMs}ms`,
      );
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
    parent.removeEventListener("abort", onAbort);
  }
};

/**
 * Runs activities for one instance. Completed activities are recorded in
 * the instance ledger, keyed by (instance, name, input hash), so a replay
 * with identical input returns the recorded value and is not charged again.
 */
export class InstanceActivityRunner implements ActivityRunner {
  readonly budget: CostBudget;

  constructor(
    private readonly state: WorkflowInstanceState,
    private readonly policy: ActivityPolicy,
    private readonly signal: AbortSignal,
    private readonly options: InstanceRunnerOptions = {},
  ) {
    this.budget = new CeilingBudget(
      options.ceilingMicros ?? Number.POSITIVE_INFINITY,
      state,
      () => options.onCheckpoint?.(),
    );
  }

  async run<T>(
    name: string,
    input: unknown,
    fn: ActivityFn<T>,
    options: RunOptions = {},
  ): Promise<T> {
    const key = idempotencyKey(this.state.instance_id, name, input);
    const recorded = this.state.activities[key];
    if (recorded) {
      return recorded.value as T;
    }

    const maxCost = options.maxCostMicros ?? 0;
    if (maxCost > this.budget.remainingMicros) {
      throw new ValidationError(`cost ceiling leaves no budget for ${name}`);
    }

    let attempt = 0;
    for (;;) {
      if (this.signal.aborted) {
        throw new CancelledError(this.state.instance_id);
      }

      attempt += 1;
      this.state.retries[name] = (this.state.retries[name] ?? 0) + 1;

      try {
        const outcome = await withTimeout(
          name,
          this.policy.timeoutMs,
          this.signal,
          fn,
        );
        const cost = outcome.costMicros ?? 0;
        const entry: ActivityLedgerEntry = {
          name,
          attempts: attempt,
          cost_micros: cost,
          completed_at: new Date().toISOString(),
          value: outcome.value,
        };
        this.state.activities[key] = entry;
        this.state.cost_micros += cost;
        this.options.onCheckpoint?.();
        return outcome.value;
      } catch (error) {
        if (this.signal.aborted) {
          throw new CancelledError(this.state.instance_id);
        }

        const classified = classifyError(error);
        this.options.onAttemptFailed?.(name, classified);
        if (classified.kind === "validation") {
          throw classified;
        }
        if (attempt >= this.policy.maxAttempts) {
          throw new TransientError(
            `Activity ${name} failed after ${attempt} attempts: ${errorMessage(classified)}`,
            { cause: classified },
          );
        }

        const delay = backoffDelay(this.policy.backoff, attempt);
        if (delay > 0) {
          await this.backoff(delay);
        }
      }
    }
  }

  private async backoff(delayMs: number): Promise<void> {
    try {
      await sleep(delayMs, undefined, { signal: this.signal });
    } catch (error) {
      if (this.signal.aborted) {
        throw new CancelledError(this.state.instance_id);
      }
      throw error;
    }
  }
}
