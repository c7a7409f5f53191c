import { Value } from "@sinclair/typebox/value";
import type { WorkerConfig } from "../config/worker-config";
import { errorMessage } from "../core/errors";
import { createModuleLogger } from "../core/logger";
import type { InstanceStore, RejectedItem } from "../core/state-store";
import { type TaskQueue, WorkItemSchema } from "../core/task-queue";
import type { TaskId, WorkItem, WorkflowInstanceState } from "../core/types";
import { isTerminalState, isWorkflowKind } from "../core/types";
import type { KindRegistry } from "../core/workflow-definition";
import { WorkflowEngine } from "../core/workflow-engine";
import type { ActivityPool } from "./activity-pool";
import { ConcurrencyGate } from "./concurrency";
import { HealthScheduler } from "./health-scheduler";

const log = createModuleLogger("worker");

export interface WorkerDependencies {
  config: WorkerConfig;
  pool: ActivityPool;
  store: InstanceStore;
  queue: TaskQueue;
  kinds: KindRegistry;
}

export interface WorkerOptions {
  /** Serve the control API on this Unix socket while running. */
  socketPath?: string;
}

export type ProcessOutcome =
  | { status: "finished"; instance: WorkflowInstanceState }
  | { status: "already-terminal"; instance: WorkflowInstanceState }
  | { status: "rejected"; rejected: RejectedItem };

/**
 * One process, one queue, both workflow kinds. Instances share the
 * activity pool and a single concurrency ceiling; admission follows
 * arrival order.
 */
export class UnifiedWorker {
  readonly engine: WorkflowEngine;
  private readonly gate: ConcurrencyGate;
  private readonly health: HealthScheduler;
  private readonly inFlight = new Map<TaskId, Promise<void>>();
  private running = false;
  private loopDone: Promise<void> | undefined;
  private unsubscribeDeposits: (() => void) | undefined;

  constructor(
    private readonly deps: WorkerDependencies,
    private readonly options: WorkerOptions = {},
  ) {
    this.engine = new WorkflowEngine(deps.config, deps.pool, deps.store, deps.kinds);
    this.gate = new ConcurrencyGate(deps.config.concurrency);
    this.health = new HealthScheduler(deps.config.healthIntervalMs, [
      { name: "knowledge-store", probe: () => deps.pool.knowledge.ping() },
      { name: "crawl-service", probe: () => deps.pool.crawl.ping() },
      { name: "content-store", probe: () => deps.pool.content.ping() },
    ]);
  }

  async start(): Promise<void> {
    if (this.running) {
      return;
    }
    this.prepare();
    if (this.options.socketPath) {
      await this.deps.queue.startControlSocket(this.options.socketPath, {
        status: () => this.status(),
        instanceStatus: (id) => this.instanceStatus(id),
        cancel: (id) => this.engine.cancel(id),
      });
    }
    this.health.start();
    this.running = true;
    this.loopDone = this.loop();
    log.info("worker started", {
      queue: this.deps.queue.name,
      concurrency: this.deps.config.concurrency,
      pending: this.deps.queue.depth,
    });
  }

  /** Processes everything queued right now, redeliveries included, then returns. */
  async drain(): Promise<void> {
    this.prepare();
    for (;;) {
      await this.gate.acquire();
      const item = this.deps.queue.poll();
      if (item) {
        this.dispatch(item);
        continue;
      }
      this.gate.release();
      if (this.inFlight.size === 0) {
        break;
      }
      await Promise.race(this.inFlight.values());
    }
    await this.deps.pool.knowledge.flush();
  }

  /** Stops taking work and waits for in-flight instances to settle. */
  async stop(): Promise<void> {
    this.running = false;
    this.deps.queue.interrupt();
    await this.loopDone;
    this.loopDone = undefined;
    await Promise.all(this.inFlight.values());
    this.health.stop();
    if (this.options.socketPath) {
      await this.deps.queue.stopControlSocket(this.options.socketPath);
    }
    await this.deps.pool.knowledge.flush();
    this.unsubscribeDeposits?.();
    this.unsubscribeDeposits = undefined;
    log.info("worker stopped");
  }

  status(): Record<string, unknown> {
    const byState: Record<string, number> = {};
    for (const instance of this.engine.list()) {
      byState[instance.current_state] = (byState[instance.current_state] ?? 0) + 1;
    }
    return {
      queue: this.deps.queue.name,
      depth: this.deps.queue.depth,
      in_flight: [...this.inFlight.keys()],
      running: this.engine.running,
      concurrency: {
        limit: this.gate.limit,
        in_use: this.gate.inUse,
        waiting: this.gate.waiting,
      },
      instances: byState,
      health: this.health.getState(),
    };
  }

  instanceStatus(id: string): WorkflowInstanceState | RejectedItem | null {
    return this.engine.get(id) ?? this.deps.store.loadRejected(id);
  }

  async process(item: WorkItem): Promise<ProcessOutcome> {
    const { store, queue, kinds } = this.deps;

    if (!Value.Check(WorkItemSchema, item)) {
      return this.reject(item, "malformed work item");
    }
    const kind = item.workflow_kind;
    if (!isWorkflowKind(kind) || !kinds.has(kind)) {
      return this.reject(item, `unknown workflow kind: ${kind}`);
    }

    const existing = store.loadInstance(item.instance_id);
    if (existing && isTerminalState(existing.current_state)) {
      queue.ack(item.task_id);
      return { status: "already-terminal", instance: existing };
    }
    if (existing) {
      log.info("resuming instance", {
        instance: existing.instance_id,
        state: existing.current_state,
      });
    }

    const instance = existing ?? this.engine.create(item, kind);
    const finished = await this.engine.run(instance.instance_id);
    queue.ack(item.task_id);
    return { status: "finished", instance: finished };
  }

  private prepare(): void {
    this.deps.store.ensure();
    if (!this.unsubscribeDeposits) {
      this.unsubscribeDeposits = this.deps.pool.knowledge.onDepositFailure(
        (failure) => {
          this.deps.store.appendSideError({
            instance_id: failure.instanceId,
            operation: "knowledge-deposit",
            error: errorMessage(failure.error),
          });
        },
      );
    }
  }

  private reject(item: WorkItem, cause: string): ProcessOutcome {
    const rejected = this.deps.store.saveRejected(item, {
      kind: "validation",
      cause,
      state: "Created",
    });
    this.deps.queue.ack(item.task_id);
    log.warn("work item rejected", { task: item.task_id, cause });
    return { status: "rejected", rejected };
  }

  private async loop(): Promise<void> {
    while (this.running) {
      await this.gate.acquire();
      if (!this.running) {
        this.gate.release();
        break;
      }
      const item = await this.deps.queue.dequeue(this.deps.config.pollIntervalMs);
      if (!item) {
        this.gate.release();
        continue;
      }
      this.dispatch(item);
    }
  }

  private dispatch(item: WorkItem): void {
    const task: Promise<void> = this.process(item)
      .then((outcome) => {
        log.debug("work item settled", { task: item.task_id, status: outcome.status });
      })
      .catch((error: unknown) => this.crashed(item, error))
      .finally(() => {
        if (this.inFlight.get(item.task_id) === task) {
          this.inFlight.delete(item.task_id);
        }
        this.gate.release();
      });
    this.inFlight.set(item.task_id, task);
  }

  /**
   * An item whose processing threw is handed out again until it has been
   * delivered `maxDeliveries` times, then rejected.
   */
  private crashed(item: WorkItem, error: unknown): void {
    const { queue, config } = this.deps;
    const deliveries = queue.deliveryCount(item.task_id);
    const message = errorMessage(error);

    if (deliveries < config.maxDeliveries) {
      log.warn("work item crashed, redelivering", {
        task: item.task_id,
        instance: item.instance_id,
        deliveries,
        error: message,
      });
      queue.release(item.task_id);
      return;
    }

    log.error("work item crashed, giving up", {
      task: item.task_id,
      instance: item.instance_id,
      deliveries,
      error: message,
    });
    try {
      this.reject(item, `work item failed ${deliveries} deliveries: ${message}`);
    } catch (rejectError) {
      // Left unacknowledged: redelivered on the next start.
      log.error("could not record rejected work item", {
        task: item.task_id,
        error: errorMessage(rejectError),
      });
    }
  }
}
