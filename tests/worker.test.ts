import path from "node:path";
import { describe, expect, it, vi } from "vitest";
import type { WorkerConfig } from "../src/config/worker-config";
import { InstanceStore } from "../src/core/state-store";
import { TaskQueue, buildWorkItem } from "../src/core/task-queue";
import type { WorkflowInstanceState } from "../src/core/types";
import { UnifiedWorker } from "../src/runtime/worker";
import { COMPANY_FIELDS, builtInKinds } from "../src/workflows";
import {
  FakeGenerator,
  FakeKnowledgeClient,
  type TestPool,
  companyDraft,
  createTestPool,
  entitiesFor,
  tempDir,
  testConfig,
} from "./helpers/fakes";

const cachedKnowledge = (): FakeKnowledgeClient => {
  const client = new FakeKnowledgeClient();
  client.stored = {
    coverage: 1,
    narrative: "",
    entities: entitiesFor(COMPANY_FIELDS.map((field) => field.name)),
    updated_at: "2026-01-05T00:00:00.000Z",
  };
  return client;
};

const setup = (
  config: WorkerConfig = testConfig(),
  parts: Partial<Omit<TestPool, "pool">> = {},
) => {
  const dir = tempDir("content-worker-");
  const walPath = path.join(dir, "runtime", "content-queue.wal");
  const store = new InstanceStore(dir);
  const queue = new TaskQueue("content-queue", walPath);
  const test = createTestPool(config, { knowledgeClient: cachedKnowledge(), ...parts });
  const worker = new UnifiedWorker({
    config,
    pool: test.pool,
    store,
    queue,
    kinds: builtInKinds(),
  });
  return { ...test, dir, walPath, store, queue, worker };
};

/** Instance store whose next `failures` saves throw. */
class FailingStore extends InstanceStore {
  saves = 0;

  constructor(
    root: string,
    private failures: number,
  ) {
    super(root);
  }

  saveInstance(state: WorkflowInstanceState): void {
    this.saves += 1;
    if (this.failures > 0) {
      this.failures -= 1;
      throw new Error("disk full");
    }
    super.saveInstance(state);
  }
}

const crashingWorker = (failures: number) => {
  const dir = tempDir("content-worker-");
  const walPath = path.join(dir, "runtime", "content-queue.wal");
  const config = testConfig();
  const store = new FailingStore(dir, failures);
  const queue = new TaskQueue("content-queue", walPath);
  const { pool } = createTestPool(config, { knowledgeClient: cachedKnowledge() });
  const worker = new UnifiedWorker({ config, pool, store, queue, kinds: builtInKinds() });
  return { walPath, store, queue, worker };
};

const companyTask = (taskId: string, name = `Company ${taskId}`) => ({
  workflow_kind: "Company",
  subject: { name },
  task_id: taskId,
});

describe("UnifiedWorker", () => {
  it("rejects work items of an unknown kind and acknowledges them", async () => {
    const harness = setup();
    harness.queue.enqueue({ ...companyTask("t-podcast"), workflow_kind: "Podcast" });

    await harness.worker.drain();

    expect(harness.store.loadRejected("t-podcast")?.reason).toEqual({
      kind: "validation",
      cause: "unknown workflow kind: Podcast",
      state: "Created",
    });
    expect(harness.worker.instanceStatus("t-podcast")).not.toBeNull();
    expect(new TaskQueue("content-queue", harness.walPath).depth).toBe(0);
  });

  it("runs queued items to completion and acknowledges them", async () => {
    const harness = setup();
    harness.queue.enqueue(companyTask("t-1", "Acme Corp"));

    await harness.worker.drain();

    expect(harness.worker.instanceStatus("wf-t-1")).toMatchObject({
      current_state: "Completed",
      result: { slug: "acme-corp" },
    });
    expect(harness.queue.depth).toBe(0);
    expect(new TaskQueue("content-queue", harness.walPath).depth).toBe(0);
  });

  it("acknowledges redelivered work for an instance that already finished", async () => {
    const harness = setup();
    harness.queue.enqueue(companyTask("t-1", "Acme Corp"));
    await harness.worker.drain();

    const outcome = await harness.worker.process(
      buildWorkItem({ ...companyTask("t-2", "Acme Corp"), instance_id: "wf-t-1" }),
    );

    expect(outcome.status).toBe("already-terminal");
    expect(harness.generator.requests).toHaveLength(1);
  });

  it("never runs more instances than the concurrency ceiling", async () => {
    let active = 0;
    let peak = 0;
    const harness = setup(testConfig({ concurrency: 2 }), {
      generator: new FakeGenerator(async () => {
        active += 1;
        peak = Math.max(peak, active);
        await new Promise((resolve) => setTimeout(resolve, 20));
        active -= 1;
        return {
          text: JSON.stringify(companyDraft),
          inputTokens: 1,
          outputTokens: 1,
          costMicros: 18,
        };
      }),
    });
    for (const id of ["a", "b", "c", "d", "e"]) {
      harness.queue.enqueue(companyTask(id));
    }

    await harness.worker.drain();

    expect(peak).toBe(2);
    expect(harness.generator.requests).toHaveLength(5);
    expect(
      harness.worker.engine.list().map((instance) => instance.current_state),
    ).toEqual(["Completed", "Completed", "Completed", "Completed", "Completed"]);
  });

  it("records failed knowledge deposits as side errors", async () => {
    const knowledgeClient = cachedKnowledge();
    knowledgeClient.writeError = new Error("graph offline");
    const harness = setup(testConfig(), { knowledgeClient });
    harness.queue.enqueue(companyTask("t-dep", "Acme Corp"));

    await harness.worker.drain();

    expect(harness.worker.instanceStatus("wf-t-dep")).toMatchObject({
      current_state: "Completed",
    });
    const sideErrors = harness.store.readSideErrors();
    expect(sideErrors).toHaveLength(1);
    expect(sideErrors[0]).toMatchObject({
      instance_id: "wf-t-dep",
      operation: "knowledge-deposit",
      error: "graph offline",
    });
  });

  it("serves work from the queue until stopped", async () => {
    const dir = tempDir("content-worker-");
    const config = testConfig({ pollIntervalMs: 10 });
    const store = new InstanceStore(dir);
    const queue = new TaskQueue("content-queue", path.join(dir, "runtime", "content-queue.wal"));
    const { pool } = createTestPool(config, { knowledgeClient: cachedKnowledge() });
    const worker = new UnifiedWorker(
      { config, pool, store, queue, kinds: builtInKinds() },
      { socketPath: path.join(dir, "runtime", "worker.sock") },
    );

    await worker.start();
    try {
      queue.enqueue(companyTask("t-live", "Acme Corp"));
      await vi.waitFor(() => {
        expect(worker.instanceStatus("wf-t-live")).toMatchObject({ current_state: "Completed" });
      });
      expect(worker.status()).toMatchObject({
        queue: "content-queue",
        depth: 0,
        concurrency: { limit: 4 },
        instances: { Completed: 1 },
      });
    } finally {
      await worker.stop();
    }
  });

  it("redelivers a work item whose processing threw", async () => {
    const harness = crashingWorker(1);
    harness.queue.enqueue(companyTask("t-1", "Acme Corp"));

    await harness.worker.drain();

    expect(harness.worker.instanceStatus("wf-t-1")).toMatchObject({
      current_state: "Completed",
    });
    expect(harness.queue.inFlightCount).toBe(0);
    expect(new TaskQueue("content-queue", harness.walPath).depth).toBe(0);
  });

  it("rejects a work item that keeps crashing", async () => {
    const harness = crashingWorker(Number.POSITIVE_INFINITY);
    harness.queue.enqueue(companyTask("t-1", "Acme Corp"));

    await harness.worker.drain();

    expect(harness.store.saves).toBe(3);
    expect(harness.store.loadRejected("t-1")?.reason).toEqual({
      kind: "validation",
      cause: "work item failed 3 deliveries: disk full",
      state: "Created",
    });
    expect(harness.queue.inFlightCount).toBe(0);
    expect(new TaskQueue("content-queue", harness.walPath).depth).toBe(0);
  });
});
