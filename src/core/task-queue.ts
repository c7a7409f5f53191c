import fs from "node:fs";
import http from "node:http";
import path from "node:path";
import { type Static, Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { nanoid } from "nanoid";
import { createModuleLogger } from "./logger";
import type { TaskId, WorkItem } from "./types";
import { asInstanceId, asTaskId } from "./types";

const log = createModuleLogger("task-queue");

interface PendingWaiter {
  resolve: (item: WorkItem | null) => void;
  timeout: NodeJS.Timeout;
}

export const WorkItemSchema = Type.Object({
  task_id: Type.String({ minLength: 1 }),
  workflow_kind: Type.String(),
  instance_id: Type.String({ minLength: 1 }),
  subject: Type.Object({
    name: Type.String(),
    hints: Type.Optional(Type.Record(Type.String(), Type.String())),
  }),
  enqueued_at: Type.String(),
});

const WalEventSchema = Type.Union([
  Type.Object({ type: Type.Literal("enqueue"), item: WorkItemSchema }),
  Type.Object({ type: Type.Literal("ack"), taskId: Type.String({ minLength: 1 }) }),
]);

type WalEvent =
  | { type: "enqueue"; item: WorkItem }
  | { type: "ack"; taskId: TaskId };

const toWalEvent = (event: Static<typeof WalEventSchema>): WalEvent =>
  event.type === "ack"
    ? { type: "ack", taskId: asTaskId(event.taskId) }
    : {
        type: "enqueue",
        item: {
          ...event.item,
          task_id: asTaskId(event.item.task_id),
          instance_id: asInstanceId(event.item.instance_id),
        },
      };

const parseWalLine = (line: string): WalEvent | null => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return null;
  }
  return Value.Check(WalEventSchema, parsed) ? toWalEvent(parsed) : null;
};

export interface EnqueueInput {
  workflow_kind: string;
  subject: { name: string; hints?: Record<string, string> };
  task_id?: string;
  instance_id?: string;
}

export interface ControlHandlers {
  status: () => unknown;
  instanceStatus: (instanceId: string) => unknown;
  cancel: (instanceId: string) => unknown;
}

export const buildWorkItem = (input: EnqueueInput): WorkItem => {
  const taskId = asTaskId(input.task_id ?? nanoid());
  return {
    task_id: taskId,
    workflow_kind: input.workflow_kind,
    instance_id: asInstanceId(input.instance_id ?? `wf-${taskId}`),
    subject: {
      name: input.subject.name,
      ...(input.subject.hints ? { hints: input.subject.hints } : {}),
    },
    enqueued_at: new Date().toISOString(),
  };
};

/**
 * Named durable task queue. Items are journaled to a write-ahead log on
 * enqueue and only dropped from it on ack, so unacknowledged work is
 * redelivered after a restart.
 */
export class TaskQueue {
  private items = new Map<TaskId, WorkItem>();
  private pending: TaskId[] = [];
  private inFlight = new Set<TaskId>();
  private deliveries = new Map<TaskId, number>();
  private waiters: PendingWaiter[] = [];
  private server?: http.Server;

  constructor(
    readonly name: string,
    private readonly walPath: string,
  ) {
    this.replayWal();
  }

  /** Appends an item to a queue's log without a running worker. */
  static appendOffline(walPath: string, item: WorkItem): void {
    fs.mkdirSync(path.dirname(walPath), { recursive: true });
    const event: WalEvent = { type: "enqueue", item };
    fs.appendFileSync(walPath, `${JSON.stringify(event)}\n`);
  }

  get depth(): number {
    return this.pending.length;
  }

  get inFlightCount(): number {
    return this.inFlight.size;
  }

  enqueue(input: EnqueueInput): WorkItem {
    const item = buildWorkItem(input);
    const existing = this.items.get(item.task_id);
    if (existing) {
      return existing;
    }

    this.items.set(item.task_id, item);
    this.pending.push(item.task_id);
    this.appendWal({ type: "enqueue", item });
    this.deliverIfWaiting();
    return item;
  }

  /** Non-blocking dequeue. */
  poll(): WorkItem | null {
    return this.take();
  }

  async dequeue(timeoutMs: number): Promise<WorkItem | null> {
    const next = this.take();
    if (next) {
      return next;
    }

    return new Promise<WorkItem | null>((resolve) => {
      const timeout = setTimeout(() => {
        this.waiters = this.waiters.filter((entry) => entry.resolve !== resolve);
        resolve(null);
      }, timeoutMs);
      this.waiters.push({ resolve, timeout });
    });
  }

  ack(taskId: TaskId, persist = true): void {
    if (!this.items.has(taskId)) {
      return;
    }

    this.items.delete(taskId);
    this.inFlight.delete(taskId);
    this.deliveries.delete(taskId);
    this.pending = this.pending.filter((id) => id !== taskId);
    if (persist) {
      this.appendWal({ type: "ack", taskId });
    }
  }

  /** Times an item was handed out by this process. */
  deliveryCount(taskId: TaskId): number {
    return this.deliveries.get(taskId) ?? 0;
  }

  /** Returns an in-flight item to the front of the queue. */
  release(taskId: TaskId): void {
    if (!this.inFlight.delete(taskId)) {
      return;
    }
    this.pending.unshift(taskId);
    this.deliverIfWaiting();
  }

  /** Wakes every waiting consumer with no item. */
  interrupt(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      clearTimeout(waiter.timeout);
      waiter.resolve(null);
    }
  }

  startControlSocket(
    socketPath: string,
    handlers: ControlHandlers,
  ): Promise<void> {
    fs.mkdirSync(path.dirname(socketPath), { recursive: true });
    fs.rmSync(socketPath, { force: true });

    this.server = http.createServer(async (req, res) => {
      try {
        const url = req.url ?? "/";
        const method = req.method ?? "GET";

        if (method === "POST" && url === "/tasks") {
          const body = await readBody(req);
          const item = this.enqueue(parseEnqueueInput(body));
          respondJson(res, 200, {
            task_id: item.task_id,
            instance_id: item.instance_id,
            status: "queued",
          });
          return;
        }

        if (method === "POST" && url.startsWith("/cancel/")) {
          const instanceId = decodeURIComponent(url.slice("/cancel/".length));
          respondJson(res, 200, handlers.cancel(instanceId));
          return;
        }

        if (method === "GET" && url === "/status") {
          respondJson(res, 200, handlers.status());
          return;
        }

        if (method === "GET" && url.startsWith("/status/")) {
          const instanceId = decodeURIComponent(url.slice("/status/".length));
          const status = handlers.instanceStatus(instanceId);
          respondJson(res, status === null ? 404 : 200, status ?? {
            error: "not_found",
          });
          return;
        }

        respondJson(res, 404, { error: "not_found" });
      } catch (error) {
        const message =
          error instanceof Error ? error.message : "unknown error";
        respondJson(res, 400, { error: message });
      }
    });

    const server = this.server;
    return new Promise((resolve) => {
      server.listen(socketPath, () => {
        fs.chmodSync(socketPath, 0o600);
        log.info("control socket listening", { socketPath });
        resolve();
      });
    });
  }

  async stopControlSocket(socketPath: string): Promise<void> {
    if (!this.server) {
      return;
    }

    const server = this.server;
    this.server = undefined;
    await new Promise<void>((resolve, reject) => {
      server.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    });

    fs.rmSync(socketPath, { force: true });
  }

  private take(): WorkItem | null {
    while (this.pending.length > 0) {
      const id = this.pending.shift();
      if (id === undefined) {
        break;
      }
      const item = this.items.get(id);
      if (item) {
        this.inFlight.add(id);
        this.deliveries.set(id, (this.deliveries.get(id) ?? 0) + 1);
        return item;
      }
    }
    return null;
  }

  private deliverIfWaiting(): void {
    while (this.waiters.length > 0 && this.pending.length > 0) {
      const waiter = this.waiters.shift();
      const item = this.take();
      if (!waiter || !item) {
        break;
      }
      clearTimeout(waiter.timeout);
      waiter.resolve(item);
    }
  }

  private appendWal(event: WalEvent): void {
    fs.mkdirSync(path.dirname(this.walPath), { recursive: true });
    fs.appendFileSync(this.walPath, `${JSON.stringify(event)}\n`);
  }

  private replayWal(): void {
    if (!fs.existsSync(this.walPath)) {
      return;
    }

    const raw = fs.readFileSync(this.walPath, "utf8");
    const lines = raw.split("\n").filter(Boolean);
    let skipped = 0;
    for (const line of lines) {
      const event = parseWalLine(line);
      if (!event) {
        skipped += 1;
        continue;
      }
      switch (event.type) {
        case "enqueue":
          if (!this.items.has(event.item.task_id)) {
            this.items.set(event.item.task_id, event.item);
            this.pending.push(event.item.task_id);
          }
          break;
        case "ack":
          this.ack(event.taskId, false);
          break;
      }
    }

    if (skipped > 0) {
      log.warn("skipped unreadable queue log entries", {
        queue: this.name,
        skipped,
      });
    }
    // A torn final write must not swallow the next append.
    if (raw.length > 0 && !raw.endsWith("\n")) {
      fs.appendFileSync(this.walPath, "\n");
    }

    if (this.pending.length > 0) {
      log.info("replayed unacknowledged work items", {
        queue: this.name,
        count: this.pending.length,
      });
    }
  }
}

const readBody = async (req: http.IncomingMessage): Promise<unknown> => {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(Buffer.from(chunk));
  }
  const raw = Buffer.concat(chunks).toString("utf8").trim();
  if (!raw) {
    return {};
  }
  return JSON.parse(raw) as unknown;
};

const respondJson = (
  res: http.ServerResponse,
  status: number,
  payload: unknown,
): void => {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(payload));
};

const isStringRecord = (value: unknown): value is Record<string, string> =>
  typeof value === "object" &&
  value !== null &&
  !Array.isArray(value) &&
  Object.values(value).every((entry) => typeof entry === "string");

export const parseEnqueueInput = (body: unknown): EnqueueInput => {
  if (typeof body !== "object" || body === null) {
    throw new Error("invalid task body");
  }
  const kind = "workflow_kind" in body ? body.workflow_kind : undefined;
  const subject = "subject" in body ? body.subject : undefined;
  if (typeof kind !== "string" || typeof subject !== "object" || !subject) {
    throw new Error("invalid task body");
  }
  const name = "name" in subject ? subject.name : undefined;
  if (typeof name !== "string") {
    throw new Error("invalid task body: subject.name is required");
  }
  const hints = "hints" in subject ? subject.hints : undefined;
  const taskId = "task_id" in body ? body.task_id : undefined;

  return {
    workflow_kind: kind,
    subject: {
      name,
      ...(isStringRecord(hints) ? { hints } : {}),
    },
    ...(typeof taskId === "string" ? { task_id: taskId } : {}),
  };
};
