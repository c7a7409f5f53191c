#!/usr/bin/env node
/**
 * Content worker CLI
 *
 * Runs the unified worker and talks to it over its control socket.
 */

import http from "node:http";
import path from "node:path";
import "dotenv/config";
import { Command } from "commander";
import { loadWorkerConfig, type WorkerConfig } from "./config/worker-config";
import { errorMessage } from "./core/errors";
import { attachLogFile, createModuleLogger } from "./core/logger";
import { InstanceStore } from "./core/state-store";
import { asInstanceId } from "./core/types";
import { buildWorkItem, TaskQueue } from "./core/task-queue";
import { buildActivityPool, closeActivityPool } from "./runtime/activity-pool";
import { UnifiedWorker } from "./runtime/worker";
import { builtInKinds } from "./workflows";

const log = createModuleLogger("cli");

interface RuntimePaths {
  stateDir: string;
  walPath: string;
  socketPath: string;
}

const runtimePaths = (config: WorkerConfig, cwd: string): RuntimePaths => {
  const stateDir = path.resolve(cwd, config.stateDir);
  return {
    stateDir,
    walPath: path.join(stateDir, "runtime", `${config.taskQueue}.wal`),
    socketPath: path.join(stateDir, "runtime", "worker.sock"),
  };
};

const requestControl = (
  socketPath: string,
  method: "GET" | "POST",
  route: string,
  body?: unknown,
): Promise<{ status: number; payload: unknown }> =>
  new Promise((resolve, reject) => {
    const req = http.request(
      { socketPath, method, path: route, headers: { "Content-Type": "application/json" } },
      (res) => {
        const chunks: Buffer[] = [];
        res.on("data", (chunk: Buffer) => chunks.push(chunk));
        res.on("end", () => {
          try {
            const raw = Buffer.concat(chunks).toString("utf8");
            resolve({
              status: res.statusCode ?? 0,
              payload: raw ? (JSON.parse(raw) as unknown) : null,
            });
          } catch (error) {
            reject(error);
          }
        });
      },
    );
    req.on("error", reject);
    if (body !== undefined) {
      req.write(JSON.stringify(body));
    }
    req.end();
  });

const printJson = (payload: unknown): void => {
  console.log(JSON.stringify(payload, null, 2));
};

const fail = (message: string, error?: unknown): never => {
  console.error(error === undefined ? message : `${message}: ${errorMessage(error)}`);
  process.exit(1);
};

const collectHint = (
  value: string,
  previous: Record<string, string>,
): Record<string, string> => {
  const separator = value.indexOf("=");
  if (separator <= 0) {
    throw new Error(`hint must look like key=value: ${value}`);
  }
  return { ...previous, [value.slice(0, separator)]: value.slice(separator + 1) };
};

const workerCommand = new Command("worker")
  .description("Run the unified worker until interrupted")
  .option("--drain", "Process the queued items, then exit")
  .action(async (options: { drain?: boolean }) => {
    const cwd = process.cwd();
    const config = await loadWorkerConfig(cwd);
    if (config.logFile) {
      attachLogFile(path.resolve(cwd, config.logFile));
    }
    const paths = runtimePaths(config, cwd);
    const pool = buildActivityPool(config, cwd);
    const worker = new UnifiedWorker(
      {
        config,
        pool,
        store: new InstanceStore(paths.stateDir),
        queue: new TaskQueue(config.taskQueue, paths.walPath),
        kinds: builtInKinds(),
      },
      options.drain ? {} : { socketPath: paths.socketPath },
    );

    if (options.drain) {
      await worker.drain();
      await closeActivityPool(pool);
      return;
    }

    await worker.start();
    let stopping = false;
    const shutdown = (signal: NodeJS.Signals): void => {
      if (stopping) {
        return;
      }
      stopping = true;
      log.info("shutting down", { signal });
      worker
        .stop()
        .then(() => closeActivityPool(pool))
        .catch((error: unknown) => {
          log.error("shutdown failed", { error: errorMessage(error) });
          process.exitCode = 1;
        });
    };
    process.on("SIGINT", shutdown);
    process.on("SIGTERM", shutdown);
  });

const enqueueCommand = new Command("enqueue")
  .description("Queue a workflow for a subject")
  .argument("<kind>", "Workflow kind (Company or Article)")
  .argument("<name>", "Subject name")
  .option("-H, --hint <key=value>", "Subject hint, repeatable", collectHint, {})
  .option("-t, --task-id <id>", "Explicit task id")
  .action(
    async (
      kind: string,
      name: string,
      options: { hint: Record<string, string>; taskId?: string },
    ) => {
      const cwd = process.cwd();
      const paths = runtimePaths(await loadWorkerConfig(cwd), cwd);
      const input = {
        workflow_kind: kind,
        subject: {
          name,
          ...(Object.keys(options.hint).length > 0 ? { hints: options.hint } : {}),
        },
        ...(options.taskId ? { task_id: options.taskId } : {}),
      };

      try {
        const { payload } = await requestControl(paths.socketPath, "POST", "/tasks", input);
        printJson(payload);
      } catch {
        const item = buildWorkItem(input);
        TaskQueue.appendOffline(paths.walPath, item);
        printJson({ task_id: item.task_id, instance_id: item.instance_id, status: "queued-offline" });
      }
    },
  );

const cancelCommand = new Command("cancel")
  .description("Cancel a running or queued workflow instance")
  .argument("<instance>", "Workflow instance id")
  .action(async (instance: string) => {
    const cwd = process.cwd();
    const paths = runtimePaths(await loadWorkerConfig(cwd), cwd);
    try {
      const { payload } = await requestControl(
        paths.socketPath,
        "POST",
        `/cancel/${encodeURIComponent(instance)}`,
      );
      printJson(payload);
    } catch (error) {
      fail("worker is not reachable", error);
    }
  });

const statusCommand = new Command("status")
  .description("Show worker status, or one instance's state")
  .argument("[id]", "Instance id or rejected task id")
  .action(async (id: string | undefined) => {
    const cwd = process.cwd();
    const paths = runtimePaths(await loadWorkerConfig(cwd), cwd);
    try {
      const route = id ? `/status/${encodeURIComponent(id)}` : "/status";
      const { status, payload } = await requestControl(paths.socketPath, "GET", route);
      printJson(payload);
      if (status === 404) {
        process.exitCode = 1;
      }
      return;
    } catch (error) {
      if (!id) {
        fail("worker is not reachable", error);
      }
    }

    if (!id) {
      return;
    }
    // Worker offline: read the durable state directly.
    const store = new InstanceStore(paths.stateDir);
    const found = store.loadInstance(asInstanceId(id)) ?? store.loadRejected(id);
    if (!found) {
      fail(`no instance or rejected task named ${id}`);
      return;
    }
    printJson(found);
  });

const program = new Command();

program
  .name("content-worker")
  .description("Research subjects and produce company profiles and articles")
  .version("0.1.0");

program.addCommand(workerCommand);
program.addCommand(enqueueCommand);
program.addCommand(cancelCommand);
program.addCommand(statusCommand);

program.parseAsync().catch((error: unknown) => {
  fail("command failed", error);
});
