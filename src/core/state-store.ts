import fs from "node:fs";
import path from "node:path";
import type {
  FailureReason,
  InstanceId,
  WorkItem,
  WorkflowInstanceState,
} from "./types";
import { isTerminalState } from "./types";

export interface RejectedItem {
  item: WorkItem;
  reason: FailureReason;
  rejected_at: string;
}

export interface SideError {
  instance_id: string;
  operation: string;
  error: string;
  at: string;
}

/**
 * Durable instance snapshots under `<root>/workflows/<id>/state.json`.
 * Terminal instances stay readable for status queries and are mirrored
 * into `<root>/archive/`.
 */
export class InstanceStore {
  constructor(private readonly rootDir: string) {}

  ensure(): void {
    fs.mkdirSync(path.join(this.rootDir, "workflows"), { recursive: true });
    fs.mkdirSync(path.join(this.rootDir, "archive"), { recursive: true });
    fs.mkdirSync(path.join(this.rootDir, "rejected"), { recursive: true });
    fs.mkdirSync(path.join(this.rootDir, "runtime"), { recursive: true });
  }

  get root(): string {
    return this.rootDir;
  }

  instanceDir(instanceId: InstanceId): string {
    return path.join(this.rootDir, "workflows", instanceId);
  }

  statePath(instanceId: InstanceId): string {
    return path.join(this.instanceDir(instanceId), "state.json");
  }

  saveInstance(state: WorkflowInstanceState): void {
    const dir = this.instanceDir(state.instance_id);
    fs.mkdirSync(dir, { recursive: true });
    const file = this.statePath(state.instance_id);
    const tmp = `${file}.tmp`;
    fs.writeFileSync(tmp, JSON.stringify(state, null, 2));
    fs.renameSync(tmp, file);

    if (isTerminalState(state.current_state)) {
      const archiveDir = path.join(this.rootDir, "archive");
      fs.mkdirSync(archiveDir, { recursive: true });
      fs.writeFileSync(
        path.join(archiveDir, `${state.instance_id}.json`),
        JSON.stringify(state, null, 2),
      );
    }
  }

  loadInstance(instanceId: InstanceId): WorkflowInstanceState | null {
    const file = this.statePath(instanceId);
    if (!fs.existsSync(file)) {
      return null;
    }

    return JSON.parse(fs.readFileSync(file, "utf8")) as WorkflowInstanceState;
  }

  listInstances(): WorkflowInstanceState[] {
    const workflowsDir = path.join(this.rootDir, "workflows");
    if (!fs.existsSync(workflowsDir)) {
      return [];
    }

    return fs
      .readdirSync(workflowsDir)
      .flatMap((entry) => {
        const stateFile = path.join(workflowsDir, entry, "state.json");
        if (!fs.existsSync(stateFile)) {
          return [];
        }
        return [
          JSON.parse(
            fs.readFileSync(stateFile, "utf8"),
          ) as WorkflowInstanceState,
        ];
      })
      .sort((a, b) => a.created_at.localeCompare(b.created_at));
  }

  saveRejected(item: WorkItem, reason: FailureReason): RejectedItem {
    const rejected: RejectedItem = {
      item,
      reason,
      rejected_at: new Date().toISOString(),
    };
    const dir = path.join(this.rootDir, "rejected");
    fs.mkdirSync(dir, { recursive: true });
    fs.writeFileSync(
      path.join(dir, `${item.task_id}.json`),
      JSON.stringify(rejected, null, 2),
    );
    return rejected;
  }

  loadRejected(taskId: string): RejectedItem | null {
    const file = path.join(this.rootDir, "rejected", `${taskId}.json`);
    if (!fs.existsSync(file)) {
      return null;
    }
    return JSON.parse(fs.readFileSync(file, "utf8")) as RejectedItem;
  }

  appendSideError(entry: Omit<SideError, "at">): void {
    const file = path.join(this.rootDir, "runtime", "side-errors.jsonl");
    fs.mkdirSync(path.dirname(file), { recursive: true });
    const line: SideError = { ...entry, at: new Date().toISOString() };
    fs.appendFileSync(file, `${JSON.stringify(line)}\n`);
  }

  readSideErrors(): SideError[] {
    const file = path.join(this.rootDir, "runtime", "side-errors.jsonl");
    if (!fs.existsSync(file)) {
      return [];
    }
    return fs
      .readFileSync(file, "utf8")
      .split("\n")
      .filter(Boolean)
      .map((line) => JSON.parse(line) as SideError);
  }
}
