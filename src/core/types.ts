export type Brand<T, B extends string> = T & { readonly __brand: B };

export type InstanceId = Brand<string, "InstanceId">;
export type SubjectId = Brand<string, "SubjectId">;
export type TaskId = Brand<string, "TaskId">;

export const asInstanceId = (value: string): InstanceId => value as InstanceId;
export const asSubjectId = (value: string): SubjectId => value as SubjectId;
export const asTaskId = (value: string): TaskId => value as TaskId;

export const WORKFLOW_KINDS = ["Company", "Article"] as const;
export type WorkflowKind = (typeof WORKFLOW_KINDS)[number];

export const isWorkflowKind = (value: unknown): value is WorkflowKind =>
  typeof value === "string" &&
  (WORKFLOW_KINDS as readonly string[]).includes(value);

export type WorkflowStateName =
  | "Created"
  | "KnowledgeCheck"
  | "Researching"
  | "Synthesizing"
  | "Generating"
  | "Persisting"
  | "Completed"
  | "Failed"
  | "Cancelled";

export const WORKFLOW_STATES: readonly WorkflowStateName[] = [
  "Created",
  "KnowledgeCheck",
  "Researching",
  "Synthesizing",
  "Generating",
  "Persisting",
  "Completed",
  "Failed",
  "Cancelled",
];

export const isWorkflowStateName = (
  value: string,
): value is WorkflowStateName =>
  (WORKFLOW_STATES as readonly string[]).includes(value);

export type TerminalState = "Completed" | "Failed" | "Cancelled";

export const TERMINAL_STATES: readonly TerminalState[] = [
  "Completed",
  "Failed",
  "Cancelled",
];

export const isTerminalState = (
  state: WorkflowStateName,
): state is TerminalState =>
  (TERMINAL_STATES as readonly WorkflowStateName[]).includes(state);

export interface Subject {
  id: SubjectId;
  name: string;
  kind: WorkflowKind;
  created_at: string;
  /**
   * Optional research hints. Company: domain, category, jurisdiction.
   * Article: article_type, priority_sources (comma separated).
   */
  hints: Record<string, string>;
}

export interface KnowledgeEntity {
  attributes: Record<string, string>;
  relevance: number;
  source: string;
}

export type KnowledgeOrigin = "store" | "miss" | "unavailable";

export interface KnowledgeRecord {
  subject_id: SubjectId;
  kind: WorkflowKind;
  coverage: number;
  narrative: string;
  entities: Record<string, KnowledgeEntity>;
  updated_at: string;
  origin: KnowledgeOrigin;
}

export type SourceTier = "search-snippet" | "crawled-full";

/** Reserved fact key marking a candidate whose crawl was abandoned. */
export const CRAWL_FAILED = "crawl-failed";

export interface ResearchFinding {
  url: string;
  tier: SourceTier;
  relevance: number;
  rank: number;
  title: string;
  excerpt: string;
  facts: Record<string, string>;
  cost_micros: number;
  retrieved_at: string;
}

export const isUsableFinding = (finding: ResearchFinding): boolean =>
  !(CRAWL_FAILED in finding.facts);

export type FailureKind = "transient" | "validation";

export interface FailureReason {
  kind: FailureKind;
  cause: string;
  state: WorkflowStateName;
}

export interface StateHistoryEntry {
  state: WorkflowStateName;
  entered_at: string;
  exited_at?: string;
  result?: string;
  last_failure?: string;
}

export interface ActivityLedgerEntry {
  name: string;
  attempts: number;
  cost_micros: number;
  completed_at: string;
  value: unknown;
}

export interface WorkflowResult {
  kind: WorkflowKind;
  record_id: string;
  slug: string;
  coverage: number;
  partial: boolean;
  degraded: string[];
  cost_micros: number;
  findings: { total: number; usable: number; failed: number };
  assets: string[];
}

export interface WorkflowInstanceState {
  instance_id: InstanceId;
  kind: WorkflowKind;
  subject: Subject;
  current_state: WorkflowStateName;
  history: StateHistoryEntry[];
  knowledge: KnowledgeRecord | null;
  findings: Record<string, ResearchFinding>;
  coverage: number;
  ceiling_reached: boolean;
  cost_micros: number;
  retries: Record<string, number>;
  activities: Record<string, ActivityLedgerEntry>;
  draft: unknown;
  result: WorkflowResult | null;
  failure: FailureReason | null;
  degraded: string[];
  created_at: string;
  updated_at: string;
}

export interface WorkItem {
  task_id: TaskId;
  workflow_kind: string;
  instance_id: InstanceId;
  subject: {
    name: string;
    hints?: Record<string, string>;
  };
  enqueued_at: string;
}
