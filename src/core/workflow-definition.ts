import { createHash } from "node:crypto";
import type { WorkerConfig } from "../config/worker-config";
import type { FieldSpec } from "../knowledge/coverage";
import type { ActivityPool } from "../runtime/activity-pool";
import type { ActivityRunner } from "./activity";
import { ValidationError } from "./errors";
import type {
  InstanceId,
  KnowledgeRecord,
  ResearchFinding,
  Subject,
  WorkflowKind,
} from "./types";

/** Everything a kind's generation and persistence steps may read. */
export interface KindContext {
  instanceId: InstanceId;
  subject: Subject;
  knowledge: KnowledgeRecord;
  /** Usable findings, most relevant first. */
  findings: readonly ResearchFinding[];
  coverage: number;
  partial: boolean;
  pool: ActivityPool;
  config: WorkerConfig;
  activities: ActivityRunner;
  /** Spend generation must leave for persistence. */
  reserveMicros: number;
  signal: AbortSignal;
}

export interface PersistOutcome {
  record_id: string;
  slug: string;
  assets: string[];
  /** Optional dependencies that failed without failing the instance. */
  degraded?: string[];
}

export interface WorkflowKindDefinition<TDraft> {
  kind: WorkflowKind;
  fields: readonly FieldSpec[];
  buildQueries(subject: Subject): string[];
  escalationQuery?(subject: Subject, missing: readonly FieldSpec[]): string;
  isDraft(value: unknown): value is TDraft;
  /** Most that persisting one draft can be charged. */
  persistCostMicros?(config: WorkerConfig): number;
  generateDraft(ctx: KindContext): Promise<TDraft>;
  persist(draft: TDraft, ctx: KindContext): Promise<PersistOutcome>;
}

/**
 * The per-kind strategy as the engine sees it. The draft type is erased:
 * drafts live in the persisted instance as plain JSON and are checked
 * again before persisting.
 */
export interface KindStrategy {
  kind: WorkflowKind;
  fields: readonly FieldSpec[];
  buildQueries(subject: Subject): string[];
  escalationQuery?(subject: Subject, missing: readonly FieldSpec[]): string;
  persistCostMicros(config: WorkerConfig): number;
  generateDraft(ctx: KindContext): Promise<unknown>;
  persist(draft: unknown, ctx: KindContext): Promise<PersistOutcome>;
}

export const defineWorkflowKind = <TDraft>(
  definition: WorkflowKindDefinition<TDraft>,
): KindStrategy => ({
  kind: definition.kind,
  fields: definition.fields,
  buildQueries: (subject) => definition.buildQueries(subject),
  escalationQuery: definition.escalationQuery?.bind(definition),
  persistCostMicros: (config) => definition.persistCostMicros?.(config) ?? 0,
  generateDraft: (ctx) => definition.generateDraft(ctx),
  persist: async (draft, ctx) => {
    if (!definition.isDraft(draft)) {
      throw new ValidationError(`${definition.kind} draft is missing or malformed`);
    }
    return definition.persist(draft, ctx);
  },
});

export type KindRegistry = ReadonlyMap<WorkflowKind, KindStrategy>;

export const createKindRegistry = (
  strategies: readonly KindStrategy[],
): KindRegistry => new Map(strategies.map((strategy) => [strategy.kind, strategy]));

export const slugify = (value: string): string =>
  value
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "")
    .slice(0, 80)
    .replace(/-+$/g, "");

/**
 * URL-safe key for a subject name. Names with no Latin letters or digits
 * slugify to nothing, so they fall back to a hash of the normalized name.
 */
export const subjectSlug = (name: string): string => {
  const slug = slugify(name);
  if (slug.length > 0) {
    return slug;
  }
  const digest = createHash("sha256")
    .update(name.normalize("NFKC").toLowerCase())
    .digest("hex")
    .slice(0, 12);
  return `s-${digest}`;
};
