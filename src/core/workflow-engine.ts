import { type WorkerConfig, policyForState } from "../config/worker-config";
import { type FieldSpec, computeCoverage } from "../knowledge/coverage";
import { emptyRecord } from "../knowledge/knowledge-gateway";
import { ReservedBudget } from "../research/budget";
import type { ActivityPool } from "../runtime/activity-pool";
import { type ActivityRunner, InstanceActivityRunner } from "./activity";
import {
  CancelledError,
  ValidationError,
  WorkflowError,
  classifyError,
} from "./errors";
import { createModuleLogger } from "./logger";
import type { InstanceStore } from "./state-store";
import type {
  InstanceId,
  ResearchFinding,
  TerminalState,
  WorkItem,
  WorkflowInstanceState,
  WorkflowKind,
  WorkflowStateName,
} from "./types";
import {
  CRAWL_FAILED,
  asInstanceId,
  asSubjectId,
  isTerminalState,
  isUsableFinding,
} from "./types";
import {
  type KindContext,
  type KindRegistry,
  type KindStrategy,
  subjectSlug,
} from "./workflow-definition";

const log = createModuleLogger("engine");

export const MAX_SUBJECT_NAME_LENGTH = 200;

type ActiveState = Exclude<WorkflowStateName, TerminalState>;

type StateHandler = (
  working: WorkflowInstanceState,
  strategy: KindStrategy,
  activities: ActivityRunner,
  signal: AbortSignal,
) => Promise<WorkflowStateName>;

export interface CancelOutcome {
  instance_id: string;
  status: "cancelling" | "cancelled" | "already-terminal" | "not-found";
}

const addDegraded = (state: WorkflowInstanceState, dependency: string): void => {
  if (!state.degraded.includes(dependency)) {
    state.degraded.push(dependency);
  }
};

const mergeFindingRecord = (
  findings: Record<string, ResearchFinding>,
  finding: ResearchFinding,
): void => {
  const existing = findings[finding.url];
  if (!existing || finding.relevance > existing.relevance) {
    findings[finding.url] = finding;
  }
};

const usableFindings = (state: WorkflowInstanceState): ResearchFinding[] =>
  Object.values(state.findings)
    .filter(isUsableFinding)
    .sort(
      (a, b) =>
        b.relevance - a.relevance || (a.url < b.url ? -1 : a.url > b.url ? 1 : 0),
    );

/**
 * Drives instances through Created → KnowledgeCheck → Researching →
 * Synthesizing → Generating → Persisting → Completed. Each state runs on a
 * copy of the instance; the copy is committed when the state finishes
 * (or fails) and discarded when the instance was cancelled meanwhile.
 */
export class WorkflowEngine {
  private readonly controllers = new Map<InstanceId, AbortController>();
  private readonly handlers: Record<ActiveState, StateHandler>;

  constructor(
    private readonly config: WorkerConfig,
    private readonly pool: ActivityPool,
    private readonly store: InstanceStore,
    private readonly kinds: KindRegistry,
  ) {
    this.handlers = {
      Created: (working) => this.validateSubject(working),
      KnowledgeCheck: (working, strategy, activities) =>
        this.checkKnowledge(working, strategy, activities),
      Researching: (working, strategy, activities, signal) =>
        this.research(working, strategy, activities, signal),
      Synthesizing: (working, strategy, activities) =>
        this.synthesize(working, strategy, activities),
      Generating: (working, strategy, activities, signal) =>
        this.generate(working, strategy, activities, signal),
      Persisting: (working, strategy, activities, signal) =>
        this.persist(working, strategy, activities, signal),
    };
  }

  get(instanceId: string): WorkflowInstanceState | null {
    return this.store.loadInstance(asInstanceId(instanceId));
  }

  list(): WorkflowInstanceState[] {
    return this.store.listInstances();
  }

  get running(): InstanceId[] {
    return [...this.controllers.keys()];
  }

  /** Creates the instance for a work item, or returns the one already stored. */
  create(item: WorkItem, kind: WorkflowKind): WorkflowInstanceState {
    const existing = this.store.loadInstance(item.instance_id);
    if (existing) {
      return existing;
    }

    const now = new Date().toISOString();
    const name = item.subject.name.trim();
    const state: WorkflowInstanceState = {
      instance_id: item.instance_id,
      kind,
      subject: {
        id: asSubjectId(`${kind.toLowerCase()}:${subjectSlug(name)}`),
        name,
        kind,
        created_at: now,
        hints: { ...item.subject.hints },
      },
      current_state: "Created",
      history: [{ state: "Created", entered_at: now }],
      knowledge: null,
      findings: {},
      coverage: 0,
      ceiling_reached: false,
      cost_micros: 0,
      retries: {},
      activities: {},
      draft: null,
      result: null,
      failure: null,
      degraded: [],
      created_at: now,
      updated_at: now,
    };

    this.store.saveInstance(state);
    log.info("instance created", {
      instance: state.instance_id,
      kind,
      subject: state.subject.id,
    });
    return state;
  }

  /**
   * Requests cancellation. A running instance stops at its next state
   * boundary; an idle one is moved to Cancelled at once.
   */
  cancel(instanceId: string): CancelOutcome {
    const id = asInstanceId(instanceId);
    const controller = this.controllers.get(id);
    if (controller) {
      controller.abort(new CancelledError(id));
      return { instance_id: id, status: "cancelling" };
    }

    const state = this.store.loadInstance(id);
    if (!state) {
      return { instance_id: id, status: "not-found" };
    }
    if (isTerminalState(state.current_state)) {
      return { instance_id: id, status: "already-terminal" };
    }
    this.transition(state, "Cancelled", "cancel requested");
    return { instance_id: id, status: "cancelled" };
  }

  /** Runs an instance from its current state until it is terminal. */
  async run(instanceId: InstanceId): Promise<WorkflowInstanceState> {
    let state = this.store.loadInstance(instanceId);
    if (!state) {
      throw new Error(`Unknown workflow instance: ${instanceId}`);
    }
    const strategy = this.kinds.get(state.kind);
    if (!strategy) {
      throw new ValidationError(`No strategy registered for kind ${state.kind}`);
    }

    const controller = new AbortController();
    this.controllers.set(instanceId, controller);
    try {
      while (!isTerminalState(state.current_state)) {
        if (controller.signal.aborted) {
          state = this.transition(state, "Cancelled", "cancel requested");
          break;
        }
        state = await this.step(state, strategy, controller.signal);
      }
    } finally {
      this.controllers.delete(instanceId);
    }

    log.info("instance finished", {
      instance: state.instance_id,
      state: state.current_state,
      cost_micros: state.cost_micros,
      ...(state.failure ? { failure: state.failure.cause } : {}),
    });
    return state;
  }

  private async step(
    committed: WorkflowInstanceState,
    strategy: KindStrategy,
    signal: AbortSignal,
  ): Promise<WorkflowInstanceState> {
    const current = committed.current_state;
    if (isTerminalState(current)) {
      return committed;
    }

    const working = structuredClone(committed);
    const activities = new InstanceActivityRunner(
      working,
      policyForState(this.config, current),
      signal,
      {
        ceilingMicros: this.config.costCeilingMicros,
        onAttemptFailed: (name, error) => {
          const entry = working.history[working.history.length - 1];
          if (entry) {
            entry.last_failure = `${name}: ${error.message}`;
          }
          log.warn("activity attempt failed", {
            instance: working.instance_id,
            state: current,
            activity: name,
            kind: error.kind,
            error: error.message,
          });
        },
        onCheckpoint: () => this.checkpoint(committed, working),
      },
    );

    try {
      const next = await this.handlers[current](
        working,
        strategy,
        activities,
        signal,
      );
      if (signal.aborted) {
        return this.transition(committed, "Cancelled", "cancel requested");
      }
      return this.transition(working, next);
    } catch (error) {
      if (signal.aborted || error instanceof CancelledError) {
        return this.transition(committed, "Cancelled", "cancel requested");
      }
      const failure: WorkflowError = classifyError(error);
      working.failure = {
        kind: failure.kind,
        cause: failure.message,
        state: current,
      };
      return this.transition(working, "Failed", failure.message);
    }
  }

  /**
   * Persists completed activities and spent cost ahead of the transition,
   * leaving the rest of the committed state untouched.
   */
  private checkpoint(
    committed: WorkflowInstanceState,
    working: WorkflowInstanceState,
  ): void {
    committed.activities = structuredClone(working.activities);
    committed.retries = { ...working.retries };
    committed.cost_micros = working.cost_micros;
    committed.updated_at = new Date().toISOString();
    this.store.saveInstance(committed);
  }

  private transition(
    state: WorkflowInstanceState,
    next: WorkflowStateName,
    result?: string,
  ): WorkflowInstanceState {
    const now = new Date().toISOString();
    const entry = state.history[state.history.length - 1];
    if (entry) {
      entry.exited_at = now;
      entry.result = result ?? next;
    }
    const from = state.current_state;
    state.history.push({ state: next, entered_at: now });
    state.current_state = next;
    state.updated_at = now;
    this.store.saveInstance(state);

    log.debug("state transition", {
      instance: state.instance_id,
      from,
      to: next,
    });
    return state;
  }

  private kindContext(
    working: WorkflowInstanceState,
    strategy: KindStrategy,
    activities: ActivityRunner,
    signal: AbortSignal,
  ): KindContext {
    return {
      instanceId: working.instance_id,
      subject: working.subject,
      knowledge: working.knowledge ?? emptyRecord(working.subject, "miss"),
      findings: usableFindings(working),
      coverage: working.coverage,
      partial: working.coverage < this.config.coverageThreshold,
      pool: this.pool,
      config: this.config,
      activities,
      reserveMicros: strategy.persistCostMicros(this.config),
      signal,
    };
  }

  private async validateSubject(
    working: WorkflowInstanceState,
  ): Promise<WorkflowStateName> {
    const name = working.subject.name;
    if (name.length === 0) {
      throw new ValidationError("subject name is empty");
    }
    if (name.length > MAX_SUBJECT_NAME_LENGTH) {
      throw new ValidationError(
        `subject name exceeds ${MAX_SUBJECT_NAME_LENGTH} characters`,
      );
    }
    if (!this.kinds.has(working.kind)) {
      throw new ValidationError(`unknown workflow kind: ${working.kind}`);
    }
    return "KnowledgeCheck";
  }

  private async checkKnowledge(
    working: WorkflowInstanceState,
    strategy: KindStrategy,
    activities: ActivityRunner,
  ): Promise<WorkflowStateName> {
    const subject = working.subject;
    const record = await activities.run(
      "knowledge-lookup",
      { subject_id: subject.id },
      async (activitySignal) => ({
        value: await this.pool.knowledge.lookup(
          subject,
          strategy.fields,
          activitySignal,
        ),
      }),
    );

    working.knowledge = record;
    working.coverage = record.coverage;
    if (record.origin === "unavailable") {
      addDegraded(working, "knowledge-store");
    }

    if (record.coverage >= this.config.coverageThreshold) {
      log.info("knowledge cache sufficient, skipping research", {
        instance: working.instance_id,
        coverage: record.coverage,
      });
      return "Synthesizing";
    }
    return "Researching";
  }

  private async research(
    working: WorkflowInstanceState,
    strategy: KindStrategy,
    activities: ActivityRunner,
    signal: AbortSignal,
  ): Promise<WorkflowStateName> {
    const subject = working.subject;
    const queries = strategy.buildQueries(subject);
    const budget = new ReservedBudget(
      activities.budget,
      this.config.generationReserveMicros + strategy.persistCostMicros(this.config),
    );
    const escalationQuery = strategy.escalationQuery;

    const result = await activities.run(
      "research-funnel",
      {
        subject_id: subject.id,
        queries,
        prior_coverage: working.knowledge?.coverage ?? 0,
      },
      async (activitySignal) => ({
        value: await this.pool.funnel.run(
          {
            instanceId: working.instance_id,
            subject,
            queries,
            fields: strategy.fields,
            prior: working.knowledge,
            ...(escalationQuery
              ? {
                  escalationQuery: (missing: readonly FieldSpec[]) =>
                    escalationQuery(subject, missing),
                }
              : {}),
          },
          budget,
          activitySignal,
        ),
      }),
    );

    if (signal.aborted) {
      throw new CancelledError(working.instance_id);
    }

    for (const finding of result.findings) {
      mergeFindingRecord(working.findings, finding);
    }
    working.ceiling_reached = working.ceiling_reached || result.ceilingReached;
    for (const dependency of result.degraded) {
      addDegraded(working, dependency);
    }
    working.coverage = computeCoverage(
      working.knowledge,
      Object.values(working.findings),
      strategy.fields,
    );
    return "Synthesizing";
  }

  private async synthesize(
    working: WorkflowInstanceState,
    strategy: KindStrategy,
    activities: ActivityRunner,
  ): Promise<WorkflowStateName> {
    const subject = working.subject;
    const findings = Object.values(working.findings);
    const priorCoverage = working.knowledge?.coverage ?? 0;

    if (working.ceiling_reached && findings.length === 0 && priorCoverage === 0) {
      throw new ValidationError("cost ceiling breached before any useful result");
    }

    const prior = working.knowledge ?? emptyRecord(subject, "miss");
    const enriched = this.pool.knowledge.enrich(prior, findings, strategy.fields);
    working.knowledge = enriched;
    working.coverage = enriched.coverage;

    await activities.run(
      "knowledge-deposit",
      {
        subject_id: subject.id,
        coverage: enriched.coverage,
        updated_at: enriched.updated_at,
        entities: Object.keys(enriched.entities).sort(),
      },
      async () => {
        this.pool.knowledge.deposit(subject, enriched, {
          instanceId: working.instance_id,
        });
        return { value: true };
      },
    );

    return "Generating";
  }

  private async generate(
    working: WorkflowInstanceState,
    strategy: KindStrategy,
    activities: ActivityRunner,
    signal: AbortSignal,
  ): Promise<WorkflowStateName> {
    working.draft = await strategy.generateDraft(
      this.kindContext(working, strategy, activities, signal),
    );
    return "Persisting";
  }

  private async persist(
    working: WorkflowInstanceState,
    strategy: KindStrategy,
    activities: ActivityRunner,
    signal: AbortSignal,
  ): Promise<WorkflowStateName> {
    const ctx = this.kindContext(working, strategy, activities, signal);
    const outcome = await strategy.persist(working.draft, ctx);
    for (const dependency of outcome.degraded ?? []) {
      addDegraded(working, dependency);
    }
    const all = Object.values(working.findings);

    working.result = {
      kind: working.kind,
      record_id: outcome.record_id,
      slug: outcome.slug,
      coverage: working.coverage,
      partial: ctx.partial,
      degraded: [...working.degraded],
      cost_micros: working.cost_micros,
      findings: {
        total: all.length,
        usable: ctx.findings.length,
        failed: all.filter((finding) => CRAWL_FAILED in finding.facts).length,
      },
      assets: outcome.assets,
    };
    return "Completed";
  }
}
