import { errorMessage } from "../core/errors";
import { createModuleLogger } from "../core/logger";
import type {
  KnowledgeEntity,
  KnowledgeRecord,
  ResearchFinding,
  Subject,
  SubjectId,
} from "../core/types";
import { isUsableFinding } from "../core/types";
import { type FieldSpec, computeCoverage, splitSentences } from "./coverage";

const log = createModuleLogger("knowledge");

/** What the knowledge-graph service stores for one subject. */
export interface StoredKnowledge {
  coverage: number;
  narrative: string;
  entities: Record<string, KnowledgeEntity>;
  updated_at: string;
}

export interface KnowledgeGraphClient {
  fetch(subject: Subject, signal?: AbortSignal): Promise<StoredKnowledge | null>;
  write(subject: Subject, record: KnowledgeRecord): Promise<void>;
  ping(): Promise<void>;
}

export interface DepositMeta {
  instanceId: string;
}

export interface DepositFailure {
  subjectId: SubjectId;
  instanceId: string;
  error: unknown;
}

export type DepositFailureListener = (failure: DepositFailure) => void;

export const emptyRecord = (
  subject: Subject,
  origin: "miss" | "unavailable",
): KnowledgeRecord => ({
  subject_id: subject.id,
  kind: subject.kind,
  coverage: 0,
  narrative: "",
  entities: {},
  updated_at: subject.created_at,
  origin,
});

const normalizeSentence = (sentence: string): string =>
  sentence.toLowerCase().replace(/\s+/g, " ").trim();

const byRelevanceThenUrl = (a: ResearchFinding, b: ResearchFinding): number =>
  b.relevance - a.relevance || (a.url < b.url ? -1 : a.url > b.url ? 1 : 0);

/**
 * Merge usable findings into a record. Pure: the same record and findings
 * always produce the same result, and merging the result again with the
 * same findings changes nothing.
 */
export const enrichRecord = (
  record: KnowledgeRecord,
  findings: readonly ResearchFinding[],
  fields: readonly FieldSpec[],
): KnowledgeRecord => {
  const usable = findings.filter(isUsableFinding).sort(byRelevanceThenUrl);

  const sentences = splitSentences(record.narrative);
  const seen = new Set(sentences.map(normalizeSentence));
  const entities: Record<string, KnowledgeEntity> = { ...record.entities };
  let updatedAt = record.updated_at;

  for (const finding of usable) {
    for (const sentence of splitSentences(finding.excerpt)) {
      const key = normalizeSentence(sentence);
      if (!seen.has(key)) {
        seen.add(key);
        sentences.push(sentence);
      }
    }

    for (const [name, value] of Object.entries(finding.facts)) {
      const existing = entities[name];
      if (!existing || finding.relevance > existing.relevance) {
        entities[name] = {
          attributes: { value },
          relevance: finding.relevance,
          source: finding.url,
        };
      }
    }

    if (finding.retrieved_at > updatedAt) {
      updatedAt = finding.retrieved_at;
    }
  }

  const merged: KnowledgeRecord = {
    ...record,
    narrative: sentences.join("\n"),
    entities,
    updated_at: updatedAt,
  };
  merged.coverage = Math.max(
    record.coverage,
    computeCoverage(merged, [], fields),
  );
  return merged;
};

export interface KnowledgeGatewayOptions {
  /** Subjects whose deposited coverage is remembered, least recent dropped first. */
  highWaterLimit?: number;
}

const DEFAULT_HIGH_WATER_LIMIT = 10_000;

/**
 * Front door to the long-lived knowledge store: check before researching,
 * merge what was found, and write it back without holding up the caller.
 *
 * Coverage written for a subject never drops below what this process last
 * wrote for it. That memory is bounded; a forgotten subject starts again
 * from the coverage of the record being written.
 */
export class KnowledgeGateway {
  private readonly pending = new Set<Promise<void>>();
  private readonly highWater = new Map<SubjectId, number>();
  private readonly listeners = new Set<DepositFailureListener>();
  private readonly highWaterLimit: number;

  constructor(
    private readonly client: KnowledgeGraphClient,
    options: KnowledgeGatewayOptions = {},
  ) {
    this.highWaterLimit = options.highWaterLimit ?? DEFAULT_HIGH_WATER_LIMIT;
  }

  /** Never rejects; an unreachable store yields an empty record. */
  async lookup(
    subject: Subject,
    fields: readonly FieldSpec[],
    signal?: AbortSignal,
  ): Promise<KnowledgeRecord> {
    let stored: StoredKnowledge | null;
    try {
      stored = await this.client.fetch(subject, signal);
    } catch (error) {
      log.warn("knowledge store unavailable", {
        subject: subject.id,
        error: errorMessage(error),
      });
      return emptyRecord(subject, "unavailable");
    }

    if (!stored) {
      return emptyRecord(subject, "miss");
    }

    const record: KnowledgeRecord = {
      subject_id: subject.id,
      kind: subject.kind,
      coverage: stored.coverage,
      narrative: stored.narrative,
      entities: stored.entities,
      updated_at: stored.updated_at,
      origin: "store",
    };
    record.coverage = Math.max(
      stored.coverage,
      computeCoverage(record, [], fields),
    );
    return record;
  }

  enrich(
    record: KnowledgeRecord,
    findings: readonly ResearchFinding[],
    fields: readonly FieldSpec[],
  ): KnowledgeRecord {
    return enrichRecord(record, findings, fields);
  }

  /** Schedules a background write. Failures are reported to listeners only. */
  deposit(subject: Subject, record: KnowledgeRecord, meta: DepositMeta): void {
    const floor = this.highWater.get(subject.id) ?? 0;
    const coverage = Math.max(record.coverage, floor);
    this.rememberCoverage(subject.id, coverage);

    const write: Promise<void> = this.client
      .write(subject, { ...record, coverage })
      .then(() => {
        log.debug("knowledge deposited", {
          subject: subject.id,
          coverage,
        });
      })
      .catch((error: unknown) => {
        this.reportFailure({
          subjectId: subject.id,
          instanceId: meta.instanceId,
          error,
        });
      })
      .finally(() => {
        this.pending.delete(write);
      });
    this.pending.add(write);
  }

  onDepositFailure(listener: DepositFailureListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  get pendingDeposits(): number {
    return this.pending.size;
  }

  async flush(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }

  async ping(): Promise<void> {
    await this.client.ping();
  }

  private rememberCoverage(subjectId: SubjectId, coverage: number): void {
    // Map order is insertion order; re-inserting marks the subject as recent.
    this.highWater.delete(subjectId);
    this.highWater.set(subjectId, coverage);
    while (this.highWater.size > this.highWaterLimit) {
      const oldest = this.highWater.keys().next();
      if (oldest.done) {
        break;
      }
      this.highWater.delete(oldest.value);
    }
  }

  private reportFailure(failure: DepositFailure): void {
    log.error("knowledge deposit failed", {
      subject: failure.subjectId,
      instance: failure.instanceId,
      error: errorMessage(failure.error),
    });
    for (const listener of this.listeners) {
      try {
        listener(failure);
      } catch (error) {
        log.error("deposit failure listener threw", {
          error: errorMessage(error),
        });
      }
    }
  }
}
