import { type Static, Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import axios, { type AxiosAdapter, type AxiosInstance } from "axios";
import { TransientError } from "../core/errors";
import type { KnowledgeEntity, KnowledgeRecord, Subject } from "../core/types";
import type { KnowledgeGraphClient, StoredKnowledge } from "./knowledge-gateway";

const EntitySchema = Type.Object({
  attributes: Type.Record(Type.String(), Type.String()),
  relevance: Type.Number(),
  source: Type.String(),
});

const NodeSchema = Type.Object({
  uuid: Type.Optional(Type.String()),
  name: Type.String(),
  summary: Type.Optional(Type.String()),
  attributes: Type.Optional(Type.Record(Type.String(), Type.Unknown())),
});

const SearchResponseSchema = Type.Object({
  results: Type.Optional(Type.Array(NodeSchema)),
});

type GraphNode = Static<typeof NodeSchema>;

export interface ZepClientOptions {
  url: string;
  apiKey?: string;
  timeoutMs?: number;
  adapter?: AxiosAdapter;
}

const sessionIdFor = (subject: Subject): string =>
  `subject-${subject.id.replace(/[^a-z0-9-]+/gi, "-")}`;

const parseEntities = (raw: unknown): Record<string, KnowledgeEntity> => {
  if (typeof raw !== "string") {
    return {};
  }
  const parsed: unknown = JSON.parse(raw);
  if (typeof parsed !== "object" || parsed === null) {
    return {};
  }
  const entities: Record<string, KnowledgeEntity> = {};
  for (const [name, value] of Object.entries(parsed)) {
    if (Value.Check(EntitySchema, value)) {
      entities[name] = value;
    }
  }
  return entities;
};

const toStored = (node: GraphNode): StoredKnowledge => {
  const attributes = node.attributes ?? {};
  const coverage = attributes.coverage;
  const updatedAt = attributes.updated_at;
  return {
    coverage: typeof coverage === "number" ? coverage : 0,
    narrative: node.summary ?? "",
    entities: parseEntities(attributes.entities),
    updated_at: typeof updatedAt === "string" ? updatedAt : "",
  };
};

/**
 * Knowledge-graph client over the Zep REST API. Each subject is one graph
 * node keyed by subject id, with its narrative mirrored into a session
 * memory so it is searchable as text.
 */
export class ZepKnowledgeClient implements KnowledgeGraphClient {
  private readonly http: AxiosInstance;

  constructor(options: ZepClientOptions) {
    this.http = axios.create({
      baseURL: options.url,
      timeout: options.timeoutMs ?? 30_000,
      headers: {
        "Content-Type": "application/json",
        ...(options.apiKey ? { Authorization: `Api-Key ${options.apiKey}` } : {}),
      },
      ...(options.adapter ? { adapter: options.adapter } : {}),
    });
  }

  async fetch(
    subject: Subject,
    signal?: AbortSignal,
  ): Promise<StoredKnowledge | null> {
    const response = await this.http.post<unknown>(
      "/api/v2/graph/search",
      {
        query: subject.name,
        limit: 5,
        scope: "nodes",
        filters: { node_type: subject.kind.toLowerCase() },
      },
      { signal },
    );

    if (!Value.Check(SearchResponseSchema, response.data)) {
      throw new TransientError("knowledge store returned an unexpected payload");
    }

    const node = (response.data.results ?? []).find(
      (candidate) => candidate.attributes?.subject_id === subject.id,
    );
    return node ? toStored(node) : null;
  }

  async write(subject: Subject, record: KnowledgeRecord): Promise<void> {
    await this.http.post("/api/v2/graph/nodes", {
      name: subject.name,
      type: subject.kind.toLowerCase(),
      summary: record.narrative,
      attributes: {
        subject_id: subject.id,
        coverage: record.coverage,
        updated_at: record.updated_at,
        entities: JSON.stringify(record.entities),
      },
    });

    if (record.narrative.length > 0) {
      await this.http.post(`/api/v2/sessions/${sessionIdFor(subject)}/memory`, {
        messages: [
          {
            role: "system",
            content: record.narrative,
            metadata: {
              type: `${subject.kind.toLowerCase()}_profile`,
              subject_id: subject.id,
            },
          },
        ],
      });
    }
  }

  async ping(): Promise<void> {
    await this.http.get("/healthz");
  }
}
