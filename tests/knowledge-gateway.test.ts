import { describe, expect, it, vi } from "vitest";
import type { ResearchFinding } from "../src/core/types";
import { KnowledgeGateway, enrichRecord } from "../src/knowledge/knowledge-gateway";
import { COMPANY_FIELDS } from "../src/workflows";
import {
  FakeKnowledgeClient,
  entitiesFor,
  knowledgeRecord,
  testSubject,
} from "./helpers/fakes";

const finding = (
  url: string,
  relevance: number,
  excerpt: string,
  facts: Record<string, string>,
  retrieved_at = "2026-02-01T00:00:00.000Z",
): ResearchFinding => ({
  url,
  tier: "crawled-full",
  relevance,
  rank: 1,
  title: "",
  excerpt,
  facts,
  cost_micros: 0,
  retrieved_at,
});

describe("enrichRecord", () => {
  const findings = [
    finding("https://b.example", 0.4, "Acme was founded in 1990. Acme is based in Leeds.", {
      founded: "Acme was founded in 1990.",
      headquarters: "Acme is based in Leeds.",
    }),
    finding("https://a.example", 0.9, "Acme is based in Leeds. It has 40 staff.", {
      headquarters: "Acme is based in Leeds, England.",
      team_size: "It has 40 staff.",
    }),
    finding(
      "https://c.example",
      1,
      "Ignored.",
      { services: "x", "crawl-failed": "timeout" },
      "2027-01-01T00:00:00.000Z",
    ),
  ];

  it("merges usable findings by relevance and dedupes the narrative", () => {
    const enriched = enrichRecord(knowledgeRecord(), findings, COMPANY_FIELDS);

    expect(enriched.narrative).toBe(
      "Acme is based in Leeds.\nIt has 40 staff.\nAcme was founded in 1990.",
    );
    expect(enriched.entities.headquarters).toEqual({
      attributes: { value: "Acme is based in Leeds, England." },
      relevance: 0.9,
      source: "https://a.example",
    });
    expect(Object.keys(enriched.entities).sort()).toEqual([
      "founded",
      "headquarters",
      "team_size",
    ]);
    expect(enriched.coverage).toBe(0.5);
    expect(enriched.updated_at).toBe("2026-02-01T00:00:00.000Z");
  });

  it("is idempotent", () => {
    const once = enrichRecord(knowledgeRecord(), findings, COMPANY_FIELDS);
    const twice = enrichRecord(once, findings, COMPANY_FIELDS);
    expect(twice).toEqual(once);
  });

  it("never lowers coverage", () => {
    const prior = knowledgeRecord({ coverage: 0.9 });
    expect(enrichRecord(prior, findings, COMPANY_FIELDS).coverage).toBe(0.9);
  });

  it("replaces an entity only with a strictly more relevant one", () => {
    const prior = knowledgeRecord({
      entities: { founded: { attributes: { value: "old" }, relevance: 0.4, source: "kb" } },
    });
    const sameRelevance = finding("https://b.example", 0.4, "Acme was founded in 1990.", {
      founded: "Acme was founded in 1990.",
    });
    const enriched = enrichRecord(prior, [sameRelevance], COMPANY_FIELDS);
    expect(enriched.entities.founded?.attributes.value).toBe("old");
  });
});

describe("KnowledgeGateway", () => {
  it("reports a miss and an unreachable store without rejecting", async () => {
    const client = new FakeKnowledgeClient();
    const gateway = new KnowledgeGateway(client);
    const subject = testSubject();

    const miss = await gateway.lookup(subject, COMPANY_FIELDS);
    expect(miss).toMatchObject({ origin: "miss", coverage: 0, entities: {} });

    client.fetchError = new Error("connection refused");
    const unavailable = await gateway.lookup(subject, COMPANY_FIELDS);
    expect(unavailable.origin).toBe("unavailable");
    expect(unavailable.updated_at).toBe(subject.created_at);
  });

  it("recomputes stored coverage from the stored entities", async () => {
    const client = new FakeKnowledgeClient();
    client.stored = {
      coverage: 0.2,
      narrative: "Acme is based in Leeds.",
      entities: entitiesFor(["headquarters", "founded", "services"]),
      updated_at: "2026-01-05T00:00:00.000Z",
    };
    const record = await new KnowledgeGateway(client).lookup(testSubject(), COMPANY_FIELDS);

    expect(record.origin).toBe("store");
    expect(record.coverage).toBe(0.5);
    expect(record.subject_id).toBe("company:acme-corp");
  });

  it("writes deposits in the background and never lowers stored coverage", async () => {
    const client = new FakeKnowledgeClient();
    const gateway = new KnowledgeGateway(client);
    const subject = testSubject();

    gateway.deposit(subject, knowledgeRecord({ coverage: 0.8 }), { instanceId: "wf-1" });
    gateway.deposit(subject, knowledgeRecord({ coverage: 0.5 }), { instanceId: "wf-2" });
    expect(gateway.pendingDeposits).toBe(2);
    await gateway.flush();

    expect(gateway.pendingDeposits).toBe(0);
    expect(client.writes.map((record) => record.coverage)).toEqual([0.8, 0.8]);
  });

  it("forgets the coverage floor of the least recently deposited subject", async () => {
    const client = new FakeKnowledgeClient();
    const gateway = new KnowledgeGateway(client, { highWaterLimit: 2 });
    const acme = testSubject("Acme Corp");
    const beta = testSubject("Beta Corp");
    const gamma = testSubject("Gamma Corp");
    const meta = { instanceId: "wf-1" };

    gateway.deposit(acme, knowledgeRecord({ coverage: 0.9 }), meta);
    gateway.deposit(beta, knowledgeRecord({ coverage: 0.9 }), meta);
    gateway.deposit(acme, knowledgeRecord({ coverage: 0.5 }), meta);
    gateway.deposit(gamma, knowledgeRecord({ coverage: 0.1 }), meta);
    gateway.deposit(acme, knowledgeRecord({ coverage: 0.2 }), meta);
    gateway.deposit(beta, knowledgeRecord({ coverage: 0.3 }), meta);
    await gateway.flush();

    expect(client.writes.map((record) => record.coverage)).toEqual([
      0.9, 0.9, 0.9, 0.1, 0.9, 0.3,
    ]);
  });

  it("reports deposit failures to listeners", async () => {
    const client = new FakeKnowledgeClient();
    client.writeError = new Error("graph offline");
    const gateway = new KnowledgeGateway(client);
    const listener = vi.fn();
    const unsubscribe = gateway.onDepositFailure(listener);

    gateway.deposit(testSubject(), knowledgeRecord(), { instanceId: "wf-1" });
    await gateway.flush();

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith({
      subjectId: "company:acme-corp",
      instanceId: "wf-1",
      error: client.writeError,
    });

    unsubscribe();
    gateway.deposit(testSubject(), knowledgeRecord(), { instanceId: "wf-2" });
    await gateway.flush();
    expect(listener).toHaveBeenCalledTimes(1);
  });
});
