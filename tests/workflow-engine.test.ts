import { describe, expect, it, vi } from "vitest";
import { type WorkerConfig, defaultWorkerConfig } from "../src/config/worker-config";
import { InstanceStore } from "../src/core/state-store";
import { buildWorkItem } from "../src/core/task-queue";
import type { WorkflowKind } from "../src/core/types";
import { WorkflowEngine } from "../src/core/workflow-engine";
import type { CrawledPage } from "../src/research/crawl-service";
import type { SearchHit } from "../src/research/search-provider";
import { ARTICLE_FIELDS, COMPANY_FIELDS, builtInKinds } from "../src/workflows";
import {
  FakeCrawl,
  FakeGenerator,
  FakeKnowledgeClient,
  FakeMedia,
  FakeSearch,
  type TestPool,
  articleDraft,
  createTestPool,
  entitiesFor,
  tempDir,
  testConfig,
} from "./helpers/fakes";

const setup = (
  config: WorkerConfig = testConfig(),
  parts: Partial<Omit<TestPool, "pool">> = {},
) => {
  const store = new InstanceStore(tempDir("content-engine-"));
  store.ensure();
  const test = createTestPool(config, parts);
  const engine = new WorkflowEngine(config, test.pool, store, builtInKinds());
  const start = (kind: WorkflowKind, name: string, hints?: Record<string, string>) =>
    engine.create(
      buildWorkItem({
        workflow_kind: kind,
        subject: { name, ...(hints ? { hints } : {}) },
      }),
      kind,
    );
  return { ...test, store, engine, start };
};

const cachedKnowledge = (names: readonly string[]): FakeKnowledgeClient => {
  const client = new FakeKnowledgeClient();
  client.stored = {
    coverage: 1,
    narrative: "Acme Corp advises mid-market companies.",
    entities: entitiesFor(names),
    updated_at: "2026-01-05T00:00:00.000Z",
  };
  return client;
};

const hit = (n: number, snippet = `Acme Corp shared news item ${n}.`): SearchHit => ({
  url: `https://acme.example/news/${n}`,
  title: `Acme Corp update ${n}`,
  snippet,
  rank: n,
});

const stateNames = (history: ReadonlyArray<{ state: string }>) =>
  history.map((entry) => entry.state);

describe("WorkflowEngine", () => {
  it("skips research when the knowledge cache already covers the subject", async () => {
    const harness = setup(testConfig(), {
      knowledgeClient: cachedKnowledge(COMPANY_FIELDS.map((field) => field.name)),
    });
    const created = harness.start("Company", "  Acme Corp ");
    expect(created.subject).toMatchObject({ id: "company:acme-corp", name: "Acme Corp" });

    const finished = await harness.engine.run(created.instance_id);

    expect(finished.current_state).toBe("Completed");
    expect(stateNames(finished.history)).toEqual([
      "Created",
      "KnowledgeCheck",
      "Synthesizing",
      "Generating",
      "Persisting",
      "Completed",
    ]);
    expect(harness.search.calls).toHaveLength(0);
    expect(harness.crawl.calls).toHaveLength(0);
    expect(finished.result).toEqual({
      kind: "Company",
      record_id: harness.content.findBySlug("companies", "acme-corp")?.id,
      slug: "acme-corp",
      coverage: 1,
      partial: false,
      degraded: [],
      cost_micros: 1_050,
      findings: { total: 0, usable: 0, failed: 0 },
      assets: [],
    });
    expect(harness.generator.requests[0]?.prompt).toContain(
      "- headquarters: headquarters fact (source: https://kb.example/source)",
    );

    await harness.pool.knowledge.flush();
    expect(harness.knowledgeClient.writes).toHaveLength(1);
  });

  it("researches, crawls and completes a company with a failed crawl recorded", async () => {
    const fullFacts = Object.fromEntries(
      COMPANY_FIELDS.map((field) => [field.name, `${field.name} detail`]),
    );
    const pages: Record<string, CrawledPage | Error> = {};
    for (const n of [1, 2, 3, 4, 6, 7, 8, 11, 12]) {
      pages[`https://acme.example/news/${n}`] = {
        text: "Acme Corp annual report.",
        structured_facts: fullFacts,
      };
    }
    pages["https://acme.example/news/5"] = new Error("crawl blocked");

    const harness = setup(testConfig(), {
      search: new FakeSearch({
        "Acme Corp": [
          [1, 2, 3, 4, 5, 6, 7, 8].map((n) => hit(n)),
          [11, 12, 13, 14].map((n) => hit(n)),
        ],
      }),
      crawl: new FakeCrawl(pages),
    });

    const finished = await harness.engine.run(harness.start("Company", "Acme Corp").instance_id);

    expect(finished.current_state).toBe("Completed");
    expect(harness.search.calls).toHaveLength(4);
    expect(Object.keys(finished.findings)).toHaveLength(10);
    expect(finished.findings["https://acme.example/news/5"]?.facts["crawl-failed"]).toBe(
      "crawl blocked",
    );
    expect(finished.result).toMatchObject({
      coverage: 1,
      partial: false,
      degraded: [],
      cost_micros: 5_050,
      findings: { total: 10, usable: 9, failed: 1 },
    });
    expect(finished.knowledge?.coverage).toBe(1);
  });

  it("completes with a partial result when the cost ceiling stops research", async () => {
    const knowledgeClient = new FakeKnowledgeClient();
    knowledgeClient.fetchError = new Error("graph offline");
    const config = testConfig({ costCeilingMicros: 20_000, generationReserveMicros: 18_000 });
    const harness = setup(config, {
      knowledgeClient,
      search: new FakeSearch({
        "Acme Corp": [[hit(1, "Acme Corp is headquartered in Springfield."), hit(2)]],
      }),
    });

    const finished = await harness.engine.run(harness.start("Company", "Acme Corp").instance_id);

    expect(finished.current_state).toBe("Completed");
    expect(finished.ceiling_reached).toBe(true);
    expect(harness.search.calls).toHaveLength(2);
    expect(harness.crawl.calls).toHaveLength(0);
    expect(finished.result?.partial).toBe(true);
    expect(finished.result?.coverage).toBeCloseTo(1 / 6);
    expect(finished.result?.cost_micros).toBe(3_050);
    expect(finished.cost_micros).toBeLessThanOrEqual(config.costCeilingMicros);
    expect(finished.result?.degraded).toEqual(["knowledge-store"]);
    expect(harness.generator.requests[0]?.maxTokens).toBeGreaterThanOrEqual(256);
  });

  it("refuses generation the remaining budget cannot pay for", async () => {
    const config = testConfig({ costCeilingMicros: 1_000 });
    const harness = setup(config, {
      knowledgeClient: cachedKnowledge(COMPANY_FIELDS.map((field) => field.name)),
    });

    const finished = await harness.engine.run(harness.start("Company", "Acme Corp").instance_id);

    expect(finished.current_state).toBe("Failed");
    expect(finished.failure).toEqual({
      kind: "validation",
      cause: "cost ceiling leaves no budget for generate-company-profile",
      state: "Generating",
    });
    expect(harness.generator.requests).toHaveLength(0);
    expect(finished.cost_micros).toBe(0);
  });

  it("keeps media spend under the ceiling by skipping unaffordable assets", async () => {
    const config = testConfig({
      costCeilingMicros: 5_000,
      maxArticleImages: 2,
      costs: {
        ...defaultWorkerConfig.costs,
        generationInputMicrosPerToken: 0,
        generationOutputMicrosPerToken: 1,
      },
    });
    const harness = setup(config, {
      knowledgeClient: cachedKnowledge(ARTICLE_FIELDS.map((field) => field.name)),
      generator: FakeGenerator.returning(articleDraft, 1_500),
    });

    const finished = await harness.engine.run(harness.start("Article", "Acme expands").instance_id);

    expect(finished.current_state).toBe("Completed");
    expect(harness.media.requests.map((spec) => spec.prompt)).toEqual(["a skyline"]);
    expect(finished.result).toMatchObject({
      assets: ["https://media.example/a-skyline.webp"],
      degraded: ["media"],
      cost_micros: 4_500,
    });
  });

  it("fails when the ceiling is hit before anything useful was found", async () => {
    const harness = setup(testConfig({ costCeilingMicros: 500 }));

    const finished = await harness.engine.run(harness.start("Company", "Acme Corp").instance_id);

    expect(finished.current_state).toBe("Failed");
    expect(finished.failure).toEqual({
      kind: "validation",
      cause: "cost ceiling breached before any useful result",
      state: "Synthesizing",
    });
    expect(harness.search.calls).toHaveLength(0);
    expect(harness.generator.requests).toHaveLength(0);
  });

  it("fails an instance once an activity exhausts its attempts", async () => {
    const harness = setup(testConfig(), {
      knowledgeClient: cachedKnowledge(COMPANY_FIELDS.map((field) => field.name)),
      generator: new FakeGenerator(async () => {
        throw new Error("model overloaded");
      }),
    });

    const finished = await harness.engine.run(harness.start("Company", "Acme Corp").instance_id);

    expect(finished.current_state).toBe("Failed");
    expect(finished.failure).toEqual({
      kind: "transient",
      cause: "Activity generate-company-profile failed after 3 attempts: model overloaded",
      state: "Generating",
    });
    expect(harness.generator.requests).toHaveLength(3);
    expect(finished.retries["generate-company-profile"]).toBe(3);
    expect(finished.history.find((entry) => entry.state === "Generating")?.last_failure).toBe(
      "generate-company-profile: model overloaded",
    );
  });

  it("rejects malformed subjects at creation", async () => {
    const harness = setup();

    const empty = await harness.engine.run(harness.start("Company", "   ").instance_id);
    expect(empty.current_state).toBe("Failed");
    expect(empty.failure).toEqual({
      kind: "validation",
      cause: "subject name is empty",
      state: "Created",
    });

    const long = await harness.engine.run(harness.start("Company", "x".repeat(201)).instance_id);
    expect(long.failure?.cause).toBe("subject name exceeds 200 characters");
    expect(harness.knowledgeClient.fetches).toBe(0);
  });

  it("does not repeat recorded activities when states are replayed", async () => {
    const harness = setup(testConfig(), {
      knowledgeClient: cachedKnowledge(COMPANY_FIELDS.map((field) => field.name)),
    });
    const first = await harness.engine.run(harness.start("Company", "Acme Corp").instance_id);
    await harness.pool.knowledge.flush();

    // Simulates a crash after Synthesizing was entered.
    harness.store.saveInstance({ ...first, current_state: "Synthesizing", result: null });
    const replayed = await harness.engine.run(first.instance_id);
    await harness.pool.knowledge.flush();

    expect(replayed.current_state).toBe("Completed");
    expect(harness.generator.requests).toHaveLength(1);
    expect(harness.knowledgeClient.writes).toHaveLength(1);
    expect(replayed.cost_micros).toBe(1_050);
    expect(replayed.result?.record_id).toBe(first.result?.record_id);
  });

  it("fails a resumed instance whose stored draft is malformed", async () => {
    const harness = setup(testConfig(), {
      knowledgeClient: cachedKnowledge(COMPANY_FIELDS.map((field) => field.name)),
    });
    const created = harness.start("Company", "Acme Corp");
    harness.store.saveInstance({
      ...created,
      current_state: "Persisting",
      draft: { name: "Acme Corp" },
    });

    const finished = await harness.engine.run(created.instance_id);

    expect(finished.current_state).toBe("Failed");
    expect(finished.failure).toEqual({
      kind: "validation",
      cause: "Company draft is missing or malformed",
      state: "Persisting",
    });
  });

  it("cancels an idle instance at once", () => {
    const harness = setup();
    const created = harness.start("Company", "Acme Corp");

    expect(harness.engine.cancel(created.instance_id)).toEqual({
      instance_id: created.instance_id,
      status: "cancelled",
    });
    expect(harness.engine.get(created.instance_id)?.current_state).toBe("Cancelled");
    expect(harness.engine.cancel(created.instance_id).status).toBe("already-terminal");
    expect(harness.engine.cancel("wf-missing").status).toBe("not-found");
  });

  it("cancels a running instance at its next activity boundary", async () => {
    let notifyStarted: () => void = () => undefined;
    const started = new Promise<void>((resolve) => {
      notifyStarted = resolve;
    });
    const harness = setup(testConfig(), {
      knowledgeClient: cachedKnowledge(COMPANY_FIELDS.map((field) => field.name)),
      generator: new FakeGenerator(
        (_request, signal) =>
          new Promise((_resolve, reject) => {
            notifyStarted();
            signal?.addEventListener("abort", () => reject(new Error("aborted")));
          }),
      ),
    });
    const created = harness.start("Company", "Acme Corp");

    const running = harness.engine.run(created.instance_id);
    await started;
    expect(harness.engine.running).toEqual([created.instance_id]);
    expect(harness.engine.cancel(created.instance_id).status).toBe("cancelling");

    const finished = await running;
    expect(finished.current_state).toBe("Cancelled");
    expect(finished.draft).toBeNull();
    expect(harness.engine.running).toEqual([]);
    expect(finished.history.at(-2)).toMatchObject({
      state: "Generating",
      result: "cancel requested",
    });
  });

  it("publishes an article with the media that could be generated", async () => {
    const harness = setup(testConfig(), {
      knowledgeClient: cachedKnowledge(ARTICLE_FIELDS.map((field) => field.name)),
      generator: FakeGenerator.returning(articleDraft),
      media: new FakeMedia(["a chart"]),
    });

    const finished = await harness.engine.run(
      harness.start("Article", "Acme expands", { article_type: "feature" }).instance_id,
    );

    expect(finished.current_state).toBe("Completed");
    expect(finished.result).toMatchObject({
      kind: "Article",
      slug: "acme-expands",
      assets: ["https://media.example/a-skyline.webp"],
      degraded: ["media"],
      cost_micros: 4_050,
    });
    expect(harness.media.requests.map((spec) => spec.aspectRatio)).toEqual([
      "16:9",
      "4:3",
      "4:3",
      "4:3",
    ]);
    const recordId = finished.result?.record_id ?? "";
    expect(harness.content.listAssets(recordId)).toEqual([
      { url: "https://media.example/a-skyline.webp", prompt: "a skyline" },
    ]);
    expect(harness.content.findBySlug("articles", "acme-expands")?.article_type).toBe("feature");
  });

  it("keeps completed media across a crash in the middle of persisting", async () => {
    const articleFields = ARTICLE_FIELDS.map((field) => field.name);
    const first = setup(testConfig(), {
      knowledgeClient: cachedKnowledge(articleFields),
      generator: FakeGenerator.returning(articleDraft),
      media: new FakeMedia([], ["a chart"]),
    });
    const created = first.start("Article", "Acme expands");
    const running = first.engine.run(created.instance_id);
    await vi.waitFor(() => expect(first.media.requests).toHaveLength(2));

    // What a process dying now leaves on disk.
    const crashed = first.store.loadInstance(created.instance_id);
    expect(crashed?.current_state).toBe("Persisting");
    expect(crashed?.cost_micros).toBe(4_050);

    const resumed = setup(testConfig(), {
      knowledgeClient: cachedKnowledge(articleFields),
      generator: FakeGenerator.returning(articleDraft),
    });
    if (crashed) {
      resumed.store.saveInstance(crashed);
    }
    const finished = await resumed.engine.run(created.instance_id);

    expect(finished.current_state).toBe("Completed");
    expect(resumed.media.requests).toEqual([{ prompt: "a chart", aspectRatio: "4:3" }]);
    expect(resumed.generator.requests).toHaveLength(0);
    expect(finished.result?.assets).toEqual([
      "https://media.example/a-skyline.webp",
      "https://media.example/a-chart.webp",
    ]);
    expect(finished.cost_micros).toBe(7_050);

    first.engine.cancel(created.instance_id);
    await expect(running).resolves.toMatchObject({ current_state: "Cancelled" });
  });

  it("gives non-Latin subject names distinct ids and records", async () => {
    const harness = setup(testConfig(), {
      knowledgeClient: cachedKnowledge(COMPANY_FIELDS.map((field) => field.name)),
    });
    const tepco = harness.start("Company", "東京電力");
    const post = harness.start("Company", "日本郵政");
    expect(tepco.subject.id).toBe("company:s-05bb78db56b9");
    expect(post.subject.id).toBe("company:s-47eef5f0b88d");

    const first = await harness.engine.run(tepco.instance_id);
    const second = await harness.engine.run(post.instance_id);

    expect(first.result?.slug).toBe("s-05bb78db56b9");
    expect(second.result?.slug).toBe("s-47eef5f0b88d");
    expect(first.result?.record_id).not.toBe(second.result?.record_id);
  });
});
