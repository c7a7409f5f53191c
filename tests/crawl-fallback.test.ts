import { describe, expect, it } from "vitest";
import { defaultWorkerConfig } from "../src/config/worker-config";
import { CeilingBudget } from "../src/research/budget";
import { FallbackCrawlService } from "../src/research/crawl-fallback";
import { HttpCrawlService } from "../src/research/crawl-service";
import { buildCrawlService } from "../src/runtime/activity-pool";
import { FakeCrawl } from "./helpers/fakes";

const PAGE_URL = "https://acme.example/about";

const page = (text: string) => ({ text, structured_facts: {} });

const chain = () => {
  const primary = new FakeCrawl();
  const firecrawl = new FakeCrawl({ [PAGE_URL]: page("from firecrawl") });
  const http = new FakeCrawl({ [PAGE_URL]: page("from http") });
  const service = new FallbackCrawlService([
    { name: "crawl-service", service: primary, costMicros: 0 },
    { name: "firecrawl", service: firecrawl, costMicros: 10_000 },
    { name: "http", service: http, costMicros: 0 },
  ]);
  return { primary, firecrawl, http, service };
};

describe("FallbackCrawlService", () => {
  it("returns the primary provider's page without touching the others", async () => {
    const firecrawl = new FakeCrawl({ [PAGE_URL]: page("from firecrawl") });
    const service = new FallbackCrawlService([
      { name: "crawl-service", service: new FakeCrawl({ [PAGE_URL]: page("primary") }), costMicros: 0 },
      { name: "firecrawl", service: firecrawl, costMicros: 10_000 },
    ]);
    const ledger = { cost_micros: 0 };

    await expect(
      service.fetch(PAGE_URL, undefined, new CeilingBudget(100_000, ledger)),
    ).resolves.toEqual(page("primary"));
    expect(firecrawl.calls).toEqual([]);
    expect(ledger.cost_micros).toBe(0);
  });

  it("falls back in order and charges the paid provider", async () => {
    const { primary, firecrawl, http, service } = chain();
    const ledger = { cost_micros: 0 };

    await expect(
      service.fetch(PAGE_URL, undefined, new CeilingBudget(100_000, ledger)),
    ).resolves.toEqual(page("from firecrawl"));
    expect(primary.calls).toEqual([PAGE_URL]);
    expect(firecrawl.calls).toEqual([PAGE_URL]);
    expect(http.calls).toEqual([]);
    expect(ledger.cost_micros).toBe(10_000);
  });

  it("skips a paid provider the budget cannot cover", async () => {
    const { firecrawl, http, service } = chain();
    const ledger = { cost_micros: 0 };

    await expect(
      service.fetch(PAGE_URL, undefined, new CeilingBudget(5_000, ledger)),
    ).resolves.toEqual(page("from http"));
    expect(firecrawl.calls).toEqual([]);
    expect(http.calls).toEqual([PAGE_URL]);
    expect(ledger.cost_micros).toBe(0);
  });

  it("reports every provider's failure when none returns a page", async () => {
    const service = new FallbackCrawlService([
      { name: "crawl-service", service: new FakeCrawl(), costMicros: 0 },
      { name: "http", service: new FakeCrawl({ [PAGE_URL]: new Error("HTTP 403") }), costMicros: 0 },
    ]);

    await expect(service.fetch(PAGE_URL)).rejects.toThrow(
      `every crawl provider failed: crawl-service: no page for ${PAGE_URL}; http: HTTP 403`,
    );
  });
});

describe("buildCrawlService", () => {
  it("chains the configured fallbacks after the crawl service", () => {
    expect(buildCrawlService(defaultWorkerConfig)).toBeInstanceOf(FallbackCrawlService);
  });

  it("uses the crawl service alone when no fallback is configured", () => {
    const config = {
      ...defaultWorkerConfig,
      services: {
        ...defaultWorkerConfig.services,
        crawl: { ...defaultWorkerConfig.services.crawl, fallbacks: [] },
      },
    };
    expect(buildCrawlService(config)).toBeInstanceOf(HttpCrawlService);
  });
});
