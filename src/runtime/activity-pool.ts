import path from "node:path";
import type { WorkerConfig } from "../config/worker-config";
import { AnthropicContentGenerator, type ContentGenerator } from "../content/generator";
import { type MediaGenerator, ReplicateMediaGenerator } from "../content/media";
import { createModuleLogger } from "../core/logger";
import { KnowledgeGateway } from "../knowledge/knowledge-gateway";
import { ZepKnowledgeClient } from "../knowledge/zep-client";
import { type CrawlProvider, FallbackCrawlService } from "../research/crawl-fallback";
import {
  type CrawlService,
  FirecrawlScrapeService,
  HttpCrawlService,
  PlainHttpCrawlService,
} from "../research/crawl-service";
import {
  type EscalationProvider,
  FirecrawlEscalationProvider,
} from "../research/escalation-provider";
import { ResearchFunnel } from "../research/funnel";
import { type SearchProvider, SerperSearchProvider } from "../research/search-provider";
import { type ContentStore, SqliteContentStore } from "../storage/content-store";

const log = createModuleLogger("activity-pool");

const DEFAULT_CRAWL_SERVICE_URL = "http://127.0.0.1:8080";

/** Shared, read-only clients every workflow instance runs its activities on. */
export interface ActivityPool {
  readonly knowledge: KnowledgeGateway;
  readonly search: SearchProvider;
  readonly crawl: CrawlService;
  readonly escalation?: EscalationProvider;
  readonly generator: ContentGenerator;
  readonly media: MediaGenerator;
  readonly content: ContentStore;
  readonly funnel: ResearchFunnel;
}

export type ActivityPoolMembers = Omit<ActivityPool, "funnel">;

export const createActivityPool = (
  config: WorkerConfig,
  members: ActivityPoolMembers,
): ActivityPool =>
  Object.freeze({
    ...members,
    funnel: new ResearchFunnel(
      config,
      members.search,
      members.crawl,
      members.escalation,
    ),
  });

/**
 * The crawl service first, then each configured fallback. Firecrawl is
 * skipped without an API key.
 */
export const buildCrawlService = (config: WorkerConfig): CrawlService => {
  const { crawl, escalation } = config.services;
  const primary = new HttpCrawlService({
    url: crawl.url ?? DEFAULT_CRAWL_SERVICE_URL,
    timeoutMs: crawl.timeoutMs,
  });
  const providers: CrawlProvider[] = [
    { name: "crawl-service", service: primary, costMicros: 0 },
  ];

  for (const fallback of crawl.fallbacks) {
    switch (fallback) {
      case "firecrawl":
        if (!escalation.apiKey) {
          log.info("firecrawl crawl fallback skipped: no API key");
          break;
        }
        providers.push({
          name: "firecrawl",
          service: new FirecrawlScrapeService({
            url: escalation.url,
            apiKey: escalation.apiKey,
            timeoutMs: crawl.timeoutMs,
          }),
          costMicros: config.costs.scrapeMicros,
        });
        break;
      case "http":
        providers.push({
          name: "http",
          service: new PlainHttpCrawlService({ timeoutMs: crawl.timeoutMs }),
          costMicros: 0,
        });
        break;
    }
  }

  return providers.length === 1 ? primary : new FallbackCrawlService(providers);
};

/** Builds the production clients from configuration. */
export const buildActivityPool = (
  config: WorkerConfig,
  cwd: string,
): ActivityPool => {
  const services = config.services;
  const escalation = services.escalation.apiKey
    ? new FirecrawlEscalationProvider({
        url: services.escalation.url,
        apiKey: services.escalation.apiKey,
      })
    : undefined;
  if (!escalation) {
    log.info("escalation provider not configured");
  }

  return createActivityPool(config, {
    knowledge: new KnowledgeGateway(
      new ZepKnowledgeClient({
        url: services.knowledge.url,
        apiKey: services.knowledge.apiKey,
      }),
    ),
    search: new SerperSearchProvider({
      url: services.search.url,
      apiKey: services.search.apiKey,
    }),
    crawl: buildCrawlService(config),
    ...(escalation ? { escalation } : {}),
    generator: new AnthropicContentGenerator({
      apiKey: services.generation.apiKey,
      model: services.generation.model,
      maxTokens: services.generation.maxTokens,
      costs: config.costs,
    }),
    media: new ReplicateMediaGenerator({
      url: services.media.url,
      apiKey: services.media.apiKey,
      model: services.media.model,
    }),
    content: new SqliteContentStore(path.resolve(cwd, services.databasePath)),
  });
};

/** Waits for background knowledge deposits, then releases the database. */
export const closeActivityPool = async (pool: ActivityPool): Promise<void> => {
  await pool.knowledge.flush();
  pool.content.close();
};
