import fs from "node:fs";
import path from "node:path";
import { createJiti } from "jiti";
import { type WorkflowStateName, isWorkflowStateName } from "../core/types";

export interface BackoffPolicy {
  initialMs: number;
  multiplier: number;
  maxMs: number;
}

export interface ActivityPolicy {
  timeoutMs: number;
  maxAttempts: number;
  backoff: BackoffPolicy;
}

export type StatePolicyOverrides = Partial<
  Record<WorkflowStateName, Partial<ActivityPolicy>>
>;

/** Unit prices in USD micros (1_000_000 = $1). */
export interface CostTable {
  searchMicros: number;
  crawlMicros: number;
  escalationMicros: number;
  scrapeMicros: number;
  mediaMicros: number;
  generationInputMicrosPerToken: number;
  generationOutputMicrosPerToken: number;
}

/** Crawl providers tried after the crawl service, in order. */
export type CrawlFallback = "firecrawl" | "http";

const CRAWL_FALLBACKS: readonly CrawlFallback[] = ["firecrawl", "http"];

const isCrawlFallback = (value: unknown): value is CrawlFallback =>
  CRAWL_FALLBACKS.some((fallback) => fallback === value);

export interface ServiceConfig {
  knowledge: { url: string; apiKey?: string };
  search: { url: string; apiKey?: string };
  crawl: { url?: string; timeoutMs: number; fallbacks: CrawlFallback[] };
  escalation: { url: string; apiKey?: string };
  media: { url: string; apiKey?: string; model: string };
  generation: { apiKey?: string; model: string; maxTokens: number };
  databasePath: string;
}

export interface WorkerConfig {
  taskQueue: string;
  stateDir: string;
  logFile?: string;
  concurrency: number;
  pollIntervalMs: number;
  healthIntervalMs: number;
  costCeilingMicros: number;
  /** Held back from research so generation and persistence stay affordable. */
  generationReserveMicros: number;
  /** Deliveries of a crashing work item before it is rejected. */
  maxDeliveries: number;
  coverageThreshold: number;
  searchPages: number;
  crawlCandidates: number;
  crawlAttempts: number;
  crawlConcurrency: number;
  relevanceThreshold: number;
  rankDecay: number;
  unmentionedFactor: number;
  maxArticleImages: number;
  excludeUrls: string[];
  activity: ActivityPolicy;
  states: StatePolicyOverrides;
  costs: CostTable;
  services: ServiceConfig;
}

export const defaultWorkerConfig: WorkerConfig = {
  taskQueue: "content-queue",
  stateDir: ".content-worker",
  concurrency: 4,
  pollIntervalMs: 1_000,
  healthIntervalMs: 30_000,
  costCeilingMicros: 100_000,
  generationReserveMicros: 50_000,
  maxDeliveries: 3,
  coverageThreshold: 0.8,
  searchPages: 2,
  crawlCandidates: 10,
  crawlAttempts: 2,
  crawlConcurrency: 5,
  relevanceThreshold: 0.1,
  rankDecay: 0.9,
  unmentionedFactor: 0.5,
  maxArticleImages: 3,
  excludeUrls: [
    "{,*.}wsj.com/**",
    "{,*.}ft.com/**",
    "{,*.}economist.com/**",
    "{,*.}nytimes.com/**",
    "{,*.}washingtonpost.com/**",
    "{,*.}barrons.com/**",
    "{,*.}seekingalpha.com/**",
    "{,*.}twitter.com/**",
    "{,*.}x.com/**",
    "{,*.}linkedin.com/**",
    "{,*.}facebook.com/**",
    "{,*.}instagram.com/**",
    "{,*.}reddit.com/**",
    "{,*.}youtube.com/**",
    "{,*.}tiktok.com/**",
    "{,*.}pinterest.com/**",
  ],
  activity: {
    timeoutMs: 60_000,
    maxAttempts: 3,
    backoff: { initialMs: 1_000, multiplier: 2, maxMs: 30_000 },
  },
  states: {
    KnowledgeCheck: { timeoutMs: 30_000 },
    Researching: { timeoutMs: 300_000, maxAttempts: 2 },
    Generating: { timeoutMs: 180_000 },
  },
  costs: {
    searchMicros: 1_000,
    crawlMicros: 0,
    escalationMicros: 10_000,
    scrapeMicros: 10_000,
    mediaMicros: 3_000,
    generationInputMicrosPerToken: 3,
    generationOutputMicrosPerToken: 15,
  },
  services: {
    knowledge: { url: "https://api.getzep.com" },
    search: { url: "https://google.serper.dev" },
    crawl: { timeoutMs: 60_000, fallbacks: ["firecrawl", "http"] },
    escalation: { url: "https://api.firecrawl.dev" },
    media: {
      url: "https://api.replicate.com",
      model: "black-forest-labs/flux-schnell",
    },
    generation: { model: "claude-sonnet-4-5", maxTokens: 4_096 },
    databasePath: ".content-worker/content.db",
  },
};

export const policyForState = (
  config: WorkerConfig,
  state: WorkflowStateName,
): ActivityPolicy => {
  const override = config.states[state] ?? {};
  return {
    timeoutMs: override.timeoutMs ?? config.activity.timeoutMs,
    maxAttempts: override.maxAttempts ?? config.activity.maxAttempts,
    backoff: { ...config.activity.backoff, ...override.backoff },
  };
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isStringArray = (value: unknown): value is string[] =>
  Array.isArray(value) && value.every((v) => typeof v === "string");

const positiveNumber = (value: unknown, fallback: number): number =>
  typeof value === "number" && Number.isFinite(value) && value >= 0
    ? value
    : fallback;

const fraction = (value: unknown, fallback: number): number =>
  typeof value === "number" && value >= 0 && value <= 1 ? value : fallback;

const integer = (value: unknown, fallback: number, min = 1): number =>
  typeof value === "number" && Number.isInteger(value) && value >= min
    ? value
    : fallback;

const str = (value: unknown, fallback: string): string =>
  typeof value === "string" && value.length > 0 ? value : fallback;

const optionalStr = (value: unknown, fallback?: string): string | undefined =>
  typeof value === "string" && value.length > 0 ? value : fallback;

const normalizeBackoff = (
  raw: unknown,
  fallback: BackoffPolicy,
): BackoffPolicy => {
  if (!isRecord(raw)) return fallback;
  return {
    initialMs: positiveNumber(raw.initialMs, fallback.initialMs),
    multiplier: positiveNumber(raw.multiplier, fallback.multiplier),
    maxMs: positiveNumber(raw.maxMs, fallback.maxMs),
  };
};

const normalizeActivity = (
  raw: unknown,
  fallback: ActivityPolicy,
): ActivityPolicy => {
  if (!isRecord(raw)) return fallback;
  return {
    timeoutMs: integer(raw.timeoutMs, fallback.timeoutMs),
    maxAttempts: integer(raw.maxAttempts, fallback.maxAttempts),
    backoff: normalizeBackoff(raw.backoff, fallback.backoff),
  };
};

const normalizeStates = (raw: unknown): StatePolicyOverrides | undefined => {
  if (!isRecord(raw)) return undefined;
  const result: StatePolicyOverrides = {};
  for (const [state, value] of Object.entries(raw)) {
    if (!isWorkflowStateName(state) || !isRecord(value)) continue;
    const override: Partial<ActivityPolicy> = {};
    if (typeof value.timeoutMs === "number" && value.timeoutMs >= 1)
      override.timeoutMs = value.timeoutMs;
    if (typeof value.maxAttempts === "number" && value.maxAttempts >= 1)
      override.maxAttempts = Math.floor(value.maxAttempts);
    if (isRecord(value.backoff))
      override.backoff = normalizeBackoff(
        value.backoff,
        defaultWorkerConfig.activity.backoff,
      );
    if (Object.keys(override).length > 0) result[state] = override;
  }
  return result;
};

const normalizeCosts = (raw: unknown, fallback: CostTable): CostTable => {
  if (!isRecord(raw)) return fallback;
  return {
    searchMicros: positiveNumber(raw.searchMicros, fallback.searchMicros),
    crawlMicros: positiveNumber(raw.crawlMicros, fallback.crawlMicros),
    escalationMicros: positiveNumber(
      raw.escalationMicros,
      fallback.escalationMicros,
    ),
    scrapeMicros: positiveNumber(raw.scrapeMicros, fallback.scrapeMicros),
    mediaMicros: positiveNumber(raw.mediaMicros, fallback.mediaMicros),
    generationInputMicrosPerToken: positiveNumber(
      raw.generationInputMicrosPerToken,
      fallback.generationInputMicrosPerToken,
    ),
    generationOutputMicrosPerToken: positiveNumber(
      raw.generationOutputMicrosPerToken,
      fallback.generationOutputMicrosPerToken,
    ),
  };
};

const normalizeServices = (
  raw: unknown,
  fallback: ServiceConfig,
): ServiceConfig => {
  if (!isRecord(raw)) return fallback;
  const section = (key: string): Record<string, unknown> => {
    const value = raw[key];
    return isRecord(value) ? value : {};
  };
  const knowledge = section("knowledge");
  const search = section("search");
  const crawl = section("crawl");
  const escalation = section("escalation");
  const media = section("media");
  const generation = section("generation");

  return {
    knowledge: {
      url: str(knowledge.url, fallback.knowledge.url),
      apiKey: optionalStr(knowledge.apiKey, fallback.knowledge.apiKey),
    },
    search: {
      url: str(search.url, fallback.search.url),
      apiKey: optionalStr(search.apiKey, fallback.search.apiKey),
    },
    crawl: {
      url: optionalStr(crawl.url, fallback.crawl.url),
      timeoutMs: integer(crawl.timeoutMs, fallback.crawl.timeoutMs),
      fallbacks: Array.isArray(crawl.fallbacks)
        ? crawl.fallbacks.filter(isCrawlFallback)
        : fallback.crawl.fallbacks,
    },
    escalation: {
      url: str(escalation.url, fallback.escalation.url),
      apiKey: optionalStr(escalation.apiKey, fallback.escalation.apiKey),
    },
    media: {
      url: str(media.url, fallback.media.url),
      apiKey: optionalStr(media.apiKey, fallback.media.apiKey),
      model: str(media.model, fallback.media.model),
    },
    generation: {
      apiKey: optionalStr(generation.apiKey, fallback.generation.apiKey),
      model: str(generation.model, fallback.generation.model),
      maxTokens: integer(generation.maxTokens, fallback.generation.maxTokens),
    },
    databasePath: str(raw.databasePath, fallback.databasePath),
  };
};

export const normalizeWorkerConfig = (parsed: unknown): WorkerConfig => {
  if (!isRecord(parsed)) {
    return defaultWorkerConfig;
  }

  const d = defaultWorkerConfig;
  return {
    taskQueue: str(parsed.taskQueue, d.taskQueue),
    stateDir: str(parsed.stateDir, d.stateDir),
    logFile: optionalStr(parsed.logFile),
    concurrency: integer(parsed.concurrency, d.concurrency),
    pollIntervalMs: integer(parsed.pollIntervalMs, d.pollIntervalMs),
    healthIntervalMs: integer(parsed.healthIntervalMs, d.healthIntervalMs),
    costCeilingMicros: positiveNumber(
      parsed.costCeilingMicros,
      d.costCeilingMicros,
    ),
    generationReserveMicros: positiveNumber(
      parsed.generationReserveMicros,
      d.generationReserveMicros,
    ),
    maxDeliveries: integer(parsed.maxDeliveries, d.maxDeliveries),
    coverageThreshold: fraction(parsed.coverageThreshold, d.coverageThreshold),
    searchPages: integer(parsed.searchPages, d.searchPages),
    crawlCandidates: integer(parsed.crawlCandidates, d.crawlCandidates, 0),
    crawlAttempts: integer(parsed.crawlAttempts, d.crawlAttempts),
    crawlConcurrency: integer(parsed.crawlConcurrency, d.crawlConcurrency),
    relevanceThreshold: fraction(
      parsed.relevanceThreshold,
      d.relevanceThreshold,
    ),
    rankDecay: fraction(parsed.rankDecay, d.rankDecay),
    unmentionedFactor: fraction(parsed.unmentionedFactor, d.unmentionedFactor),
    maxArticleImages: integer(parsed.maxArticleImages, d.maxArticleImages, 0),
    excludeUrls: isStringArray(parsed.excludeUrls)
      ? parsed.excludeUrls
      : d.excludeUrls,
    activity: normalizeActivity(parsed.activity, d.activity),
    states: normalizeStates(parsed.states) ?? d.states,
    costs: normalizeCosts(parsed.costs, d.costs),
    services: normalizeServices(parsed.services, d.services),
  };
};

const envInt = (value: string | undefined): number | undefined => {
  if (value === undefined) return undefined;
  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? undefined : parsed;
};

const envFloat = (value: string | undefined): number | undefined => {
  if (value === undefined) return undefined;
  const parsed = Number.parseFloat(value);
  return Number.isNaN(parsed) ? undefined : parsed;
};

/** Environment variables win over file configuration. */
export const applyEnvironment = (
  config: WorkerConfig,
  env: NodeJS.ProcessEnv,
): WorkerConfig => {
  const services = config.services;
  return normalizeWorkerConfig({
    ...config,
    taskQueue: env.TASK_QUEUE ?? config.taskQueue,
    logFile: env.LOG_FILE ?? config.logFile,
    concurrency: envInt(env.WORKER_CONCURRENCY) ?? config.concurrency,
    costCeilingMicros:
      envInt(env.COST_CEILING_MICROS) ?? config.costCeilingMicros,
    coverageThreshold:
      envFloat(env.COVERAGE_THRESHOLD) ?? config.coverageThreshold,
    services: {
      ...services,
      knowledge: {
        url: env.ZEP_API_URL ?? services.knowledge.url,
        apiKey: env.ZEP_API_KEY ?? services.knowledge.apiKey,
      },
      search: {
        ...services.search,
        apiKey: env.SERPER_API_KEY ?? services.search.apiKey,
      },
      crawl: {
        ...services.crawl,
        url: env.CRAWL_SERVICE_URL ?? services.crawl.url,
      },
      escalation: {
        ...services.escalation,
        apiKey: env.FIRECRAWL_API_KEY ?? services.escalation.apiKey,
      },
      media: {
        ...services.media,
        apiKey: env.REPLICATE_API_TOKEN ?? services.media.apiKey,
      },
      generation: {
        ...services.generation,
        apiKey: env.ANTHROPIC_API_KEY ?? services.generation.apiKey,
      },
      databasePath: env.DATABASE_PATH ?? services.databasePath,
    },
  });
};

const readConfigFile = async (cwd: string): Promise<unknown> => {
  const tsPath = path.join(cwd, ".content-worker", "config.ts");
  if (fs.existsSync(tsPath)) {
    const jiti = createJiti(import.meta.url);
    const loaded = await jiti.import(tsPath);
    return isRecord(loaded) && "default" in loaded
      ? (loaded.default ?? loaded)
      : loaded;
  }

  const jsonPath = path.join(cwd, ".content-worker", "config.json");
  if (!fs.existsSync(jsonPath)) {
    return undefined;
  }
  return JSON.parse(fs.readFileSync(jsonPath, "utf8")) as unknown;
};

export const loadWorkerConfig = async (
  cwd: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<WorkerConfig> => {
  const fromFile = normalizeWorkerConfig(await readConfigFile(cwd));
  return applyEnvironment(fromFile, env);
};
