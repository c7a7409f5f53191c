import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import axios, { type AxiosAdapter, type AxiosInstance } from "axios";
import * as cheerio from "cheerio";
import { TransientError } from "../core/errors";
import type { CostBudget } from "./budget";

export interface CrawledPage {
  text: string;
  title?: string;
  structured_facts: Record<string, string>;
}

export interface CrawlService {
  /** Paid providers behind this service charge `budget` before calling out. */
  fetch(url: string, signal?: AbortSignal, budget?: CostBudget): Promise<CrawledPage>;
  ping(): Promise<void>;
}

const CrawlResponseSchema = Type.Object({
  success: Type.Boolean(),
  content: Type.Optional(Type.Union([Type.String(), Type.Null()])),
  title: Type.Optional(Type.Union([Type.String(), Type.Null()])),
  structured_facts: Type.Optional(Type.Record(Type.String(), Type.String())),
  error: Type.Optional(Type.Union([Type.String(), Type.Null()])),
});

export interface CrawlServiceOptions {
  url: string;
  timeoutMs: number;
  adapter?: AxiosAdapter;
}

/** Client for the crawl microservice (`POST /crawl`, `GET /health`). */
export class HttpCrawlService implements CrawlService {
  private readonly http: AxiosInstance;

  constructor(private readonly options: CrawlServiceOptions) {
    this.http = axios.create({
      baseURL: options.url,
      timeout: options.timeoutMs,
      headers: { "Content-Type": "application/json" },
      ...(options.adapter ? { adapter: options.adapter } : {}),
    });
  }

  async fetch(url: string, signal?: AbortSignal): Promise<CrawledPage> {
    const response = await this.http.post<unknown>(
      "/crawl",
      { url, timeout: Math.ceil(this.options.timeoutMs / 1000) },
      { signal },
    );

    const body = response.data;
    if (!Value.Check(CrawlResponseSchema, body)) {
      throw new TransientError(`crawl of ${url} returned an unexpected payload`);
    }
    if (!body.success || !body.content) {
      throw new TransientError(body.error ?? `crawl of ${url} returned no content`);
    }

    return {
      text: body.content,
      ...(body.title ? { title: body.title } : {}),
      structured_facts: body.structured_facts ?? {},
    };
  }

  async ping(): Promise<void> {
    await this.http.get("/health");
  }
}

const ScrapeResponseSchema = Type.Object({
  success: Type.Boolean(),
  data: Type.Optional(
    Type.Object({
      markdown: Type.Optional(Type.String()),
      metadata: Type.Optional(Type.Object({ title: Type.Optional(Type.String()) })),
    }),
  ),
  error: Type.Optional(Type.String()),
});

export interface FirecrawlScrapeOptions {
  url: string;
  apiKey: string;
  timeoutMs: number;
  adapter?: AxiosAdapter;
}

/** Single-page scrape through Firecrawl (`POST /v1/scrape`). */
export class FirecrawlScrapeService implements CrawlService {
  private readonly http: AxiosInstance;

  constructor(options: FirecrawlScrapeOptions) {
    this.http = axios.create({
      baseURL: options.url,
      timeout: options.timeoutMs,
      headers: {
        "Content-Type": "application/json",
        Authorization: `Bearer ${options.apiKey}`,
      },
      ...(options.adapter ? { adapter: options.adapter } : {}),
    });
  }

  async fetch(url: string, signal?: AbortSignal): Promise<CrawledPage> {
    const response = await this.http.post<unknown>(
      "/v1/scrape",
      { url, formats: ["markdown"], onlyMainContent: true },
      { signal },
    );

    const body = response.data;
    if (!Value.Check(ScrapeResponseSchema, body)) {
      throw new TransientError(`scrape of ${url} returned an unexpected payload`);
    }
    const markdown = body.data?.markdown;
    if (!body.success || !markdown) {
      throw new TransientError(body.error ?? `scrape of ${url} returned no content`);
    }

    const title = body.data?.metadata?.title;
    return {
      text: markdown,
      ...(title ? { title } : {}),
      structured_facts: {},
    };
  }

  // Hosted API: no local health to check.
  async ping(): Promise<void> {}
}

export interface PlainHttpCrawlOptions {
  timeoutMs: number;
  userAgent?: string;
  adapter?: AxiosAdapter;
}

const BOILERPLATE = "script, style, noscript, nav, footer, header, aside";

/** Extracts readable text from HTML: main content if marked up, else the body. */
export const htmlToText = (html: string): { text: string; title?: string } => {
  const $ = cheerio.load(html);
  $(BOILERPLATE).remove();

  const title = $("title").first().text().trim();
  const main = $("main, article").first();
  const root = main.length > 0 ? main : $("body");
  const text = root
    .text()
    .split("\n")
    .map((line) => line.replace(/\s+/g, " ").trim())
    .filter(Boolean)
    .join("\n");

  return { text, ...(title ? { title } : {}) };
};

/** Last resort: fetch the page directly and strip it to text. */
export class PlainHttpCrawlService implements CrawlService {
  private readonly http: AxiosInstance;

  constructor(options: PlainHttpCrawlOptions) {
    this.http = axios.create({
      timeout: options.timeoutMs,
      maxRedirects: 5,
      responseType: "text",
      headers: {
        "User-Agent": options.userAgent ?? "content-research-worker/0.1",
        Accept: "text/html,application/xhtml+xml",
      },
      ...(options.adapter ? { adapter: options.adapter } : {}),
    });
  }

  async fetch(url: string, signal?: AbortSignal): Promise<CrawledPage> {
    const response = await this.http.get<unknown>(url, { signal });
    if (typeof response.data !== "string") {
      throw new TransientError(`fetch of ${url} returned no HTML`);
    }

    const page = htmlToText(response.data);
    if (page.text.length === 0) {
      throw new TransientError(`fetch of ${url} returned no readable text`);
    }
    return { ...page, structured_facts: {} };
  }

  async ping(): Promise<void> {}
}
