import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import axios, { type AxiosAdapter, type AxiosInstance } from "axios";
import { TransientError } from "../core/errors";

export interface EscalationHit {
  url: string;
  title: string;
  text: string;
}

/** Higher-cost search-and-scrape used only to close a coverage gap. */
export interface EscalationProvider {
  research(
    query: string,
    excludeUrls: readonly string[],
    signal?: AbortSignal,
  ): Promise<EscalationHit[]>;
}

const SearchResultSchema = Type.Object({
  url: Type.String(),
  title: Type.Optional(Type.String()),
  description: Type.Optional(Type.String()),
  markdown: Type.Optional(Type.String()),
});

const SearchResponseSchema = Type.Object({
  success: Type.Boolean(),
  data: Type.Optional(Type.Array(SearchResultSchema)),
  error: Type.Optional(Type.String()),
});

export interface FirecrawlOptions {
  url: string;
  apiKey: string;
  limit?: number;
  adapter?: AxiosAdapter;
}

export class FirecrawlEscalationProvider implements EscalationProvider {
  private readonly http: AxiosInstance;
  private readonly limit: number;

  constructor(options: FirecrawlOptions) {
    this.limit = options.limit ?? 5;
    this.http = axios.create({
      baseURL: options.url,
      timeout: 120_000,
      headers: {
        "Content-Type": "application/json",
        Authorization: `Bearer ${options.apiKey}`,
      },
      ...(options.adapter ? { adapter: options.adapter } : {}),
    });
  }

  async research(
    query: string,
    excludeUrls: readonly string[],
    signal?: AbortSignal,
  ): Promise<EscalationHit[]> {
    const response = await this.http.post<unknown>(
      "/v1/search",
      {
        query,
        limit: this.limit + excludeUrls.length,
        scrapeOptions: { formats: ["markdown"], onlyMainContent: true },
      },
      { signal },
    );

    const body = response.data;
    if (!Value.Check(SearchResponseSchema, body) || !body.success) {
      throw new TransientError("escalation provider search failed");
    }

    const excluded = new Set(excludeUrls);
    return (body.data ?? [])
      .filter((result) => !excluded.has(result.url))
      .slice(0, this.limit)
      .map((result) => ({
        url: result.url,
        title: result.title ?? "",
        text: result.markdown ?? result.description ?? "",
      }));
  }
}
