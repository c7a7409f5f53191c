import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import axios, { type AxiosAdapter, type AxiosInstance } from "axios";
import { TransientError } from "../core/errors";

export interface SearchHit {
  url: string;
  title: string;
  snippet: string;
  /** 1-based position across pages. */
  rank: number;
}

export interface SearchProvider {
  search(query: string, page: number, signal?: AbortSignal): Promise<SearchHit[]>;
}

const NewsItemSchema = Type.Object({
  link: Type.String(),
  title: Type.Optional(Type.String()),
  snippet: Type.Optional(Type.String()),
  position: Type.Optional(Type.Number()),
});

const NewsResponseSchema = Type.Object({
  news: Type.Optional(Type.Array(NewsItemSchema)),
});

export interface SerperOptions {
  url: string;
  apiKey?: string;
  resultsPerPage?: number;
  adapter?: AxiosAdapter;
}

export class SerperSearchProvider implements SearchProvider {
  private readonly http: AxiosInstance;
  private readonly resultsPerPage: number;

  constructor(options: SerperOptions) {
    this.resultsPerPage = options.resultsPerPage ?? 10;
    this.http = axios.create({
      baseURL: options.url,
      timeout: 30_000,
      headers: {
        "Content-Type": "application/json",
        ...(options.apiKey ? { "X-API-KEY": options.apiKey } : {}),
      },
      ...(options.adapter ? { adapter: options.adapter } : {}),
    });
  }

  async search(
    query: string,
    page: number,
    signal?: AbortSignal,
  ): Promise<SearchHit[]> {
    const response = await this.http.post<unknown>(
      "/news",
      { q: query, num: this.resultsPerPage, page },
      { signal },
    );

    if (!Value.Check(NewsResponseSchema, response.data)) {
      throw new TransientError("search provider returned an unexpected payload");
    }

    const offset = (page - 1) * this.resultsPerPage;
    return (response.data.news ?? []).map((item, index) => ({
      url: item.link,
      title: item.title ?? "",
      snippet: item.snippet ?? "",
      rank: offset + (item.position ?? index + 1),
    }));
  }
}
