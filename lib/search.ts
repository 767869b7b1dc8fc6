import axios, { type AxiosInstance, type AxiosResponse } from "axios";
import { z } from "zod";
import type { AppConfig } from "./config";
import { SearchUnavailableError, errorMessage } from "./errors";
import type { SearchResult } from "./types";

export interface SearchOptions {
  maxResults: number;
}

export interface SearchClient {
  search(query: string, options: SearchOptions): Promise<SearchResult[]>;
}

const TavilyResponseSchema = z.object({
  results: z
    .array(
      z.object({
        title: z.string().nullish(),
        url: z.string().nullish(),
        content: z.string().nullish(),
      })
    )
    .nullish(),
});

const TAVILY_URL = "https://api.tavily.com/search";
const RETRY_DELAY_MS = 250;

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/** No response at all, a timeout, rate limiting or a 5xx. */
export function isTransientError(error: unknown): boolean {
  if (!axios.isAxiosError(error)) return false;
  if (!error.response) return true;
  const status = error.response.status;
  return status === 429 || status >= 500;
}

export class TavilySearchClient implements SearchClient {
  constructor(
    private readonly apiKey: string,
    private readonly http: AxiosInstance,
    private readonly retryDelayMs = RETRY_DELAY_MS
  ) {}

  async search(query: string, { maxResults }: SearchOptions): Promise<SearchResult[]> {
    const request = () =>
      this.http.post<unknown>(
        TAVILY_URL,
        { query, max_results: maxResults, search_depth: "advanced" },
        { headers: { Authorization: `Bearer ${this.apiKey}` } }
      );

    let response: AxiosResponse<unknown>;
    try {
      response = await request();
    } catch (error) {
      if (!isTransientError(error)) {
        throw new SearchUnavailableError(`Search failed: ${errorMessage(error)}`, error);
      }
      // one gentle retry
      console.warn("⚠️ Search request failed, retrying once:", errorMessage(error));
      await sleep(this.retryDelayMs);
      try {
        response = await request();
      } catch (retryError) {
        throw new SearchUnavailableError(
          `Search failed after retry: ${errorMessage(retryError)}`,
          retryError
        );
      }
    }

    const parsed = TavilyResponseSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new SearchUnavailableError("Search returned an unexpected response.", parsed.error);
    }

    const results: SearchResult[] = [];
    for (const r of parsed.data.results ?? []) {
      if (!r.url) continue;
      results.push({
        title: (r.title ?? "").trim(),
        snippet: (r.content ?? "").replace(/\s+/g, " ").trim(),
        url: r.url,
      });
    }
    return results.slice(0, maxResults);
  }
}

export function createSearchClient(config: AppConfig): SearchClient {
  const http = axios.create({ timeout: config.requestTimeoutMs });
  return new TavilySearchClient(config.tavilyApiKey, http);
}
