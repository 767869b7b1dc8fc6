import axios, { AxiosError, type AxiosAdapter, type InternalAxiosRequestConfig } from "axios";
import { describe, expect, it } from "vitest";
import { fakeContext } from "@/test/fakes";
import { runAnalysis } from "./agents/orchestrator";
import { SearchUnavailableError } from "./errors";
import { TavilySearchClient, isTransientError } from "./search";

type Reply = { status: number; data?: unknown } | "network-error";

// In-process stand-in for the Tavily endpoint: replies are consumed in order.
function fakeTavily(replies: Reply[]) {
  const requests: InternalAxiosRequestConfig[] = [];
  const adapter: AxiosAdapter = async (config) => {
    requests.push(config);
    const reply = replies.shift() ?? "network-error";
    if (reply === "network-error") {
      throw new AxiosError("socket hang up", "ECONNRESET", config);
    }
    const response = {
      data: reply.data ?? {},
      status: reply.status,
      statusText: String(reply.status),
      headers: {},
      config,
    };
    if (reply.status >= 400) {
      throw new AxiosError(`Request failed with status code ${reply.status}`, "ERR_BAD_RESPONSE", config, null, response);
    }
    return response;
  };

  const client = new TavilySearchClient("test-tavily-key", axios.create({ adapter }), 0);
  return { client, requests };
}

const tavilyResults = {
  results: [
    { title: " Competitor A ", url: "https://competitor-a.example.com", content: "Beans\n\n every   month" },
    { title: "No link", content: "dropped" },
    { title: "Competitor B", url: "https://competitor-b.example.com" },
  ],
};

describe("TavilySearchClient", () => {
  it("maps Tavily results to search results", async () => {
    const { client, requests } = fakeTavily([{ status: 200, data: tavilyResults }]);

    const results = await client.search("coffee", { maxResults: 5 });

    expect(results).toEqual([
      { title: "Competitor A", snippet: "Beans every month", url: "https://competitor-a.example.com" },
      { title: "Competitor B", snippet: "", url: "https://competitor-b.example.com" },
    ]);
    expect(requests).toHaveLength(1);
    expect(requests[0].url).toBe("https://api.tavily.com/search");
    expect(requests[0].headers.Authorization).toBe("Bearer test-tavily-key");
    expect(JSON.parse(String(requests[0].data))).toEqual({
      query: "coffee",
      max_results: 5,
      search_depth: "advanced",
    });
  });

  it("never returns more than the requested number of results", async () => {
    const { client } = fakeTavily([{ status: 200, data: tavilyResults }]);

    expect(await client.search("coffee", { maxResults: 1 })).toHaveLength(1);
  });

  it("retries once after a transient failure", async () => {
    const { client, requests } = fakeTavily(["network-error", { status: 200, data: tavilyResults }]);

    const results = await client.search("coffee", { maxResults: 5 });

    expect(requests).toHaveLength(2);
    expect(results).toHaveLength(2);
  });

  it("gives up after the single retry", async () => {
    const { client, requests } = fakeTavily([{ status: 503 }, { status: 503 }]);

    await expect(client.search("coffee", { maxResults: 5 })).rejects.toThrow(
      new SearchUnavailableError("Search failed after retry: Request failed with status code 503")
    );
    expect(requests).toHaveLength(2);
  });

  it.each([
    ["a null result", { results: [null] }],
    ["results that are not a list", { results: "none" }],
    ["a numeric title", { results: [{ title: 42, url: "https://competitor-a.example.com" }] }],
  ])("rejects a response with %s", async (_label, data) => {
    const { client, requests } = fakeTavily([{ status: 200, data }]);

    await expect(client.search("coffee", { maxResults: 5 })).rejects.toThrow(
      new SearchUnavailableError("Search returned an unexpected response.")
    );
    expect(requests).toHaveLength(1);
  });

  it("lets the analysis continue when the search response is unusable", async () => {
    const { client } = fakeTavily([{ status: 200, data: { results: [null] } }]);
    const { ctx } = fakeContext({
      responses: ['{"gaps": [], "opportunities": [], "positioningNarrative": "Go niche."}'],
    });

    const bundle = await runAnalysis("coffee box", { ...ctx, search: client });

    expect(bundle.competitors).toEqual([]);
    expect(bundle.issues).toEqual([
      { step: "discovery", code: "SearchUnavailable", message: "Search returned an unexpected response." },
    ]);
    expect(bundle.report.positioningNarrative).toBe("Go niche.");
  });

  it("does not retry a rejected API key", async () => {
    const { client, requests } = fakeTavily([{ status: 401 }]);

    await expect(client.search("coffee", { maxResults: 5 })).rejects.toBeInstanceOf(SearchUnavailableError);
    expect(requests).toHaveLength(1);
  });
});

describe("isTransientError", () => {
  it("only treats axios failures without a response, 429 and 5xx as transient", () => {
    const config = { headers: new axios.AxiosHeaders() };
    const withStatus = (status: number) =>
      new AxiosError("failed", "ERR", config, null, {
        data: {},
        status,
        statusText: "",
        headers: {},
        config,
      });

    expect(isTransientError(new AxiosError("timeout", "ECONNABORTED", config))).toBe(true);
    expect(isTransientError(withStatus(429))).toBe(true);
    expect(isTransientError(withStatus(502))).toBe(true);
    expect(isTransientError(withStatus(400))).toBe(false);
    expect(isTransientError(new Error("boom"))).toBe(false);
  });
});
