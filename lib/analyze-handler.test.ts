import { describe, expect, it, vi } from "vitest";
import {
  coffeeCompetitorsJson,
  coffeeMatrixJson,
  coffeeResults,
  coffeeStrategyJson,
  fakeContext,
} from "@/test/fakes";
import { createAnalyzeHandler } from "./analyze-handler";
import type { AnalysisContext } from "./context";
import { ConfigurationError } from "./errors";
import { readEvents, type AnalysisEvent } from "./stream";

const post = (body: string) =>
  new Request("http://localhost/api/analyze", {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body,
  });

async function collect(response: Response): Promise<AnalysisEvent[]> {
  const events: AnalysisEvent[] = [];
  if (response.body) await readEvents(response.body, (event) => events.push(event));
  return events;
}

describe("POST /api/analyze", () => {
  it.each([
    ['{"idea": "   "}', "Describe your startup idea before running the analysis."],
    ['{"topic": "coffee"}', "Missing or invalid 'idea' in request body."],
    ["not json", "Request body must be JSON."],
  ])("rejects %s with 400 before building a context", async (body, message) => {
    const getContext = vi.fn<() => AnalysisContext>();
    const handler = createAnalyzeHandler(getContext);

    const response = await handler(post(body));

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ error: "InvalidInput", message });
    expect(getContext).not.toHaveBeenCalled();
  });

  it("reports missing configuration with 500", async () => {
    const handler = createAnalyzeHandler(() => {
      throw new ConfigurationError("Invalid configuration: TAVILY_API_KEY.", ["TAVILY_API_KEY"]);
    });

    const response = await handler(post('{"idea": "coffee box"}'));

    expect(response.status).toBe(500);
    expect(await response.json()).toEqual({
      error: "ConfigurationError",
      message: "Invalid configuration: TAVILY_API_KEY.",
    });
  });

  it("streams progress for every step followed by the bundle", async () => {
    const { ctx } = fakeContext({
      results: coffeeResults,
      responses: [coffeeCompetitorsJson, coffeeMatrixJson, coffeeStrategyJson],
    });
    const handler = createAnalyzeHandler(() => ctx);

    const response = await handler(post('{"idea": " artisanal coffee box "}'));
    const events = await collect(response);

    expect(response.headers.get("Content-Type")).toBe("application/x-ndjson; charset=utf-8");
    expect(events.slice(0, -1)).toEqual(
      (["discovery", "features", "strategy", "chart"] as const).flatMap((step) => [
        { type: "progress", step, status: "started" },
        { type: "progress", step, status: "completed" },
      ])
    );

    const last = events[events.length - 1];
    expect(last.type).toBe("result");
    if (last.type !== "result") return;
    expect(last.bundle.query).toBe("artisanal coffee box");
    expect(last.bundle.chart.categories).toEqual(["Competitor A", "Competitor B"]);
    expect(last.bundle.partial).toBe(false);
  });

  it("ends the stream with an error event on an unexpected failure", async () => {
    const { ctx } = fakeContext({ searchFailure: new Error("socket closed") });
    const handler = createAnalyzeHandler(() => ctx);

    const events = await collect(await handler(post('{"idea": "coffee box"}')));

    expect(events).toEqual([
      { type: "progress", step: "discovery", status: "started" },
      { type: "error", error: "InternalError", message: "socket closed" },
    ]);
  });
});
