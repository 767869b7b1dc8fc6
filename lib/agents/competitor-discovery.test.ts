import { describe, expect, it, vi } from "vitest";
import { InvalidInputError } from "../errors";
import { coffeeCompetitorsJson, coffeeResults, fakeContext } from "@/test/fakes";
import {
  buildDiscoveryPrompt,
  buildDiscoveryQuery,
  discoverCompetitors,
  isAggregatorUrl,
  normalizeCompetitors,
} from "./competitor-discovery";

describe("buildDiscoveryQuery", () => {
  it("collapses whitespace into the broad competitor query", () => {
    expect(buildDiscoveryQuery("  meal kits\nfor  students ")).toBe(
      "top meal kits for students competitors alternatives"
    );
  });
});

describe("isAggregatorUrl", () => {
  it("flags review and comparison sites", () => {
    expect(isAggregatorUrl("https://www.capterra.com/p/123")).toBe(true);
    expect(isAggregatorUrl("https://example.com/best-alternatives-2025")).toBe(true);
    expect(isAggregatorUrl("https://competitor-a.example.com")).toBe(false);
  });
});

describe("buildDiscoveryPrompt", () => {
  it("numbers every search result and states the competitor limit", () => {
    const prompt = buildDiscoveryPrompt("coffee box", coffeeResults, 4);

    expect(prompt).toContain(
      "[2] Competitor B - curated coffee boxes\nURL: https://competitor-b.example.com"
    );
    expect(prompt).toContain("Identify up to 4 real companies");
  });
});

describe("normalizeCompetitors", () => {
  const results = [
    ...coffeeResults,
    { title: "Top 10 alternatives", snippet: "...", url: "https://reviews.example.com/coffee" },
  ];

  it("merges duplicate names and unions their features and sources", () => {
    const competitors = normalizeCompetitors(
      [
        {
          name: "Competitor A",
          description: "First take.",
          notableFeatures: ["Roaster variety"],
          sourceUrls: ["https://competitor-a.example.com"],
        },
        {
          name: "competitor a",
          description: "Second take.",
          notableFeatures: ["roaster variety", "Gift cards"],
          sourceUrls: ["https://competitor-b.example.com"],
        },
      ],
      results,
      6
    );

    expect(competitors).toEqual([
      {
        name: "Competitor A",
        description: "First take.",
        notableFeatures: ["Roaster variety", "Gift cards"],
        sourceUrls: ["https://competitor-a.example.com", "https://competitor-b.example.com"],
      },
    ]);
  });

  it("drops source URLs that were not returned by the search or are aggregators", () => {
    const [competitor] = normalizeCompetitors(
      [
        {
          name: "Competitor B",
          description: "",
          notableFeatures: [],
          sourceUrls: [
            "https://made-up.example.com",
            "https://reviews.example.com/coffee",
            "https://competitor-b.example.com",
          ],
        },
      ],
      results,
      6
    );

    expect(competitor.sourceUrls).toEqual(["https://competitor-b.example.com"]);
  });

  it("fills pricing, audience and USP from the first entry that knows them", () => {
    const [competitor] = normalizeCompetitors(
      [
        {
          name: "Competitor A",
          description: "",
          notableFeatures: [],
          sourceUrls: [],
          pricingModel: "N/A",
          usp: "Rotating roasters",
        },
        {
          name: "Competitor A",
          description: "",
          notableFeatures: [],
          sourceUrls: [],
          pricingModel: "$18 per bag",
          usp: "Cheapest beans",
        },
      ],
      results,
      6
    );

    expect(competitor.pricingModel).toBe("$18 per bag");
    expect(competitor.usp).toBe("Rotating roasters");
    expect(competitor.targetAudience).toBeUndefined();
  });

  it("skips empty names and caps the list", () => {
    const raw = ["", "One", "Two", "Three"].map((name) => ({
      name,
      description: "",
      notableFeatures: [],
      sourceUrls: [],
    }));

    expect(normalizeCompetitors(raw, results, 2).map((c) => c.name)).toEqual(["One", "Two"]);
  });
});

describe("discoverCompetitors", () => {
  it("throws InvalidInputError for a blank idea", async () => {
    const { ctx, search } = fakeContext();

    await expect(discoverCompetitors("  ", ctx)).rejects.toBeInstanceOf(InvalidInputError);
    expect(search.calls).toHaveLength(0);
  });

  it("searches with the configured result limit and parses the competitor list", async () => {
    const { ctx, search } = fakeContext({
      results: coffeeResults,
      responses: [coffeeCompetitorsJson],
      config: { searchMaxResults: 5 },
    });

    const { data, issue } = await discoverCompetitors("artisanal coffee box", ctx);

    expect(search.calls).toEqual([
      {
        query: "top artisanal coffee box competitors alternatives",
        options: { maxResults: 5 },
      },
    ]);
    expect(issue).toBeUndefined();
    expect(data.map((c) => c.name)).toEqual(["Competitor A", "Competitor B"]);
    expect(data[0].notableFeatures).toEqual(["Roaster variety", "Flexible delivery"]);
    expect(data[0].targetAudience).toBe("Home espresso enthusiasts");
    expect(data[1].pricingModel).toBeUndefined();
  });

  it("returns an empty list without calling the model when the search is empty", async () => {
    const { ctx, llm } = fakeContext({ results: [] });
    const invoke = vi.spyOn(llm, "invoke");

    const result = await discoverCompetitors("coffee", ctx);

    expect(result).toEqual({ data: [] });
    expect(invoke).not.toHaveBeenCalled();
  });

  it("degrades a malformed model reply to an empty list", async () => {
    const { ctx } = fakeContext({
      results: coffeeResults,
      responses: ['{"competitors": "Competitor A, Competitor B"}'],
    });

    const { data, issue } = await discoverCompetitors("coffee", ctx);

    expect(data).toEqual([]);
    expect(issue?.step).toBe("discovery");
    expect(issue?.code).toBe("MalformedModelOutput");
  });

  it("degrades a model outage to an empty list", async () => {
    const { ctx, llm } = fakeContext({ results: coffeeResults });
    vi.spyOn(llm, "invoke").mockRejectedValueOnce(new Error("quota exceeded"));

    const { data, issue } = await discoverCompetitors("coffee", ctx);

    expect(data).toEqual([]);
    expect(issue).toEqual({
      step: "discovery",
      code: "ModelUnavailable",
      message: "Model call failed: quota exceeded",
    });
  });
});
