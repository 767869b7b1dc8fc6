// @vitest-environment jsdom
import { cleanup, render, screen } from "@testing-library/react";
import { afterEach, describe, expect, it } from "vitest";
import { buildChartData } from "@/lib/agents/visual-gap-mapper";
import type { Competitor, FeatureMatrix } from "@/lib/types";
import CompetitorsPanel from "./competitors-panel";
import FeatureHeatmap, { presenceLabel } from "./feature-heatmap";
import IssuesNotice from "./issues-notice";
import LandscapeTable from "./landscape-table";
import StrategyPanel from "./strategy-panel";

afterEach(cleanup);

const competitors: Competitor[] = [
  { name: "Competitor A", description: "Beans.", notableFeatures: ["Roaster variety"], sourceUrls: [] },
  { name: "Competitor B", description: "Boxes.", notableFeatures: [], sourceUrls: [] },
];

describe("CompetitorsPanel", () => {
  it("shows one expandable entry per competitor", () => {
    render(<CompetitorsPanel competitors={competitors} />);

    expect(screen.getByRole("button", { name: "Competitor A" })).toBeTruthy();
    expect(screen.getByRole("button", { name: "Competitor B" })).toBeTruthy();
  });

  it("explains an empty result", () => {
    render(<CompetitorsPanel competitors={[]} />);

    expect(screen.getByText("No competitors were found for this idea.")).toBeTruthy();
  });
});

describe("FeatureHeatmap", () => {
  it("labels each cell with the matrix value", () => {
    const matrix: FeatureMatrix = {
      "Competitor A": { "Gift cards": true },
      "Competitor B": { "Gift cards": "enterprise only" },
    };
    render(<FeatureHeatmap chart={buildChartData(matrix, competitors)} matrix={matrix} />);

    const row = screen.getByRole("rowheader", { name: "Gift cards" }).closest("tr");
    const cells = Array.from(row?.querySelectorAll("td") ?? []).map((td) => td.textContent);
    expect(cells).toEqual(["✓", "enterprise only"]);
  });

  it("renders absent values as a dash", () => {
    expect(presenceLabel(false)).toBe("—");
    expect(presenceLabel(undefined)).toBe("—");
  });
});

describe("StrategyPanel", () => {
  it("renders the narrative as markdown and hides empty sections", () => {
    render(
      <StrategyPanel
        report={{
          gaps: ["No gifting"],
          opportunities: [],
          positioningNarrative: "Own **gifting**.",
          keyDifferentiators: [],
          opportunityMap: [],
        }}
      />
    );

    expect(screen.getByText("gifting").tagName).toBe("STRONG");
    expect(screen.getByText("No gifting")).toBeTruthy();
    expect(screen.queryByText("Opportunities")).toBeNull();
    expect(screen.queryByText("Key Differentiators")).toBeNull();
    expect(screen.queryByText("Opportunity Map")).toBeNull();
  });

  it("groups the opportunity map by type", () => {
    render(
      <StrategyPanel
        report={{
          gaps: [],
          opportunities: [],
          positioningNarrative: "Niche.",
          keyDifferentiators: [],
          opportunityMap: [
            { type: "niche", category: "Underserved Segments", description: "Office coffee clubs" },
            { type: "pricing", category: "Value-Based Pricing", description: "Pay per cup" },
          ],
        }}
      />
    );

    expect(screen.getAllByRole("heading", { level: 4 }).map((h) => h.textContent)).toEqual([
      "Pricing Opportunities",
      "Niche Markets",
    ]);
    expect(screen.getByText("Office coffee clubs")).toBeTruthy();
    expect(screen.getByText("Value-Based Pricing")).toBeTruthy();
  });
});

describe("LandscapeTable", () => {
  it("shows one row per competitor", () => {
    render(
      <LandscapeTable
        landscape={[
          { name: "Competitor A", pricingModel: "$18 per bag", targetAudience: "Home baristas", usp: "Rotating roasters", featureCount: 2 },
        ]}
      />
    );

    const row = screen.getByRole("rowheader", { name: "Competitor A" }).closest("tr");
    const cells = Array.from(row?.querySelectorAll("td") ?? []).map((td) => td.textContent);
    expect(cells).toEqual(["$18 per bag", "Home baristas", "Rotating roasters", "2"]);
  });

  it("renders nothing without competitors", () => {
    const { container } = render(<LandscapeTable landscape={[]} />);

    expect(container.innerHTML).toBe("");
  });
});

describe("IssuesNotice", () => {
  it("lists each degraded step", () => {
    render(
      <IssuesNotice
        issues={[{ step: "features", code: "MalformedModelOutput", message: "Model response is not valid JSON." }]}
      />
    );

    expect(screen.getByRole("status").textContent).toContain(
      "Feature matrix: Model response is not valid JSON."
    );
  });

  it("renders nothing without issues", () => {
    const { container } = render(<IssuesNotice issues={[]} />);

    expect(container.innerHTML).toBe("");
  });
});
