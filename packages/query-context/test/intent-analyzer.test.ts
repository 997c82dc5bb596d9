import { describe, expect, it } from "vitest";

import { analyzeQuery } from "../src/intent-analyzer.ts";
import { activeIntents } from "../src/intents.ts";

const SHEETS = ["TURN-COS-GP_RM", "Divisions", "Notes"];

describe("analyzeQuery", () => {
  it("detects entity search and the mentioned sheet", () => {
    const { scores, filters } = analyzeQuery("what companies are in sheet TURN-COS-GP_RM", SHEETS);

    expect(scores.entity_search).toBe(0.5);
    expect(scores.financial_analysis).toBe(0);
    expect(scores.general_overview).toBe(0);
    expect(filters.mentionedSheets).toEqual(["TURN-COS-GP_RM"]);
    expect(filters.keywordTerms).toEqual(["companies"]);
    expect(filters.numericComparisons).toEqual([]);
  });

  it("activates several intents at once", () => {
    const { scores } = analyzeQuery("revenue of Holdings Bhd", SHEETS);

    expect(scores.entity_search).toBe(1);
    expect(scores.financial_analysis).toBe(0.5);
    expect(activeIntents(scores).map((intent) => intent.label)).toEqual(["entity_search", "financial_analysis"]);
  });

  it("reports entity cues even when they sit inside a sheet name", () => {
    const { scores, filters } = analyzeQuery("list the companies in Companies", ["Companies"]);

    expect(scores.entity_search).toBe(0.5);
    expect(filters.mentionedSheets).toEqual(["Companies"]);
    expect(filters.keywordTerms).toEqual([]);
    expect(filters.entityCues).toEqual(["companies"]);
    expect(analyzeQuery("revenue of Holdings Bhd", SHEETS).filters.entityCues).toEqual(["bhd", "holdings"]);
  });

  it("does not activate entity search without entity cues in the query", () => {
    const { scores, filters } = analyzeQuery("division names", SHEETS);

    expect(scores.entity_search).toBe(0);
    expect(activeIntents(scores)).toEqual([{ label: "general_overview", score: 1 }]);
    expect(filters.keywordTerms).toEqual(["division"]);
  });

  it("falls back to general_overview for empty or cue-less text", () => {
    for (const text of ["", "   ", "hello there", "?!#", "\u0000"]) {
      expect(activeIntents(analyzeQuery(text, SHEETS).scores)).toEqual([{ label: "general_overview", score: 1 }]);
    }
  });

  it("extracts a greater-than comparison", () => {
    const { scores, filters } = analyzeQuery("revenue over 500000000", SHEETS);

    expect(filters.numericComparisons).toEqual([{ operator: "gt", threshold: 500000000 }]);
    expect(scores.numeric_filter).toBe(0.5);
    expect(scores.financial_analysis).toBe(0.5);
    expect(filters.keywordTerms).toEqual(["revenue"]);
  });

  it("normalizes comparison phrases, magnitudes and currency", () => {
    expect(analyzeQuery("profit above 1.5 million", []).filters.numericComparisons).toEqual([
      { operator: "gt", threshold: 1500000 },
    ]);
    expect(analyzeQuery("costs at least RM 2,000", []).filters.numericComparisons).toEqual([{ operator: "ge", threshold: 2000 }]);
    expect(analyzeQuery("revenue greater than or equal to 10", []).filters.numericComparisons).toEqual([
      { operator: "ge", threshold: 10 },
    ]);
    expect(analyzeQuery("anything above $5m", []).filters.numericComparisons).toEqual([{ operator: "gt", threshold: 5000000 }]);
    expect(analyzeQuery("expenses exactly 42", []).filters.numericComparisons).toEqual([{ operator: "eq", threshold: 42 }]);
  });

  it("keeps comparisons in query order", () => {
    const { scores, filters } = analyzeQuery("amounts less than 500k and more than 100", []);

    expect(filters.numericComparisons).toEqual([
      { operator: "lt", threshold: 500000 },
      { operator: "gt", threshold: 100 },
    ]);
    expect(scores.numeric_filter).toBe(1);
  });

  it("drops comparisons whose number does not parse", () => {
    const { filters } = analyzeQuery("revenue over 1,2,3", []);
    expect(filters.numericComparisons).toEqual([]);
  });

  it("matches sheet names on boundaries only", () => {
    expect(analyzeQuery("totals for q10", ["Q1", "Q10"]).filters.mentionedSheets).toEqual(["Q10"]);
    expect(analyzeQuery("compare Q1 and Q10", ["Q1", "Q10"]).filters.mentionedSheets).toEqual(["Q1", "Q10"]);
  });

  it("removes stopwords and mentioned sheet tokens from keyword terms", () => {
    const { filters } = analyzeQuery("Show revenue for ABC Corporation in Divisions", SHEETS);
    expect(filters.keywordTerms).toEqual(["revenue", "abc", "corporation"]);
  });

  it("scores listing and structure cues", () => {
    const listing = analyzeQuery("which sheets are in the workbook", SHEETS).scores;
    expect(listing.sheet_listing).toBe(1);

    const structure = analyzeQuery("how many rows and columns", SHEETS).scores;
    expect(structure.structural_query).toBe(1);
    expect(structure.sheet_listing).toBe(0);
  });

  it("honours a custom cue saturation", () => {
    const { scores } = analyzeQuery("what companies are listed", [], { cueSaturation: 1 });
    expect(scores.entity_search).toBe(1);
  });
});
