import { describe, it, expect } from "vitest";
import { formatSearchResults } from "./format-results";
import type { SearchResult } from "../vectorstore/types";

function result(overrides: Partial<SearchResult> = {}): SearchResult {
  return {
    id: "id-1",
    content: "Library hours extended to 9pm on weekdays",
    source: "minutes-3.pdf",
    sourceType: "pdf",
    metadata: {},
    score: 0.921,
    strategy: "hybrid",
    ...overrides,
  };
}

describe("formatSearchResults", () => {
  it("reports an empty result set", () => {
    expect(formatSearchResults([], "Board Minutes")).toBe('No results found in "Board Minutes".');
  });

  it("numbers results with score and strategy", () => {
    const output = formatSearchResults(
      [result(), result({ source: "b.pdf", score: 0.5, strategy: "keyword" })],
      "Docs"
    );

    expect(output).toBe(
      'Found 2 results in "Docs":\n\n' +
        "1. minutes-3.pdf (score: 0.92, hybrid)\n" +
        "   Library hours extended to 9pm on weekdays\n\n" +
        "2. b.pdf (score: 0.50, keyword)\n" +
        "   Library hours extended to 9pm on weekdays"
    );
  });

  it("adds location and metadata lines when present", () => {
    const output = formatSearchResults(
      [result({ page: 4, section: "Services", metadata: { year: 2024, tags: ["a"] } })],
      "Docs"
    );

    expect(output.split("\n")).toEqual([
      'Found 1 result in "Docs":',
      "",
      "1. minutes-3.pdf (score: 0.92, hybrid)",
      "   Library hours extended to 9pm on weekdays",
      "   Page 4, section Services",
      '   Metadata: year=2024, tags=["a"]',
    ]);
  });

  it("truncates long content to an excerpt", () => {
    const output = formatSearchResults([result({ content: "x".repeat(250) })], "Docs");

    expect(output.split("\n")[3]).toBe(`   ${"x".repeat(200)}...`);
  });
});
