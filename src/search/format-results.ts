/**
 * format-results.ts - Formats search results for the terminal
 *
 * Converts SearchResult arrays into readable text for the CLI's `search`
 * command.
 *
 * Design choices:
 * - Numbered results, so a reader can refer to one
 * - Score and the strategy that produced it on the first line, since
 *   scores only compare within one strategy
 * - Source details and metadata on their own lines
 */

import type { SearchResult } from "../vectorstore/types";

/** Longest content excerpt shown per result. */
const EXCERPT_LENGTH = 200;

/**
 * Example output:
 *   Found 2 results in "Board Minutes":
 *
 *   1. minutes-3.pdf (score: 0.92, hybrid)
 *      Library hours extended to 9pm on weekdays...
 *      Page 4, section Services
 *      Metadata: year=2024
 */
export function formatSearchResults(results: SearchResult[], collection: string): string {
  if (results.length === 0) {
    return `No results found in "${collection}".`;
  }

  const header = `Found ${results.length} result${results.length === 1 ? "" : "s"} in "${collection}":\n`;

  const formatted = results.map((result, index) => {
    const lines = [
      `${index + 1}. ${result.source} (score: ${result.score.toFixed(2)}, ${result.strategy})`,
      `   ${excerpt(result.content)}`,
    ];

    const location = formatLocation(result);
    if (location) lines.push(`   ${location}`);

    const metadataLine = formatMetadata(result.metadata);
    if (metadataLine) lines.push(`   Metadata: ${metadataLine}`);

    return lines.join("\n");
  });

  return header + "\n" + formatted.join("\n\n");
}

function excerpt(content: string): string {
  const flat = content.replace(/\s+/g, " ").trim();
  return flat.length > EXCERPT_LENGTH ? `${flat.slice(0, EXCERPT_LENGTH)}...` : flat;
}

function formatLocation(result: SearchResult): string {
  const parts: string[] = [];
  if (result.page !== undefined) parts.push(`Page ${result.page}`);
  if (result.section) parts.push(`section ${result.section}`);
  return parts.join(", ");
}

/**
 * Formats metadata key-value pairs into a readable string.
 * Example: "year=2024, committee=Finance"
 */
function formatMetadata(metadata: Record<string, unknown>): string {
  const entries = Object.entries(metadata);
  if (entries.length === 0) return "";
  return entries
    .map(([key, value]) => `${key}=${typeof value === "object" ? JSON.stringify(value) : String(value)}`)
    .join(", ");
}
