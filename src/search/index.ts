/**
 * search/index.ts - Public API for the search module
 */

export { SearchEngine, type SearchEngineOptions, type SearchRequest } from "./search-engine";
export { GraphQLSearch, buildGetQuery, type GraphQLSearchRequest } from "./graphql-search";
export { formatSearchResults } from "./format-results";
export { applyFilters, clamp01, vectorScore } from "./results";
