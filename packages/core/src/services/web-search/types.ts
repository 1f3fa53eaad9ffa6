export interface WebSearchClient {
  search(query: string, systemContext?: string): Promise<WebSearchResult>;
}

/** Grounded search output: the provider's condensed page content plus where it came from. */
export interface WebSearchResult {
  readonly query: string;
  readonly content: string;
  readonly sourceUrls: readonly string[];
}
