import { SnippetSource } from "../types/sources";
import { errorMessage } from "../errors";

/**
 * Snippet bodies for a query. A source failure yields no evidence rather than an error.
 */
export async function gatherSnippets(
  source: SnippetSource,
  query: string,
  maxResults: number
): Promise<string[]> {
  try {
    const results = await source.search(query, maxResults);
    return results
      .map(r => r.body.trim())
      .filter(body => body.length > 0)
      .slice(0, maxResults);
  } catch (error) {
    console.warn(`[evidence] Search failed for ${query}: ${errorMessage(error)}`);
    return [];
  }
}
