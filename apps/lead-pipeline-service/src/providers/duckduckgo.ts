import axios, { AxiosInstance } from "axios";
import { parse } from "node-html-parser";
import { SnippetSource } from "../types/sources";
import { Snippet } from "../types/leads";
import { SourceUnavailableError, errorMessage } from "../errors";

const DDG_HTML_URL = "https://html.duckduckgo.com/html/";
const USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";

/**
 * Web snippets from DuckDuckGo's HTML endpoint (no API key)
 */
export class DuckDuckGoSnippetSource implements SnippetSource {
  private readonly http: AxiosInstance;

  constructor(timeoutMs: number, http?: AxiosInstance) {
    this.http = http ?? axios.create({ timeout: timeoutMs, headers: { "User-Agent": USER_AGENT } });
  }

  async search(query: string, maxResults: number): Promise<Snippet[]> {
    const q = query.trim();
    if (!q) return [];

    let html: string;
    try {
      const response = await this.http.get<string>(DDG_HTML_URL, {
        params: { q },
        responseType: "text",
      });
      html = response.data;
    } catch (error) {
      throw new SourceUnavailableError("duckduckgo", `search failed: ${errorMessage(error)}`, { cause: error });
    }

    return parseDuckDuckGoResults(html).slice(0, maxResults);
  }
}

/**
 * Snippet text of each organic result on a results page
 */
export function parseDuckDuckGoResults(html: string): Snippet[] {
  return parse(html)
    .querySelectorAll(".result__snippet")
    .map(el => el.text.replace(/\s+/g, " ").trim())
    .filter(body => body.length > 0)
    .map(body => ({ body }));
}
