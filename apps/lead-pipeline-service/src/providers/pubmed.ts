import axios, { AxiosInstance } from "axios";
import { XMLParser } from "fast-xml-parser";
import { z } from "zod";
import { CitationSource } from "../types/sources";
import { CitationRecord, CitationAuthor } from "../types/leads";
import { SourceUnavailableError, errorMessage } from "../errors";

/**
 * PubMed citation source over NCBI E-utilities
 * @see https://www.ncbi.nlm.nih.gov/books/NBK25501/
 */

const EUTILS_BASE = "https://eutils.ncbi.nlm.nih.gov/entrez/eutils";
const SOURCE = "pubmed";

// NCBI allows 3 requests/second per caller, 10 with an API key
const MIN_INTERVAL_MS = 334;
const MIN_INTERVAL_WITH_KEY_MS = 100;

export interface PubMedOptions {
  /** Contact address NCBI requires from every caller */
  email: string;
  apiKey?: string;
  timeoutMs: number;
}

// ============================================================================
// RESPONSE SCHEMAS
// ============================================================================

const ESearchResponseSchema = z.object({
  esearchresult: z.object({
    idlist: z.array(z.string()),
  }),
});

const AuthorSchema = z.object({
  LastName: z.string().optional(),
  ForeName: z.string().optional(),
  AffiliationInfo: z.array(z.object({ Affiliation: z.string().optional() })).optional(),
});

const ArticleSetSchema = z.object({
  PubmedArticleSet: z.object({
    PubmedArticle: z
      .array(
        z.object({
          MedlineCitation: z.object({
            Article: z.object({
              ArticleTitle: z.string().optional(),
              AuthorList: z.object({ Author: z.array(AuthorSchema).optional() }).optional(),
            }),
          }),
        })
      )
      .min(1),
  }),
});

const ARRAY_TAGS = new Set(["PubmedArticle", "Author", "AffiliationInfo"]);

const xmlParser = new XMLParser({
  ignoreAttributes: true,
  ignoreDeclaration: true,
  parseTagValue: false,
  // Titles and affiliations may carry inline markup (<i>, <sup>); keep them as raw text
  stopNodes: ["*.ArticleTitle", "*.Affiliation"],
  isArray: (name: string) => ARRAY_TAGS.has(name),
  htmlEntities: true,
});

// ============================================================================
// CLIENT
// ============================================================================

export class PubMedCitationSource implements CitationSource {
  private readonly http: AxiosInstance;
  private readonly options: PubMedOptions;
  private nextRequestAt = 0;

  constructor(options: PubMedOptions, http?: AxiosInstance) {
    this.options = options;
    this.http = http ?? axios.create({ baseURL: EUTILS_BASE, timeout: options.timeoutMs });

    const intervalMs = requestIntervalMs(options.apiKey);
    this.http.interceptors.request.use(async config => {
      // Reserve the slot before waiting so concurrent calls queue up
      const now = Date.now();
      const waitMs = Math.max(0, this.nextRequestAt - now);
      this.nextRequestAt = Math.max(now, this.nextRequestAt) + intervalMs;
      if (waitMs > 0) await sleep(waitMs);
      return config;
    });
  }

  async search(query: string, maxResults: number): Promise<string[]> {
    let data: unknown;
    try {
      const response = await this.http.get("/esearch.fcgi", {
        params: { ...this.identity(), db: "pubmed", term: query, retmax: maxResults, retmode: "json" },
      });
      data = response.data;
    } catch (error) {
      throw new SourceUnavailableError(SOURCE, `search failed: ${errorMessage(error)}`, { cause: error });
    }

    const parsed = ESearchResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new SourceUnavailableError(SOURCE, "unexpected search response shape");
    }
    return parsed.data.esearchresult.idlist;
  }

  async fetch(id: string): Promise<CitationRecord> {
    let xml: string;
    try {
      const response = await this.http.get<string>("/efetch.fcgi", {
        params: { ...this.identity(), db: "pubmed", id, rettype: "xml", retmode: "xml" },
        responseType: "text",
      });
      xml = response.data;
    } catch (error) {
      throw new SourceUnavailableError(SOURCE, `fetch ${id} failed: ${errorMessage(error)}`, { cause: error });
    }
    return parsePubMedArticle(xml, id);
  }

  private identity(): Record<string, string> {
    const params: Record<string, string> = { tool: "lead-pipeline-service", email: this.options.email };
    if (this.options.apiKey) params.api_key = this.options.apiKey;
    return params;
  }
}

export function requestIntervalMs(apiKey?: string): number {
  return apiKey ? MIN_INTERVAL_WITH_KEY_MS : MIN_INTERVAL_MS;
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

// ============================================================================
// PARSING
// ============================================================================

/**
 * Map an EFetch XML document to a citation record (first article only)
 */
export function parsePubMedArticle(xml: string, id: string): CitationRecord {
  let tree: unknown;
  try {
    tree = xmlParser.parse(xml);
  } catch (error) {
    throw new SourceUnavailableError(SOURCE, `invalid XML for ${id}: ${errorMessage(error)}`, { cause: error });
  }

  const parsed = ArticleSetSchema.safeParse(tree);
  if (!parsed.success) {
    throw new SourceUnavailableError(SOURCE, `no article in response for ${id}`);
  }

  const article = parsed.data.PubmedArticleSet.PubmedArticle[0].MedlineCitation.Article;
  const authors: CitationAuthor[] = (article.AuthorList?.Author ?? []).map(author => ({
    given: plainText(author.ForeName),
    family: plainText(author.LastName),
    affiliation: markupText(author.AffiliationInfo?.[0]?.Affiliation),
  }));

  return {
    id,
    title: markupText(article.ArticleTitle) ?? "",
    authors,
  };
}

const XML_ENTITIES: Record<string, string> = {
  lt: "<",
  gt: ">",
  quot: "\"",
  apos: "'",
  amp: "&",
};

const ENTITY_PATTERN = /&(?:#(\d+)|#x([0-9a-fA-F]+)|(lt|gt|quot|apos|amp));/g;

/**
 * Text the parser already decoded: only whitespace is normalized
 */
function plainText(value: string | undefined): string | null {
  if (value === undefined) return null;
  const text = value.replace(/\s+/g, " ").trim();
  return text.length > 0 ? text : null;
}

/**
 * Stop-node text arrives raw: drop inline tags, then decode entities in a single pass
 */
function markupText(value: string | undefined): string | null {
  if (value === undefined) return null;
  return plainText(value.replace(/<[^>]+>/g, "").replace(ENTITY_PATTERN, decodeEntity));
}

function decodeEntity(entity: string, decimal?: string, hex?: string, name?: string): string {
  if (name !== undefined) return XML_ENTITIES[name] ?? entity;
  const codePoint = decimal !== undefined ? parseInt(decimal, 10) : parseInt(hex ?? "", 16);
  if (Number.isNaN(codePoint) || codePoint > 0x10ffff) return entity;
  return String.fromCodePoint(codePoint);
}
