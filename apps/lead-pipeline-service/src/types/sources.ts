import { CitationRecord, Snippet } from "./leads";

/**
 * Literature database (PubMed in production)
 */
export interface CitationSource {
  search(query: string, maxResults: number): Promise<string[]>;
  fetch(id: string): Promise<CitationRecord>;
}

/**
 * Web search returning unstructured evidence fragments
 */
export interface SnippetSource {
  search(query: string, maxResults: number): Promise<Snippet[]>;
}

/**
 * Generative text model behind the extraction service
 */
export interface TextGenerator {
  /** Model names that support text generation */
  listModels(): Promise<string[]>;
  generate(model: string, prompt: string): Promise<string>;
}
