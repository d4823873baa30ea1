import { EnrichmentOverflow, ScoreCombineMode } from "../types/leads";

const DEFAULT_TOPIC_KEYWORDS = [
  "Drug-Induced Liver Injury",
  "3D cell culture",
  "Organ-on-chip",
  "Hepatic spheroids",
  "Investigative Toxicology",
];

const DEFAULT_PREFERRED_MODELS = ["gemini-2.0-flash", "gemini-1.5-flash", "gemini-1.5-pro"];

type Env = Record<string, string | undefined>;

/**
 * Environment configuration
 */
export function loadConfig(env: Env = process.env, now: Date = new Date()) {
  const currentYear = now.getFullYear();

  return {
    port: parseInt(env.PORT || "3000", 10),
    nodeEnv: env.NODE_ENV || "development",

    // Gemini
    geminiApiKey: env.GEMINI_API_KEY || "",
    geminiPreferredModels: parseList(env.GEMINI_PREFERRED_MODELS, DEFAULT_PREFERRED_MODELS),

    // PubMed (NCBI asks callers to identify themselves by email)
    ncbiEmail: env.EMAIL || "",
    ncbiApiKey: env.NCBI_API_KEY || "",
    citationFromYear: parseInteger(env.PUBMED_FROM_YEAR, currentYear - 2),
    citationToYear: parseInteger(env.PUBMED_TO_YEAR, currentYear),
    citationMaxResults: parseInteger(env.CITATION_MAX_RESULTS, 30),

    // Identification inputs
    topicKeywords: parseList(env.TOPIC_KEYWORDS, DEFAULT_TOPIC_KEYWORDS),
    conferenceTopic: env.CONFERENCE_TOPIC || `SOT toxicology conference speakers ${currentYear - 1}`,

    // Enrichment: leads past the limit are dropped, or passed through with synthesized contacts
    enrichmentBatchLimit: parseInteger(env.ENRICHMENT_BATCH_LIMIT, 30),
    enrichmentOverflow: parseOverflow(env.ENRICHMENT_OVERFLOW),

    // Scoring: model score added to the heuristic floor, or used instead of it
    scoreCombineMode: parseCombineMode(env.SCORE_COMBINE_MODE),

    httpTimeoutMs: parseInteger(env.HTTP_TIMEOUT_MS, 15000),
  };
}

export type AppConfig = ReturnType<typeof loadConfig>;

export const config: AppConfig = loadConfig();

/**
 * Names of required settings that are absent
 */
export function missingRequiredConfig(cfg: AppConfig): string[] {
  const missing: string[] = [];
  if (!cfg.geminiApiKey) missing.push("GEMINI_API_KEY");
  if (!cfg.ncbiEmail) missing.push("EMAIL");
  return missing;
}

// ============================================================================
// PARSERS
// ============================================================================

function parseList(value: string | undefined, fallback: string[]): string[] {
  if (!value) return fallback;
  const items = value.split(",").map(s => s.trim()).filter(s => s.length > 0);
  return items.length > 0 ? items : fallback;
}

function parseInteger(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value ?? "", 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function parseOverflow(value: string | undefined): EnrichmentOverflow {
  return value?.toLowerCase() === "passthrough" ? "passthrough" : "drop";
}

function parseCombineMode(value: string | undefined): ScoreCombineMode {
  return value?.toLowerCase() === "fallback" ? "fallback" : "additive";
}
