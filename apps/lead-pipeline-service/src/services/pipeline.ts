import { PipelineResult, EnrichmentOverflow, ScoreCombineMode } from "../types/leads";
import { CitationSource, SnippetSource } from "../types/sources";
import { ExtractionService } from "./extraction";
import { identifyLeads } from "./identification";
import { enrichLeads } from "./enrichment";
import { scoreLeads } from "./scoring";

export interface PipelineDeps {
  citations: CitationSource;
  snippets: SnippetSource;
  extraction: ExtractionService;
}

export interface PipelineInput {
  topicKeywords: string[];
  conferenceTopic: string;
  batchLimit: number;
}

export interface PipelineSettings {
  maxCitationResults: number;
  fromYear: number;
  toYear: number;
  overflow: EnrichmentOverflow;
  combineMode: ScoreCombineMode;
}

/**
 * Identification → enrichment → scoring, sequentially.
 * Returns the ranked leads plus run metrics. Quota exhaustion is scoped to the run.
 */
export async function runPipeline(
  sharedDeps: PipelineDeps,
  input: PipelineInput,
  settings: PipelineSettings
): Promise<PipelineResult> {
  const startTime = Date.now();
  const deps: PipelineDeps = { ...sharedDeps, extraction: sharedDeps.extraction.forRun() };

  console.log(`[pipeline] Stage 1: identification`);
  const rawLeads = await identifyLeads(deps, {
    topicKeywords: input.topicKeywords,
    conferenceTopic: input.conferenceTopic,
    maxCitationResults: settings.maxCitationResults,
    fromYear: settings.fromYear,
    toYear: settings.toYear,
  });

  console.log(`[pipeline] Stage 2: enrichment of ${Math.min(rawLeads.length, input.batchLimit)} leads`);
  const enrichedLeads = await enrichLeads(deps, rawLeads, {
    batchLimit: input.batchLimit,
    overflow: settings.overflow,
  });

  console.log(`[pipeline] Stage 3: scoring`);
  const scoredLeads = await scoreLeads(deps, enrichedLeads, {
    combineMode: settings.combineMode,
  });

  const totalScore = scoredLeads.reduce((sum, lead) => sum + lead.score, 0);
  const result: PipelineResult = {
    leads: scoredLeads,
    total_identified: rawLeads.length,
    enriched_count: enrichedLeads.length,
    average_score: scoredLeads.length > 0 ? Math.round((totalScore / scoredLeads.length) * 10) / 10 : 0,
    duration_ms: Date.now() - startTime,
    extraction: deps.extraction.status(),
  };

  console.log(`[pipeline] Completed:`, {
    total_identified: result.total_identified,
    enriched_count: result.enriched_count,
    average_score: result.average_score,
    duration_ms: result.duration_ms,
  });

  return result;
}
