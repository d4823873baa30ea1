import { EnrichedLead, ScoredLead, ScoreCombineMode } from "../types/leads";
import { SnippetSource } from "../types/sources";
import { ExtractionService, ExtractionOutcome } from "./extraction";
import { parseScore } from "./extractionParsers";
import { extractScore, clampScore } from "./heuristics";
import { gatherSnippets } from "./evidence";
import { propensityScorePrompt } from "./prompts";

const FUNDING_RESULTS = 5;

export interface ScoringDeps {
  snippets: SnippetSource;
  extraction: ExtractionService;
}

export interface ScoringOptions {
  /**
   * "additive": model score + heuristic floor (clamped)
   * "fallback": model score when one was produced, heuristic otherwise
   */
  combineMode: ScoreCombineMode;
}

// ============================================================================
// MAIN SCORING FUNCTION
// ============================================================================

/**
 * Score every lead and rank them, highest first.
 * Equal scores keep their input order.
 */
export async function scoreLeads(
  deps: ScoringDeps,
  leads: EnrichedLead[],
  options: ScoringOptions
): Promise<ScoredLead[]> {
  const scored: ScoredLead[] = [];
  for (const lead of leads) {
    scored.push(await scoreLead(deps, lead, options));
  }
  return rankLeads(scored);
}

/**
 * Score a single lead from funding evidence, model analysis and heuristic rules
 */
export async function scoreLead(
  deps: ScoringDeps,
  lead: EnrichedLead,
  options: ScoringOptions
): Promise<ScoredLead> {
  const fundingSnippets = await gatherSnippets(
    deps.snippets,
    `"${lead.company}" series funding OR raised OR IPO`,
    FUNDING_RESULTS
  );

  const modelOutcome = parseScore(
    await deps.extraction.extract(
      propensityScorePrompt({
        company: lead.company,
        title: lead.title,
        location: lead.location,
        fundingSnippets,
      })
    )
  );

  const heuristic = extractScore({
    title: lead.title,
    location: lead.location,
    fundingSnippets,
    hasRecentPublication: lead.has_recent_publication,
  });

  const { score, breakdown } = combineScores(modelOutcome, heuristic, options.combineMode);

  return {
    ...lead,
    score,
    score_breakdown: breakdown,
  };
}

// ============================================================================
// COMBINATION
// ============================================================================

export function combineScores(
  model: ExtractionOutcome<number>,
  heuristic: { score: number; breakdown: Record<string, number> },
  mode: ScoreCombineMode
): { score: number; breakdown: Record<string, number> } {
  if (model.status !== "ok") {
    return { score: heuristic.score, breakdown: { ...heuristic.breakdown } };
  }

  if (mode === "fallback") {
    return { score: clampScore(model.value), breakdown: { model: model.value } };
  }

  return {
    score: clampScore(model.value + heuristic.score),
    breakdown: { model: model.value, ...heuristic.breakdown },
  };
}

/**
 * Sort descending by score; Array.prototype.sort is stable
 */
export function rankLeads(leads: ScoredLead[]): ScoredLead[] {
  return [...leads].sort((a, b) => b.score - a.score);
}
