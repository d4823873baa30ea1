/**
 * Deterministic fallback extraction: pure, never fails, no network
 */

// ============================================================================
// SCORING RULES
// ============================================================================

const ROLE_KEYWORDS = ["toxicology", "safety", "hepatic", "3d", "preclinical", "director", "head"];

const FUNDING_KEYWORDS = ["series", "raised"];

const HUB_LOCATIONS = ["boston", "cambridge", "san francisco", "basel", "london"];

export const HEURISTIC_POINTS = {
  role_fit: 30,
  company_intent: 20,
  technographic: 15,
  location: 10,
  scientific_intent: 40,
} as const;

const NAME_PATTERN = /[A-Z][a-z]+ [A-Z][a-z]+/g;

// ============================================================================
// NAME EXTRACTION
// ============================================================================

/**
 * "Capitalized Capitalized" pairs across snippets, unique in first-seen order
 */
export function extractNames(snippets: string[], limit: number): string[] {
  const seen = new Set<string>();
  for (const snippet of snippets) {
    for (const match of snippet.matchAll(NAME_PATTERN)) {
      seen.add(match[0]);
    }
  }
  return Array.from(seen).slice(0, Math.max(0, limit));
}

// ============================================================================
// SCORE EXTRACTION
// ============================================================================

export interface HeuristicScoreInput {
  title: string;
  location: string;
  fundingSnippets: string[];
  hasRecentPublication: boolean;
}

export interface HeuristicScore {
  score: number;
  breakdown: Record<string, number>;
}

export function extractScore(input: HeuristicScoreInput): HeuristicScore {
  const title = input.title.toLowerCase();
  const location = input.location.toLowerCase();
  const breakdown: Record<string, number> = {};

  if (ROLE_KEYWORDS.some(k => title.includes(k))) {
    breakdown.role_fit = HEURISTIC_POINTS.role_fit;
  }

  if (input.fundingSnippets.some(s => {
    const snippet = s.toLowerCase();
    return FUNDING_KEYWORDS.some(k => snippet.includes(k));
  })) {
    breakdown.company_intent = HEURISTIC_POINTS.company_intent;
  }

  // Sector fit is assumed for every lead
  breakdown.technographic = HEURISTIC_POINTS.technographic;

  if (HUB_LOCATIONS.some(hub => location.includes(hub))) {
    breakdown.location = HEURISTIC_POINTS.location;
  }

  if (input.hasRecentPublication) {
    breakdown.scientific_intent = HEURISTIC_POINTS.scientific_intent;
  }

  const total = Object.values(breakdown).reduce((sum, points) => sum + points, 0);
  return { score: clampScore(total), breakdown };
}

export function clampScore(score: number): number {
  return Math.max(0, Math.min(100, Math.round(score)));
}
