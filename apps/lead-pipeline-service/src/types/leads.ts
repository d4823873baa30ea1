/**
 * Lead Pipeline Types
 * Records flow identification → enrichment → scoring; each stage builds a new record
 */

// ============================================================================
// ENUMS
// ============================================================================

export type LeadSource = "Citation" | "Conference";
export type EnrichmentOverflow = "drop" | "passthrough";
export type ScoreCombineMode = "additive" | "fallback";

// ============================================================================
// SENTINELS
// ============================================================================

export const UNKNOWN = "Unknown";
export const CITATION_TITLE = "Researcher";
export const CONFERENCE_TITLE = "Speaker";

// ============================================================================
// LEAD RECORDS
// ============================================================================

export interface RawLead {
  readonly name: string;
  readonly title: string;
  readonly company: string;
  readonly location: string;
  readonly source: LeadSource;
  readonly has_recent_publication: boolean;
}

export interface EnrichedLead extends RawLead {
  readonly contact_email: string;
  readonly professional_profile_url: string;
}

export interface ScoredLead extends EnrichedLead {
  /** 0-100, clamped */
  readonly score: number;
  readonly score_breakdown: Readonly<Record<string, number>>;
}

// ============================================================================
// EXTERNAL RECORDS
// ============================================================================

export interface CitationAuthor {
  given: string | null;
  family: string | null;
  affiliation: string | null;
}

export interface CitationRecord {
  id: string;
  title: string;
  authors: CitationAuthor[];
}

export interface Snippet {
  body: string;
}

// ============================================================================
// PIPELINE OUTPUT
// ============================================================================

export interface ExtractionStatus {
  model: string | null;
  quota_exhausted: boolean;
}

export interface PipelineResult {
  leads: ScoredLead[];
  total_identified: number;
  enriched_count: number;
  average_score: number;
  duration_ms: number;
  extraction: ExtractionStatus;
}
