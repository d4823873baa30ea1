import { RawLead } from "../types/leads";
import { CitationSource, SnippetSource } from "../types/sources";
import { ExtractionService } from "./extraction";
import { parseNameList } from "./extractionParsers";
import { extractNames } from "./heuristics";
import { gatherSnippets } from "./evidence";
import { conferenceNamesPrompt } from "./prompts";
import { mapCitationToLeads } from "../mappers/citation";
import { mapConferenceNameToLead } from "../mappers/conference";
import { errorMessage } from "../errors";

const CONFERENCE_SNIPPET_RESULTS = 10;
const CONFERENCE_NAME_LIMIT = 20;

export interface IdentificationDeps {
  citations: CitationSource;
  snippets: SnippetSource;
  extraction: ExtractionService;
}

export interface IdentificationInput {
  topicKeywords: string[];
  maxCitationResults: number;
  conferenceTopic: string;
  /** Publication year range, inclusive */
  fromYear: number;
  toYear: number;
}

/**
 * Citation leads first, then conference leads, each in source order
 */
export async function identifyLeads(
  deps: IdentificationDeps,
  input: IdentificationInput
): Promise<RawLead[]> {
  const citationLeads = await identifyFromCitations(deps.citations, input);
  const conferenceLeads = await identifyFromConference(deps, input.conferenceTopic);

  console.log(`[identification] Identified leads:`, {
    citation: citationLeads.length,
    conference: conferenceLeads.length,
  });

  return [...citationLeads, ...conferenceLeads];
}

/**
 * "(k1 OR k2) AND (2023[DP] : 2025[DP])"
 */
export function buildCitationQuery(keywords: string[], fromYear: number, toYear: number): string {
  return `(${keywords.join(" OR ")}) AND (${fromYear}[DP] : ${toYear}[DP])`;
}

async function identifyFromCitations(
  source: CitationSource,
  input: IdentificationInput
): Promise<RawLead[]> {
  if (input.topicKeywords.length === 0) return [];

  const query = buildCitationQuery(input.topicKeywords, input.fromYear, input.toYear);

  let ids: string[];
  try {
    ids = await source.search(query, input.maxCitationResults);
  } catch (error) {
    console.warn(`[identification] Citation search failed: ${errorMessage(error)}`);
    return [];
  }

  console.log(`[identification] Found ${ids.length} citations`);

  const leads: RawLead[] = [];
  for (const id of ids) {
    try {
      const citation = await source.fetch(id);
      leads.push(...mapCitationToLeads(citation));
    } catch (error) {
      console.warn(`[identification] Skipping citation ${id}: ${errorMessage(error)}`);
    }
  }
  return leads;
}

async function identifyFromConference(
  deps: IdentificationDeps,
  topic: string
): Promise<RawLead[]> {
  const snippets = await gatherSnippets(deps.snippets, topic, CONFERENCE_SNIPPET_RESULTS);
  if (snippets.length === 0) return [];

  const outcome = parseNameList(
    await deps.extraction.extract(conferenceNamesPrompt(topic, snippets, CONFERENCE_NAME_LIMIT)),
    CONFERENCE_NAME_LIMIT
  );

  let names: string[];
  if (outcome.status === "ok" && outcome.value.length > 0) {
    names = outcome.value;
  } else {
    if (outcome.status !== "ok") {
      console.warn(`[identification] Name extraction ${outcome.status}, using pattern match`);
    }
    names = extractNames(snippets, CONFERENCE_NAME_LIMIT);
  }

  return names.map(mapConferenceNameToLead);
}
