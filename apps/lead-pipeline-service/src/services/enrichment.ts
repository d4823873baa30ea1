import { RawLead, EnrichedLead, EnrichmentOverflow } from "../types/leads";
import { SnippetSource } from "../types/sources";
import { ExtractionService } from "./extraction";
import { ContactInfo, parseContactInfo } from "./extractionParsers";
import { gatherSnippets } from "./evidence";
import { contactInfoPrompt } from "./prompts";

const PROFILE_HOST = "https://linkedin.com/in/";

const PROFILE_RESULTS = 5;
const EMAIL_RESULTS = 5;
const LOCATION_RESULTS = 3;

/**
 * Contact facts pulled from evidence; null when absent or unusable
 */
export interface ExtractedContact {
  profileUrl: string | null;
  email: string | null;
  location: string | null;
}

const EMPTY_CONTACT: ExtractedContact = { profileUrl: null, email: null, location: null };

export interface EnrichmentDeps {
  snippets: SnippetSource;
  extraction: ExtractionService;
}

export interface EnrichmentOptions {
  /** Leads enriched per run; the rest follow `overflow` */
  batchLimit: number;
  overflow: EnrichmentOverflow;
}

/**
 * Enrich up to `batchLimit` leads, one at a time
 */
export async function enrichLeads(
  deps: EnrichmentDeps,
  leads: RawLead[],
  options: EnrichmentOptions
): Promise<EnrichedLead[]> {
  const limit = Math.max(0, options.batchLimit);
  const batch = leads.slice(0, limit);
  const overflow = leads.slice(limit);

  const enriched: EnrichedLead[] = [];
  for (const lead of batch) {
    enriched.push(await enrichLead(deps, lead));
  }

  if (overflow.length > 0) {
    if (options.overflow === "passthrough") {
      console.log(`[enrichment] Passing ${overflow.length} leads through with synthesized contacts`);
      enriched.push(...overflow.map(lead => mergeEnrichment(lead, EMPTY_CONTACT)));
    } else {
      console.log(`[enrichment] Batch limit ${limit} reached, dropping ${overflow.length} leads`);
    }
  }

  return enriched;
}

/**
 * Enrich a single lead using web search evidence and the extraction service
 */
export async function enrichLead(deps: EnrichmentDeps, lead: RawLead): Promise<EnrichedLead> {
  const { name, company } = lead;

  const profileSnippets = await gatherSnippets(deps.snippets, `"${name}" "${company}" linkedin`, PROFILE_RESULTS);
  const emailSnippets = await gatherSnippets(deps.snippets, `"${name}" "${company}" email`, EMAIL_RESULTS);
  const locationSnippets = await gatherSnippets(deps.snippets, `"${company}" headquarters location`, LOCATION_RESULTS);

  const outcome = parseContactInfo(
    await deps.extraction.extract(
      contactInfoPrompt({ name, company, profileSnippets, emailSnippets, locationSnippets })
    )
  );

  let contact = EMPTY_CONTACT;
  if (outcome.status === "ok") {
    contact = sanitizeContact(outcome.value);
  } else {
    console.warn(`[enrichment] Contact extraction ${outcome.status} for ${name}, synthesizing`);
  }

  return mergeEnrichment(lead, contact);
}

/**
 * Merge extracted contact facts into a new lead
 * Missing contact fields are synthesized; location is replaced only when extracted
 */
export function mergeEnrichment(lead: RawLead, contact: ExtractedContact): EnrichedLead {
  return {
    ...lead,
    location: contact.location ?? lead.location,
    contact_email: contact.email ?? synthesizeEmail(lead.name, lead.company),
    professional_profile_url: contact.profileUrl ?? synthesizeProfileUrl(lead.name),
  };
}

// ============================================================================
// SYNTHESIS (pure functions of name + company)
// ============================================================================

/**
 * "Jane Doe" → https://linkedin.com/in/janedoe
 */
export function synthesizeProfileUrl(name: string): string {
  return `${PROFILE_HOST}${normalizeToken(name) || "unknown"}`;
}

/**
 * ("Jane Doe", "Acme Inc") → jane.doe@acmeinc.com
 */
export function synthesizeEmail(name: string, company: string): string {
  const parts = name.split(/\s+/).map(normalizeToken).filter(p => p.length > 0);
  const first = parts[0] ?? "contact";
  const last = parts.length > 1 ? parts[parts.length - 1] : null;
  const localPart = last ? `${first}.${last}` : first;
  const domain = normalizeToken(company) || "unknown";
  return `${localPart}@${domain}.com`;
}

/**
 * Lowercase, drop whitespace and anything outside [a-z0-9-]
 */
function normalizeToken(value: string): string {
  return value
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .replace(/[^a-z0-9-]/g, "");
}

// ============================================================================
// VALIDATION
// ============================================================================

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

function sanitizeContact(info: ContactInfo): ExtractedContact {
  const email = info.email?.trim();
  const location = info.location?.trim();
  return {
    profileUrl: validProfileUrl(info.linkedin),
    email: email && EMAIL_PATTERN.test(email) ? email : null,
    location: location ? location : null,
  };
}

function validProfileUrl(value: string | null | undefined): string | null {
  const trimmed = value?.trim();
  if (!trimmed) return null;
  try {
    const url = new URL(trimmed);
    return url.protocol === "http:" || url.protocol === "https:" ? trimmed : null;
  } catch {
    return null;
  }
}
