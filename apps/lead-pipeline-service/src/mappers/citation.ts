import {
  RawLead,
  CitationRecord,
  CitationAuthor,
  UNKNOWN,
  CITATION_TITLE,
} from "../types/leads";

/**
 * Affiliation strings look like "Dept of X, Acme Inc, Boston, MA".
 * Company is the first segment, location the last two.
 */
export interface ParsedAffiliation {
  company: string;
  location: string;
}

export function parseAffiliation(affiliation: string | null): ParsedAffiliation {
  const parts = (affiliation ?? "").split(",").map(p => p.trim());

  const company = parts[0] || UNKNOWN;

  let location = UNKNOWN;
  if (parts.length > 1) {
    const region = parts[parts.length - 2];
    const country = parts[parts.length - 1];
    if (region && country) {
      location = `${region}, ${country}`;
    }
  }

  return { company, location };
}

/**
 * Full name when both given and family names are present
 */
export function authorName(author: CitationAuthor): string | null {
  const given = author.given?.trim();
  const family = author.family?.trim();
  if (!given || !family) return null;
  return `${given} ${family}`;
}

/**
 * Map a citation record to one lead per fully named author
 */
export function mapCitationToLeads(citation: CitationRecord): RawLead[] {
  const leads: RawLead[] = [];

  for (const author of citation.authors) {
    const name = authorName(author);
    if (!name) continue;

    const { company, location } = parseAffiliation(author.affiliation);
    leads.push({
      name,
      title: CITATION_TITLE,
      company,
      location,
      source: "Citation",
      has_recent_publication: true,
    });
  }

  return leads;
}
