/**
 * Prompt builders for the three extraction call sites
 */

export function conferenceNamesPrompt(topic: string, snippets: string[], limit: number): string {
  return `Extract names of speakers or attendees from the following search snippets about: ${topic}.
Snippets: ${snippets.join(" ")}

Return a list of up to ${limit} names in JSON format, e.g., ["Name1", "Name2"].`;
}

export function contactInfoPrompt(params: {
  name: string;
  company: string;
  profileSnippets: string[];
  emailSnippets: string[];
  locationSnippets: string[];
}): string {
  return `Extract information for ${params.name} at ${params.company} from the following search snippets.

LinkedIn snippets: ${params.profileSnippets.join(" ")}
Email snippets: ${params.emailSnippets.join(" ")}
Location snippets: ${params.locationSnippets.join(" ")}

Return JSON with:
- linkedin: LinkedIn URL if found, else null
- email: Email if found, else null
- location: HQ location if found, else null`;
}

export function propensityScorePrompt(params: {
  company: string;
  title: string;
  location: string;
  fundingSnippets: string[];
}): string {
  return `Analyze the following for ${params.company} in biotech/toxicology space.
Title: ${params.title}
Location: ${params.location}
Funding snippets: ${params.fundingSnippets.join(" ")}

Assign scores:
- Role Fit (0-30): High if title contains toxicology, safety, etc.
- Company Intent (0-20): High if recent funding (series A/B, raised money).
- Technographic (0-15): Assume 15 for biotech.
- Location (0-10): High if in Boston, Cambridge, etc.
- Scientific Intent (0-40): High if has recent paper.

Return total score (0-100).`;
}
