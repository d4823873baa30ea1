import { RawLead, UNKNOWN, CONFERENCE_TITLE } from "../types/leads";

/**
 * Conference attendees carry only a name; everything else stays at its sentinel
 */
export function mapConferenceNameToLead(name: string): RawLead {
  return {
    name,
    title: CONFERENCE_TITLE,
    company: UNKNOWN,
    location: UNKNOWN,
    source: "Conference",
    has_recent_publication: false,
  };
}
