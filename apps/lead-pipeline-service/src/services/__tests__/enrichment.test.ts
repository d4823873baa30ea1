import {
  enrichLeads,
  enrichLead,
  mergeEnrichment,
  synthesizeEmail,
  synthesizeProfileUrl,
} from "../enrichment";
import { ExtractionService } from "../extraction";
import { FakeSnippetSource, FakeTextGenerator, FailingSnippetSource, rawLead, silenceConsole } from "./fakes";

async function serviceReturning(text: string): Promise<{ extraction: ExtractionService; generator: FakeTextGenerator }> {
  const generator = new FakeTextGenerator(() => text);
  const extraction = await ExtractionService.create(generator, { preferredModels: [] });
  return { extraction, generator };
}

describe("Enrichment Stage", () => {
  silenceConsole();

  describe("synthesis", () => {
    it("should synthesize jane.doe@acmeinc.com for Jane Doe at Acme Inc", () => {
      expect(synthesizeEmail("Jane Doe", "Acme Inc")).toBe("jane.doe@acmeinc.com");
      expect(synthesizeProfileUrl("Jane Doe")).toBe("https://linkedin.com/in/janedoe");
    });

    it("should use first and last name tokens", () => {
      expect(synthesizeEmail("Mary Ann Smith", "Beta Labs")).toBe("mary.smith@betalabs.com");
    });

    it("should drop characters that are invalid in an address", () => {
      expect(synthesizeEmail("Seán O'Brien", "Acme & Sons, Ltd.")).toBe("sean.obrien@acmesonsltd.com");
    });

    it("should handle single-token names and unknown companies", () => {
      expect(synthesizeEmail("Madonna", "Unknown")).toBe("madonna@unknown.com");
    });

    it("should be deterministic", () => {
      expect(synthesizeEmail("Jane Doe", "Acme Inc")).toBe(synthesizeEmail("Jane Doe", "Acme Inc"));
    });
  });

  describe("enrichLead", () => {
    it("should issue the three evidence queries", async () => {
      const snippets = new FakeSnippetSource();

      await enrichLead({ snippets, extraction: ExtractionService.disabled() }, rawLead());

      expect(snippets.queries).toEqual([
        "\"Jane Doe\" \"Acme Inc\" linkedin",
        "\"Jane Doe\" \"Acme Inc\" email",
        "\"Acme Inc\" headquarters location",
      ]);
    });

    it("should use extracted contact facts", async () => {
      const { extraction, generator } = await serviceReturning(
        "```json\n{\"linkedin\": \"https://www.linkedin.com/in/jane-doe-tox\", \"email\": \"jdoe@acme.com\", \"location\": \"Cambridge, MA\"}\n```"
      );
      const snippets = new FakeSnippetSource(q => [`evidence for ${q}`]);

      const lead = await enrichLead({ snippets, extraction }, rawLead({ location: "Boston, MA" }));

      expect(lead.contact_email).toBe("jdoe@acme.com");
      expect(lead.professional_profile_url).toBe("https://www.linkedin.com/in/jane-doe-tox");
      expect(lead.location).toBe("Cambridge, MA");
      expect(generator.prompts[0]).toContain("evidence for \"Acme Inc\" headquarters location");
    });

    it("should synthesize missing fields and keep the original location", async () => {
      const { extraction } = await serviceReturning("{\"linkedin\": null, \"email\": null, \"location\": null}");

      const lead = await enrichLead(
        { snippets: new FakeSnippetSource(), extraction },
        rawLead({ location: "Boston, MA" })
      );

      expect(lead.contact_email).toBe("jane.doe@acmeinc.com");
      expect(lead.professional_profile_url).toContain("janedoe");
      expect(lead.location).toBe("Boston, MA");
    });

    it("should treat unusable extracted values as absent", async () => {
      const { extraction } = await serviceReturning(
        "{\"linkedin\": \"not a url\", \"email\": \"contact us\", \"location\": \"  \"}"
      );

      const lead = await enrichLead({ snippets: new FakeSnippetSource(), extraction }, rawLead());

      expect(lead.contact_email).toBe("jane.doe@acmeinc.com");
      expect(lead.professional_profile_url).toBe("https://linkedin.com/in/janedoe");
      expect(lead.location).toBe("Unknown");
    });

    it("should treat malformed model output as absent", async () => {
      const { extraction } = await serviceReturning("I could not find anything.");

      const lead = await enrichLead({ snippets: new FakeSnippetSource(), extraction }, rawLead());

      expect(lead.contact_email).toBe("jane.doe@acmeinc.com");
    });

    it("should return the enriched record itself", async () => {
      const lead = await enrichLead({ snippets: new FakeSnippetSource(), extraction: ExtractionService.disabled() }, rawLead());

      expect(lead).toEqual({
        ...rawLead(),
        contact_email: "jane.doe@acmeinc.com",
        professional_profile_url: "https://linkedin.com/in/janedoe",
      });
    });

    it("should enrich with empty evidence when the snippet source is down", async () => {
      const snippets = new FailingSnippetSource();

      const lead = await enrichLead({ snippets, extraction: ExtractionService.disabled() }, rawLead());

      expect(snippets.calls).toBe(3);
      expect(lead.contact_email).toBe("jane.doe@acmeinc.com");
    });
  });

  describe("enrichLeads", () => {
    const leads = [
      rawLead({ name: "Jane Doe" }),
      rawLead({ name: "John Roe", company: "Beta Labs" }),
      rawLead({ name: "Ada Byron", company: "Unknown", source: "Conference" }),
    ];

    it("should produce complete records for every lead with extraction unavailable", async () => {
      const enriched = await enrichLeads(
        { snippets: new FakeSnippetSource(), extraction: ExtractionService.disabled() },
        leads,
        { batchLimit: 30, overflow: "drop" }
      );

      expect(enriched).toHaveLength(3);
      for (const lead of enriched) {
        expect(lead.contact_email).toMatch(/^[^\s@]+@[^\s@]+\.com$/);
        expect(new URL(lead.professional_profile_url).protocol).toBe("https:");
      }
      expect(enriched.map(l => l.contact_email)).toEqual([
        "jane.doe@acmeinc.com",
        "john.roe@betalabs.com",
        "ada.byron@unknown.com",
      ]);
    });

    it("should drop leads past the batch limit by default", async () => {
      const snippets = new FakeSnippetSource();

      const enriched = await enrichLeads(
        { snippets, extraction: ExtractionService.disabled() },
        leads,
        { batchLimit: 2, overflow: "drop" }
      );

      expect(enriched.map(l => l.name)).toEqual(["Jane Doe", "John Roe"]);
      expect(snippets.queries).toHaveLength(6);
    });

    it("should pass leads past the batch limit through with synthesized contacts", async () => {
      const snippets = new FakeSnippetSource();

      const enriched = await enrichLeads(
        { snippets, extraction: ExtractionService.disabled() },
        leads,
        { batchLimit: 1, overflow: "passthrough" }
      );

      expect(enriched.map(l => l.name)).toEqual(["Jane Doe", "John Roe", "Ada Byron"]);
      expect(enriched[2].contact_email).toBe("ada.byron@unknown.com");
      expect(snippets.queries).toHaveLength(3);
    });

    it("should not mutate the input leads", async () => {
      const input = [rawLead({ location: "Boston, MA" })];
      const { extraction } = await serviceReturning("{\"location\": \"Basel, Switzerland\"}");

      const enriched = await enrichLeads(
        { snippets: new FakeSnippetSource(), extraction },
        input,
        { batchLimit: 30, overflow: "drop" }
      );

      expect(enriched[0].location).toBe("Basel, Switzerland");
      expect(input[0]).toEqual(rawLead({ location: "Boston, MA" }));
      expect(enriched[0]).not.toBe(input[0]);
    });
  });

  describe("mergeEnrichment", () => {
    it("should keep raw fields and add contact fields", () => {
      expect(mergeEnrichment(rawLead(), { profileUrl: null, email: "j@acme.com", location: null })).toEqual({
        ...rawLead(),
        contact_email: "j@acme.com",
        professional_profile_url: "https://linkedin.com/in/janedoe",
      });
    });
  });
});
