import { identifyLeads, buildCitationQuery, IdentificationInput } from "../identification";
import { ExtractionService } from "../extraction";
import { CitationRecord } from "../../types/leads";
import {
  FakeCitationSource,
  FakeSnippetSource,
  FakeTextGenerator,
  FailingSnippetSource,
  silenceConsole,
} from "./fakes";

const INPUT: IdentificationInput = {
  topicKeywords: ["Hepatic spheroids", "Organ-on-chip"],
  maxCitationResults: 30,
  conferenceTopic: "toxicology conference speakers",
  fromYear: 2023,
  toYear: 2025,
};

const CITATION: CitationRecord = {
  id: "101",
  title: "Liver-on-chip models",
  authors: [
    { given: "Jane", family: "Doe", affiliation: "Acme Inc, Boston, MA" },
    { given: "John", family: "Roe", affiliation: "Beta Labs" },
  ],
};

const CONFERENCE_SNIPPETS = ["Speakers include Maria Lopez and Tom Baker."];

describe("Identification Stage", () => {
  silenceConsole();

  it("should build an OR query over keywords with a date range", () => {
    expect(buildCitationQuery(["A", "B C"], 2023, 2025)).toBe("(A OR B C) AND (2023[DP] : 2025[DP])");
  });

  it("should derive two leads from one citation with two authors", async () => {
    const citations = new FakeCitationSource([CITATION]);

    const leads = await identifyLeads(
      { citations, snippets: new FakeSnippetSource(), extraction: ExtractionService.disabled() },
      INPUT
    );

    expect(citations.queries).toEqual(["(Hepatic spheroids OR Organ-on-chip) AND (2023[DP] : 2025[DP])"]);
    expect(leads.map(l => l.name)).toEqual(["Jane Doe", "John Roe"]);
    expect(leads[0].location).toBe("Boston, MA");
    expect(leads[1].location).toBe("Unknown");
    expect(leads.every(l => l.source === "Citation" && l.has_recent_publication)).toBe(true);
  });

  it("should skip citations that fail to fetch and keep the batch", async () => {
    const second: CitationRecord = {
      id: "202",
      title: "Spheroids",
      authors: [{ given: "Ada", family: "Byron", affiliation: null }],
    };
    const citations = new FakeCitationSource([CITATION, second], ["999"]);

    const leads = await identifyLeads(
      { citations, snippets: new FakeSnippetSource(), extraction: ExtractionService.disabled() },
      INPUT
    );

    expect(citations.fetched).toEqual(["101", "202", "999"]);
    expect(leads.map(l => l.name)).toEqual(["Jane Doe", "John Roe", "Ada Byron"]);
  });

  it("should use model-extracted conference names after citation leads", async () => {
    const generator = new FakeTextGenerator(() => "```json\n[\"Grace Hopper\", \"Alan Turing\"]\n```");
    const extraction = await ExtractionService.create(generator, { preferredModels: [] });
    const snippets = new FakeSnippetSource(() => CONFERENCE_SNIPPETS);

    const leads = await identifyLeads(
      { citations: new FakeCitationSource([CITATION]), snippets, extraction },
      INPUT
    );

    expect(snippets.queries).toEqual(["toxicology conference speakers"]);
    expect(leads.map(l => `${l.source}:${l.name}`)).toEqual([
      "Citation:Jane Doe",
      "Citation:John Roe",
      "Conference:Grace Hopper",
      "Conference:Alan Turing",
    ]);
    expect(leads[2]).toEqual({
      name: "Grace Hopper",
      title: "Speaker",
      company: "Unknown",
      location: "Unknown",
      source: "Conference",
      has_recent_publication: false,
    });
  });

  it("should fall back to pattern matching when extraction is unavailable", async () => {
    const leads = await identifyLeads(
      {
        citations: new FakeCitationSource([]),
        snippets: new FakeSnippetSource(() => CONFERENCE_SNIPPETS),
        extraction: ExtractionService.disabled(),
      },
      INPUT
    );

    expect(leads.map(l => l.name)).toEqual(["Maria Lopez", "Tom Baker"]);
  });

  it("should fall back to pattern matching when the model returns no names", async () => {
    const extraction = await ExtractionService.create(new FakeTextGenerator(() => "[]"), { preferredModels: [] });

    const leads = await identifyLeads(
      {
        citations: new FakeCitationSource([]),
        snippets: new FakeSnippetSource(() => CONFERENCE_SNIPPETS),
        extraction,
      },
      INPUT
    );

    expect(leads.map(l => l.name)).toEqual(["Maria Lopez", "Tom Baker"]);
  });

  it("should cap model-extracted names at 20", async () => {
    const many = Array.from({ length: 25 }, (_, i) => `Person Number${String.fromCharCode(97 + i)}`);
    const extraction = await ExtractionService.create(
      new FakeTextGenerator(() => JSON.stringify(many)),
      { preferredModels: [] }
    );

    const leads = await identifyLeads(
      {
        citations: new FakeCitationSource([]),
        snippets: new FakeSnippetSource(() => CONFERENCE_SNIPPETS),
        extraction,
      },
      INPUT
    );

    expect(leads).toHaveLength(20);
  });

  it("should produce no conference leads when the snippet source is down", async () => {
    const leads = await identifyLeads(
      {
        citations: new FakeCitationSource([CITATION]),
        snippets: new FailingSnippetSource(),
        extraction: ExtractionService.disabled(),
      },
      INPUT
    );

    expect(leads.map(l => l.source)).toEqual(["Citation", "Citation"]);
  });

  it("should never emit empty fields", async () => {
    const leads = await identifyLeads(
      {
        citations: new FakeCitationSource([
          { id: "1", title: "", authors: [{ given: "Jane", family: "Doe", affiliation: "" }] },
        ]),
        snippets: new FakeSnippetSource(() => CONFERENCE_SNIPPETS),
        extraction: ExtractionService.disabled(),
      },
      INPUT
    );

    for (const lead of leads) {
      expect(lead.name).not.toBe("");
      expect(lead.title).not.toBe("");
      expect(lead.company).not.toBe("");
      expect(lead.location).not.toBe("");
    }
  });
});
