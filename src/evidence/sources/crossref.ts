import { z } from "zod";
import type { RawEvidence } from "../../schema/evidence.js";
import { fetchJson, withQuery } from "./http.js";
import type { EvidenceRequest, EvidenceSource, SearchOptions } from "./types.js";
import { plain } from "./xml.js";

const dateParts = z.object({ "date-parts": z.array(z.array(z.number().nullable())).default([]) }).optional();

const workSchema = z.object({
  DOI: z.string().default(""),
  title: z.array(z.string()).default([]),
  author: z.array(z.object({ given: z.string().optional(), family: z.string().optional() })).default([]),
  "container-title": z.array(z.string()).default([]),
  "published-print": dateParts,
  "published-online": dateParts,
  type: z.string().default(""),
  abstract: z.string().optional(),
  URL: z.string().default(""),
});

const responseSchema = z.object({
  message: z.object({ items: z.array(workSchema).default([]) }).default({}),
});

type CrossrefWork = z.infer<typeof workSchema>;

function publicationYear(work: CrossrefWork): number | undefined {
  const printed = work["published-print"]?.["date-parts"][0]?.[0];
  const online = work["published-online"]?.["date-parts"][0]?.[0];
  return printed ?? online ?? undefined;
}

export function toEvidence(work: CrossrefWork): RawEvidence {
  const authors = work.author.map((author) => `${author.given ?? ""} ${author.family ?? ""}`.trim()).filter(Boolean);
  const journal = work["container-title"][0] ?? "";
  const abstract = work.abstract ? plain(work.abstract) : "";
  return {
    source: "Crossref",
    title: work.title[0] ?? "",
    citation: `${authors.slice(0, 3).join(", ")} et al. (${publicationYear(work) ?? "n.d."}) ${journal}`,
    url: work.URL,
    excerpts: abstract ? [abstract.slice(0, 500)] : [],
    keyFindings: [],
    abstract: abstract || undefined,
    venue: journal,
    publicationType: work.type,
    domain: "literature",
  };
}

export class CrossrefSource implements EvidenceSource {
  readonly id = "crossref";
  readonly name = "Crossref";
  readonly family = "literature";
  readonly defaultLimit = 10;

  constructor(private readonly mailto?: string) {}

  async search(request: EvidenceRequest, { maxResults, signal }: SearchOptions): Promise<RawEvidence[]> {
    const data = await fetchJson(
      withQuery("https://api.crossref.org/works", {
        query: request.mainQuery,
        rows: Math.min(maxResults, 100),
        mailto: this.mailto,
      }),
      responseSchema,
      { signal },
    );
    return (data?.message.items ?? []).map(toEvidence);
  }
}
