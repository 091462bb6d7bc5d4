import { z } from "zod";
import type { RawEvidence } from "../../schema/evidence.js";
import { fetchJson, withQuery } from "./http.js";
import type { EvidenceRequest, EvidenceSource, SearchOptions } from "./types.js";
import { formatAuthors } from "./types.js";
import { plain } from "./xml.js";

const recordSchema = z.object({
  id: z.union([z.number(), z.string()]).optional(),
  metadata: z
    .object({
      title: z.string().default("Untitled"),
      description: z.string().default(""),
      creators: z.array(z.object({ name: z.string().optional() })).default([]),
      publication_date: z.string().default("Unknown"),
      doi: z.string().default(""),
      resource_type: z.object({ type: z.string().default("unknown") }).default({}),
    })
    .default({}),
});

const responseSchema = z.object({
  hits: z.object({ hits: z.array(recordSchema).default([]) }).default({}),
});

type ZenodoRecord = z.infer<typeof recordSchema>;

export function toEvidence(record: ZenodoRecord): RawEvidence {
  const { title, description, creators, publication_date: published, doi, resource_type } = record.metadata;
  const authors = creators.flatMap((creator) => (creator.name ? [creator.name] : []));
  const text = plain(description);
  const findings = text
    .split(". ")
    .slice(0, 3)
    .map((sentence) => sentence.trim())
    .filter((sentence) => sentence.length > 20);

  return {
    source: "Zenodo",
    title,
    citation: `${formatAuthors(authors)}. ${title}. Zenodo. ${published}.${doi ? ` DOI: ${doi}` : ""}`,
    url: record.id === undefined ? "" : `https://zenodo.org/record/${record.id}`,
    excerpts: [],
    keyFindings: findings,
    abstract: text ? text.slice(0, 500) : undefined,
    publicationType: resource_type.type,
    domain: "dataset",
  };
}

export class ZenodoSource implements EvidenceSource {
  readonly id = "zenodo";
  readonly name = "Zenodo";
  readonly family = "dataset";
  readonly defaultLimit = 5;

  async search(request: EvidenceRequest, { maxResults, signal }: SearchOptions): Promise<RawEvidence[]> {
    const data = await fetchJson(
      withQuery("https://zenodo.org/api/records", { q: request.mainQuery, size: maxResults, sort: "mostrecent" }),
      responseSchema,
      { signal },
    );
    return (data?.hits.hits ?? []).map(toEvidence);
  }
}
