import { z } from "zod";
import type { RawEvidence } from "../../schema/evidence.js";
import { fetchJson, withQuery } from "./http.js";
import type { EvidenceRequest, EvidenceSource, SearchOptions } from "./types.js";
import { mentionsAny } from "./types.js";

const textBlock = z.object({ value: z.string().default("") });

const entrySchema = z.object({
  primaryAccession: z.string().default(""),
  proteinDescription: z
    .object({ recommendedName: z.object({ fullName: textBlock.optional() }).optional() })
    .default({}),
  organism: z.object({ scientificName: z.string().default("") }).default({}),
  comments: z
    .array(z.object({ commentType: z.string().default(""), texts: z.array(textBlock).default([]) }))
    .default([]),
});

const responseSchema = z.object({ results: z.array(entrySchema).default([]) });

type UniProtEntry = z.infer<typeof entrySchema>;

export function toEvidence(entry: UniProtEntry): RawEvidence {
  const accession = entry.primaryAccession;
  const proteinName = entry.proteinDescription.recommendedName?.fullName?.value ?? "";
  const functionText =
    entry.comments.find((comment) => comment.commentType === "FUNCTION")?.texts[0]?.value ?? "";

  return {
    source: "UniProt",
    title: `${proteinName} (${accession})`,
    citation: `UniProt: ${accession} - ${entry.organism.scientificName}`,
    url: `https://www.uniprot.org/uniprotkb/${accession}`,
    excerpts: [],
    keyFindings: functionText ? [functionText.slice(0, 200)] : [],
    domain: "protein",
  };
}

export class UniProtSource implements EvidenceSource {
  readonly id = "uniprot";
  readonly name = "UniProt";
  readonly family = "protein";
  readonly defaultLimit = 5;

  appliesTo(request: EvidenceRequest): boolean {
    return mentionsAny(request.mainQuery, ["protein", "gene", "enzyme", "receptor"]);
  }

  async search(request: EvidenceRequest, { maxResults, signal }: SearchOptions): Promise<RawEvidence[]> {
    const data = await fetchJson(
      withQuery("https://rest.uniprot.org/uniprotkb/search", {
        query: `${request.mainQuery} AND reviewed:true`,
        format: "json",
        size: Math.min(maxResults, 500),
      }),
      responseSchema,
      { signal },
    );
    return (data?.results ?? []).map(toEvidence);
  }
}
