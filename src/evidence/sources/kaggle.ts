import { z } from "zod";
import type { RawEvidence } from "../../schema/evidence.js";
import { fetchJson, withQuery } from "./http.js";
import type { EvidenceRequest, EvidenceSource, SearchOptions } from "./types.js";

const MEDICAL_WORDS = ["disease", "diabetes", "cancer", "cardiac", "neural", "infection"];
const TAGS = ["medicine", "biology", "healthcare"];

const datasetSchema = z.object({
  ref: z.string().default(""),
  title: z.string().default(""),
  subtitle: z.string().nullable().default(""),
  creatorName: z.string().default(""),
  totalDownloads: z.number().default(0),
  totalVotes: z.number().default(0),
  files: z.array(z.unknown()).default([]),
});

const responseSchema = z.array(datasetSchema);

type KaggleDataset = z.infer<typeof datasetSchema>;

export interface KaggleCredentials {
  username: string;
  key: string;
}

/** Kaggle search does best on short queries: the domain, plus one disease-like term. */
export function kaggleQuery(request: EvidenceRequest): string {
  const base = ["general", "general_medicine", "multidomain"].includes(request.domain)
    ? (request.goal.split(/\s+/)[0] ?? request.domain)
    : request.domain;
  const keyword = request.searchTerms
    .slice(0, 5)
    .find((term) => MEDICAL_WORDS.some((word) => term.toLowerCase().includes(word)));
  return keyword ? `${request.domain} ${keyword}` : base;
}

export function toEvidence(dataset: KaggleDataset): RawEvidence {
  return {
    source: "Kaggle",
    title: dataset.title,
    citation: `Kaggle: ${dataset.creatorName} - ${dataset.totalDownloads} downloads`,
    url: `https://www.kaggle.com/datasets/${dataset.ref}`,
    excerpts: [(dataset.subtitle ?? "").slice(0, 300)],
    keyFindings: [`${dataset.files.length} files, ${dataset.totalVotes} votes`],
    domain: "dataset",
  };
}

export class KaggleSource implements EvidenceSource {
  readonly id = "kaggle";
  readonly name = "Kaggle";
  readonly family = "dataset";
  readonly defaultLimit = 5;

  constructor(private readonly credentials?: KaggleCredentials) {}

  appliesTo(): boolean {
    return this.credentials !== undefined;
  }

  async search(request: EvidenceRequest, { maxResults, signal }: SearchOptions): Promise<RawEvidence[]> {
    if (!this.credentials) {
      return [];
    }
    const auth = Buffer.from(`${this.credentials.username}:${this.credentials.key}`).toString("base64");
    const data = await fetchJson(
      withQuery("https://www.kaggle.com/api/v1/datasets/list", {
        search: kaggleQuery(request),
        sortBy: "relevance",
        page: 1,
        maxSize: maxResults,
        tagIds: TAGS.join(","),
      }),
      responseSchema,
      { signal, headers: { authorization: `Basic ${auth}` } },
    );
    return (data ?? []).slice(0, maxResults).map(toEvidence);
  }
}
