import { z } from "zod";
import { extractEpistemicMetadata } from "../epistemic.js";
import { round } from "../scorer.js";
import type { EpistemicMetadata, RawEvidence } from "../../schema/evidence.js";
import { fetchJson, withQuery } from "./http.js";
import type { EvidenceRequest, EvidenceSource, SearchOptions } from "./types.js";

const studySchema = z.object({
  protocolSection: z
    .object({
      identificationModule: z
        .object({ nctId: z.string().default(""), officialTitle: z.string().optional(), briefTitle: z.string().optional() })
        .default({}),
      statusModule: z.object({ overallStatus: z.string().default("") }).default({}),
      designModule: z.object({ phases: z.array(z.string()).default([]), studyType: z.string().default("") }).default({}),
      descriptionModule: z
        .object({ briefSummary: z.string().default(""), detailedDescription: z.string().default("") })
        .default({}),
      outcomesModule: z
        .object({ primaryOutcomes: z.array(z.object({ measure: z.string().default("") })).default([]) })
        .default({}),
      conditionsModule: z.object({ conditions: z.array(z.string()).default([]) }).default({}),
    })
    .default({}),
});

const responseSchema = z.object({ studies: z.array(studySchema).default([]) });

type Study = z.infer<typeof studySchema>;

/** Domains that name no single condition and so add no condition filter. */
const UNFILTERED_DOMAINS = new Set(["general", "general_medicine", "multidomain"]);

/** Interventional studies count as RCTs; late phases carry more weight than first-in-human ones. */
export function trialEpistemics(title: string, summary: string, studyType: string, phases: string[]): EpistemicMetadata {
  const metadata = extractEpistemicMetadata(
    { title, abstract: `${title}. ${summary}` },
    studyType.toUpperCase().includes("INTERVENTIONAL") ? "rct" : "cohort",
  );

  let weight = metadata.weight;
  if (phases.includes("PHASE3") || phases.includes("PHASE4")) {
    weight = Math.min(weight * 1.1, 1);
  } else if (phases.includes("PHASE1") || phases.includes("EARLY_PHASE1")) {
    weight = Math.max(weight * 0.85, 0.3);
  }
  return { ...metadata, weight: round(weight, 2) };
}

export function toEvidence(study: Study): RawEvidence {
  const { identificationModule, statusModule, designModule, descriptionModule, outcomesModule } =
    study.protocolSection;
  const nctId = identificationModule.nctId;
  const title = identificationModule.officialTitle || identificationModule.briefTitle || "";
  const summary = `${descriptionModule.briefSummary} ${descriptionModule.detailedDescription}`.trim();

  return {
    source: "ClinicalTrials.gov",
    title,
    citation: `${nctId} - ${statusModule.overallStatus} - Phase: ${designModule.phases.join(", ")}`,
    url: `https://clinicaltrials.gov/study/${nctId}`,
    excerpts: [descriptionModule.briefSummary.slice(0, 500)],
    keyFindings: outcomesModule.primaryOutcomes.slice(0, 3).map((outcome) => outcome.measure),
    abstract: summary || undefined,
    publicationType: designModule.studyType,
    domain: "clinical",
    epistemicMetadata: trialEpistemics(title, summary, designModule.studyType, designModule.phases),
  };
}

export class ClinicalTrialsSource implements EvidenceSource {
  readonly id = "clinicaltrials";
  readonly name = "ClinicalTrials.gov";
  readonly family = "clinical";
  readonly defaultLimit = 10;

  async search(request: EvidenceRequest, { maxResults, signal }: SearchOptions): Promise<RawEvidence[]> {
    const parts = request.mainQuery ? [request.mainQuery] : [];
    if (!UNFILTERED_DOMAINS.has(request.domain)) {
      parts.push(`AREA[Condition]${request.domain}`);
    }

    const data = await fetchJson(
      withQuery("https://clinicaltrials.gov/api/v2/studies", {
        format: "json",
        pageSize: maxResults,
        "query.term": parts.length > 0 ? parts.join(" AND ") : undefined,
      }),
      responseSchema,
      { signal },
    );
    return (data?.studies ?? []).map(toEvidence);
  }
}
