import { errorMessage } from "../errors.js";
import { createLogger } from "../logger.js";
import type { EvidenceRecord, RawEvidence } from "../schema/evidence.js";
import type { ConceptMap } from "../schema/stages.js";
import { EvidenceDeduplicator } from "./deduplicator.js";
import { calculateDomainRelevance, domainContext, extractTargetConcepts } from "./domainRelevance.js";
import { extractEpistemicMetadata } from "./epistemic.js";
import { dedupeTerms, QueryExpander } from "./queryExpander.js";
import { blendConfidence, EvidenceScorer, evidenceTier, rankEvidence } from "./scorer.js";
import type { EvidenceRequest, EvidenceSource } from "./sources/index.js";

const log = createLogger("evidence-aggregator");

export interface AggregatorOptions {
  sources: EvidenceSource[];
  /** Upper bound on any one source's result count. */
  maxResults: number;
  timeoutMs: number;
  scorer?: EvidenceScorer;
  expander?: QueryExpander;
  deduplicator?: EvidenceDeduplicator;
}

export interface SourceOutcome {
  source: string;
  status: "ok" | "failed" | "skipped";
  count: number;
  error?: string;
}

export interface AggregationResult {
  request: EvidenceRequest;
  records: EvidenceRecord[];
  outcomes: SourceOutcome[];
}

/** Concept terms, then their targets, then pathway names. */
export function baseSearchTerms(conceptMap: Pick<ConceptMap, "concepts" | "keyPathways">): string[] {
  const terms = [
    ...conceptMap.concepts.map((concept) => concept.term),
    ...conceptMap.concepts.flatMap((concept) => concept.targets),
    ...conceptMap.keyPathways.map((pathway) => pathway.name),
  ];
  return dedupeTerms(terms.map((term) => term.trim()).filter((term) => term.length > 0));
}

export class EvidenceAggregator {
  private readonly scorer: EvidenceScorer;
  private readonly expander: QueryExpander;
  private readonly deduplicator: EvidenceDeduplicator;

  constructor(private readonly options: AggregatorOptions) {
    this.scorer = options.scorer ?? new EvidenceScorer();
    this.expander = options.expander ?? new QueryExpander();
    this.deduplicator = options.deduplicator ?? new EvidenceDeduplicator(0.85);
  }

  buildRequest(conceptMap: ConceptMap, domain: string, goal: string): EvidenceRequest {
    const expanded = baseSearchTerms(conceptMap)
      .slice(0, 10)
      .flatMap((term) =>
        this.expander.expand(term, { domain, maxTerms: 3, includeSynonyms: true, includeDomainKeywords: false }),
      );
    const searchTerms = dedupeTerms(expanded);
    log.info("Prepared evidence search terms", { terms: searchTerms.length });

    return { goal, domain, searchTerms, mainQuery: searchTerms.slice(0, 3).join(" ") };
  }

  /** Every applicable source at once; a failed source contributes nothing. */
  async gather(request: EvidenceRequest): Promise<{ evidence: RawEvidence[]; outcomes: SourceOutcome[] }> {
    const active = this.options.sources.filter((source) => source.appliesTo?.(request) ?? true);
    const skipped = this.options.sources.filter((source) => !active.includes(source));

    const settled = await Promise.allSettled(
      active.map((source) =>
        source.search(request, {
          maxResults: Math.min(source.defaultLimit, this.options.maxResults),
          signal: AbortSignal.timeout(this.options.timeoutMs),
        }),
      ),
    );

    const evidence: RawEvidence[] = [];
    const outcomes = skipped.map((source): SourceOutcome => ({ source: source.name, status: "skipped", count: 0 }));
    settled.forEach((result, index) => {
      const source = active[index];
      if (result.status === "fulfilled") {
        evidence.push(...result.value);
        outcomes.push({ source: source.name, status: "ok", count: result.value.length });
        log.info("Evidence source returned results", { source: source.name, count: result.value.length });
      } else {
        const error = errorMessage(result.reason);
        outcomes.push({ source: source.name, status: "failed", count: 0, error });
        log.warn("Evidence source failed", { source: source.name, error });
      }
    });

    return { evidence, outcomes };
  }

  async aggregate(conceptMap: ConceptMap, domain: string, goal: string): Promise<AggregationResult> {
    const request = this.buildRequest(conceptMap, domain, goal);
    const { evidence, outcomes } = await this.gather(request);

    const withQuality = evidence.map((record) => ({ ...record, qualityScore: this.scorer.quality(record) }));
    const unique = this.deduplicator.deduplicate(withQuality, { keepHighestQuality: true });

    const targetConcepts = extractTargetConcepts(conceptMap, goal);
    const context = domainContext(domain, goal);

    const scored = unique.map((record, index): EvidenceRecord => {
      const domainRelevance = calculateDomainRelevance(record, targetConcepts, context);
      const scores = this.scorer.score(record, request.searchTerms);
      const confidenceScore = blendConfidence(scores.confidenceScore, domainRelevance);
      return {
        ...record,
        ...scores,
        id: `ev_${index + 1}`,
        domainRelevance,
        confidenceScore,
        evidenceTier: evidenceTier(confidenceScore),
        epistemicMetadata: record.epistemicMetadata ?? extractEpistemicMetadata(record),
      };
    });

    const records = rankEvidence(scored);
    const tiers: Record<string, number> = {};
    for (const record of records) {
      tiers[record.evidenceTier] = (tiers[record.evidenceTier] ?? 0) + 1;
    }
    log.info("Compiled evidence", { raw: evidence.length, unique: records.length, tiers });

    return { request, records, outcomes };
  }
}
