import { createLogger } from "../logger.js";
import type { RawEvidence } from "../schema/evidence.js";
import { similarityRatio } from "./similarity.js";

const log = createLogger("deduplicator");

type Dedupable = Pick<RawEvidence, "source" | "title" | "citation" | "url" | "excerpts" | "keyFindings"> & {
  confidenceScore?: number;
  qualityScore?: number;
};

export interface DeduplicateOptions {
  keepHighestQuality?: boolean;
}

export function extractDoi(evidence: Dedupable): string {
  const fromUrl = /10\.\d{4,}\/\S+/.exec(evidence.url);
  if (fromUrl) {
    return fromUrl[0].replace(/\/+$/, "");
  }
  const fromCitation = /10\.\d{4,}\/[^\s,;]+/.exec(evidence.citation);
  return fromCitation ? fromCitation[0].replace(/[.,;/]+$/, "") : "";
}

export function extractPmid(evidence: Dedupable): string {
  const fromUrl = /pubmed(?:\.ncbi\.nlm\.nih\.gov)?\/(\d+)/.exec(evidence.url);
  if (fromUrl) {
    return fromUrl[1];
  }
  const fromCitation = /PMID:?\s*(\d+)/i.exec(evidence.citation);
  return fromCitation ? fromCitation[1] : "";
}

export function extractNctId(evidence: Dedupable): string {
  const match = /NCT\d{8}/i.exec(`${evidence.citation} ${evidence.url}`);
  return match ? match[0].toUpperCase() : "";
}

export function extractArxivId(evidence: Dedupable): string {
  const match = /arxiv:?\s*(\d{4}\.\d{4,5})/i.exec(`${evidence.citation} ${evidence.url}`);
  return match ? match[1] : "";
}

export function signatureOf(evidence: Dedupable): string {
  const doi = extractDoi(evidence);
  if (doi) return `doi:${doi}`;

  const pmid = extractPmid(evidence);
  if (pmid) return `pmid:${pmid}`;

  const nct = extractNctId(evidence);
  if (nct) return `nct:${nct}`;

  const arxiv = extractArxivId(evidence);
  if (arxiv) return `arxiv:${arxiv}`;

  if (evidence.url) {
    const normalized = evidence.url.replace(/^https?:\/\//, "").replace(/\/+$/, "").split("?")[0];
    return `url:${normalized}`;
  }

  const title = evidence.title
    .toLowerCase()
    .trim()
    .replace(/[^\w\s]/g, "")
    .replace(/\s+/g, " ");
  return `title:${title}`;
}

function qualityOf(evidence: Dedupable): number {
  return evidence.confidenceScore ?? evidence.qualityScore ?? 0.5;
}

export class EvidenceDeduplicator {
  constructor(private readonly similarityThreshold = 0.85) {}

  isFuzzyDuplicate(first: Dedupable, second: Dedupable): boolean {
    const doi = extractDoi(first);
    if (doi && doi === extractDoi(second)) {
      return true;
    }

    const pmid = extractPmid(first);
    if (pmid && pmid === extractPmid(second)) {
      return true;
    }

    const titleA = first.title.toLowerCase().trim();
    const titleB = second.title.toLowerCase().trim();
    if (!titleA || !titleB) {
      return false;
    }
    return similarityRatio(titleA, titleB) >= this.similarityThreshold;
  }

  private matchesEitherWay(first: Dedupable, second: Dedupable): boolean {
    return this.isFuzzyDuplicate(first, second) || this.isFuzzyDuplicate(second, first);
  }

  deduplicate<T extends Dedupable>(records: T[], options: DeduplicateOptions = {}): T[] {
    const keepHighest = options.keepHighestQuality ?? true;
    let kept: Array<{ record: T; signature: string }> = [];

    for (const record of records) {
      const entry = { record, signature: signatureOf(record) };
      // Title similarity is not transitive, so every kept match joins the cluster.
      const cluster = kept.filter(
        (existing) => existing.signature === entry.signature || this.matchesEitherWay(record, existing.record),
      );
      if (cluster.length === 0) {
        kept.push(entry);
        continue;
      }

      let best = cluster[0];
      if (keepHighest) {
        for (const candidate of [...cluster.slice(1), entry]) {
          if (qualityOf(candidate.record) > qualityOf(best.record)) {
            best = candidate;
          }
        }
      }
      kept = kept.flatMap((existing) => {
        if (existing === cluster[0]) return [best];
        return cluster.includes(existing) ? [] : [existing];
      });
    }

    const unique = kept.map((entry) => entry.record);
    const removed = records.length - unique.length;
    if (removed > 0) {
      log.info("Removed duplicate evidence", { removed, unique: unique.length });
    }
    return unique;
  }

  /** Collapses records sharing a signature into one, keeping what each contributed. */
  merge<T extends Dedupable>(records: T[]): T[] {
    const groups = new Map<string, T[]>();
    for (const record of records) {
      const signature = signatureOf(record);
      const group = groups.get(signature);
      if (group) {
        group.push(record);
      } else {
        groups.set(signature, [record]);
      }
    }

    const merged: T[] = [];
    for (const group of groups.values()) {
      if (group.length === 1) {
        merged.push(group[0]);
        continue;
      }

      const [best] = [...group].sort((a, b) => qualityOf(b) - qualityOf(a));
      const others = [...new Set(group.map((record) => record.source))].filter((source) => source !== best.source);
      const confidences = group.flatMap((record) =>
        record.confidenceScore === undefined ? [] : [record.confidenceScore],
      );

      const combined: T = {
        ...best,
        keyFindings: [...new Set(group.flatMap((record) => record.keyFindings))],
        excerpts: [...new Set(group.flatMap((record) => record.excerpts))].slice(0, 3),
        source: others.length > 0 ? `${best.source} (also in: ${others.join(", ")})` : best.source,
        ...(confidences.length > 0 ? { confidenceScore: Math.max(...confidences) } : {}),
      };

      merged.push(combined);
    }
    return merged;
  }
}
