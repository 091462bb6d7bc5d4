import type { EvidenceSourceName } from "../../config.js";
import type { RawEvidence } from "../../schema/evidence.js";

export type SourceFamily = "literature" | "clinical" | "preprint" | "protein" | "pathway" | "chemical" | "dataset";

/** The query side of one evidence-mining pass, shared by every source. */
export interface EvidenceRequest {
  goal: string;
  domain: string;
  /** Expanded search terms, most important first. */
  searchTerms: string[];
  /** First three search terms joined with spaces. */
  mainQuery: string;
}

export interface SearchOptions {
  maxResults: number;
  signal: AbortSignal;
}

export interface EvidenceSource {
  readonly id: EvidenceSourceName;
  /** Display name; also the key into the credibility table. */
  readonly name: string;
  readonly family: SourceFamily;
  readonly defaultLimit: number;
  appliesTo?(request: EvidenceRequest): boolean;
  search(request: EvidenceRequest, options: SearchOptions): Promise<RawEvidence[]>;
}

export function mentionsAny(text: string, keywords: string[]): boolean {
  const lower = text.toLowerCase();
  return keywords.some((keyword) => lower.includes(keyword));
}

/** `A, B, C et al.` style author list. */
export function formatAuthors(authors: string[], limit = 3): string {
  const shown = authors.slice(0, limit).join(", ");
  return authors.length > limit ? `${shown} et al.` : shown;
}
