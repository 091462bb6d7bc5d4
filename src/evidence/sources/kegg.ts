import type { RawEvidence } from "../../schema/evidence.js";
import { createLogger } from "../../logger.js";
import { errorMessage } from "../../errors.js";
import { fetchText } from "./http.js";
import type { EvidenceRequest, EvidenceSource, SearchOptions } from "./types.js";

const BASE = "https://rest.kegg.jp";
const ORGANISM = "hsa";
const PATHWAY_WORDS = ["pathway", "signaling", "metabolism", "synthesis", "degradation"];

const DOMAIN_PATHWAYS: Record<string, string[]> = {
  diabetes: ["insulin", "glucose"],
  cardiology: ["cardiac", "vascular"],
  oncology: ["cancer", "tumor"],
  neurology: ["neural", "brain"],
  immunology: ["immune", "cytokine"],
};

const log = createLogger("kegg");

export interface KeggPathway {
  id: string;
  name: string;
}

/** Pathway-ish terms or short ones; KEGG names are terse. */
export function pathwayTerms(searchTerms: string[], domain: string): string[] {
  const terms = searchTerms.slice(0, 10).filter((term) => {
    const lower = term.toLowerCase();
    return PATHWAY_WORDS.some((word) => lower.includes(word)) || term.split(/\s+/).length <= 2;
  });
  return terms.length > 0 ? terms : (DOMAIN_PATHWAYS[domain] ?? [domain]);
}

export function parsePathwayList(listing: string): KeggPathway[] {
  return listing
    .trim()
    .split("\n")
    .flatMap((line) => {
      const [id, name] = line.split("\t");
      return id && name ? [{ id: id.replace(/^path:/, ""), name }] : [];
    });
}

export function parseDescription(entry: string): string {
  const line = entry.split("\n").find((candidate) => candidate.startsWith("DESCRIPTION"));
  return line ? line.replace("DESCRIPTION", "").trim() : "";
}

export class KeggSource implements EvidenceSource {
  readonly id = "kegg";
  readonly name = "KEGG";
  readonly family = "pathway";
  readonly defaultLimit = 5;

  async search(request: EvidenceRequest, { maxResults, signal }: SearchOptions): Promise<RawEvidence[]> {
    const listing = parsePathwayList(await fetchText(`${BASE}/list/pathway/${ORGANISM}`, { signal }));

    const matched: KeggPathway[] = [];
    for (const term of pathwayTerms(request.searchTerms, request.domain).slice(0, 3)) {
      const lower = term.toLowerCase();
      for (const pathway of listing) {
        if (pathway.name.toLowerCase().includes(lower) && !matched.some((seen) => seen.id === pathway.id)) {
          matched.push(pathway);
        }
      }
      if (matched.length >= maxResults) {
        break;
      }
    }

    const evidence: RawEvidence[] = [];
    for (const pathway of matched.slice(0, maxResults)) {
      const description = await this.describe(pathway.id, signal);
      evidence.push({
        source: "KEGG",
        title: pathway.name,
        citation: `KEGG Pathway: ${pathway.id}`,
        url: `https://www.kegg.jp/pathway/${pathway.id}`,
        excerpts: [],
        keyFindings: description ? [description.slice(0, 200)] : [],
        domain: "pathway",
      });
    }
    return evidence;
  }

  private async describe(pathwayId: string, signal: AbortSignal): Promise<string> {
    try {
      return parseDescription(await fetchText(`${BASE}/get/${pathwayId}`, { signal }));
    } catch (error) {
      log.debug("Pathway details unavailable", { pathwayId, error: errorMessage(error) });
      return "";
    }
  }
}
