import { z } from "zod";
import { extractEpistemicMetadata } from "../epistemic.js";
import type { RawEvidence } from "../../schema/evidence.js";
import { fetchJson, fetchText, withQuery } from "./http.js";
import type { EvidenceRequest, EvidenceSource, SearchOptions } from "./types.js";
import { formatAuthors } from "./types.js";
import { elements, plain, text } from "./xml.js";

const EUTILS = "https://eutils.ncbi.nlm.nih.gov/entrez/eutils";
const TOOL = "mcp-med-hypothesis";
const FINDING_VERBS = ["found", "showed", "demonstrated", "revealed", "indicated", "suggests", "associated"];

const esearchSchema = z.object({
  esearchresult: z.object({ idlist: z.array(z.string()).default([]) }).default({}),
});

export interface PubMedOptions {
  apiKey?: string;
  email?: string;
}

/** Sentences among the first five that report a result. */
export function findingSentences(abstract: string): string[] {
  return abstract
    .split(". ")
    .slice(0, 5)
    .filter((sentence) => FINDING_VERBS.some((verb) => sentence.toLowerCase().includes(verb)))
    .map((sentence) => sentence.trim())
    .slice(0, 3);
}

export function parsePubmedArticles(xml: string): RawEvidence[] {
  return elements(xml, "PubmedArticle").map((article) => {
    const pmid = text(article, "PMID") || "Unknown";
    const title = text(article, "ArticleTitle") || "No title";
    const abstract = elements(article, "AbstractText")
      .map(plain)
      .filter((part) => part.length > 0)
      .join(" ");
    const authors = elements(article, "Author").flatMap((author) => {
      const last = text(author, "LastName");
      if (!last) return [];
      const fore = text(author, "ForeName");
      return [fore ? `${fore} ${last}` : last];
    });
    const journalBlock = elements(article, "Journal")[0] ?? "";
    const journal = text(journalBlock, "Title") || "Unknown Journal";
    const pubDate = elements(article, "PubDate")[0] ?? "";
    const year = text(pubDate, "Year") || "Unknown";
    const publicationType = elements(article, "PublicationType")
      .map(plain)
      .join("; ");

    const evidence: RawEvidence = {
      source: "PubMed",
      title,
      citation: `${formatAuthors(authors)}. ${title}. ${journal}. ${year}.`,
      url: `https://pubmed.ncbi.nlm.nih.gov/${pmid}/`,
      excerpts: abstract ? [abstract.slice(0, 500)] : [],
      keyFindings: findingSentences(abstract),
      abstract,
      venue: journal,
      publicationType,
      domain: "literature",
    };
    return { ...evidence, epistemicMetadata: extractEpistemicMetadata(evidence) };
  });
}

export class PubMedSource implements EvidenceSource {
  readonly id = "pubmed";
  readonly name = "PubMed";
  readonly family = "literature";
  readonly defaultLimit = 15;

  constructor(private readonly options: PubMedOptions = {}) {}

  async search(request: EvidenceRequest, { maxResults, signal }: SearchOptions): Promise<RawEvidence[]> {
    const term = request.searchTerms.slice(0, 5).join(" OR ");
    if (!term) {
      return [];
    }

    const common = { db: "pubmed", api_key: this.options.apiKey, email: this.options.email, tool: TOOL };
    const search = await fetchJson(
      withQuery(`${EUTILS}/esearch.fcgi`, { ...common, term, retmax: maxResults, retmode: "json", sort: "relevance" }),
      esearchSchema,
      { signal },
    );
    const ids = search?.esearchresult.idlist ?? [];
    if (ids.length === 0) {
      return [];
    }

    const xml = await fetchText(withQuery(`${EUTILS}/efetch.fcgi`, { ...common, id: ids.join(","), retmode: "xml" }), {
      signal,
    });
    return parsePubmedArticles(xml);
  }
}
