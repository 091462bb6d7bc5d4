import type { RawEvidence } from "../../schema/evidence.js";
import { fetchText, withQuery } from "./http.js";
import type { EvidenceRequest, EvidenceSource, SearchOptions } from "./types.js";
import { elements, text } from "./xml.js";

export function parseArxivFeed(xml: string): RawEvidence[] {
  return elements(xml, "entry").map((entry): RawEvidence => {
    const arxivId = text(entry, "id").split("/").pop() ?? "";
    const title = text(entry, "title");
    const summary = text(entry, "summary");
    const published = text(entry, "published").slice(0, 10);
    const authors = elements(entry, "author").map((author) => text(author, "name"));

    return {
      source: "arXiv",
      title,
      citation: `${authors.slice(0, 3).join(", ")} (${published}) arXiv:${arxivId}`,
      url: `https://arxiv.org/abs/${arxivId}`,
      excerpts: [summary.slice(0, 500)],
      keyFindings: [],
      abstract: summary,
      venue: "arXiv",
      domain: "preprint",
    };
  });
}

export class ArxivSource implements EvidenceSource {
  readonly id = "arxiv";
  readonly name = "arXiv";
  readonly family = "preprint";
  readonly defaultLimit = 10;

  async search(request: EvidenceRequest, { maxResults, signal }: SearchOptions): Promise<RawEvidence[]> {
    if (!request.mainQuery) {
      return [];
    }
    const xml = await fetchText(
      withQuery("https://export.arxiv.org/api/query", {
        search_query: `cat:q-bio AND ${request.mainQuery}`,
        start: 0,
        max_results: maxResults,
        sortBy: "relevance",
        sortOrder: "descending",
      }),
      { signal },
    );
    return parseArxivFeed(xml);
  }
}
