import { afterEach, describe, expect, it, vi } from "vitest";
import { ClinicalTrialsSource } from "../src/evidence/sources/clinicalTrials.js";
import { HttpStatusError } from "../src/evidence/sources/http.js";
import { createEvidenceSources, type EvidenceRequest } from "../src/evidence/sources/index.js";
import { PubMedSource } from "../src/evidence/sources/pubmed.js";
import { decodeEntities, plain } from "../src/evidence/sources/xml.js";

const request: EvidenceRequest = {
  goal: "Slow plaque growth",
  domain: "cardiology",
  searchTerms: ["NLRP3", "Caspase-1"],
  mainQuery: "NLRP3 Caspase-1",
};

const PUBMED_XML = `<?xml version="1.0"?>
<PubmedArticleSet>
  <PubmedArticle>
    <MedlineCitation>
      <PMID Version="1">38000001</PMID>
      <Article>
        <Journal>
          <Title>Circulation</Title>
          <JournalIssue><PubDate><Year>2024</Year></PubDate></JournalIssue>
        </Journal>
        <ArticleTitle>NLRP3 inhibition &amp; plaque</ArticleTitle>
        <Abstract>
          <AbstractText>Background text. Treatment showed smaller plaques. Safety was acceptable</AbstractText>
        </Abstract>
        <AuthorList>
          <Author><LastName>Rivera</LastName><ForeName>Ana</ForeName></Author>
          <Author><LastName>Chen</LastName></Author>
        </AuthorList>
        <PublicationTypeList><PublicationType>Randomized Controlled Trial</PublicationType></PublicationTypeList>
      </Article>
    </MedlineCitation>
  </PubmedArticle>
</PubmedArticleSet>`;

function jsonResponse(body: unknown): Response {
  return new Response(JSON.stringify(body), { status: 200, headers: { "content-type": "application/json" } });
}

function options() {
  return { maxResults: 7, signal: new AbortController().signal };
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("PubMedSource", () => {
  it("searches ids, then parses the fetched articles", async () => {
    const fetchMock = vi.fn(async (url: string) =>
      url.includes("esearch.fcgi")
        ? jsonResponse({ esearchresult: { idlist: ["38000001"] } })
        : new Response(PUBMED_XML, { status: 200 }),
    );
    vi.stubGlobal("fetch", fetchMock);

    const records = await new PubMedSource({ apiKey: "test-secret" }).search(request, options());

    const searchUrl = new URL(fetchMock.mock.calls[0][0]);
    expect(searchUrl.searchParams.get("term")).toBe("NLRP3 OR Caspase-1");
    expect(searchUrl.searchParams.get("retmax")).toBe("7");
    expect(searchUrl.searchParams.get("api_key")).toBe("test-secret");
    expect(new URL(fetchMock.mock.calls[1][0]).searchParams.get("id")).toBe("38000001");

    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({
      source: "PubMed",
      title: "NLRP3 inhibition & plaque",
      citation: "Ana Rivera, Chen. NLRP3 inhibition & plaque. Circulation. 2024.",
      url: "https://pubmed.ncbi.nlm.nih.gov/38000001/",
      keyFindings: ["Treatment showed smaller plaques"],
      venue: "Circulation",
      publicationType: "Randomized Controlled Trial",
      domain: "literature",
      epistemicMetadata: { studyType: "rct", sampleSize: null, weight: 0.9, confidence: 0.9 },
    });
  });

  it("skips the fetch when the search finds nothing", async () => {
    const fetchMock = vi.fn(async () => jsonResponse({ esearchresult: { idlist: [] } }));
    vi.stubGlobal("fetch", fetchMock);

    expect(await new PubMedSource().search(request, options())).toEqual([]);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("surfaces HTTP failures", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => new Response("", { status: 503, statusText: "Service Unavailable" })),
    );

    const search = new PubMedSource().search(request, options());
    await expect(search).rejects.toBeInstanceOf(HttpStatusError);
    await expect(search).rejects.toMatchObject({ status: 503 });
  });
});

describe("ClinicalTrialsSource", () => {
  it("filters by condition and weights late-phase interventional trials", async () => {
    const fetchMock = vi.fn(async (_url: string) =>
      jsonResponse({
        studies: [
          {
            protocolSection: {
              identificationModule: { nctId: "NCT01234567", briefTitle: "Colchicine after MI" },
              statusModule: { overallStatus: "COMPLETED" },
              designModule: { phases: ["PHASE3"], studyType: "INTERVENTIONAL" },
              descriptionModule: { briefSummary: "Randomised colchicine study." },
              outcomesModule: { primaryOutcomes: [{ measure: "MACE" }] },
            },
          },
        ],
      }),
    );
    vi.stubGlobal("fetch", fetchMock);

    const [record] = await new ClinicalTrialsSource().search(request, options());

    const url = new URL(fetchMock.mock.calls[0][0]);
    expect(url.searchParams.get("query.term")).toBe("NLRP3 Caspase-1 AND AREA[Condition]cardiology");
    expect(url.searchParams.get("pageSize")).toBe("7");
    expect(record).toEqual({
      source: "ClinicalTrials.gov",
      title: "Colchicine after MI",
      citation: "NCT01234567 - COMPLETED - Phase: PHASE3",
      url: "https://clinicaltrials.gov/study/NCT01234567",
      excerpts: ["Randomised colchicine study."],
      keyFindings: ["MACE"],
      abstract: "Randomised colchicine study.",
      publicationType: "INTERVENTIONAL",
      domain: "clinical",
      epistemicMetadata: { studyType: "rct", sampleSize: null, weight: 0.99, confidence: 1 },
    });
  });
});

describe("createEvidenceSources", () => {
  it("keeps fan-out order for the configured sources", () => {
    const sources = createEvidenceSources({ sources: ["kaggle", "pubmed"], maxResults: 10, timeoutMs: 1000 });
    expect(sources.map((source) => source.name)).toEqual(["PubMed", "Kaggle"]);
  });
});

describe("xml helpers", () => {
  it("decodes entities and strips markup", () => {
    expect(decodeEntities("a &lt;b&gt; &#x3B1; &#946; &unknown;")).toBe("a <b> α β &unknown;");
    expect(plain("<i>NLRP3</i>   <![CDATA[x & y]]>")).toBe("NLRP3 x & y");
  });
});
