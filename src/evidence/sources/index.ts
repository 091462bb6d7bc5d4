import type { AppConfig, EvidenceSourceName } from "../../config.js";
import { ArxivSource } from "./arxiv.js";
import { ChemblSource } from "./chembl.js";
import { ClinicalTrialsSource } from "./clinicalTrials.js";
import { CrossrefSource } from "./crossref.js";
import { KaggleSource } from "./kaggle.js";
import { KeggSource } from "./kegg.js";
import { PubChemSource } from "./pubchem.js";
import { PubMedSource } from "./pubmed.js";
import type { EvidenceSource } from "./types.js";
import { UniProtSource } from "./uniprot.js";
import { ZenodoSource } from "./zenodo.js";

export type { EvidenceRequest, EvidenceSource, SearchOptions, SourceFamily } from "./types.js";

/** Sources in fan-out order; results are concatenated in this order. */
export function createEvidenceSources(config: AppConfig["evidence"]): EvidenceSource[] {
  const factories: Record<EvidenceSourceName, () => EvidenceSource> = {
    pubmed: () => new PubMedSource({ apiKey: config.ncbiApiKey, email: config.contactEmail }),
    crossref: () => new CrossrefSource(config.contactEmail),
    arxiv: () => new ArxivSource(),
    clinicaltrials: () => new ClinicalTrialsSource(),
    uniprot: () => new UniProtSource(),
    kegg: () => new KeggSource(),
    pubchem: () => new PubChemSource(),
    chembl: () => new ChemblSource(),
    zenodo: () => new ZenodoSource(),
    kaggle: () => new KaggleSource(config.kaggle),
  };

  const order: EvidenceSourceName[] = [
    "pubmed",
    "crossref",
    "arxiv",
    "clinicaltrials",
    "uniprot",
    "kegg",
    "pubchem",
    "chembl",
    "zenodo",
    "kaggle",
  ];
  return order.filter((name) => config.sources.includes(name)).map((name) => factories[name]());
}
