import { z } from "zod";
import type { RawEvidence } from "../../schema/evidence.js";
import { fetchJson } from "./http.js";
import type { EvidenceRequest, EvidenceSource, SearchOptions } from "./types.js";
import { mentionsAny } from "./types.js";

const BASE = "https://pubchem.ncbi.nlm.nih.gov/rest/pug";

const cidSchema = z.object({
  IdentifierList: z.object({ CID: z.array(z.number()).default([]) }).default({}),
});

const propertySchema = z.object({
  CID: z.number(),
  MolecularFormula: z.string().default(""),
  MolecularWeight: z.union([z.string(), z.number()]).optional(),
  IUPACName: z.string().optional(),
});

const propertyTableSchema = z.object({
  PropertyTable: z.object({ Properties: z.array(propertySchema).default([]) }).default({}),
});

type CompoundProperties = z.infer<typeof propertySchema>;

export function toEvidence(compound: CompoundProperties): RawEvidence {
  const cid = compound.CID;
  return {
    source: "PubChem",
    title: `${compound.IUPACName || "Compound"} (CID: ${cid})`,
    citation: `PubChem CID: ${cid} - ${compound.MolecularFormula}`,
    url: `https://pubchem.ncbi.nlm.nih.gov/compound/${cid}`,
    excerpts: [],
    keyFindings: [`MW: ${compound.MolecularWeight ?? "N/A"}, Formula: ${compound.MolecularFormula}`],
    domain: "chemical",
  };
}

export class PubChemSource implements EvidenceSource {
  readonly id = "pubchem";
  readonly name = "PubChem";
  readonly family = "chemical";
  readonly defaultLimit = 5;

  appliesTo(request: EvidenceRequest): boolean {
    return mentionsAny(request.mainQuery, ["compound", "drug", "molecule", "chemical"]);
  }

  async search(request: EvidenceRequest, { maxResults, signal }: SearchOptions): Promise<RawEvidence[]> {
    const name = encodeURIComponent(request.mainQuery);
    const ids = await fetchJson(`${BASE}/compound/name/${name}/cids/JSON`, cidSchema, { signal, emptyOn: [404] });
    const cids = (ids?.IdentifierList.CID ?? []).slice(0, maxResults);
    if (cids.length === 0) {
      return [];
    }

    const table = await fetchJson(
      `${BASE}/compound/cid/${cids.join(",")}/property/MolecularFormula,MolecularWeight,IUPACName/JSON`,
      propertyTableSchema,
      { signal },
    );
    return (table?.PropertyTable.Properties ?? []).map(toEvidence);
  }
}
