import { z } from "zod";
import type { RawEvidence } from "../../schema/evidence.js";
import { fetchJson, withQuery } from "./http.js";
import type { EvidenceRequest, EvidenceSource, SearchOptions } from "./types.js";
import { mentionsAny } from "./types.js";

const moleculeSchema = z.object({
  molecule_chembl_id: z.string().default(""),
  pref_name: z.string().nullable().optional(),
  max_phase: z.union([z.string(), z.number()]).nullable().optional(),
});

const responseSchema = z.object({ molecules: z.array(moleculeSchema.nullable()).default([]) });

type Molecule = z.infer<typeof moleculeSchema>;

export function toEvidence(molecule: Molecule): RawEvidence {
  const id = molecule.molecule_chembl_id;
  const phase = molecule.max_phase ?? undefined;
  return {
    source: "ChEMBL",
    title: `${molecule.pref_name || "Molecule"} (${id})`,
    citation: `ChEMBL: ${id} - Phase ${phase ?? "N/A"}`,
    url: `https://www.ebi.ac.uk/chembl/compound_report_card/${id}`,
    excerpts: [],
    keyFindings: [`Clinical Phase: ${phase ?? "Preclinical"}`],
    domain: "chemical",
  };
}

export class ChemblSource implements EvidenceSource {
  readonly id = "chembl";
  readonly name = "ChEMBL";
  readonly family = "chemical";
  readonly defaultLimit = 5;

  appliesTo(request: EvidenceRequest): boolean {
    return mentionsAny(request.mainQuery, ["drug", "bioactivity", "target", "inhibitor"]);
  }

  async search(request: EvidenceRequest, { maxResults, signal }: SearchOptions): Promise<RawEvidence[]> {
    const data = await fetchJson(
      withQuery("https://www.ebi.ac.uk/chembl/api/data/molecule/search.json", {
        q: request.mainQuery,
        limit: maxResults,
      }),
      responseSchema,
      { signal },
    );
    return (data?.molecules ?? []).flatMap((molecule) => (molecule ? [toEvidence(molecule)] : []));
  }
}
