import { z } from "zod";
import { errorMessage } from "../errors.js";
import type { AggregationResult, EvidenceAggregator } from "../evidence/aggregator.js";
import type { StructuredLlm } from "../llm/structuredClient.js";
import { createLogger } from "../logger.js";
import { renderPrompt } from "../prompt-helpers/promptLibrary.js";
import type { EvidenceRecord } from "../schema/evidence.js";
import type { ConceptMap } from "../schema/stages.js";
import { stringList } from "./shared.js";

const log = createLogger("evidence-miner");

const ENHANCE_LIMIT = 10;

const keyFindingsSchema = z.object({ key_findings: stringList });

/** Stage 3: multi-source literature search, scoring and ranking. */
export class EvidenceMinerAgent {
  constructor(
    private readonly aggregator: EvidenceAggregator,
    private readonly llm?: StructuredLlm,
  ) {}

  async gatherEvidence(conceptMap: ConceptMap, domain: string, goal: string): Promise<AggregationResult> {
    const result = await this.aggregator.aggregate(conceptMap, domain, goal);
    if (!this.llm || result.records.length === 0) {
      return result;
    }
    return { ...result, records: await this.enhanceKeyFindings(result.records, goal) };
  }

  /** Asks the model for findings on top records that came back without any. Best effort. */
  async enhanceKeyFindings(records: EvidenceRecord[], goal: string): Promise<EvidenceRecord[]> {
    const llm = this.llm;
    if (!llm) {
      return records;
    }

    const enhanced: EvidenceRecord[] = [];
    for (const [index, record] of records.entries()) {
      if (index >= ENHANCE_LIMIT || record.keyFindings.length > 0) {
        enhanced.push(record);
        continue;
      }
      try {
        const { prompt } = await renderPrompt("key-findings", { title: record.title, goal });
        const { key_findings } = await llm.generateStructured({
          prompt,
          temperature: 0.3,
          maxTokens: 300,
          schema: keyFindingsSchema,
          label: "key-findings",
        });
        enhanced.push({ ...record, keyFindings: key_findings });
      } catch (error) {
        log.debug("Key finding extraction skipped", { id: record.id, error: errorMessage(error) });
        enhanced.push(record);
      }
    }
    return enhanced;
  }
}
