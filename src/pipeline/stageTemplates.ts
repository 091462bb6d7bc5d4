import { readFileSync } from "node:fs";
import { z } from "zod";
import { resolveResource } from "../paths.js";
import type { StageAgent } from "../schema/run.js";

const templateSchema = z.object({
  stage: z.string(),
  emoji: z.string(),
  action: z.string(),
  question: z.string(),
  inputSummary: z.string(),
  reasoning: z.string(),
  keyInsight: z.string(),
  impact: z.string(),
  alternatives: z.array(z.string()).length(4),
  decisionRationale: z.string(),
  criteria: z.array(z.string()),
  decisionPoints: z.array(z.string()),
  uncertainties: z.array(z.string()),
  uncertaintyTags: z.array(z.string()),
  handoff: z.array(z.string()),
  handoffPayload: z.array(z.string()),
  provenanceSources: z.array(z.string()),
});

export type StageTemplate = z.infer<typeof templateSchema>;

const templatesSchema = z.object({
  VisionerAgent: templateSchema,
  ConceptLearnerAgent: templateSchema,
  EvidenceMinerAgent: templateSchema,
  CrossDomainMapperAgent: templateSchema,
  SynthesizerAgent: templateSchema,
  SimulationAgent: templateSchema,
  EthicsValidatorAgent: templateSchema,
}) satisfies z.ZodType<Record<StageAgent, StageTemplate>>;

let cached: Record<StageAgent, StageTemplate> | undefined;

export function loadStageTemplates(): Record<StageAgent, StageTemplate> {
  if (!cached) {
    const raw = readFileSync(resolveResource("stage-templates.json"), "utf8");
    cached = templatesSchema.parse(JSON.parse(raw));
  }
  return cached;
}

export function stageTemplate(agent: StageAgent): StageTemplate {
  return loadStageTemplates()[agent];
}
