import { stageTemplate } from "../pipeline/stageTemplates.js";
import type { EvidenceRecord } from "../schema/evidence.js";
import type { ReasoningStep } from "../schema/run.js";
import { confidenceLabel, orNA } from "./guards.js";

export function confidenceBar(confidence: number): string {
  const filled = Math.max(0, Math.min(10, Math.floor(confidence * 10)));
  return "█".repeat(filled) + "░".repeat(10 - filled);
}

function percent2(value: number): string {
  return `${(value * 100).toFixed(2)}%`;
}

function introduction(stepCount: number): string {
  return [
    "# 🧠 The Journey of Discovery: From Question to Hypothesis",
    "",
    "---",
    "",
    "## How This Hypothesis Was Reasoned",
    "",
    "This narrative follows every decision the pipeline made, not only the final answer.",
    "",
    `The hypothesis was built over **${stepCount} distinct stages of analysis**, each handled by a specialised agent. ` +
      "Each agent weighed alternatives and evidence and handed its output to the next.",
    "",
    "**How to use it**:",
    "",
    "- 🔍 **Validate the reasoning**: check that each step follows from sound scientific principles",
    "- 💡 **Look for new connections**: the agents may have linked areas you had not considered",
    "- ⚖️ **Trust but verify**: read the confidence levels and the stated uncertainties",
    "- 🚀 **Build on it**: treat the insights as a starting point for your own work",
  ].join("\n");
}

function stepSection(step: ReasoningStep, index: number, total: number, evidence: EvidenceRecord[]): string {
  const template = stageTemplate(step.agent);
  const lines = [`### ${template.emoji} ${index}/${total}. ${step.agent}: ${step.action}`, "", "---", ""];

  if (step.questionAsked) {
    lines.push("#### 🎯 The Question", "", `*${step.questionAsked}*`, "");
  }

  lines.push("#### 🔀 Why This, Not That", "");
  if (step.alternativesConsidered.length > 0) {
    lines.push("**Alternatives Evaluated:**", "");
    for (const alternative of step.alternativesConsidered.slice(0, 4)) {
      lines.push(`❌ **Dropped**: ${alternative}`, "");
    }
    lines.push(`✅ **Selected**: ${step.action}`, "", `**Why this choice?** ${orNA(step.decisionRationale)}`, "");
    if (step.reasoning) {
      lines.push("**Clinical/Biological Rationale:**", "", step.reasoning.slice(0, 500), "");
    }
  } else {
    lines.push(
      `**Primary approach**: ${step.action}`,
      "",
      `**Rationale**: ${step.decisionRationale ? step.decisionRationale.slice(0, 300) : "Direct path based on prior steps"}`,
      "",
    );
  }

  lines.push("#### 🎯 Decision Criteria", "", "**What guided this decision:**", "");
  lines.push(...template.criteria.map((criterion) => `- ${criterion}`));
  lines.push("", `**Applied to this case**: ${orNA(step.inputSummary.slice(0, 300))}`, "");

  if (step.keyInsight) {
    lines.push("#### 💡 Key Insight", "", `**Key Finding**: ${step.keyInsight}`, "");
  }

  lines.push(
    "#### 📊 Confidence & Uncertainties",
    "",
    `**Confidence Level**: ${confidenceLabel(step.confidence)} (${percent2(step.confidence)})`,
    "",
    "```",
    confidenceBar(step.confidence),
    "```",
    "",
    "**Remaining Uncertainties:**",
    "",
    ...template.uncertainties.map((item) => `- ${item}`),
    "",
    "#### 🤝 Handoff to Next Stage",
    "",
  );
  if (index < total) {
    lines.push(
      "**Delivered to next agent:**",
      "",
      ...template.handoff.map((item) => `- ${item}`),
      "",
      `**This enables the next agent to**: ${step.impactOnHypothesis ?? "Build upon validated foundation"}`,
      "",
    );
  } else {
    lines.push("**Final output**: Complete hypothesis with transparent reasoning chain", "");
  }

  if (step.supportingEvidence.length > 0) {
    lines.push("#### 📚 Evidence Base", "", `Backed by **${step.supportingEvidence.length} scientific sources**`, "");
    if (evidence.length > 0) {
      lines.push("**Top Supporting Studies:**", "");
      for (const record of evidence.slice(0, 2)) {
        lines.push(`- ${record.title.slice(0, 100)} - ${record.citation.slice(0, 100)}`);
      }
      lines.push("");
    }
  }
  return lines.join("\n");
}

function synthesis(steps: ReasoningStep[]): string {
  const average = steps.reduce((sum, step) => sum + step.confidence, 0) / steps.length;
  const insights = steps.flatMap((step) => (step.keyInsight ? [step.keyInsight] : []));
  const alternatives = steps.reduce((sum, step) => sum + step.alternativesConsidered.length, 0);
  const sources = steps.reduce((sum, step) => sum + step.supportingEvidence.length, 0);

  let meaning =
    "**What This Means**: This hypothesis is an exploratory direction with moderate confidence. " +
    "It needs additional validation and risk assessment before significant resources are committed.";
  if (average >= 0.8) {
    meaning =
      "**What This Means**: Evidence, theoretical support and feasibility converge. " +
      "This is a high-priority research opportunity.";
  } else if (average >= 0.7) {
    meaning =
      "**What This Means**: The hypothesis has solid scientific merit with good supporting evidence. " +
      "Some uncertainties remain, but the framework warrants further validation.";
  }

  const lines = [
    "## 🌟 The Complete Journey: From Question to Hypothesis",
    "",
    "---",
    "",
    "### 📖 Story of Discovery",
    "",
    `This hypothesis emerged through a systematic ${steps.length}-stage process in which each step built on the previous one.`,
    "",
    "### ⏱️ Critical Milestones",
    "",
  ];
  steps.forEach((step, index) => {
    if (step.keyInsight) {
      lines.push(`**Stage ${index + 1} (${step.agent})**: ${step.keyInsight}`, "");
    }
  });
  lines.push(
    "### 📊 Overall Confidence Assessment",
    "",
    `**Aggregate Confidence**: ${confidenceLabel(average)} (${percent2(average)})`,
    "",
    "```",
    confidenceBar(average),
    "```",
    "",
    meaning,
    "",
  );
  if (insights.length > 0) {
    lines.push("### 💡 Insights Uncovered", "");
    insights.forEach((insight, index) => lines.push(`**${index + 1}.** ${insight}`, ""));
  }
  lines.push(
    "### 🔍 Analytical Rigor",
    "",
    `- **Alternatives Evaluated**: ${alternatives} different approaches were considered and compared`,
    `- **Evidence Sources**: ${sources} scientific sources were consulted and analyzed`,
    `- **Process Stages**: ${steps.length} specialized agents contributed unique perspectives`,
    "",
  );
  if (steps.some((step) => step.agent === "EthicsValidatorAgent")) {
    lines.push(
      "### ⚖️ Scientific Integrity",
      "",
      "✅ **Ethics Review Completed**: patient safety, informed consent, equity and regulatory compliance were evaluated.",
      "",
    );
  }
  lines.push("### 🛤️ The Path Forward", "", "**Complete Decision Chain**:", "");
  steps.forEach((step, index) => lines.push(`${index + 1}. **${step.agent}** → *${step.action}*`));
  lines.push(
    "",
    "### 🚀 Next Steps",
    "",
    "**If pursuing this hypothesis**:",
    "",
    "1. **Immediate**: Conduct preliminary experiments to validate key assumptions",
    "2. **Short-term**: Secure funding and assemble interdisciplinary research team",
    "3. **Medium-term**: Execute pilot studies with carefully designed protocols",
    "4. **Long-term**: Scale successful approaches toward clinical or real-world applications",
  );
  return lines.join("\n");
}

/** Markdown walk-through of every reasoning step. */
export function buildReasoningNarrative(steps: ReasoningStep[], evidence: EvidenceRecord[] = []): string {
  if (steps.length === 0) {
    return "No reasoning steps recorded.";
  }
  const byId = new Map(evidence.map((record) => [record.id, record]));
  const parts = [introduction(steps.length)];
  steps.forEach((step, index) => {
    const stepEvidence = step.supportingEvidence
      .flatMap((id) => {
        const record = byId.get(id);
        return record ? [record] : [];
      })
      .slice(0, 3);
    parts.push(stepSection(step, index + 1, steps.length, stepEvidence));
  });
  parts.push(synthesis(steps));
  return parts.join("\n\n");
}
