import { stageTemplate } from "../pipeline/stageTemplates.js";
import type { ReasoningStep } from "../schema/run.js";

function nodeStyle(confidence: number): string {
  if (confidence >= 0.8) {
    return "fill:#d4edda,stroke:#28a745,stroke-width:2px";
  }
  if (confidence >= 0.7) {
    return "fill:#fff3cd,stroke:#ffc107,stroke-width:2px";
  }
  return "fill:#f8d7da,stroke:#dc3545,stroke-width:2px";
}

/** Mermaid `graph TD` of the reasoning chain, coloured by confidence. */
export function buildFlowchart(steps: ReasoningStep[]): string {
  const lines = [
    "```mermaid",
    "graph TD",
    `    Start([🎯 Research Goal<br/>Generate Novel Hypothesis]) --> ${steps.length > 0 ? "Step1" : "End"}`,
    "    style Start fill:#e1f5e1,stroke:#4caf50,stroke-width:3px",
    "",
  ];

  steps.forEach((step, index) => {
    const node = `Step${index + 1}`;
    const next = index + 1 < steps.length ? `Step${index + 2}` : "End";
    const { emoji } = stageTemplate(step.agent);
    const confidence = Math.floor(step.confidence * 100);
    lines.push(
      `    ${node}[${emoji} ${step.agent}<br/>${step.action}<br/>Conf: ${confidence}% | Evidence: ${step.supportingEvidence.length}]`,
      `    style ${node} ${nodeStyle(step.confidence)}`,
    );

    const alternatives = step.alternativesConsidered.length;
    if (alternatives > 0) {
      const decision = `Decision${index + 1}`;
      lines.push(
        `    ${node} --> ${decision}{{🤔 Evaluated<br/>${alternatives} Alternative${alternatives > 1 ? "s" : ""}}}`,
        `    style ${decision} fill:#e7f3ff,stroke:#2196f3,stroke-width:2px`,
        `    ${decision} -->|✅ Best Choice| ${next}`,
      );
    } else {
      lines.push(`    ${node} -->|⏭️ Next Stage| ${next}`);
    }
    lines.push("");
  });

  lines.push(
    "    End([✅ Hypothesis<br/>Ready for Review])",
    "    style End fill:#d4edda,stroke:#28a745,stroke-width:3px",
    "",
    "    subgraph Legend",
    "        L1[High Confidence 80%+]",
    "        L2[Good Confidence 70-80%]",
    "        L3[Moderate Confidence <70%]",
    "    end",
    "    style L1 fill:#d4edda,stroke:#28a745",
    "    style L2 fill:#fff3cd,stroke:#ffc107",
    "    style L3 fill:#f8d7da,stroke:#dc3545",
    "    style Legend fill:#f9f9f9,stroke:#999,stroke-dasharray: 5 5",
    "```",
    "",
  );
  return lines.join("\n");
}
