import { describe, expect, it } from "vitest";
import { buildFlowchart } from "../src/report/flowchart.js";
import { agentShortName, buildNarrativeJson } from "../src/report/narrativeJson.js";
import { buildReasoningNarrative, confidenceBar } from "../src/report/reasoningNarrative.js";
import { makeCompleteScorecard, makeDocument, makeEthics, makeRecord, makeStep } from "./fixtures.js";

const steps = [
  makeStep("VisionerAgent", 0.9, {
    alternativesConsidered: ["Single-target approach", "Repurpose existing drug"],
    supportingEvidence: ["ev_1", "ev_9"],
    keyInsight: "Three complementary directions",
  }),
  makeStep("EthicsValidatorAgent", 0.5),
];

describe("buildReasoningNarrative", () => {
  it("handles a run without steps", () => {
    expect(buildReasoningNarrative([])).toBe("No reasoning steps recorded.");
  });

  it("draws a ten-cell confidence bar", () => {
    expect(confidenceBar(0.75)).toBe("███████░░░");
    expect(confidenceBar(0)).toBe("░░░░░░░░░░");
    expect(confidenceBar(1.2)).toBe("██████████");
  });

  it("walks every stage with its template and evidence", () => {
    const narrative = buildReasoningNarrative(steps, [makeRecord("ev_1", 0.9, 0.9)]);
    const lines = narrative.split("\n");

    expect(lines).toContain("### 🔭 1/2. VisionerAgent: VisionerAgent action");
    expect(lines).toContain("### ⚖️ 2/2. EthicsValidatorAgent: EthicsValidatorAgent action");
    expect(lines).toContain("❌ **Dropped**: Single-target approach");
    expect(lines).toContain("**Confidence Level**: High (90.00%)");
    expect(lines).toContain("Backed by **2 scientific sources**");
    expect(lines).toContain("- Study ev_1 - Journal of Tests (2023) ev_1");
    expect(lines).toContain("**Final output**: Complete hypothesis with transparent reasoning chain");
    expect(lines).toContain("**Stage 1 (VisionerAgent)**: Three complementary directions");
    expect(lines).toContain("**Aggregate Confidence**: Moderate-High (70.00%)");
  });
});

describe("buildNarrativeJson", () => {
  it("chains handoffs and uses reconciled cards", () => {
    const json = buildNarrativeJson({
      runId: "run-1",
      goal: "Slow plaque growth in atherosclerosis",
      steps,
      document: makeDocument(),
      scorecard: makeCompleteScorecard(),
      ethics: makeEthics({ verdict: "amber" }),
      evidence: { total: 7, tiers: { T1: 1, T2: 2, T3: 3, T4: 1 }, strength: 0.53, domains: [] },
      timestamp: "2026-01-01T00:00:00.000Z",
    });

    expect(json.narrative.agents.map((agent) => agent.handoff.to)).toEqual(["ethicsvalidator", "user"]);
    expect(json.narrative.agents[0].handoff.payload).toEqual(["research_directions", "molecular_targets", "pathways"]);
    expect(json.narrative.agents[0].whyThisNotThat).toEqual([
      {
        kept: "VisionerAgent action",
        dropped: "Single-target approach, Repurpose existing drug",
        reason: "VisionerAgent rationale",
      },
    ]);
    expect(json.narrative.agents[1].whyThisNotThat).toEqual([]);
    expect(json.cards.hypothesis.feasibility).toBe("AMBER");
    expect(json.cards.hypothesis.ethics).toBe("amber");
    expect(json.cards.evidence).toEqual({ count: 7, tiers: { T1: 1, T2: 2, T3: 3, T4: 1 } });
    expect(json.cards.simulation.scores.feasibilityScore).toBe(0.65);
    expect(json.cards.ethics.conditions).toEqual(["Independent safety board", "Staged dose escalation"]);
    expect(json.provenance).toEqual({
      traceId: "run-1",
      timestamp: "2026-01-01T00:00:00.000Z",
      agentVersions: { VisionerAgent: "1.0", EthicsValidatorAgent: "1.0" },
    });
  });

  it("shortens agent names", () => {
    expect(agentShortName("CrossDomainMapperAgent")).toBe("crossdomainmapper");
  });
});

describe("buildFlowchart", () => {
  it("links stages through decision nodes", () => {
    const lines = buildFlowchart(steps).split("\n");

    expect(lines.slice(0, 3)).toEqual([
      "```mermaid",
      "graph TD",
      "    Start([🎯 Research Goal<br/>Generate Novel Hypothesis]) --> Step1",
    ]);
    expect(lines).toContain("    Step1[🔭 VisionerAgent<br/>VisionerAgent action<br/>Conf: 90% | Evidence: 2]");
    expect(lines).toContain("    style Step1 fill:#d4edda,stroke:#28a745,stroke-width:2px");
    expect(lines).toContain("    Step1 --> Decision1{{🤔 Evaluated<br/>2 Alternatives}}");
    expect(lines).toContain("    Decision1 -->|✅ Best Choice| Step2");
    expect(lines).toContain("    style Step2 fill:#f8d7da,stroke:#dc3545,stroke-width:2px");
    expect(lines).toContain("    Step2 -->|⏭️ Next Stage| End");
    expect(lines.at(-2)).toBe("```");
  });

  it("goes straight to the end node without steps", () => {
    expect(buildFlowchart([]).split("\n")[2]).toBe(
      "    Start([🎯 Research Goal<br/>Generate Novel Hypothesis]) --> End",
    );
  });
});
