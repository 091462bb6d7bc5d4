import { calculateEvidenceStrengthV2, formatEpistemicConfidence } from "../evidence/epistemic.js";
import { createLogger } from "../logger.js";
import type { EvidenceRecord } from "../schema/evidence.js";
import type { DetectedMode, ExecutiveSummary, ReasoningStep, TierCounts } from "../schema/run.js";
import type {
  CompleteScorecard,
  CrossDomainTransfer,
  DivergentVariant,
  EthicsReport,
  HypothesisDocument,
} from "../schema/stages.js";
import {
  cleanDiagnosticText,
  cleanTextBlocks,
  dedupeParagraphs,
  feasibilityLabel,
  filterCrossDomain,
  ivdTimelineCost,
  orNA,
  pluralizeDomains,
  punctuationGuard,
  sentenceCase,
  softenAccuracyClaims,
  type ConsolidatedEvidence,
} from "./guards.js";

const log = createLogger("executive-summary");

export interface ExecutiveSummaryInput {
  document: HypothesisDocument;
  scorecard: CompleteScorecard;
  ethics: EthicsReport;
  evidence: ConsolidatedEvidence;
  evidenceRecords: EvidenceRecord[];
  transfers: CrossDomainTransfer[];
  steps: ReasoningStep[];
  avgConfidence: number;
  mode: DetectedMode;
  domain: string;
}

const IVD_TRANSFERS = [
  "- **Liquid Biopsy**: Preanalytical SOPs from ctDNA workflows → EVs/miRNAs",
  "- **Clinical Chemistry**: Reference materials & EQA programs for inter-lab comparability",
  "- **Automation**: Cartridge-based EV isolation for throughput & reproducibility",
  "- **AI/ML**: Explainable composite modeling + longitudinal trajectory analysis",
];

const DIAGNOSTIC_ACTIONS = [
  "Develop preanalytical SOPs (sample collection, tubes, temperature, storage, spike-in controls)",
  "Perform analytical validation (LoD/LoQ, precision, reproducibility, cross-contamination tests)",
  "Design pilot clinical cohort (n≈150: healthy controls, early-stage and established disease; pre-registered protocol)",
  "Build SHAP-explainable ML model with calibration curves and decision thresholds",
  "Conduct clinical utility study (decision-curve analysis, net reclassification index)",
  "Prepare regulatory pathway documentation (CLIA LDT or CE-IVD dossier)",
];

const MECHANISM_PREFIX = /^(this\s+hypothesis\s+proposes|this\s+approach\s+works\s+by)\s+/i;

function percent(value: number): string {
  return `${Math.round(value * 100)}%`;
}

function strengthBand(strength: number): "strong" | "moderate" | "emerging" | "weak" {
  if (strength >= 0.7) {
    return "strong";
  }
  if (strength >= 0.5) {
    return "moderate";
  }
  return strength >= 0.3 ? "emerging" : "weak";
}

function tierLine(tiers: TierCounts): string {
  return `T1:${tiers.T1}, T2:${tiers.T2}, T3:${tiers.T3}, T4:${tiers.T4}`;
}

interface Narrative {
  mechanism: string;
  outcomes: string;
  rationale: string;
  pathways: string;
}

function cleanNarrative(document: HypothesisDocument, mode: DetectedMode): Narrative {
  return {
    mechanism: cleanDiagnosticText(document.mechanismOfAction, mode),
    outcomes: softenAccuracyClaims(cleanDiagnosticText(document.expectedOutcomes, mode), mode),
    rationale: cleanDiagnosticText(document.clinicalRationale, mode),
    pathways: cleanDiagnosticText(document.pathwayImpact, mode),
  };
}

function elevatorPitch(title: string, text: Narrative): string {
  const lines = [`We propose ${title}.`];
  if (text.mechanism) {
    lines.push(`This approach works by ${sentenceCase(text.mechanism.replace(MECHANISM_PREFIX, "").trim())}.`);
  }
  if (text.outcomes) {
    lines.push(`Expected outcome: ${sentenceCase(text.outcomes)}.`);
  }
  return lines.join(" ");
}

function treatmentGap(input: ExecutiveSummaryInput, text: Narrative): string {
  const parts =
    input.mode === "diagnostic"
      ? [
          "**Current Diagnostic Limitations**:",
          "",
          "- Existing diagnostics lack sensitivity/specificity for early detection",
          "- Current methods are invasive, expensive, or inaccessible",
          "- No reliable biomarkers for disease progression or treatment response",
          "",
        ]
      : [
          "**Current Treatment Limitations**:",
          "",
          "- Existing therapies show limited efficacy in certain patient populations",
          "- Disease progression often continues despite treatment",
          "- Side effects and resistance remain major challenges",
          "",
        ];
  if (text.rationale) {
    parts.push(`**Clinical Context**: ${text.rationale}`, "");
  }
  const evidenceStep = input.steps.find((step) => step.agent === "EvidenceMinerAgent");
  if (evidenceStep?.keyInsight) {
    parts.push(`**Evidence shows**: ${evidenceStep.keyInsight}`, "");
  }
  parts.push(
    `**Compiled from ${input.evidence.total} scientific sources** across ${pluralizeDomains(input.evidence.domains.length)}.`,
  );
  return parts.join("\n");
}

function keyInnovation(input: ExecutiveSummaryInput, text: Narrative): string {
  const parts = [
    text.mechanism
      ? `**Novel Mechanism**: ${text.mechanism}`
      : "**Novel Mechanism**: Multi-target approach combining established pathways",
    "",
  ];
  if (input.transfers.length > 0) {
    if (input.mode === "diagnostic") {
      parts.push("**Cross-Domain Breakthrough**: This diagnostic leverages innovations from multiple fields:", "");
      parts.push(...IVD_TRANSFERS);
    } else {
      parts.push(
        `**Cross-Domain Breakthrough**: This hypothesis leverages innovations from ${input.transfers.length} fields:`,
        "",
      );
      for (const transfer of input.transfers.slice(0, 4)) {
        parts.push(`- **${orNA(transfer.sourceDomain)}**: ${transfer.concept}`);
      }
    }
    parts.push("");
  }
  if (input.document.molecularTargets.length > 0) {
    parts.push(`**Molecular Targets**: ${input.document.molecularTargets.slice(0, 5).join(", ")}`);
  }
  return parts.join("\n");
}

function biologicalRationale(input: ExecutiveSummaryInput, text: Narrative): string {
  const { total, tiers, strength } = input.evidence;
  const parts: string[] = [];
  if (text.mechanism) {
    parts.push("**Mechanistic Justification**:", "", text.mechanism, "");
  }
  if (text.rationale) {
    parts.push("**Clinical Context**:", "", text.rationale, "");
  }
  if (text.pathways) {
    parts.push("**Pathway Effects**:", "", text.pathways, "");
  }
  parts.push(
    `**Evidence Base**: ${total} sources → T1 (high): ${tiers.T1}, T2 (moderate): ${tiers.T2}, T3 (low): ${tiers.T3}, T4 (marginal): ${tiers.T4}`,
    "",
  );
  const descriptions = {
    strong: "(Strong) - Well-supported by literature",
    moderate: "(Moderate) - Individual components supported; combination is novel",
    emerging: "(Emerging) - Preliminary support requiring validation",
    weak: "(Weak) - Speculative; requires extensive validation",
  };
  parts.push(`**Evidence Strength**: ${strength.toFixed(2)} ${descriptions[strengthBand(strength)]}`);

  if (input.mode === "diagnostic") {
    const mentionsL1cam = `${text.mechanism} ${text.outcomes} ${text.rationale}`.toLowerCase().includes("l1cam");
    parts.push(
      "",
      "**Assay Caveats & Controls**:",
      "",
      mentionsL1cam
        ? "- EV immunocapture antibody selection (L1CAM vs alternatives); report orthogonal markers (CD9/63/81)"
        : "- EV isolation/characterization: orthogonal markers (CD9/63/81), NTA size distribution",
      "- Hemolysis/platelet-activation flags; standardized PRP/PPP handling",
      "- PBMC gene/protein readouts: batch correction, RNA integrity, storage time limits",
      "- Inter-site reproducibility with reference materials & EQA participation",
    );
  }
  return parts.join("\n");
}

function priorityActions(input: ExecutiveSummaryInput): string[] {
  if (input.mode === "diagnostic") {
    return [...DIAGNOSTIC_ACTIONS];
  }
  const actions: string[] = [];
  const [assumption] = input.scorecard.assumptions;
  const [target] = input.document.molecularTargets;
  const [route] = input.document.deliveryOptions;
  const [transfer] = filterCrossDomain(
    input.transfers.map((item) => `${item.sourceDomain}: ${item.concept}`),
    input.mode,
  );
  if (assumption) {
    actions.push(`Validate key assumption: ${assumption}`);
  }
  if (target) {
    actions.push(`Test ${target} as primary molecular target in relevant disease model`);
  }
  if (route) {
    actions.push(`Evaluate ${route} delivery route for optimal bioavailability`);
  }
  if (transfer) {
    actions.push(`Validate cross-domain transfer: ${transfer}`);
  }
  actions.push(
    "Conduct systematic literature review to identify evidence gaps",
    "Design preliminary in vitro/in vivo experiments to test mechanism",
  );
  return actions;
}

function evidenceStrengthText({ total, tiers, strength }: ConsolidatedEvidence): string {
  const score = strength.toFixed(2);
  switch (strengthBand(strength)) {
    case "strong":
      return (
        `**STRONG EVIDENCE**: ${total} sources with ${tiers.T1} high-quality studies. ` +
        "The mechanistic rationale is well-established in the literature. " +
        `T2 (${tiers.T2}) and T3 (${tiers.T3}) provide corroborating evidence.`
      );
    case "moderate":
      return (
        `**MODERATE EVIDENCE**: ${total} sources with strength score ${score}. ` +
        `T1 (${tiers.T1}) + T2 (${tiers.T2}) support key aspects. ` +
        "Individual components are validated; the combination is innovative and requires experimental validation."
      );
    case "emerging":
      return (
        `**EMERGING EVIDENCE**: ${total} sources with strength score ${score}. ` +
        `Primarily T3 (${tiers.T3}) and T4 (${tiers.T4}) evidence. ` +
        "This represents an early-stage area requiring significant validation."
      );
    case "weak":
      return (
        `**WEAK EVIDENCE**: ${total} sources with strength score ${score}. ` +
        `Mostly marginal evidence (T4: ${tiers.T4}). ` +
        "This is a speculative hypothesis requiring extensive preclinical work."
      );
  }
}

const ETHICS_NOTES = {
  green: "No significant ethical concerns identified",
  amber: "Manageable ethical considerations requiring oversight",
  red: "Significant ethical concerns requiring resolution",
} as const;

function feasibilityVerdict(input: ExecutiveSummaryInput, text: Narrative): string {
  const { scorecard, ethics } = input;
  const composite = scorecard.feasibilityScore;
  const emoji = composite >= 0.6 ? "✅" : composite >= 0.4 ? "⚠️" : "🚫";
  const lines = [
    `${emoji} **${feasibilityLabel(composite)}** - Composite ${composite.toFixed(2)}`,
    "",
    `**Technical Feasibility**: ${percent(scorecard.technicalFeasibility)}`,
    `**Clinical Translatability**: ${percent(scorecard.clinicalTranslatability)}`,
    `**Safety Profile**: ${percent(scorecard.safetyProfile)}`,
    `**Regulatory Readiness**: ${percent(scorecard.regulatoryPathReady)}`,
    "",
  ];
  if (input.mode === "diagnostic" && `${input.document.title} ${text.mechanism} ${text.rationale}`.toLowerCase().includes("platelet")) {
    lines.push(
      "**Assay Considerations**: Platelet-derived markers may be influenced by platelet count/function; " +
        "enforce standardized PRP prep, rapid processing, and platelet activation controls.",
    );
  }
  if (scorecard.limitations.length > 0) {
    lines.push(`**Key Limitations**: ${scorecard.limitations.slice(0, 3).join("; ")}`);
  }

  let verdict = dedupeParagraphs(lines.join("\n"));
  verdict += `\n\n**Ethics Assessment**: ${ethics.verdict.toUpperCase()} - ${ETHICS_NOTES[ethics.verdict]}`;
  if (ethics.verdictCapped) {
    verdict += "\n\n⚠️ *Note: Ethics verdict capped at AMBER due to weak evidence base*";
  }
  return verdict;
}

function timelineAndCost(composite: number, mode: DetectedMode): { timeline: string; cost: string } {
  if (mode === "diagnostic") {
    const ivd = ivdTimelineCost(composite);
    if (composite >= 0.7) {
      return {
        timeline: [
          ivd.timeline,
          "",
          "**Milestones**:",
          "- Months 0-6: SOPs + analytical validation (spike-in, LoD/LoQ, reproducibility)",
          "- Months 6-12: Replication cohort + SHAP modeling (n=150, calibration)",
          "- Months 12-18: Pilot release as CLIA LDT or RUO kit",
          "",
          "**Regulatory Path**: CLIA LDT (US) or CE-IVD (EU)",
        ].join("\n"),
        cost: [
          ivd.cost,
          "",
          "**Breakdown**:",
          "- Assay development + SOPs: €50k-€100k",
          "- Analytical validation (LoD/LoQ, precision): €40k-€80k",
          "- Pilot cohort (n=150, sample collection, analysis): €100k-€200k",
          "- Bioinformatics + SHAP modeling: €30k-€60k",
          "- QC systems + regulatory docs: €30k-€60k",
          "",
          "**Reasoning**: Standard IVD development with established methods",
        ].join("\n"),
      };
    }
    if (composite >= 0.5) {
      return {
        timeline: [
          ivd.timeline,
          "",
          "**Milestones**:",
          "- Months 0-9: Extended analytical validation + cross-site reproducibility",
          "- Months 9-18: Larger cohort (n=200+) + prospective validation",
          "- Months 18-24: Regulatory dossier + pilot release",
          "",
          "**Regulatory Path**: CLIA LDT with additional QC requirements",
        ].join("\n"),
        cost: [
          ivd.cost,
          "",
          "**Breakdown**:",
          "- Extended assay development + cross-site validation: €100k-€150k",
          "- Multi-site analytical validation: €80k-€120k",
          "- Larger cohort (n=200+, multiple sites): €200k-€300k",
          "- Advanced modeling + clinical utility study: €70k-€100k",
          "- Regulatory consulting + dossier preparation: €50k-€130k",
          "",
          "**Reasoning**: Additional validation and regulatory requirements",
        ].join("\n"),
      };
    }
    return {
      timeline: [
        ivd.timeline,
        "",
        "**Milestones**:",
        "- Months 0-12: Extensive method development + reproducibility studies",
        "- Months 12-24: Multi-site validation + clinical utility studies",
        "- Months 24-36+: Regulatory strategy + phased launch",
        "",
        "**Regulatory Path**: Full CE-IVD or FDA 510(k) submission likely required",
      ].join("\n"),
      cost: [
        ivd.cost,
        "",
        "**Breakdown**:",
        "- Comprehensive method development: €150k-€250k",
        "- Multi-site, multi-country validation: €200k-€350k",
        "- Large prospective cohort (n=300+): €250k-€400k",
        "- Clinical utility + health economics: €100k-€150k",
        "- Full regulatory dossier (CE-IVD or 510(k)): €100k-€200k",
        "",
        "**Reasoning**: Complex development with regulatory de-risking",
      ].join("\n"),
    };
  }

  if (composite >= 0.7) {
    return {
      timeline: [
        "**18-36 months** to clinical proof-of-concept",
        "",
        "- Months 1-6: Preclinical validation and target confirmation",
        "- Months 7-12: Lead optimization and formulation development",
        "- Months 13-18: IND-enabling toxicology studies",
        "- Months 19-36: Phase I/II clinical trials",
      ].join("\n"),
      cost: [
        "**MODERATE**: $2-5M for preclinical + Phase I/II",
        "",
        "- Preclinical studies: $500K-1M",
        "- IND preparation: $300K-500K",
        "- Phase I trial: $1-2M",
        "- Phase II proof-of-concept: $1-2M",
        "",
        "**Reasoning**: Standard development pathway with established methods",
      ].join("\n"),
    };
  }
  if (composite >= 0.5) {
    return {
      timeline: [
        "**24-48 months** to clinical proof-of-concept",
        "",
        "- Months 1-12: Extended preclinical validation addressing key uncertainties",
        "- Months 13-24: Optimization and safety assessment",
        "- Months 25-48: Regulatory preparation and early clinical trials",
      ].join("\n"),
      cost: [
        "**MODERATE-HIGH**: $4-8M for preclinical + Phase I/II",
        "",
        "- Extended preclinical validation: $1-2M",
        "- Additional safety studies: $500K-1M",
        "- IND preparation: $500K-750K",
        "- Phase I/II trials: $2-4M",
        "",
        "**Reasoning**: Additional validation and risk mitigation required",
      ].join("\n"),
    };
  }
  return {
    timeline: [
      "**36-60+ months** to clinical proof-of-concept",
      "",
      "- Months 1-24: Extensive preclinical work to de-risk key challenges",
      "- Months 25-36: Regulatory strategy development",
      "- Months 37-60+: Phased clinical development",
    ].join("\n"),
    cost: [
      "**HIGH**: $8-15M+ for preclinical + Phase I/II",
      "",
      "- Comprehensive preclinical program: $3-5M",
      "- Advanced technology development: $1-3M",
      "- Regulatory consulting: $500K-1M",
      "- Phase I/II trials: $3-6M",
      "",
      "**Reasoning**: Complex development requiring significant de-risking",
    ].join("\n"),
  };
}

const FEASIBILITY_POINTS = { GREEN: 0.2, AMBER: 0.12, RED: 0.05 } as const;
const ETHICS_POINTS = { green: 0.1, amber: 0.07, red: 0.03 } as const;

export function successPercent(
  avgConfidence: number,
  strength: number,
  feasibility: keyof typeof FEASIBILITY_POINTS,
  verdict: keyof typeof ETHICS_POINTS,
): number {
  const score = avgConfidence * 0.3 + strength * 0.4 + FEASIBILITY_POINTS[feasibility] + ETHICS_POINTS[verdict];
  return Math.floor(score * 100);
}

function successProbability(input: ExecutiveSummaryInput): string {
  const { total, tiers, strength } = input.evidence;
  const feasibility = input.scorecard.overallFeasibility;
  const pct = successPercent(input.avgConfidence, strength, feasibility, input.ethics.verdict);
  let interpretation = "High-risk/high-reward opportunity requiring substantial validation";
  if (pct >= 60) {
    interpretation = "Strong candidate for development with favorable risk/reward profile";
  } else if (pct >= 40) {
    interpretation = "Viable opportunity requiring careful execution and risk management";
  }
  return [
    `**${pct}%** likelihood of reaching clinical proof-of-concept`,
    "",
    "**Justification**:",
    `- AI reasoning confidence: ${percent(input.avgConfidence)} (reflects analytical rigor)`,
    `- Evidence strength: ${strength.toFixed(2)} from ${total} sources (${tierLine(tiers)})`,
    `- Technical feasibility: ${feasibility}`,
    `- Ethical assessment: ${input.ethics.verdict.toUpperCase()}`,
    "",
    `**Interpretation**: ${interpretation}`,
  ].join("\n");
}

function plausibilityBadge(plausibility: number): string {
  if (plausibility >= 0.6) {
    return "🟢 High Plausibility";
  }
  return plausibility >= 0.4 ? "🟡 Medium Plausibility" : "🟠 Speculative";
}

function titleCase(value: string): string {
  return value
    .split("_")
    .map((word) => sentenceCase(word.toLowerCase()))
    .join(" ");
}

export function formatDivergentVariants(variants: DivergentVariant[]): string | undefined {
  if (variants.length === 0) {
    return undefined;
  }
  const lines = ["## 🔀 Speculative Variants", "", "*Alternative mechanistic approaches for exploratory research*", ""];
  for (const variant of variants.slice(0, 3)) {
    lines.push(
      `### Variant: ${titleCase(variant.type)}`,
      `**${plausibilityBadge(variant.plausibilityEstimate)}** (p=${variant.plausibilityEstimate.toFixed(2)})`,
      "",
      `**Claim**: ${sentenceCase(variant.claim)}`,
      "",
      `**Novelty**: ${variant.noveltyJustification}`,
      "",
      `**Testability**: ${variant.testability}`,
      "",
    );
  }
  return lines.join("\n");
}

export function formatCriticalAssumptions(ethics: EthicsReport): string | undefined {
  const { fragileAssumptions, potentialConfounders } = ethics;
  if (fragileAssumptions.length === 0 && potentialConfounders.length === 0) {
    return undefined;
  }
  const lines = [
    "## ⚠️ Critical Assumptions & Confounders",
    "",
    "*Adversarial review identifies fragile points requiring validation*",
    "",
  ];
  if (fragileAssumptions.length > 0) {
    lines.push("### Fragile Assumptions", "");
    fragileAssumptions.slice(0, 5).forEach((item, index) => {
      lines.push(
        `**${index + 1}. ${sentenceCase(item.assumption)}**`,
        `- ⚠️ Impact if wrong: ${orNA(item.impactIfWrong)}`,
        `- ✅ Mitigation: ${orNA(item.mitigation)}`,
        "",
      );
    });
  }
  if (potentialConfounders.length > 0) {
    lines.push("", "### Potential Confounders", "");
    for (const confounder of potentialConfounders.slice(0, 5)) {
      lines.push(`- 🔍 ${confounder}`);
    }
    lines.push("");
  }
  return lines.join("\n");
}

function consistencyIssues(
  evidence: ConsolidatedEvidence,
  composite: number,
  verdict: string,
  timeline: string,
  mode: DetectedMode,
): string[] {
  const issues: string[] = [];
  const tierSum = evidence.tiers.T1 + evidence.tiers.T2 + evidence.tiers.T3 + evidence.tiers.T4;
  if (evidence.total !== tierSum) {
    issues.push("Evidence count mismatch: total != sum(tiers)");
  }
  if (composite >= 0.6 && verdict.includes("SIGNIFICANT CHALLENGES")) {
    issues.push("Feasibility label inconsistent with composite score");
  }
  if (mode === "diagnostic" && (timeline.includes("IND") || timeline.includes("Phase I"))) {
    issues.push("Diagnostic using drug development timeline");
  }
  return issues;
}

function polish(text: string): string {
  return cleanTextBlocks(punctuationGuard(text));
}

/** Researcher-facing summary built only from reconciled values. */
export function buildExecutiveSummary(input: ExecutiveSummaryInput): ExecutiveSummary {
  const text = cleanNarrative(input.document, input.mode);
  const composite = input.scorecard.feasibilityScore;
  const { timeline, cost } = timelineAndCost(composite, input.mode);
  const verdict = polish(feasibilityVerdict(input, text));
  const estimatedTimeline = polish(timeline);

  const issues = consistencyIssues(input.evidence, composite, verdict, estimatedTimeline, input.mode);
  if (issues.length > 0) {
    log.warn("Consistency issues detected", { issues });
  }

  const strengthV2 = calculateEvidenceStrengthV2(input.evidenceRecords);
  const summary: ExecutiveSummary = {
    title: orNA(input.document.title),
    domain: input.domain,
    mode: input.mode,
    elevatorPitch: polish(elevatorPitch(orNA(input.document.title), text)),
    currentTreatmentGap: polish(treatmentGap(input, text)),
    keyInnovation: polish(keyInnovation(input, text)),
    biologicalRationale: polish(biologicalRationale(input, text)),
    priorityActions: priorityActions(input),
    evidenceStrength: polish(evidenceStrengthText(input.evidence)),
    feasibilityVerdict: verdict,
    estimatedTimeline,
    estimatedCost: polish(cost),
    successProbability: polish(successProbability(input)),
    consistencyIssues: issues,
  };

  if (strengthV2.totalEvidence > 0) {
    summary.epistemicConfidence = formatEpistemicConfidence(strengthV2);
  }
  const variants = formatDivergentVariants(input.document.divergentVariants);
  if (variants) {
    summary.divergentVariants = variants;
  }
  const critical = formatCriticalAssumptions(input.ethics);
  if (critical) {
    summary.criticalAssumptions = critical;
  }
  return summary;
}
