import { z } from "zod";

export const MEDICAL_DOMAINS = [
  "cardiology",
  "oncology",
  "neurology",
  "diabetes",
  "infectious_diseases",
  "genetics",
  "immunology",
  "nephrology",
  "pulmonology",
  "gastroenterology",
  "endocrinology",
  "hematology",
  "rheumatology",
  "psychiatry",
  "general_medicine",
] as const;

export const DELIVERY_ROUTES = [
  "oral",
  "topical",
  "localized",
  "systemic",
  "intravenous",
  "subcutaneous",
  "intramuscular",
  "inhalation",
  "transdermal",
] as const;

export const HYPOTHESIS_MODES = ["auto", "diagnostic", "therapeutic"] as const;

export const DEFAULT_CROSS_DOMAINS = ["clinical", "materials", "nanomedicine", "bioinformatics"];

export type MedicalDomain = (typeof MEDICAL_DOMAINS)[number];
export type DeliveryRoute = (typeof DELIVERY_ROUTES)[number];
export type HypothesisMode = (typeof HYPOTHESIS_MODES)[number];

export const constraintsSchema = z.object({
  route: z.enum(DELIVERY_ROUTES).optional(),
  avoid: z.array(z.string().trim().min(1)).optional(),
  focus: z.array(z.string().trim().min(1)).optional(),
  budgetConstraints: z.string().trim().min(1).optional(),
  timeline: z.string().trim().min(1).optional(),
});

export const hypothesisRequestSchema = z.object({
  goal: z.string().trim().min(10).max(500),
  domain: z.enum(MEDICAL_DOMAINS),
  constraints: constraintsSchema.optional(),
  crossDomains: z.array(z.string().trim().min(1)).default(DEFAULT_CROSS_DOMAINS),
  maxRuntimeMinutes: z.number().int().min(1).max(30).default(8),
  userId: z.string().trim().min(1).optional(),
  mode: z.enum(HYPOTHESIS_MODES).default("auto"),
});

export type HypothesisConstraints = z.infer<typeof constraintsSchema>;
/** A request after defaults are applied. */
export type HypothesisRequest = z.output<typeof hypothesisRequestSchema>;
export type HypothesisRequestInput = z.input<typeof hypothesisRequestSchema>;
