import { existsSync } from "node:fs";
import { resolve } from "node:path";
import { config as loadDotenv } from "dotenv";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import { getProjectRoot } from "./paths.js";

export const MEMORY_STORE_PATH = ":memory:";

const providerNames = ["sampling", "openai", "claude", "anthropic"] as const;
const logLevels = ["debug", "info", "warn", "error"] as const;

export const EVIDENCE_SOURCE_NAMES = [
  "pubmed",
  "crossref",
  "clinicaltrials",
  "arxiv",
  "uniprot",
  "kegg",
  "pubchem",
  "chembl",
  "zenodo",
  "kaggle",
] as const;
export type EvidenceSourceName = (typeof EVIDENCE_SOURCE_NAMES)[number];

const optionalString = z
  .string()
  .trim()
  .transform((value) => (value.length > 0 ? value : undefined))
  .optional();

const intWithDefault = (fallback: number, min: number, max: number) =>
  z
    .string()
    .trim()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined || value.length === 0) {
        return fallback;
      }
      const parsed = Number(value);
      if (!Number.isInteger(parsed) || parsed < min || parsed > max) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `expected an integer between ${min} and ${max}, got "${value}"`,
        });
        return z.NEVER;
      }
      return parsed;
    });

const envSchema = z.object({
  MED_HYPOTHESIS_RUNS_PATH: optionalString,
  LLM_PROVIDER: z
    .string()
    .trim()
    .toLowerCase()
    .optional()
    .transform((value) => (value && value.length > 0 ? value : "sampling"))
    .pipe(z.enum(providerNames)),
  OPENAI_API_KEY: optionalString,
  OPENAI_BASE_URL: optionalString,
  OPENAI_MODEL: optionalString,
  ANTHROPIC_API_KEY: optionalString,
  ANTHROPIC_MODEL: optionalString,
  LLM_MAX_ATTEMPTS: intWithDefault(3, 1, 10),
  LLM_RETRY_BASE_MS: intWithDefault(2000, 0, 60_000),
  LLM_RETRY_MAX_MS: intWithDefault(10_000, 0, 300_000),
  LLM_TIMEOUT_MS: intWithDefault(120_000, 1000, 600_000),
  EVIDENCE_MAX_RESULTS: intWithDefault(10, 1, 100),
  EVIDENCE_TIMEOUT_MS: intWithDefault(30_000, 1000, 300_000),
  EVIDENCE_SOURCES: optionalString,
  NCBI_API_KEY: optionalString,
  CONTACT_EMAIL: optionalString,
  KAGGLE_USERNAME: optionalString,
  KAGGLE_KEY: optionalString,
  LOG_LEVEL: z
    .string()
    .trim()
    .toLowerCase()
    .optional()
    .transform((value) => (value && value.length > 0 ? value : "info"))
    .pipe(z.enum(logLevels)),
});

export interface AppConfig {
  runsPath: string;
  llm: {
    provider: "sampling" | "openai" | "claude";
    openai: { apiKey?: string; baseURL?: string; defaultModel?: string };
    claude: { apiKey?: string; defaultModel?: string };
    maxAttempts: number;
    retryBaseMs: number;
    retryMaxMs: number;
    timeoutMs: number;
  };
  evidence: {
    sources: EvidenceSourceName[];
    maxResults: number;
    timeoutMs: number;
    ncbiApiKey?: string;
    contactEmail?: string;
    kaggle?: { username: string; key: string };
  };
  logLevel: (typeof logLevels)[number];
}

let dotenvLoaded = false;

function loadEnvFiles(): void {
  if (dotenvLoaded) {
    return;
  }
  dotenvLoaded = true;

  const candidates = [resolve(process.cwd(), ".env"), resolve(getProjectRoot(), ".env")];
  for (const envPath of new Set(candidates)) {
    if (existsSync(envPath)) {
      loadDotenv({ path: envPath, override: false, quiet: true });
    }
  }
}

function parseSourceList(raw: string | undefined, issues: string[]): EvidenceSourceName[] {
  if (!raw) {
    return [...EVIDENCE_SOURCE_NAMES];
  }

  const selected: EvidenceSourceName[] = [];
  for (const token of raw.split(",")) {
    const name = token.trim().toLowerCase();
    if (name.length === 0) {
      continue;
    }
    const known = EVIDENCE_SOURCE_NAMES.find((candidate) => candidate === name);
    if (known) {
      if (!selected.includes(known)) {
        selected.push(known);
      }
    } else {
      issues.push(`EVIDENCE_SOURCES: unknown source "${name}"`);
    }
  }
  return selected;
}

/**
 * Reads settings from the environment. `.env` files are only consulted when
 * reading from `process.env` itself.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  if (env === process.env) {
    loadEnvFiles();
  }

  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    );
  }

  const values = parsed.data;
  const issues: string[] = [];
  const sources = parseSourceList(values.EVIDENCE_SOURCES, issues);
  if (issues.length > 0) {
    throw new ConfigError(issues);
  }

  return {
    runsPath: values.MED_HYPOTHESIS_RUNS_PATH ?? resolve(getProjectRoot(), "data", "runs.json"),
    llm: {
      provider: values.LLM_PROVIDER === "anthropic" ? "claude" : values.LLM_PROVIDER,
      openai: {
        apiKey: values.OPENAI_API_KEY,
        baseURL: values.OPENAI_BASE_URL,
        defaultModel: values.OPENAI_MODEL,
      },
      claude: {
        apiKey: values.ANTHROPIC_API_KEY,
        defaultModel: values.ANTHROPIC_MODEL,
      },
      maxAttempts: values.LLM_MAX_ATTEMPTS,
      retryBaseMs: values.LLM_RETRY_BASE_MS,
      retryMaxMs: values.LLM_RETRY_MAX_MS,
      timeoutMs: values.LLM_TIMEOUT_MS,
    },
    evidence: {
      sources,
      maxResults: values.EVIDENCE_MAX_RESULTS,
      timeoutMs: values.EVIDENCE_TIMEOUT_MS,
      ncbiApiKey: values.NCBI_API_KEY,
      contactEmail: values.CONTACT_EMAIL,
      kaggle:
        values.KAGGLE_USERNAME && values.KAGGLE_KEY
          ? { username: values.KAGGLE_USERNAME, key: values.KAGGLE_KEY }
          : undefined,
    },
    logLevel: values.LOG_LEVEL,
  };
}
