import { readFile } from "node:fs/promises";
import { resolveResource } from "../paths.js";
import { render } from "./template-renderer.js";

export const PROMPT_NAMES = [
  "visioner",
  "concept-learner",
  "key-findings",
  "cross-domain",
  "synthesizer",
  "simulation",
  "ethics",
] as const;
export type PromptName = (typeof PROMPT_NAMES)[number];

export interface PromptPair {
  system?: string;
  user: string;
}

const cache = new Map<PromptName, Promise<PromptPair>>();

async function readOptional(path: string): Promise<string | undefined> {
  try {
    return await readFile(path, "utf-8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return undefined;
    }
    throw error;
  }
}

async function readPair(name: PromptName): Promise<PromptPair> {
  const [system, user] = await Promise.all([
    readOptional(resolveResource("prompts", `${name}.system.md`)),
    readFile(resolveResource("prompts", `${name}.md`), "utf-8"),
  ]);
  return { system: system?.trim(), user: user.trim() };
}

/** Loads resources/prompts/<name>.md and its optional .system.md, once per process. */
export function loadPrompt(name: PromptName): Promise<PromptPair> {
  let pending = cache.get(name);
  if (!pending) {
    pending = readPair(name);
    cache.set(name, pending);
    void pending.catch(() => cache.delete(name));
  }
  return pending;
}

export async function renderPrompt(
  name: PromptName,
  data: Record<string, unknown>,
): Promise<{ prompt: string; systemMessage?: string }> {
  const { system, user } = await loadPrompt(name);
  return { prompt: render(user, data), systemMessage: system };
}
