import { existsSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/**
 * Resolves the package root whether the code runs from src/ (vitest) or dist/.
 */
export function getProjectRoot(): string {
  const fromModule = resolve(__dirname, "..");
  const fromNested = resolve(__dirname, "../..");

  if (existsSync(resolve(fromModule, "package.json"))) {
    return fromModule;
  }
  if (existsSync(resolve(fromNested, "package.json"))) {
    return fromNested;
  }

  return fromModule;
}

export function resolveResource(...segments: string[]): string {
  return resolve(getProjectRoot(), "resources", ...segments);
}
