import { z } from "zod";
import type { HypothesisConstraints } from "../schema/request.js";

/** Free text from the model; anything that is not a string reads as empty. */
export const text = z.string().catch("");

export const optionalText = z.string().optional().catch(undefined);

/** String lists tolerate a bare string and drop non-string members. */
export const stringList = z
  .union([z.array(z.unknown()), z.string()])
  .transform((value) =>
    (Array.isArray(value) ? value : [value])
      .filter((item): item is string => typeof item === "string")
      .map((item) => item.trim())
      .filter((item) => item.length > 0),
  )
  .catch([]);

export const optionalScore = z.number().finite().optional().catch(undefined);

export function describeConstraints(constraints: HypothesisConstraints | undefined): string {
  if (!constraints) {
    return "";
  }
  const lines: string[] = [];
  if (constraints.route) {
    lines.push(`- Preferred route: ${constraints.route}`);
  }
  if (constraints.avoid?.length) {
    lines.push(`- Avoid: ${constraints.avoid.join(", ")}`);
  }
  if (constraints.focus?.length) {
    lines.push(`- Focus areas: ${constraints.focus.join(", ")}`);
  }
  if (constraints.budgetConstraints) {
    lines.push(`- Budget: ${constraints.budgetConstraints}`);
  }
  if (constraints.timeline) {
    lines.push(`- Timeline: ${constraints.timeline}`);
  }
  return lines.join("\n");
}
