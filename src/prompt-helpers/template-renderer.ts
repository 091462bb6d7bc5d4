export type TemplateValue = string | number | boolean | undefined;

/**
 * Replaces {{key}} with values. Unknown placeholders are left in place.
 */
export function renderTemplate(template: string, data: Record<string, TemplateValue>): string {
  return template.replace(/\{\{(\w+)\}\}/g, (placeholder: string, key: string) => {
    if (!Object.hasOwn(data, key)) {
      return placeholder;
    }
    const value = data[key];
    return value !== undefined ? String(value) : "";
  });
}

/**
 * Conditional block rendering: {{#if key}}...{{/if}}. Empty arrays count as false.
 */
export function renderConditional(template: string, data: Record<string, unknown>): string {
  const ifPattern = /\{\{#if\s+(\w+)\}\}([\s\S]*?)\{\{\/if\}\}/g;

  return template.replace(ifPattern, (_match: string, key: string, content: string) => {
    const value = data[key];
    const truthy = Array.isArray(value) ? value.length > 0 : Boolean(value);
    return truthy ? content : "";
  });
}

/**
 * Conditionals first, then substitution of the scalar values.
 */
export function render(template: string, data: Record<string, unknown>): string {
  const withBlocks = renderConditional(template, data);

  const flatData: Record<string, TemplateValue> = {};
  for (const [key, value] of Object.entries(data)) {
    if (
      typeof value === "string" ||
      typeof value === "number" ||
      typeof value === "boolean" ||
      value === undefined
    ) {
      flatData[key] = value;
    }
  }

  return renderTemplate(withBlocks, flatData);
}
