export type TemplateValues = Record<string, string>;

/** Replaces `{key}` placeholders; unknown keys are left in place. */
export function fillTemplate(template: string, values: TemplateValues): string {
  return template.replace(/\{(\w+)\}/g, (placeholder, key: string) => values[key] ?? placeholder);
}

export function titleCase(value: string): string {
  return value
    .split(/[\s_]+/)
    .filter((word) => word.length > 0)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(" ");
}

/** `value.slice(0, end)` that never ends on the first half of a surrogate pair. */
export function sliceCodePoints(value: string, end: number): string {
  const cut = value.slice(0, end);
  const last = cut.charCodeAt(cut.length - 1);
  return last >= 0xd800 && last <= 0xdbff ? cut.slice(0, -1) : cut;
}
