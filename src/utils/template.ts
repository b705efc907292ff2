/**
 * Fill `{name}` placeholders in one pass. Values are inserted verbatim, so
 * placeholder-like text inside a value is left alone. Unknown placeholders
 * are kept.
 */
export function fillTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (placeholder, key: string) =>
    Object.prototype.hasOwnProperty.call(values, key) ? values[key] : placeholder,
  );
}
