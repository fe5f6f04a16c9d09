// ─────────────────────────────────────────────
//  Text Template — {PLACEHOLDER} substitution
//  Unresolved placeholders use the fallback when one is given,
//  otherwise they stay in the text as written.
// ─────────────────────────────────────────────

export type TemplateValues = Record<string, string | number | null | undefined>;

const PLACEHOLDER = /\{([A-Z][A-Z0-9_]*)\}/g;

export const TextTemplate = {
  render(template: string, values: TemplateValues, fallbacks: Record<string, string> = {}): string {
    return template.replace(PLACEHOLDER, (token: string, name: string) => {
      const value = values[name];
      if (value !== undefined && value !== null && value !== '') return String(value);
      return fallbacks[name] ?? token;
    });
  },
};
