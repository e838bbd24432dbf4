export type TemplateField = 'name' | 'phone';

export type TemplateValues = Readonly<Record<TemplateField, string>>;

export const DEFAULT_CONTACT_FORMAT = '{name} {phone}';

const TOKEN = /\{\{|\}\}|\{([^{}]*)\}/g;

const isTemplateField = (value: string): value is TemplateField => value === 'name' || value === 'phone';

/**
 * Placeholders in `template` that are not `{name}` or `{phone}`. Doubled
 * braces are literal braces.
 */
export function findUnknownPlaceholders(template: string): string[] {
  const unknown: string[] = [];
  for (const match of template.matchAll(TOKEN)) {
    const field = match[1];
    if (field !== undefined && !isTemplateField(field)) {
      unknown.push(field);
    }
  }
  return unknown;
}

export function renderTemplate(template: string, values: TemplateValues): string {
  return template.replace(TOKEN, (token: string, field: string | undefined) => {
    if (field === undefined) {
      return token[0] ?? '';
    }
    return isTemplateField(field) ? values[field] : token;
  });
}
