export type TemplateVars = Record<string, string | string[] | boolean | number | undefined>;

function isTruthy(value: TemplateVars[string]): boolean {
  return (
    value !== undefined &&
    value !== false &&
    value !== '' &&
    value !== 0 &&
    !(Array.isArray(value) && value.length === 0)
  );
}

/**
 * Minimal mustache-style rendering: `{{#each list}}…{{this}}…{{/each}}`,
 * `{{#if var}}…{{else}}…{{/if}}` and `{{var}}`. `{{var}}` values are
 * inserted last, in one pass: placeholders inside them stay as they are.
 */
export function renderTemplate(template: string, vars: TemplateVars): string {
  let result = template;

  result = result.replace(
    /\{\{#each (\w+)\}\}([\s\S]*?)\{\{\/each\}\}/g,
    (_match, key: string, body: string) => {
      const value = vars[key];
      if (!Array.isArray(value) || value.length === 0) return '';
      return value.map((item) => body.replace(/\{\{this\}\}/g, () => item)).join('');
    },
  );

  result = result.replace(
    /\{\{#if (\w+)\}\}([\s\S]*?)\{\{\/if\}\}/g,
    (_match, key: string, body: string) => {
      const [whenTrue, whenFalse] = body.split(/\{\{else\}\}/);
      return isTruthy(vars[key]) ? whenTrue : (whenFalse ?? '');
    },
  );

  result = result.replace(/\{\{(\w+)\}\}/g, (match, key: string) => {
    const value = vars[key];
    if (value === undefined) return match;
    if (Array.isArray(value)) return value.join(', ');
    return String(value);
  });

  return result;
}
