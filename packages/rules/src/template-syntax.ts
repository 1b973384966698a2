// {{ field }} placeholders and {{> clause }} boilerplate partials.
export const PLACEHOLDER_PATTERN = /{{\s*([a-z][a-z0-9_]*)\s*}}/g;
export const PARTIAL_PATTERN = /{{>\s*([a-z][a-z0-9_]*)\s*}}/g;

export const GENERATION_DATE_PLACEHOLDER = 'fecha_generacion';

export function listPlaceholders(text: string): string[] {
  return Array.from(text.matchAll(PLACEHOLDER_PATTERN), (match) => match[1]);
}

export function listPartials(text: string): string[] {
  return Array.from(text.matchAll(PARTIAL_PATTERN), (match) => match[1]);
}

/**
 * Replaces every partial with its clause text. Clauses are not expanded recursively.
 */
export function expandPartials(text: string, resolveClause: (id: string) => string): string {
  return text.replace(PARTIAL_PATTERN, (_, id: string) => resolveClause(id));
}

/**
 * Single-pass substitution: values are inserted verbatim and never re-scanned, so caller
 * text that happens to contain braces comes out exactly as supplied.
 */
export function interpolate(text: string, values: Record<string, string>): string {
  return text.replace(PLACEHOLDER_PATTERN, (_, key: string) => values[key] ?? '');
}
