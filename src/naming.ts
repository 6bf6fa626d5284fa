/**
 * Naming helpers shared by the model namer, the endpoint analyzer and the
 * emitters. English-only, best-effort.
 */

/** Singularize a simple English noun (projects → project, categories → category). */
export function singularize(word: string): string {
  if (word.endsWith("ies") && word.length > 4) return word.slice(0, -3) + "y";
  if (word.endsWith("ses") || word.endsWith("xes") || word.endsWith("zes"))
    return word.slice(0, -2);
  if (word.endsWith("s") && !word.endsWith("ss") && word.length > 2) return word.slice(0, -1);
  return word;
}

/** PascalCase from a segment: "user-profile" → "UserProfile", "userId" → "UserId" */
export function toPascalCase(s: string): string {
  if (!s) return "";
  return s
    .replace(/[^a-zA-Z0-9]+/g, " ")
    .replace(/([a-z0-9])([A-Z])/g, "$1 $2")
    .split(/\s+/)
    .filter(Boolean)
    .map((w) => w.charAt(0).toUpperCase() + w.slice(1))
    .join("");
}

export function toCamelCase(s: string): string {
  const pascal = toPascalCase(s);
  return pascal.charAt(0).toLowerCase() + pascal.slice(1);
}

/** Convert a slug or camelCase segment into lowercase words. */
export function humanize(segment: string): string {
  return segment
    .replace(/[-_]/g, " ")
    .replace(/([a-z])([A-Z])/g, "$1 $2")
    .toLowerCase();
}

/**
 * Make a type identifier out of a context name. Names that would start with
 * a digit (or are empty) get a "Model" prefix.
 */
export function toTypeName(contextName: string): string {
  const pascal = toPascalCase(contextName);
  if (!pascal) return "Model";
  return /^\d/.test(pascal) ? `Model${pascal}` : pascal;
}

/** Append 2, 3, … to `base` until `taken` no longer has it. */
export function withNumericSuffix(base: string, taken: (name: string) => boolean): string {
  if (!taken(base)) return base;
  let counter = 2;
  while (taken(`${base}${counter}`)) counter++;
  return `${base}${counter}`;
}

const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

/** Property key as it must appear in generated TypeScript: bare or quoted. */
export function propertyKey(name: string): string {
  return IDENTIFIER.test(name) ? name : JSON.stringify(name);
}
