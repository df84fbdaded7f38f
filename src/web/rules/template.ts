export const GLOBAL_SCOPE = 'global';

const TEMPLATE_PATTERN = /\{\{([^}]+)\}\}/g;

/**
 * Key under which an input value is stored: `valueKey_entityId` when the
 * widget is bound to a job, `valueKey_global` otherwise.
 */
export const makeContextKey = (valueKey: string, entityId?: string): string =>
  `${valueKey}_${entityId || GLOBAL_SCOPE}`;

export type TextLookup = (key: string) => string | undefined;

/**
 * Substitutes `{{variable}}` references with stored text values in one pass.
 * A variable is looked up as written, then under its global composite key;
 * anything unresolved becomes an empty string. Substituted values are never
 * scanned again.
 */
export const resolveTemplate = (text: string, lookup: TextLookup): string => {
  if (!text || text.indexOf('{{') < 0) return text;
  const matches = Array.from(text.matchAll(TEMPLATE_PATTERN));
  let out = text;
  // right to left so earlier match offsets stay valid
  for (let i = matches.length - 1; i >= 0; i -= 1) {
    const match = matches[i];
    const start = match.index;
    if (start === undefined) continue;
    const variable = match[1].trim();
    const value = lookup(variable) ?? lookup(makeContextKey(variable)) ?? '';
    out = out.slice(0, start) + value + out.slice(start + match[0].length);
  }
  return out;
};
