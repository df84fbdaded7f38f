import type { LangCode, LocalizedString } from './types';
import systemStrings from './systemStrings.json';

type Vars = Record<string, string | number | boolean | null | undefined>;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  !!value && typeof value === 'object' && !Array.isArray(value);

const toLocalized = (value: unknown): LocalizedString | undefined => {
  if (!isRecord(value)) return undefined;
  const out: LocalizedString = {};
  Object.keys(value).forEach(lang => {
    const text = value[lang];
    if (typeof text === 'string') out[lang] = text;
  });
  return out;
};

const getByPath = (root: unknown, path: string): unknown => {
  const parts = (path || '').split('.').map(p => p.trim()).filter(Boolean);
  if (!parts.length) return undefined;
  return parts.reduce<unknown>((acc, key) => (isRecord(acc) ? acc[key] : undefined), root);
};

/** Plain strings pass through; a localized record falls back to `en`, then to `fallback`. */
export const pickLanguage = (value: LocalizedString | string | undefined, language: LangCode, fallback = ''): string => {
  if (typeof value === 'string') return value || fallback;
  if (!value) return fallback;
  return value[(language || 'EN').toLowerCase()] || value.en || fallback;
};

const formatTemplate = (value: string, vars?: Vars): string => {
  if (!vars) return value;
  return value.replace(/\{([a-zA-Z0-9_]+)\}/g, (_match, key: string) => {
    const raw = vars[key];
    return raw === undefined || raw === null ? '' : String(raw);
  });
};

export function tSystem(key: string, language: LangCode, fallback?: string, vars?: Vars): string {
  const raw = toLocalized(getByPath(systemStrings, key));
  const resolved = pickLanguage(raw, language, fallback || '');
  return formatTemplate(resolved || fallback || '', vars);
}
