const DEBUG_ENV_KEY = 'FIELD_ROUTE_DEBUG';

let cachedDebugFlag: boolean | null = null;

export type LogPayload = Record<string, unknown>;

export const isDebugEnabled = (): boolean => {
  if (cachedDebugFlag !== null) return cachedDebugFlag;
  const flag = typeof process !== 'undefined' ? process.env[DEBUG_ENV_KEY] : undefined;
  cachedDebugFlag = !!flag && (flag === '1' || flag.toLowerCase() === 'true');
  return cachedDebugFlag;
};

/** Overrides the env-derived flag; pass `null` to re-read the environment. */
export const setDebugEnabled = (enabled: boolean | null): void => {
  cachedDebugFlag = enabled;
};

export const debugLog = (scope: string, event: string, payload?: LogPayload): void => {
  if (!isDebugEnabled()) return;
  console.info(`[${scope}]`, event, payload || {});
};

export const warnLog = (scope: string, event: string, payload?: LogPayload): void => {
  console.warn(`[${scope}]`, event, payload || {});
};

export const errorLog = (scope: string, event: string, payload?: LogPayload): void => {
  console.error(`[${scope}]`, event, payload || {});
};
