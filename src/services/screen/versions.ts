import { tSystem } from '../../web/systemStrings';
import type { LangCode, VersionError } from '../../types';

export const SUPPORTED_VERSIONS: number[] = [1, 2, 3, 4, 5];
export const CURRENT_VERSION = 5;

export const isVersionSupported = (version: unknown): version is number =>
  typeof version === 'number' && SUPPORTED_VERSIONS.includes(version);

/**
 * Describes what a payload version was authored against. Informational only:
 * every supported version is decoded with the same rules.
 */
export const getCompatibilityMode = (version: number, language: LangCode = 'EN'): string => {
  if (!isVersionSupported(version)) return tSystem('versions.unsupported', language, 'Unsupported version');
  return tSystem(`versions.${version}`, language, 'Unsupported version');
};

export const buildVersionError = (version: unknown): VersionError => ({
  type: 'version',
  message: `Unsupported screen version: ${JSON.stringify(version) ?? 'undefined'}. Supported: ${SUPPORTED_VERSIONS.join(', ')}.`,
  version,
  supported: [...SUPPORTED_VERSIONS]
});
