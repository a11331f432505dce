import { LANGUAGE_DEFINITIONS } from './definitions';
import { LanguageProfile } from './profile';
import { detectLanguage } from './script-detector';
import { DEFAULT_LANGUAGE, LANGUAGE_CODES, type LanguageCode } from './types';

function isLanguageCode(value: string): value is LanguageCode {
  return LANGUAGE_CODES.some((code) => code === value);
}

/*
 * Holds one profile per supported language. Populated in the constructor and
 * read-only afterwards, so a single instance is shared by every chunking call.
 */
export class LanguageProfileRegistry {
  private readonly profiles = new Map<LanguageCode, LanguageProfile>();
  readonly defaultProfile: LanguageProfile;

  constructor() {
    for (const code of LANGUAGE_CODES) {
      this.profiles.set(code, new LanguageProfile(LANGUAGE_DEFINITIONS[code]));
    }
    this.defaultProfile = this.profileFor(DEFAULT_LANGUAGE);
  }

  /*
   * Exact code match (case-insensitive, `ko-KR` resolves through `ko`), else the default profile.
   */
  getProfile(code: string | null | undefined): LanguageProfile {
    const resolved = this.normalizeCode(code);
    return resolved ? this.profileFor(resolved) : this.defaultProfile;
  }

  hasProfile(code: string | null | undefined): boolean {
    return this.normalizeCode(code) !== null;
  }

  detectLanguage(text: string | null | undefined): LanguageCode {
    return detectLanguage(text);
  }

  detectProfile(text: string | null | undefined): LanguageProfile {
    return this.profileFor(detectLanguage(text));
  }

  // An explicit code wins; null or undefined means detect from the text
  resolveProfile(text: string, code: string | null | undefined): LanguageProfile {
    if (code === null || code === undefined || code.trim() === '') {
      return this.detectProfile(text);
    }
    return this.getProfile(code);
  }

  supportedLanguages(): LanguageCode[] {
    return Array.from(this.profiles.keys());
  }

  private normalizeCode(code: string | null | undefined): LanguageCode | null {
    if (!code) return null;
    const lower = code.trim().toLowerCase();
    if (isLanguageCode(lower)) return lower;
    const primary = lower.split(/[-_]/)[0] ?? '';
    return isLanguageCode(primary) ? primary : null;
  }

  private profileFor(code: LanguageCode): LanguageProfile {
    return this.profiles.get(code) ?? new LanguageProfile(LANGUAGE_DEFINITIONS[code]);
  }
}

// Singleton instance
const REGISTRY = new LanguageProfileRegistry();

export function getLanguageRegistry(): LanguageProfileRegistry {
  return REGISTRY;
}

export function getProfile(code: string | null | undefined): LanguageProfile {
  return REGISTRY.getProfile(code);
}
