import { UnsupportedLanguageError } from '../control-plane/errors.js';
import type { TargetLanguage } from '../control-plane/types.js';

export interface LanguageProfile {
  id: TargetLanguage;
  displayName: string;
  extension: string;
  commentPrefix: string;
  fenceTags: string[];
  declarationPattern: RegExp;
}

export const LANGUAGES: Record<TargetLanguage, LanguageProfile> = {
  csharp: {
    id: 'csharp',
    displayName: 'C#',
    extension: '.cs',
    commentPrefix: '//',
    fenceTags: ['csharp', 'cs', 'c#'],
    declarationPattern: /\b(?:class|interface|struct|enum|record|namespace)\s+[A-Za-z_][\w.]*/,
  },
  java: {
    id: 'java',
    displayName: 'Java',
    extension: '.java',
    commentPrefix: '//',
    fenceTags: ['java'],
    declarationPattern: /\b(?:class|interface|enum|record)\s+[A-Za-z_]\w*/,
  },
};

const ALIASES: Record<string, TargetLanguage> = {
  csharp: 'csharp',
  cs: 'csharp',
  'c#': 'csharp',
  java: 'java',
};

export function parseTargetLanguage(value: string): TargetLanguage {
  const lang = ALIASES[value.trim().toLowerCase()];
  if (!lang) {
    throw new UnsupportedLanguageError(value);
  }
  return lang;
}

export function languageForExtension(ext: string): TargetLanguage | null {
  const lower = ext.toLowerCase();
  for (const profile of Object.values(LANGUAGES)) {
    if (profile.extension === lower) return profile.id;
  }
  return null;
}
