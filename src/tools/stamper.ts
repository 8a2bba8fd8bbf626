import { LANGUAGES } from '../analysis/languages.js';
import type {
  ExtractedArtifact,
  GovernanceHeader,
  StampedArtifact,
  TargetLanguage,
} from '../control-plane/types.js';

export const HEADER_MARKER = 'AUTO-GENERATED CODE';
export const HEADER_FOOTER = 'WARNING: Review required before production use';

const HEADER_FIELDS: Array<[label: string, key: keyof GovernanceHeader]> = [
  ['Pipeline Run ID', 'runId'],
  ['Source File', 'sourcePath'],
  ['Model', 'model'],
  ['Generated', 'generatedAt'],
  ['Prompt Hash', 'promptHash'],
];

export function renderGovernanceHeader(header: GovernanceHeader, language: TargetLanguage): string {
  const prefix = LANGUAGES[language].commentPrefix;
  const lines = [
    `${prefix} ${HEADER_MARKER}`,
    ...HEADER_FIELDS.map(([label, key]) => `${prefix} ${label}: ${header[key]}`),
    `${prefix} ${HEADER_FOOTER}`,
  ];
  return lines.join('\n') + '\n\n';
}

export function stampArtifact(
  artifact: ExtractedArtifact,
  header: GovernanceHeader,
  language: TargetLanguage
): StampedArtifact {
  const headerBlock = renderGovernanceHeader(header, language);
  return {
    ...artifact,
    header: { ...header },
    headerBlock,
    content: headerBlock + artifact.code + '\n',
  };
}

/**
 * Reads the header back from a staged file. Returns null unless the marker,
 * every field in order, and the footer are all present at the top.
 */
export function parseGovernanceHeader(content: string, language: TargetLanguage): GovernanceHeader | null {
  const prefix = `${LANGUAGES[language].commentPrefix} `;
  const lines = content.replace(/\r\n?/g, '\n').split('\n');

  if (lines[0] !== `${prefix}${HEADER_MARKER}`) return null;

  const parsed: Partial<GovernanceHeader> = {};
  for (let i = 0; i < HEADER_FIELDS.length; i++) {
    const [label, key] = HEADER_FIELDS[i];
    const expected = `${prefix}${label}: `;
    const line = lines[i + 1];
    if (line === undefined || !line.startsWith(expected)) return null;
    const value = line.slice(expected.length).trim();
    if (value.length === 0) return null;
    parsed[key] = value;
  }

  if (lines[HEADER_FIELDS.length + 1] !== `${prefix}${HEADER_FOOTER}`) return null;

  const { runId, sourcePath, model, generatedAt, promptHash } = parsed;
  if (!runId || !sourcePath || !model || !generatedAt || !promptHash) return null;
  return { runId, sourcePath, model, generatedAt, promptHash };
}

/** Code that follows a well-formed header, or the whole content when there is none. */
export function stripGovernanceHeader(content: string, language: TargetLanguage): string {
  if (!parseGovernanceHeader(content, language)) return content;
  const lines = content.replace(/\r\n?/g, '\n').split('\n');
  return lines.slice(HEADER_FIELDS.length + 2).join('\n');
}
