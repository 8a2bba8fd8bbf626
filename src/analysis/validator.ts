import { LANGUAGES } from './languages.js';
import { parseGovernanceHeader, stripGovernanceHeader } from '../tools/stamper.js';
import type {
  StampedArtifact,
  TargetLanguage,
  ValidationOutcome,
  Violation,
} from '../control-plane/types.js';

export function countChar(text: string, ch: string): number {
  let n = 0;
  for (const c of text) {
    if (c === ch) n++;
  }
  return n;
}

function checkBalancedDelimiters(content: string): Violation | null {
  const open = countChar(content, '{');
  const close = countChar(content, '}');
  if (open === close) return null;
  return {
    check: 'balanced-delimiters',
    message: `Unbalanced braces: ${open} opening, ${close} closing`,
  };
}

function checkDeclaration(content: string, language: TargetLanguage): Violation | null {
  const profile = LANGUAGES[language];
  if (profile.declarationPattern.test(content)) return null;
  return {
    check: 'declaration-present',
    message: `No ${profile.displayName} type or module declaration found`,
  };
}

function checkHeader(content: string, language: TargetLanguage, expectedHeader?: string): Violation | null {
  if (expectedHeader !== undefined) {
    if (content.startsWith(expectedHeader)) return null;
    return {
      check: 'governance-header',
      message: 'Governance header block missing or altered',
    };
  }
  if (parseGovernanceHeader(content, language)) return null;
  return {
    check: 'governance-header',
    message: 'Missing or incomplete governance header',
  };
}

/**
 * Runs every structural check and reports all violations. When
 * `expectedHeader` is given the header must match it verbatim; otherwise the
 * header only has to be well formed. Braces and declarations are looked for
 * below the header, so provenance values never affect them.
 */
export function validateStructure(
  content: string,
  language: TargetLanguage,
  expectedHeader?: string
): ValidationOutcome {
  const body =
    expectedHeader !== undefined && content.startsWith(expectedHeader)
      ? content.slice(expectedHeader.length)
      : stripGovernanceHeader(content, language);

  const violations = [
    checkBalancedDelimiters(body),
    checkDeclaration(body, language),
    checkHeader(content, language, expectedHeader),
  ].filter((v): v is Violation => v !== null);

  return { passed: violations.length === 0, violations };
}

export function validateArtifact(artifact: StampedArtifact, language: TargetLanguage): ValidationOutcome {
  return validateStructure(artifact.content, language, artifact.headerBlock);
}

export function formatViolations(violations: Violation[]): string {
  return violations.map((v) => `[${v.check}] ${v.message}`).join('\n  - ');
}
