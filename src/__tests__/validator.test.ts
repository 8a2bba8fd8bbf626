import { describe, it, expect } from 'vitest';
import { countChar, formatViolations, validateArtifact, validateStructure } from '../analysis/validator.js';
import { stampArtifact } from '../tools/stamper.js';
import type { GovernanceHeader, StampedArtifact } from '../control-plane/types.js';
import { CALCULATOR_CS } from './helpers.js';

const header: GovernanceHeader = {
  runId: 'run_test_01',
  sourcePath: 'legacy/Calculator.vb',
  model: 'stub-model',
  generatedAt: '2026-01-15T10:00:00.000Z',
  promptHash: 'abc123',
};

function stamp(code: string, lang: 'csharp' | 'java' = 'csharp'): StampedArtifact {
  return stampArtifact({ code, promptHash: 'abc123', blockCount: 1 }, header, lang);
}

describe('countChar', () => {
  it('counts occurrences of a single character', () => {
    expect(countChar('{ { } }}', '{')).toBe(2);
    expect(countChar('{ { } }}', '}')).toBe(3);
    expect(countChar('', '{')).toBe(0);
  });
});

describe('validateArtifact', () => {
  it('passes a stamped class with balanced braces', () => {
    expect(validateArtifact(stamp(CALCULATOR_CS), 'csharp')).toEqual({ passed: true, violations: [] });
  });

  it('reports an unmatched closing brace', () => {
    const outcome = validateArtifact(stamp('public class Broken\n{\n}\n}'), 'csharp');
    expect(outcome).toEqual({
      passed: false,
      violations: [
        { check: 'balanced-delimiters', message: 'Unbalanced braces: 1 opening, 2 closing' },
      ],
    });
  });

  it('reports a missing declaration', () => {
    const outcome = validateArtifact(stamp('int x = 1;'), 'java');
    expect(outcome.violations).toEqual([
      { check: 'declaration-present', message: 'No Java type or module declaration found' },
    ]);
  });

  it('accepts language-specific declarations', () => {
    expect(validateArtifact(stamp('namespace Legacy.Tools\n{\n}'), 'csharp').passed).toBe(true);
    expect(validateArtifact(stamp('public record Point(int x, int y) {}'), 'java').passed).toBe(true);
    expect(validateArtifact(stamp('public struct Point {}'), 'java').passed).toBe(false);
  });

  it('detects a truncated header', () => {
    const artifact = stamp(CALCULATOR_CS);
    const truncated = { ...artifact, content: artifact.content.slice(30) };
    expect(validateArtifact(truncated, 'csharp').violations).toEqual([
      { check: 'governance-header', message: 'Governance header block missing or altered' },
    ]);
  });

  it('ignores braces in header values', () => {
    const artifact = stampArtifact(
      { code: CALCULATOR_CS, promptHash: 'abc123', blockCount: 1 },
      { ...header, sourcePath: 'legacy/{old/Calculator.vb' },
      'csharp'
    );
    expect(validateArtifact(artifact, 'csharp')).toEqual({ passed: true, violations: [] });
  });

  it('still counts braces in the code below a header with braces', () => {
    const artifact = stampArtifact(
      { code: 'public class Broken\n{\n}\n}', promptHash: 'abc123', blockCount: 1 },
      { ...header, model: 'stub-{model' },
      'csharp'
    );
    expect(validateArtifact(artifact, 'csharp').violations).toEqual([
      { check: 'balanced-delimiters', message: 'Unbalanced braces: 1 opening, 2 closing' },
    ]);
  });

  it('reports every violation without short-circuiting', () => {
    const artifact = stamp('}');
    const broken = { ...artifact, content: 'int x;\n}' };
    const outcome = validateArtifact(broken, 'csharp');
    expect(outcome.passed).toBe(false);
    expect(outcome.violations.map((v) => v.check)).toEqual([
      'balanced-delimiters',
      'declaration-present',
      'governance-header',
    ]);
  });
});

describe('validateStructure without an expected header', () => {
  it('accepts any well-formed header', () => {
    const content = stamp(CALCULATOR_CS).content;
    expect(validateStructure(content, 'csharp').passed).toBe(true);
  });

  it('ignores braces in a well-formed header', () => {
    const content = stampArtifact(
      { code: CALCULATOR_CS, promptHash: 'abc123', blockCount: 1 },
      { ...header, sourcePath: 'legacy/{old/Calculator.vb' },
      'csharp'
    ).content;
    expect(validateStructure(content, 'csharp').passed).toBe(true);
  });

  it('does not take a declaration from the header', () => {
    const content = stampArtifact(
      { code: 'int x = 1;', promptHash: 'abc123', blockCount: 1 },
      { ...header, sourcePath: 'legacy/class Calculator.vb' },
      'java'
    ).content;
    expect(validateStructure(content, 'java').violations).toEqual([
      { check: 'declaration-present', message: 'No Java type or module declaration found' },
    ]);
  });

  it('rejects content with no header', () => {
    expect(validateStructure(CALCULATOR_CS, 'csharp').violations).toEqual([
      { check: 'governance-header', message: 'Missing or incomplete governance header' },
    ]);
  });
});

describe('formatViolations', () => {
  it('joins violations into an indented list', () => {
    expect(
      formatViolations([
        { check: 'balanced-delimiters', message: 'a' },
        { check: 'governance-header', message: 'b' },
      ])
    ).toBe('[balanced-delimiters] a\n  - [governance-header] b');
  });
});
