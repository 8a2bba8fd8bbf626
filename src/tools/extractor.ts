import { LANGUAGES } from '../analysis/languages.js';
import type { ExtractedArtifact, TargetLanguage } from '../control-plane/types.js';

export interface FencedBlock {
  tag: string;
  code: string;
}

export type ExtractionResult =
  | { ok: true; artifact: ExtractedArtifact }
  | { ok: false; reason: 'NoCodeBlockFound'; message: string };

const FENCE = /^[ \t]*```[ \t]*([^\n`]*)\n([\s\S]*?)^[ \t]*```[ \t]*$/gm;

export function findFencedBlocks(raw: string): FencedBlock[] {
  const text = raw.replace(/\r\n?/g, '\n');
  const blocks: FencedBlock[] = [];

  for (const match of text.matchAll(FENCE)) {
    const tag = match[1].trim().split(/\s+/)[0]?.toLowerCase() ?? '';
    const code = match[2].replace(/\s+$/, '');
    if (code.trim().length > 0) {
      blocks.push({ tag, code });
    }
  }

  return blocks;
}

/**
 * Untagged blocks and blocks tagged with the target language are treated as
 * one compilation unit and joined in document order. Blocks tagged with any
 * other language (shell snippets, the legacy source echoed back) are
 * dropped. When nothing is compatible the first block wins.
 */
export function extractCode(
  raw: string,
  language: TargetLanguage,
  promptHash: string
): ExtractionResult {
  const blocks = findFencedBlocks(raw);
  if (blocks.length === 0) {
    return {
      ok: false,
      reason: 'NoCodeBlockFound',
      message: `No fenced code block in model response (${raw.trim().length} chars)`,
    };
  }

  const accepted = new Set(LANGUAGES[language].fenceTags);
  const compatible = blocks.filter((b) => b.tag === '' || accepted.has(b.tag));
  const chosen = compatible.length > 0 ? compatible : [blocks[0]];

  return {
    ok: true,
    artifact: {
      code: chosen.map((b) => b.code).join('\n\n'),
      promptHash,
      blockCount: chosen.length,
    },
  };
}
