import { readdir, readFile } from 'node:fs/promises';
import { extname, join } from 'node:path';
import { languageForExtension } from './languages.js';
import { validateStructure } from './validator.js';
import type { TargetLanguage, Violation } from '../control-plane/types.js';

export interface FileValidation {
  path: string;
  language: TargetLanguage;
  passed: boolean;
  violations: Violation[];
}

export interface DirectoryValidation {
  dir: string;
  files: FileValidation[];
  passed: boolean;
}

async function listEntries(dir: string): Promise<string[]> {
  try {
    const entries = await readdir(dir, { withFileTypes: true });
    return entries.filter((e) => e.isFile()).map((e) => e.name).sort();
  } catch (err) {
    if (isNotFound(err)) return [];
    throw err;
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Re-checks staged artifacts. Only files with a recognized extension are
 * inspected; an empty or missing directory passes.
 */
export async function validateDirectory(dir: string): Promise<DirectoryValidation> {
  const files: FileValidation[] = [];

  for (const name of await listEntries(dir)) {
    const language = languageForExtension(extname(name));
    if (!language) continue;

    const path = join(dir, name);
    const content = await readFile(path, 'utf-8');
    const outcome = validateStructure(content, language);
    files.push({ path, language, ...outcome });
  }

  return { dir, files, passed: files.every((f) => f.passed) };
}

export function formatDiagnostics(result: DirectoryValidation): string[] {
  const lines: string[] = [];
  for (const file of result.files) {
    if (file.passed) {
      lines.push(`  [pass] ${file.path}`);
      continue;
    }
    for (const v of file.violations) {
      lines.push(`  [FAIL] ${file.path}: ${v.check}: ${v.message}`);
    }
  }
  return lines;
}
