import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { TemplateMissingError } from '../control-plane/errors.js';
import type { PromptTemplates } from '../control-plane/types.js';

export const PERSONA_TEMPLATE_FILE = 'system_prompt.txt';
export const TASK_TEMPLATE_FILE = 'task_prompt.txt';

async function readTemplate(path: string): Promise<string> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch {
    throw new TemplateMissingError(path);
  }
  if (text.trim().length === 0) {
    throw new TemplateMissingError(path);
  }
  return text;
}

export async function loadPromptTemplates(dir: string): Promise<PromptTemplates> {
  const persona = await readTemplate(join(dir, PERSONA_TEMPLATE_FILE));
  const task = await readTemplate(join(dir, TASK_TEMPLATE_FILE));
  return { persona, task };
}
