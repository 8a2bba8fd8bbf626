import { createHash } from 'node:crypto';
import { LANGUAGES } from '../analysis/languages.js';
import { TemplateMissingError } from '../control-plane/errors.js';
import type { PromptBundle, PromptTemplates, TargetLanguage } from '../control-plane/types.js';
import { PERSONA_TEMPLATE_FILE, TASK_TEMPLATE_FILE } from './templates.js';

export const REQUEST_TEMPERATURE = 0.2;
export const REQUEST_MAX_TOKENS = 4000;

const TARGET_LANG_PLACEHOLDER = /\{\{TARGET_LANG\}\}/g;

export type ChatMessage =
  | { role: 'system'; content: string }
  | { role: 'user'; content: string };

export interface ModelRequest {
  model: string;
  temperature: number;
  maxTokens: number;
  messages: ChatMessage[];
}

export function hashTemplates(templates: PromptTemplates): string {
  return createHash('sha256')
    .update(templates.persona)
    .update('\0')
    .update(templates.task)
    .digest('hex');
}

export function assertTemplates(
  templates: Partial<PromptTemplates>
): asserts templates is PromptTemplates {
  if (!templates.persona || templates.persona.trim().length === 0) {
    throw new TemplateMissingError(PERSONA_TEMPLATE_FILE);
  }
  if (!templates.task || templates.task.trim().length === 0) {
    throw new TemplateMissingError(TASK_TEMPLATE_FILE);
  }
}

export function assemblePrompt(
  job: { targetLanguage: TargetLanguage },
  templates: Partial<PromptTemplates>,
  sourceText: string
): PromptBundle {
  assertTemplates(templates);
  const { persona, task } = templates;
  const displayName = LANGUAGES[job.targetLanguage].displayName;

  return Object.freeze({
    system: persona.trim(),
    task: task.replace(TARGET_LANG_PLACEHOLDER, displayName).trim(),
    source: sourceText,
    promptHash: hashTemplates({ persona, task }),
  });
}

/**
 * Persona goes in the system message; the user message is always the task
 * followed by the source text.
 */
export function buildModelRequest(bundle: PromptBundle, model: string): ModelRequest {
  return {
    model,
    temperature: REQUEST_TEMPERATURE,
    maxTokens: REQUEST_MAX_TOKENS,
    messages: [
      { role: 'system', content: bundle.system },
      { role: 'user', content: `${bundle.task}\n\n${bundle.source}` },
    ],
  };
}
