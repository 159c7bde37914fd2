import type { DocumentTemplate } from '../templates/schema.js';

export const DEFAULT_MAX_OUTPUT_TOKENS = 4096;

const OUTPUT_ONLY_INSTRUCTION =
  'Important: Output ONLY the document text. No preamble, no explanations, no markdown. ' +
  'Just the finished document ready to read or print.';

export const EDITOR_SYSTEM_PROMPT =
  'You are a document editor. The user has a document and wants changes made. ' +
  "Apply the requested changes while preserving the document's overall structure " +
  'and meaning unless told otherwise. ' +
  'Output ONLY the revised document text. No preamble, no explanations, no markdown.';

export interface PromptPair {
  systemPrompt: string;
  userMessage: string;
}

export function buildDraftPrompt(template: DocumentTemplate, notes: string, tone: string): PromptPair {
  return {
    systemPrompt: `${template.systemPrompt}\n\nTone: ${tone}\n${OUTPUT_ONLY_INSTRUCTION}`,
    userMessage: `Document type: ${template.displayName}\n\nMy notes and bullet points:\n${notes}`,
  };
}

export function buildRefinePrompt(currentText: string, instruction: string): PromptPair {
  return {
    systemPrompt: EDITOR_SYSTEM_PROMPT,
    userMessage: `Here is the current document:\n\n${currentText}\n\nPlease make this change: ${instruction}`,
  };
}
