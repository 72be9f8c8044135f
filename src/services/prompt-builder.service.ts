import { getConfig } from '../config/index.js';
import { ValidationError } from '../utils/errors.js';
import {
  SOP_INSTRUCTIONS_PROMPT,
  OBSERVATIONS_HEADING,
  CLOSING_INSTRUCTION,
} from '../templates/sop-instructions-prompt.js';
import type { FramePlan, InlineImage, SopRequest } from '../types/sop.types.js';

export interface BuiltPrompt {
  prompt: string;
  /** Context as it appears in the prompt, after truncation */
  context?: string;
  truncated: boolean;
}

export interface BuildSopRequestInput {
  framePlan: FramePlan;
  context?: string;
  video?: { path: string; mimeType: string };
  observationImage?: InlineImage;
  template?: string;
  maxLength?: number;
}

/**
 * Cut `text` to at most `length` UTF-16 units without splitting a surrogate pair
 */
function truncateTail(text: string, length: number): string {
  let cut = text.slice(0, length);
  const last = cut.charCodeAt(cut.length - 1);
  if (last >= 0xd800 && last <= 0xdbff) {
    cut = cut.slice(0, -1);
  }
  return cut;
}

/**
 * Concatenate the template and optional user context, never exceeding
 * `maxLength`. Only the tail of the context is ever dropped.
 */
export function buildPrompt(template: string, context: string | undefined, maxLength: number): BuiltPrompt {
  const closing = `\n\n${CLOSING_INSTRUCTION}`;
  const fixedLength = template.length + closing.length;

  if (fixedLength > maxLength) {
    throw new ValidationError(
      `Prompt template needs ${fixedLength} characters but the cap is ${maxLength}`
    );
  }

  const trimmed = context?.trim();
  if (!trimmed) {
    return { prompt: template + closing, truncated: false };
  }

  const contextHeader = `\n\n${OBSERVATIONS_HEADING}\n`;
  const available = maxLength - fixedLength - contextHeader.length;
  const kept = available > 0 ? truncateTail(trimmed, available) : '';

  if (!kept) {
    return { prompt: template + closing, truncated: true };
  }

  return {
    prompt: template + contextHeader + kept + closing,
    context: kept,
    truncated: kept.length < trimmed.length,
  };
}

/**
 * Assemble an immutable request for the model
 */
export function buildSopRequest(input: BuildSopRequestInput): SopRequest {
  const config = getConfig();
  const { prompt, context } = buildPrompt(
    input.template ?? SOP_INSTRUCTIONS_PROMPT,
    input.context,
    input.maxLength ?? config.sop.promptMaxLength
  );

  const request: SopRequest = {
    prompt,
    framePlan: Object.isFrozen(input.framePlan) ? input.framePlan : Object.freeze([...input.framePlan]),
    ...(context !== undefined ? { context } : {}),
    ...(input.video ? { video: Object.freeze({ ...input.video }) } : {}),
    ...(input.observationImage ? { observationImage: Object.freeze({ ...input.observationImage }) } : {}),
  };

  return Object.freeze(request);
}
