export { GENERATOR_SYSTEM_PROMPT } from "./generator.js";
export { FORM_SPEC_SHAPE, FIELD_RULES } from "./shared.js";

// ─────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────

export interface GeneratorContext {
  prompt: string;
}

// ─────────────────────────────────────────────────────────────
// Prompt assembly helpers
// ─────────────────────────────────────────────────────────────

/**
 * Assemble the user message for the form generator.
 * The system prompt is static; this is the per-request user turn.
 */
export function assembleGeneratorUserMessage(ctx: GeneratorContext): string {
  return [
    `Form description:`,
    `"""`,
    ctx.prompt.trim(),
    `"""`,
    ``,
    `Output your JSON form spec now.`,
  ].join("\n");
}
