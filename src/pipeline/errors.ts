/**
 * Errors raised while turning a prompt into a FormSpec.
 * None of them is fatal: each is recovered within one interaction.
 */

export interface ValidationIssue {
  /** Dotted path to the offending value, "(root)" for the top level. */
  path: string;
  message: string;
}

/** An externally sourced FormSpec does not match the schema. */
export class ValidationError extends Error {
  readonly issues: readonly ValidationIssue[];

  constructor(issues: readonly ValidationIssue[]) {
    const first = issues[0] ?? { path: "(root)", message: "invalid form spec" };
    const more = issues.length > 1 ? ` (and ${issues.length - 1} more)` : "";
    super(`Invalid form spec at ${first.path}: ${first.message}${more}`);
    this.name = "ValidationError";
    this.issues = issues;
  }

  /** Path of the first offending value. */
  get path(): string {
    return this.issues[0]?.path ?? "(root)";
  }
}

export type GeneratorFailureReason =
  /** Provider missing, HTTP or network failure. */
  | "unavailable"
  | "timeout"
  /** No balanced JSON object in the output. */
  | "no-json"
  | "parse"
  | "schema";

/** The external generator could not produce a usable FormSpec. */
export class GeneratorError extends Error {
  readonly reason: GeneratorFailureReason;

  constructor(reason: GeneratorFailureReason, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "GeneratorError";
    this.reason = reason;
  }
}

/** The user asked for a form without describing it. */
export class EmptyPromptError extends Error {
  constructor() {
    super("Please describe what form you need.");
    this.name = "EmptyPromptError";
  }
}
