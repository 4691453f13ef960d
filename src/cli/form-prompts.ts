import chalk from "chalk";
import prompts from "prompts";
import { assertNever, missingRequired } from "../forms/model.js";
import { isDateValue, type Widget } from "../forms/renderer.js";
import type { FormSession } from "../forms/session.js";
import type { FormSpec } from "../forms/types.js";

export type FillOutcome = "submitted" | "cancelled";

/**
 * Answer that empties a text or date field. An empty answer to a text
 * question keeps the current value, so clearing needs its own token.
 */
export const CLEAR_ANSWER = "-";

type FreeTextWidget = Extract<Widget, { kind: "text-input" | "text-area" | "date-input" }>;

function isFreeText(widget: Widget): widget is FreeTextWidget {
  return widget.kind === "text-input" || widget.kind === "text-area" || widget.kind === "date-input";
}

function clearHint(widget: FreeTextWidget): string {
  return widget.value ? ` ${chalk.gray(`(${CLEAR_ANSWER} to clear)`)}` : "";
}

function withPlaceholder(widget: FreeTextWidget): string {
  const placeholder = widget.field.placeholder;
  const label = placeholder ? `${widget.label} ${chalk.gray(`(${placeholder})`)}` : widget.label;
  return label + clearHint(widget);
}

/** Value an answer sends to the widget: text is trimmed, the clear token empties free-text fields. */
export function answerValue(widget: Widget, answer: unknown): unknown {
  if (typeof answer !== "string") return answer;
  const text = answer.trim();
  return isFreeText(widget) && text === CLEAR_ANSWER ? "" : text;
}

/** Terminal question for one widget, seeded with the widget's current value. */
export function toQuestion(widget: Widget): prompts.PromptObject<"value"> {
  switch (widget.kind) {
    case "text-input":
    case "text-area":
      return { type: "text", name: "value", message: withPlaceholder(widget), initial: widget.value };
    case "number-input":
      return { type: "number", name: "value", message: widget.label, initial: widget.value, float: true };
    case "date-input":
      return {
        type: "text",
        name: "value",
        message: `${widget.label} ${chalk.gray("(YYYY-MM-DD)")}${clearHint(widget)}`,
        initial: widget.value,
        validate: (v: string) =>
          v.trim() === CLEAR_ANSWER || isDateValue(v.trim()) || "Use YYYY-MM-DD or leave empty",
      };
    case "select-box":
      return {
        type: "select",
        name: "value",
        message: widget.label,
        choices: widget.field.options.map((o) => ({ title: o, value: o })),
        initial: Math.max(0, widget.field.options.indexOf(widget.value)),
      };
    case "multi-select":
      return {
        type: "multiselect",
        name: "value",
        message: widget.label,
        choices: widget.field.options.map((o) => ({ title: o, value: o, selected: widget.value.includes(o) })),
        hint: "- Space to select. Return to submit",
        instructions: false,
      };
    case "checkbox":
      return { type: "toggle", name: "value", message: widget.label, initial: widget.value, active: "yes", inactive: "no" };
    default:
      return assertNever(widget);
  }
}

export function printFormHeader(spec: FormSpec): void {
  console.log(chalk.cyan("\n" + "─".repeat(60)));
  console.log(chalk.white.bold(`  ${spec.title}`));
  if (spec.description) {
    console.log(chalk.gray(`  ${spec.description}`));
  }
  console.log(chalk.cyan("─".repeat(60)));
  console.log(chalk.gray("  Fields marked * are required.\n"));
}

/**
 * Ask every field of the session's current form, then confirm submission.
 * Declining the confirmation starts another pass with the answers kept.
 */
export async function fillForm(session: FormSession): Promise<FillOutcome> {
  for (;;) {
    const { widgets } = session.view();

    for (const widget of widgets) {
      const answers = await prompts(toQuestion(widget));
      if (answers.value === undefined) {
        return "cancelled";
      }
      session.interact({ type: "input", slot: widget.slot, value: answerValue(widget, answers.value) });
    }

    const spec = session.currentSpec;
    if (spec) {
      const missing = missingRequired(spec, session.state);
      if (missing.length > 0) {
        console.log(chalk.yellow(`\n⚠ Required fields left empty: ${missing.map((f) => f.label).join(", ")}`));
      }
    }

    const { submit } = await prompts({
      type: "confirm",
      name: "submit",
      message: "Submit form?",
      initial: true,
    });
    if (submit === undefined) {
      return "cancelled";
    }
    if (submit) {
      session.interact({ type: "submit" });
      return "submitted";
    }

    console.log(chalk.gray("\n  Edit your answers; previous values are kept.\n"));
  }
}
