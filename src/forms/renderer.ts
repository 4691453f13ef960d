/**
 * Form renderer — turns a FormSpec and the previous values into a widget
 * tree, applies at most one interaction, and collects the resulting values.
 *
 * Rendering is pure: the same spec, state and interaction always give the
 * same result, so the whole tree can be recomputed after every keystroke.
 */

import { createHash } from "crypto";
import { logger } from "../utils/logger.js";
import { assertNever, isStringList } from "./model.js";
import type {
  CheckboxFieldSpec,
  DateFieldSpec,
  FieldSpec,
  FieldValue,
  FormSpec,
  FormState,
  MultiselectFieldSpec,
  NumberFieldSpec,
  SelectFieldSpec,
  TextFieldSpec,
} from "./types.js";

// ─────────────────────────────────────────
// Widgets
// ─────────────────────────────────────────

interface WidgetBase<F extends FieldSpec> {
  /** Persistent state slot; see slotKey(). */
  slot: string;
  field: F;
  /** Field label, suffixed with " *" when required. */
  label: string;
}

export interface TextInputWidget extends WidgetBase<TextFieldSpec> {
  kind: "text-input";
  inputType: "text" | "email" | "tel";
  value: string;
}

export interface TextAreaWidget extends WidgetBase<TextFieldSpec> {
  kind: "text-area";
  value: string;
}

export interface NumberInputWidget extends WidgetBase<NumberFieldSpec> {
  kind: "number-input";
  value: number;
}

export interface DateInputWidget extends WidgetBase<DateFieldSpec> {
  kind: "date-input";
  /** YYYY-MM-DD, or "" when unset. */
  value: string;
}

export interface SelectBoxWidget extends WidgetBase<SelectFieldSpec> {
  kind: "select-box";
  value: string;
}

export interface MultiSelectWidget extends WidgetBase<MultiselectFieldSpec> {
  kind: "multi-select";
  value: readonly string[];
}

export interface CheckboxWidget extends WidgetBase<CheckboxFieldSpec> {
  kind: "checkbox";
  value: boolean;
}

export type Widget =
  | TextInputWidget
  | TextAreaWidget
  | NumberInputWidget
  | DateInputWidget
  | SelectBoxWidget
  | MultiSelectWidget
  | CheckboxWidget;

// ─────────────────────────────────────────
// Interactions and results
// ─────────────────────────────────────────

export type Interaction =
  | { type: "input"; slot: string; value: unknown }
  | { type: "submit" };

export interface RenderResult {
  formId: string;
  widgets: readonly Widget[];
  /** Values after the interaction, keyed by field name in spec order. */
  collected: FormState;
  /** True only for a submit interaction. */
  submitted: boolean;
}

// ─────────────────────────────────────────
// Slot identity
// ─────────────────────────────────────────

/** Content-derived form identifier: structurally different specs never share one. */
export function formIdFor(spec: FormSpec): string {
  const digest = createHash("sha1").update(JSON.stringify(spec)).digest("hex");
  return `form_${digest.substring(0, 8)}`;
}

/** State slot of one field; includes the position so re-ordered fields get fresh slots. */
export function slotKey(formId: string, index: number, name: string): string {
  return `${formId}/${index}:${name}`;
}

// ─────────────────────────────────────────
// Seeding and coercion
// ─────────────────────────────────────────

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export function isDateValue(value: string): boolean {
  if (value === "") return true;
  if (!DATE_PATTERN.test(value)) return false;
  const parsed = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().startsWith(value);
}

function toNumber(raw: unknown): number | undefined {
  if (typeof raw === "number") return Number.isFinite(raw) ? raw : undefined;
  if (typeof raw === "string" && raw.trim() !== "") {
    const n = Number(raw);
    return Number.isFinite(n) ? n : undefined;
  }
  return undefined;
}

/** Members of `options` in the order given, without repeats. */
function pickOptions(raw: readonly string[], options: readonly string[]): string[] {
  const picked: string[] = [];
  for (const value of raw) {
    if (options.includes(value) && !picked.includes(value)) picked.push(value);
  }
  return picked;
}

function buildWidget(field: FieldSpec, slot: string, prior: FieldValue | undefined): Widget {
  const label = field.required ? `${field.label} *` : field.label;

  switch (field.type) {
    case "text":
    case "email":
    case "tel":
      return {
        kind: "text-input",
        slot,
        field,
        label,
        inputType: field.type,
        value: typeof prior === "string" ? prior : "",
      };
    case "textarea":
      return { kind: "text-area", slot, field, label, value: typeof prior === "string" ? prior : "" };
    case "number":
      return { kind: "number-input", slot, field, label, value: toNumber(prior) ?? 0 };
    case "date":
      return {
        kind: "date-input",
        slot,
        field,
        label,
        value: typeof prior === "string" && isDateValue(prior) ? prior : "",
      };
    case "select":
      return {
        kind: "select-box",
        slot,
        field,
        label,
        value: typeof prior === "string" && field.options.includes(prior) ? prior : field.options[0],
      };
    case "multiselect":
      return {
        kind: "multi-select",
        slot,
        field,
        label,
        value: isStringList(prior) ? pickOptions(prior, field.options) : [],
      };
    case "checkbox":
      return { kind: "checkbox", slot, field, label, value: typeof prior === "boolean" ? prior : false };
    default:
      return assertNever(field);
  }
}

/** Apply a raw input to a widget; values of the wrong shape leave it unchanged. */
function applyInput(widget: Widget, raw: unknown): Widget {
  switch (widget.kind) {
    case "text-input":
    case "text-area":
      return typeof raw === "string" ? { ...widget, value: raw } : widget;
    case "date-input":
      return typeof raw === "string" && isDateValue(raw) ? { ...widget, value: raw } : widget;
    case "number-input": {
      const value = toNumber(raw);
      return value === undefined ? widget : { ...widget, value };
    }
    case "select-box":
      return typeof raw === "string" && widget.field.options.includes(raw) ? { ...widget, value: raw } : widget;
    case "multi-select":
      return isStringList(raw) ? { ...widget, value: pickOptions(raw, widget.field.options) } : widget;
    case "checkbox":
      return typeof raw === "boolean" ? { ...widget, value: raw } : widget;
    default:
      return assertNever(widget);
  }
}

// ─────────────────────────────────────────
// Render
// ─────────────────────────────────────────

/**
 * Render `spec` seeded from `priorState`, apply `interaction` if given,
 * and collect every field's value.
 */
export function render(spec: FormSpec, priorState: FormState, interaction?: Interaction): RenderResult {
  const formId = formIdFor(spec);

  let widgets = spec.fields.map((field, index) =>
    buildWidget(field, slotKey(formId, index, field.name), priorState[field.name])
  );

  if (interaction?.type === "input") {
    const { slot, value } = interaction;
    const target = widgets.find((w) => w.slot === slot);
    if (target) {
      const updated = applyInput(target, value);
      if (updated === target) {
        logger.debug(`Renderer: rejected value for ${slot}`);
      }
      widgets = widgets.map((w) => (w === target ? updated : w));
    } else {
      logger.debug(`Renderer: ignored input for unknown slot ${slot}`);
    }
  }

  const collected: Record<string, FieldValue> = {};
  for (const widget of widgets) {
    collected[widget.field.name] = widget.value;
  }

  return {
    formId,
    widgets,
    collected,
    submitted: interaction?.type === "submit",
  };
}
