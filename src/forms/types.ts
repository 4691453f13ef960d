/**
 * Form model — the declarative description of a form and the values
 * collected for it.
 */

// ─────────────────────────────────────────
// Field specs
// ─────────────────────────────────────────

export const FIELD_TYPES = [
  "text",
  "email",
  "tel",
  "number",
  "textarea",
  "select",
  "multiselect",
  "date",
  "checkbox",
] as const;

export type FieldType = (typeof FIELD_TYPES)[number];

/** Field types whose spec carries an options list. */
export const CHOICE_FIELD_TYPES = ["select", "multiselect"] as const;

export type ChoiceFieldType = (typeof CHOICE_FIELD_TYPES)[number];

interface FieldBase {
  /** Unique within the form; the key of the field's value. */
  readonly name: string;
  readonly label: string;
  readonly required: boolean;
  readonly placeholder?: string;
}

export interface TextFieldSpec extends FieldBase {
  readonly type: "text" | "email" | "tel" | "textarea";
}

export interface NumberFieldSpec extends FieldBase {
  readonly type: "number";
}

export interface DateFieldSpec extends FieldBase {
  readonly type: "date";
}

export interface CheckboxFieldSpec extends FieldBase {
  readonly type: "checkbox";
}

export interface SelectFieldSpec extends FieldBase {
  readonly type: "select";
  /** Never empty. */
  readonly options: readonly string[];
}

export interface MultiselectFieldSpec extends FieldBase {
  readonly type: "multiselect";
  /** Never empty. */
  readonly options: readonly string[];
}

export type FieldSpec =
  | TextFieldSpec
  | NumberFieldSpec
  | DateFieldSpec
  | CheckboxFieldSpec
  | SelectFieldSpec
  | MultiselectFieldSpec;

export type ChoiceFieldSpec = SelectFieldSpec | MultiselectFieldSpec;

export interface FormSpec {
  readonly title: string;
  readonly description?: string;
  /** Ordered; names are unique. */
  readonly fields: readonly FieldSpec[];
}

// ─────────────────────────────────────────
// Values
// ─────────────────────────────────────────

/**
 * string: text, email, tel, textarea, select, date (YYYY-MM-DD or "")
 * number: number
 * boolean: checkbox
 * string[]: multiselect
 */
export type FieldValue = string | number | boolean | readonly string[];

/** Current values of a form, keyed by field name. */
export type FormState = Readonly<Record<string, FieldValue>>;

/** Snapshot of a form's values taken at submit time. */
export interface SubmissionRecord {
  readonly spec: FormSpec;
  readonly data: FormState;
}
