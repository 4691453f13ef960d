/**
 * Schema validation for FormSpecs that come from outside the process
 * (the external generator). Static templates go through it at load time.
 */

import { z } from "zod";
import { deepFreeze } from "../forms/model.js";
import { CHOICE_FIELD_TYPES, FIELD_TYPES, type FieldSpec, type FormSpec } from "../forms/types.js";
import { err, ok, type Result } from "../types/index.js";
import { ValidationError, type ValidationIssue } from "./errors.js";

// Field names become object keys in FormState and the JSON export
const FIELD_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;
const RESERVED_FIELD_NAMES: readonly string[] = ["__proto__"];

export const fieldNameSchema = z.string().superRefine((name, ctx) => {
  if (name === "") {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "field name must not be empty" });
  } else if (!FIELD_NAME_PATTERN.test(name)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `field name "${name}" must start with a letter or underscore and contain only letters, digits and underscores`,
    });
  } else if (RESERVED_FIELD_NAMES.includes(name)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `field name "${name}" is reserved` });
  }
});

const fieldSchema = z
  .object({
    name: fieldNameSchema,
    label: z.string(),
    type: z.enum(FIELD_TYPES),
    required: z.boolean().optional(),
    placeholder: z.string().optional(),
    options: z.array(z.string()).optional(),
  })
  .superRefine((field, ctx) => {
    const needsOptions = CHOICE_FIELD_TYPES.some((t) => t === field.type);
    if (needsOptions && (!field.options || field.options.length === 0)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["options"],
        message: `${field.type} fields need a non-empty options list`,
      });
    }
  });

export const formSpecSchema = z
  .object({
    title: z.string().min(1, "title must not be empty"),
    description: z.string().optional(),
    fields: z.array(fieldSchema).min(1, "a form needs at least one field"),
  })
  .superRefine((spec, ctx) => {
    const seen = new Set<string>();
    spec.fields.forEach((field, index) => {
      if (seen.has(field.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["fields", index, "name"],
          message: `duplicate field name "${field.name}"`,
        });
      }
      seen.add(field.name);
    });
  });

type RawFieldSpec = z.infer<typeof fieldSchema>;

function formatPath(path: readonly (string | number)[]): string {
  return path.length === 0 ? "(root)" : path.join(".");
}

function toIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: formatPath(issue.path),
    message: issue.message,
  }));
}

/** Narrow a schema-checked field to its tagged variant; options only survive on choice types. */
function toFieldSpec(raw: RawFieldSpec): FieldSpec {
  const base = {
    name: raw.name,
    label: raw.label,
    required: raw.required ?? false,
    ...(raw.placeholder !== undefined ? { placeholder: raw.placeholder } : {}),
  };
  switch (raw.type) {
    case "select":
    case "multiselect":
      return { ...base, type: raw.type, options: [...(raw.options ?? [])] };
    case "text":
    case "email":
    case "tel":
    case "textarea":
    case "number":
    case "date":
    case "checkbox":
      return { ...base, type: raw.type };
  }
}

/**
 * Check an unknown value against the FormSpec schema.
 * Returns a frozen, normalized FormSpec or a ValidationError naming every offending path.
 */
export function validateFormSpec(input: unknown): Result<FormSpec, ValidationError> {
  const parsed = formSpecSchema.safeParse(input);
  if (!parsed.success) {
    return err(new ValidationError(toIssues(parsed.error)));
  }

  const { title, description, fields } = parsed.data;
  const spec: FormSpec = {
    title,
    ...(description !== undefined ? { description } : {}),
    fields: fields.map(toFieldSpec),
  };
  return ok(deepFreeze(spec));
}
