import type {
  ChoiceFieldSpec,
  FieldSpec,
  FieldValue,
  FormSpec,
  FormState,
  SubmissionRecord,
} from "./types.js";
import { CHOICE_FIELD_TYPES } from "./types.js";

export function isChoiceField(field: FieldSpec): field is ChoiceFieldSpec {
  return CHOICE_FIELD_TYPES.some((t) => t === field.type);
}

export function isStringList(value: unknown): value is readonly string[] {
  return Array.isArray(value) && value.every((v) => typeof v === "string");
}

export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}

/** Recursively freeze a plain data structure in place and return it. */
export function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/** A fresh, frozen copy of a spec; classification hands these out so no caller shares one. */
export function cloneFormSpec(spec: FormSpec): FormSpec {
  return deepFreeze(structuredClone(spec));
}

export function findField(spec: FormSpec, name: string): FieldSpec | undefined {
  return spec.fields.find((f) => f.name === name);
}

export function isEmptyValue(value: FieldValue | undefined): boolean {
  if (value === undefined) return true;
  if (typeof value === "string") return value.trim() === "";
  if (isStringList(value)) return value.length === 0;
  return false;
}

/**
 * Required fields whose current value is empty. Used to mark the form,
 * never to block submission.
 */
export function missingRequired(spec: FormSpec, state: FormState): FieldSpec[] {
  return spec.fields.filter((f) => f.required && isEmptyValue(state[f.name]));
}

/** Freeze the values of a form, keeping only the spec's fields, in spec order. */
export function createSubmissionRecord(spec: FormSpec, state: FormState): SubmissionRecord {
  const data: Record<string, FieldValue> = {};
  for (const field of spec.fields) {
    const value = state[field.name];
    if (value !== undefined) {
      data[field.name] = isStringList(value) ? [...value] : value;
    }
  }
  return deepFreeze({ spec, data });
}
