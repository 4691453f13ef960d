/**
 * One user's form session: the selected FormSpec, the per-slot values
 * and the submission lifecycle (unsubmitted → submitted → reset).
 */

import { createSubmissionRecord } from "./model.js";
import { formIdFor, render, slotKey, type Interaction, type RenderResult } from "./renderer.js";
import type { FieldValue, FormSpec, FormState, SubmissionRecord } from "./types.js";

export type SubmissionStatus = "unsubmitted" | "submitted";

/** The session has no FormSpec to render. */
export class NoFormSelectedError extends Error {
  constructor() {
    super("No form selected; generate a form first");
    this.name = "NoFormSelectedError";
  }
}

/** Input arrived after the form was submitted. */
export class FormSubmittedError extends Error {
  constructor() {
    super("Form already submitted; reset or select a form to edit values");
    this.name = "FormSubmittedError";
  }
}

export class FormSession {
  private spec: FormSpec | null = null;
  private record: SubmissionRecord | null = null;
  private submissionStatus: SubmissionStatus = "unsubmitted";
  /** Values by slot key; slots of earlier specs survive until reset(). */
  private readonly slots = new Map<string, FieldValue>();

  get status(): SubmissionStatus {
    return this.submissionStatus;
  }

  get currentSpec(): FormSpec | null {
    return this.spec;
  }

  get submission(): SubmissionRecord | null {
    return this.record;
  }

  /** Current values of the selected spec by field name. */
  get state(): FormState {
    if (!this.spec) return {};

    const formId = formIdFor(this.spec);
    const state: Record<string, FieldValue> = {};
    this.spec.fields.forEach((field, index) => {
      const value = this.slots.get(slotKey(formId, index, field.name));
      if (value !== undefined) state[field.name] = value;
    });
    return state;
  }

  /** Make `spec` the current form and reopen it for input. */
  select(spec: FormSpec): void {
    this.spec = spec;
    this.record = null;
    this.submissionStatus = "unsubmitted";
  }

  /** Render the current form without an interaction. */
  view(): RenderResult {
    return this.cycle(undefined);
  }

  /**
   * Render with one interaction and store the collected values.
   * A submit interaction freezes a SubmissionRecord.
   */
  interact(interaction: Interaction): RenderResult {
    if (this.submissionStatus === "submitted") {
      throw new FormSubmittedError();
    }
    return this.cycle(interaction);
  }

  /** Drop the form, its values and any submission. */
  reset(): void {
    this.spec = null;
    this.record = null;
    this.submissionStatus = "unsubmitted";
    this.slots.clear();
  }

  private cycle(interaction: Interaction | undefined): RenderResult {
    const spec = this.spec;
    if (!spec) throw new NoFormSelectedError();

    const result = render(spec, this.state, interaction);
    for (const widget of result.widgets) {
      this.slots.set(widget.slot, widget.value);
    }

    if (result.submitted) {
      this.record = createSubmissionRecord(spec, result.collected);
      this.submissionStatus = "submitted";
    }
    return result;
  }
}
