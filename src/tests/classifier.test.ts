import { describe, it, expect } from "vitest";
import { matchTemplate } from "../pipeline/classifier.js";
import { deriveTitle, synthesizeFormSpec } from "../pipeline/synthesizer.js";
import { classifyLocal, EmptyPromptError } from "../pipeline/index.js";
import { validateFormSpec } from "../pipeline/validator.js";
import { getClassifierRules, getFormTemplate, getQuickExamples } from "../templates/index.js";

// ─────────────────────────────────────────
// Templates
// ─────────────────────────────────────────

describe("templates", () => {
  it("loads the doctor and fintech forms", () => {
    expect(getFormTemplate("doctor")?.title).toBe("Doctors' Conference Registration");
    expect(getFormTemplate("fintech")?.title).toBe("Fintech Conference Registration");
    expect(getFormTemplate("contact")).toBeUndefined();
  });

  it("keeps template fields in declaration order", () => {
    expect(getFormTemplate("doctor")?.fields.map((f) => f.name)).toEqual([
      "name",
      "license",
      "specialization",
      "dietary",
      "email",
      "phone",
    ]);
    expect(getFormTemplate("fintech")?.fields.map((f) => f.name)).toEqual([
      "name",
      "mobile",
      "email",
      "company",
      "job_title",
      "pain_points",
      "interests",
    ]);
  });

  it("lists the quick examples", () => {
    expect(getQuickExamples()).toEqual([
      "Doctor conference registration form",
      "Fintech conference with business pain points",
      "Simple contact form",
      "Event registration form",
      "Job application form",
    ]);
  });
});

// ─────────────────────────────────────────
// Keyword rules
// ─────────────────────────────────────────

describe("matchTemplate", () => {
  it("matches the doctor rule case-insensitively", () => {
    const match = matchTemplate("Registration for a MEDICAL symposium");

    expect(match?.rule).toBe("doctor");
    expect(match?.keyword).toBe("medical");
    expect(match?.spec.title).toBe("Doctors' Conference Registration");
  });

  it("matches the multi-word fintech keyword", () => {
    const match = matchTemplate("Survey about business pain in retail");

    expect(match?.rule).toBe("fintech");
    expect(match?.keyword).toBe("business pain");
  });

  it("prefers the first rule when several match", () => {
    expect(matchTemplate("Fintech meetup for doctors")?.rule).toBe("doctor");
  });

  it("matches keywords inside longer words", () => {
    expect(matchTemplate("Automobile club signup")?.rule).toBe("fintech");
  });

  it("returns undefined when no keyword is present", () => {
    expect(matchTemplate("Garden party RSVP")).toBeUndefined();
  });

  it("hands out an independent frozen copy each time", () => {
    const first = matchTemplate("doctor");
    const second = matchTemplate("doctor");

    expect(first?.spec).toEqual(second?.spec);
    expect(first?.spec).not.toBe(second?.spec);
    expect(first?.spec).not.toBe(getFormTemplate("doctor"));
    expect(Object.isFrozen(first?.spec.fields[0])).toBe(true);
  });

  it("accepts custom rules", () => {
    const rules = { ...getClassifierRules(), keywordRules: [{ name: "clinic", template: "doctor", keywords: ["clinic"] }] };

    expect(matchTemplate("Clinic intake", rules)?.rule).toBe("clinic");
    expect(matchTemplate("Medical intake", rules)).toBeUndefined();
  });

  it("throws when a rule names a missing template", () => {
    const rules = { ...getClassifierRules(), keywordRules: [{ name: "ghost", template: "nowhere", keywords: ["ghost"] }] };

    expect(() => matchTemplate("ghost tour", rules)).toThrow('Keyword rule "ghost" names unknown template "nowhere"');
  });
});

// ─────────────────────────────────────────
// Synthesizer
// ─────────────────────────────────────────

describe("deriveTitle", () => {
  it("uses the first two significant words", () => {
    expect(deriveTitle("Job application form")).toBe("Job Application Registration Form");
  });

  it("skips stop words and repeats", () => {
    expect(deriveTitle("Please create an event event form for the summer picnic")).toBe(
      "Event Summer Registration Form"
    );
  });

  it("skips field keywords", () => {
    expect(deriveTitle("Email and phone for newsletter")).toBe("Newsletter Registration Form");
  });

  it("keeps accented letters inside words", () => {
    expect(deriveTitle("Café signup")).toBe("Café Signup Registration Form");
    expect(deriveTitle("Über fahrt")).toBe("Über Fahrt Registration Form");
  });

  it("falls back to the suffix alone", () => {
    expect(deriveTitle("a form for my name")).toBe("Registration Form");
  });
});

describe("synthesizeFormSpec", () => {
  it("always starts with a required full name field", () => {
    const spec = synthesizeFormSpec("Event registration form");

    expect(spec).toEqual({
      title: "Event Registration Form",
      description: 'Generated from: "Event registration form"',
      fields: [
        {
          name: "name",
          label: "Full Name",
          type: "text",
          required: true,
          placeholder: "Enter your full name",
        },
      ],
    });
  });

  it("builds a contact form from its keywords", () => {
    const spec = synthesizeFormSpec("Simple contact form with name, email and message");

    expect(spec.title).toBe("Contact Registration Form");
    expect(spec.fields.map((f) => [f.name, f.type, f.required])).toEqual([
      ["name", "text", true],
      ["email", "email", true],
      ["message", "textarea", false],
    ]);
  });

  it("builds name, email and message for the contact form request", () => {
    const spec = synthesizeFormSpec("Create a contact form with name, email, and message");

    expect(spec.title).toBe("Contact Registration Form");
    expect(spec.description).toBe('Generated from: "Create a contact form with name, email, and message"');
    expect(spec.fields.map((f) => f.name)).toEqual(["name", "email", "message"]);
  });

  it("produces specs that pass the validator", () => {
    const prompts = [
      "Create a contact form with name, email, and message",
      "Hotel booking with phone and notes",
      "a form for my name",
      ...getQuickExamples(),
    ];

    for (const prompt of prompts) {
      const spec = synthesizeFormSpec(prompt);
      const result = validateFormSpec(spec);

      expect(result.ok).toBe(true);
      if (result.ok) expect(result.value).toEqual(spec);
    }
  });

  it("adds a phone field for tel or phone", () => {
    expect(synthesizeFormSpec("Phone survey").fields.map((f) => f.name)).toEqual(["name", "phone"]);
    expect(synthesizeFormSpec("Hotel booking").fields.map((f) => f.name)).toEqual(["name", "phone"]);
  });

  it("adds each field once, in rule order", () => {
    const spec = synthesizeFormSpec("notes, feedback, email, comment");

    expect(spec.fields.map((f) => f.name)).toEqual(["name", "email", "message"]);
  });

  it("trims the prompt in the description", () => {
    expect(synthesizeFormSpec("  Book club  ").description).toBe('Generated from: "Book club"');
  });

  it("returns a frozen spec", () => {
    const spec = synthesizeFormSpec("Book club");

    expect(Object.isFrozen(spec)).toBe(true);
    expect(Object.isFrozen(spec.fields[0])).toBe(true);
  });
});

// ─────────────────────────────────────────
// Local classification
// ─────────────────────────────────────────

describe("classifyLocal", () => {
  it("uses a template when a keyword matches", () => {
    const result = classifyLocal("Doctor conference registration form");

    expect(result.source).toBe("template");
    expect(result.rule).toBe("doctor");
    expect(result.spec.fields).toHaveLength(6);
  });

  it("synthesizes when nothing matches", () => {
    const result = classifyLocal("Simple contact form");

    expect(result.source).toBe("synthesized");
    expect(result.spec.title).toBe("Contact Registration Form");
    expect(result.rule).toBeUndefined();
  });

  it("rejects a blank prompt", () => {
    expect(() => classifyLocal("   \n")).toThrow(EmptyPromptError);
    expect(() => classifyLocal("")).toThrow("Please describe what form you need.");
  });
});
