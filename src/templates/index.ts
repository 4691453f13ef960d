/**
 * Template loader — the static FormSpecs and the classification rules
 * live in JSON beside this module so they can change without touching logic.
 *
 *   import { getFormTemplate, getClassifierRules } from '../templates/index.js';
 */

import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import { dirname, join } from "path";
import { z } from "zod";
import type { FormSpec } from "../forms/types.js";
import { fieldNameSchema, validateFormSpec } from "../pipeline/validator.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Synthesized fields never carry options, so choice types are not allowed here
const ruleFieldSchema = z.object({
  name: fieldNameSchema,
  label: z.string(),
  type: z.enum(["text", "email", "tel", "number", "textarea", "date", "checkbox"]),
  required: z.boolean(),
  placeholder: z.string().optional(),
});

const classifierRulesSchema = z.object({
  keywordRules: z.array(
    z.object({
      name: z.string().min(1),
      template: z.string().min(1),
      keywords: z.array(z.string().min(1)).min(1),
    })
  ),
  synthesizer: z.object({
    baseField: ruleFieldSchema,
    fieldRules: z.array(
      z.object({
        keywords: z.array(z.string().min(1)).min(1),
        field: ruleFieldSchema,
      })
    ),
    titleWordCount: z.number().int().nonnegative(),
    titleSuffix: z.string().min(1),
    stopWords: z.array(z.string()),
  }),
  quickExamples: z.array(z.string().min(1)),
});

export type ClassifierRules = z.infer<typeof classifierRulesSchema>;
export type SynthesizerRules = ClassifierRules["synthesizer"];
export type RuleField = z.infer<typeof ruleFieldSchema>;

/** Lazy-loaded configuration */
let _templates: ReadonlyMap<string, FormSpec> | null = null;
let _rules: ClassifierRules | null = null;

function readJson(fileName: string): unknown {
  return JSON.parse(readFileSync(join(__dirname, fileName), "utf-8"));
}

/** All static FormSpecs by template key, validated against the FormSpec schema. */
export function getFormTemplates(): ReadonlyMap<string, FormSpec> {
  if (!_templates) {
    const raw = z.record(z.unknown()).parse(readJson("forms.json"));
    const templates = new Map<string, FormSpec>();
    for (const [key, value] of Object.entries(raw)) {
      const result = validateFormSpec(value);
      if (!result.ok) {
        throw new Error(`forms.json: template "${key}" is invalid: ${result.error.message}`);
      }
      templates.set(key, result.value);
    }
    _templates = templates;
  }
  return _templates;
}

export function getFormTemplate(key: string): FormSpec | undefined {
  return getFormTemplates().get(key);
}

/** Keyword rules, synthesizer rules and quick examples. */
export function getClassifierRules(): ClassifierRules {
  if (!_rules) {
    const rules = classifierRulesSchema.parse(readJson("rules.json"));
    for (const rule of rules.keywordRules) {
      if (!getFormTemplate(rule.template)) {
        throw new Error(`rules.json: keyword rule "${rule.name}" names unknown template "${rule.template}"`);
      }
    }
    _rules = rules;
  }
  return _rules;
}

/** Example prompts offered to new users. */
export function getQuickExamples(): readonly string[] {
  return getClassifierRules().quickExamples;
}
