/**
 * Local synthesizer — builds a FormSpec from the prompt alone when no
 * keyword rule matches. Always synchronous, always succeeds.
 */

import { deepFreeze } from "../forms/model.js";
import type { FieldSpec, FormSpec } from "../forms/types.js";
import { getClassifierRules, type RuleField, type SynthesizerRules } from "../templates/index.js";

function toFieldSpec(field: RuleField): FieldSpec {
  return { ...field };
}

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1);
}

/**
 * Title from the first significant words of the prompt: stop words,
 * field keywords and repeats are skipped.
 */
export function deriveTitle(
  prompt: string,
  rules: SynthesizerRules = getClassifierRules().synthesizer
): string {
  const excluded = new Set<string>([
    ...rules.stopWords,
    rules.baseField.name,
    ...rules.fieldRules.flatMap((r) => r.keywords),
  ]);

  const words: string[] = [];
  for (const token of prompt.toLowerCase().split(/[^\p{L}\p{N}]+/u)) {
    if (words.length >= rules.titleWordCount) break;
    if (!token || excluded.has(token) || words.includes(token)) continue;
    words.push(token);
  }

  const lead = words.map(capitalize).join(" ");
  return lead ? `${lead} ${rules.titleSuffix}` : rules.titleSuffix;
}

export function synthesizeFormSpec(
  prompt: string,
  rules: SynthesizerRules = getClassifierRules().synthesizer
): FormSpec {
  const lower = prompt.toLowerCase();
  const fields: FieldSpec[] = [toFieldSpec(rules.baseField)];

  for (const rule of rules.fieldRules) {
    const wanted = rule.keywords.some((k) => lower.includes(k.toLowerCase()));
    const present = fields.some((f) => f.name === rule.field.name);
    if (wanted && !present) {
      fields.push(toFieldSpec(rule.field));
    }
  }

  return deepFreeze({
    title: deriveTitle(prompt, rules),
    description: `Generated from: "${prompt.trim()}"`,
    fields,
  });
}
