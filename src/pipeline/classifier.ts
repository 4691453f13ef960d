/**
 * Keyword rules — the first rule with a keyword contained in the prompt
 * selects its static template.
 */

import { cloneFormSpec } from "../forms/model.js";
import { getClassifierRules, getFormTemplate, type ClassifierRules } from "../templates/index.js";
import type { TemplateMatch } from "./types.js";

export function matchTemplate(
  prompt: string,
  rules: ClassifierRules = getClassifierRules()
): TemplateMatch | undefined {
  const lower = prompt.toLowerCase();

  for (const rule of rules.keywordRules) {
    const keyword = rule.keywords.find((k) => lower.includes(k.toLowerCase()));
    if (!keyword) continue;

    const template = getFormTemplate(rule.template);
    if (!template) {
      throw new Error(`Keyword rule "${rule.name}" names unknown template "${rule.template}"`);
    }
    return { rule: rule.name, keyword, spec: cloneFormSpec(template) };
  }

  return undefined;
}
