/**
 * Shared prompt fragments describing the FormSpec schema.
 */

import { FIELD_TYPES } from "../forms/types.js";

export const FORM_SPEC_SHAPE = `
## FormSpec Shape
{
  "title": "Short form title",
  "description": "One sentence shown under the title (optional)",
  "fields": [
    {
      "name": "snake_case_identifier",
      "label": "Label shown to the user",
      "type": ${FIELD_TYPES.map((t) => `"${t}"`).join(" | ")},
      "required": true | false,
      "placeholder": "Hint text (optional)",
      "options": ["Only", "for", "select", "and", "multiselect"]
    }
  ]
}
`.trim();

export const FIELD_RULES = `
## Field Rules
- Field names are unique, lowercase snake_case, no spaces or dashes
- "select" and "multiselect" MUST have a non-empty "options" list; other types MUST NOT have one
- Use "email" for email addresses, "tel" for phone numbers, "textarea" for long free text
- Use "date" for dates, "number" for quantities and ages, "checkbox" for yes/no consent
- Put identifying fields (name, email) first
- Mark only the fields the form cannot do without as required
- 3 to 10 fields; never an empty "fields" list
`.trim();
