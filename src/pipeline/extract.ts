/**
 * Pull JSON objects out of free-form model output.
 * Models wrap JSON in prose or markdown fences, and the prose itself may
 * contain braces; braces inside string literals do not count towards the
 * balance.
 */

/** The balanced `{…}` starting at `start`, or undefined when it never closes. */
function balancedObjectAt(text: string, start: number): string | undefined {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];

    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (ch === "\\") {
        escaped = true;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }

    if (ch === '"') {
      inString = true;
    } else if (ch === "{") {
      depth++;
    } else if (ch === "}") {
      depth--;
      if (depth === 0) {
        return text.substring(start, i + 1);
      }
    }
  }

  // Unbalanced
  return undefined;
}

/** Every balanced object in the text, one per opening brace, in order of appearance. */
export function findJsonObjectCandidates(text: string): string[] {
  const candidates: string[] = [];
  for (let start = text.indexOf("{"); start !== -1; start = text.indexOf("{", start + 1)) {
    const candidate = balancedObjectAt(text, start);
    if (candidate !== undefined) candidates.push(candidate);
  }
  return candidates;
}

function parsesAsJson(candidate: string): boolean {
  try {
    JSON.parse(candidate);
    return true;
  } catch {
    return false;
  }
}

/** The first balanced object that is also valid JSON. */
export function extractFirstJsonObject(text: string): string | undefined {
  return findJsonObjectCandidates(text).find(parsesAsJson);
}
