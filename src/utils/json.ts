/**
 * Parse a completion as JSON. Falls back to the first balanced `{...}` object
 * when the model wrapped its answer in prose or code fences.
 */
export function parseCompletionJson(text: string): unknown {
  const trimmed = text.trim();
  try {
    return JSON.parse(trimmed);
  } catch {
    return extractFirstJson(trimmed);
  }
}

export function extractFirstJson(text: string): Record<string, unknown> {
  const start = text.indexOf('{');
  if (start === -1) {
    throw new Error("No JSON object start '{' found");
  }

  let depth = 0;
  let inString = false;
  let escaped = false;
  let end = -1;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === '{') depth++;
    else if (ch === '}') {
      depth--;
      if (depth === 0) {
        end = i + 1;
        break;
      }
    }
  }

  if (end === -1) {
    throw new Error("Unbalanced braces; could not find JSON object end '}'");
  }

  const parsed: unknown = JSON.parse(text.slice(start, end));
  if (!isPlainObject(parsed)) {
    throw new Error('Extracted JSON is not an object');
  }
  return parsed;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
