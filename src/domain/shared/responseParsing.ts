/**
 * Helpers for pulling structure out of free-text model replies.
 */

/**
 * Remove a code fence wrapping the whole reply (```markdown ... ```).
 */
export function stripCodeFences(text: string): string {
  const trimmed = text.trim();
  const fenced = trimmed.match(/^```[\w-]*\s*\n([\s\S]*?)\n?```$/);
  return fenced ? fenced[1].trim() : trimmed;
}

/**
 * Remove markdown emphasis markers around a short value.
 */
export function stripEmphasis(text: string): string {
  return text.replace(/\*\*|__/g, '').trim();
}

/**
 * Extract the first JSON array or object from a reply.
 * Prefers the contents of a ```json block. Returns null when none is present.
 */
export function extractJSON(response: string): string | null {
  let cleaned = response.trim();

  // Try to extract from ```json ... ``` blocks
  const jsonBlockMatch = cleaned.match(/```(?:json)?\s*([\s\S]*?)```/);
  if (jsonBlockMatch) {
    cleaned = jsonBlockMatch[1].trim();
  }

  const start = cleaned.search(/[[{]/);
  if (start === -1) {
    return null;
  }

  // Find matching end, skipping brackets inside strings
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < cleaned.length; i++) {
    const char = cleaned[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (char === '\\') escaped = true;
      else if (char === '"') inString = false;
      continue;
    }
    if (char === '"') inString = true;
    else if (char === '[' || char === '{') depth++;
    else if (char === ']' || char === '}') {
      depth--;
      if (depth === 0) {
        return cleaned.slice(start, i + 1);
      }
    }
  }

  return null;
}

/**
 * Parse the first JSON value in a reply, or return null when there is none or it is invalid.
 */
export function parseJSONValue(response: string): unknown {
  const json = extractJSON(response);
  if (json === null) {
    return null;
  }
  try {
    return JSON.parse(json) as unknown;
  } catch {
    return null;
  }
}

/**
 * Narrow an unknown value to a plain object.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
