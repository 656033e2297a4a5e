/**
 * Pulls a JSON object out of LLM text that may wrap it in markdown fences or
 * conversational prose.
 *
 * Order: ```json fence, bare ``` fence whose body starts with `{`, the first
 * `{` from which the remainder parses, the first balanced `{...}` that parses.
 * Falls back to the trimmed input so the caller's parser reports the error.
 */
export function extractJson(response: string): string {
  const trimmed = response.trim();

  const jsonFence = trimmed.indexOf('```json');
  if (jsonFence !== -1) {
    const bodyStart = jsonFence + '```json'.length;
    const close = trimmed.indexOf('```', bodyStart);
    if (close !== -1) {
      return trimmed.slice(bodyStart, close).trim();
    }
  }

  const bareFence = trimmed.indexOf('```');
  if (bareFence !== -1) {
    const bodyStart = bareFence + 3;
    const close = trimmed.indexOf('```', bodyStart);
    if (close !== -1) {
      const inner = trimmed.slice(bodyStart, close).trim();
      if (inner.startsWith('{')) return inner;
    }
  }

  return findJsonObject(trimmed) ?? trimmed;
}

function parses(text: string): boolean {
  try {
    JSON.parse(text);
    return true;
  } catch {
    return false;
  }
}

function findJsonObject(text: string): string | null {
  for (let start = text.indexOf('{'); start !== -1; start = text.indexOf('{', start + 1)) {
    const candidate = text.slice(start);
    if (parses(candidate)) return candidate;
    const balanced = extractBalancedBraces(candidate);
    if (balanced && parses(balanced)) return balanced;
  }
  return null;
}

/**
 * Substring from the leading `{` to its matching `}`; braces inside string
 * literals (including escaped quotes) do not count.
 */
export function extractBalancedBraces(text: string): string | null {
  let depth = 0;
  let inString = false;
  let escapeNext = false;

  for (let index = 0; index < text.length; index += 1) {
    const char = text[index];
    if (escapeNext) {
      escapeNext = false;
      continue;
    }
    if (char === '\\' && inString) {
      escapeNext = true;
    } else if (char === '"') {
      inString = !inString;
    } else if (char === '{' && !inString) {
      depth += 1;
    } else if (char === '}' && !inString) {
      depth -= 1;
      if (depth === 0) return text.slice(0, index + 1);
    }
  }
  return null;
}
