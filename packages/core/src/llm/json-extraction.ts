const FENCED_BLOCK = /```(?:json)?\s*\n?([\s\S]*?)\n?\s*```/;

function tryParse(text: string): { readonly ok: true; readonly value: unknown } | { readonly ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) as unknown };
  } catch {
    return { ok: false };
  }
}

/**
 * Pulls a JSON value out of model output. Accepts bare JSON, a fenced
 * ```json block, or the first balanced object/array embedded in prose.
 */
export function extractJson(content: string): unknown {
  const trimmed = content.trim();

  const direct = tryParse(trimmed);
  if (direct.ok) {
    return direct.value;
  }

  const fenced = FENCED_BLOCK.exec(trimmed)?.[1];
  if (fenced) {
    const parsed = tryParse(fenced.trim());
    if (parsed.ok) {
      return parsed.value;
    }
  }

  for (const [open, close] of [['{', '}'], ['[', ']']] as const) {
    const candidate = findBalanced(trimmed, open, close);
    if (candidate !== undefined) {
      const parsed = tryParse(candidate);
      if (parsed.ok) {
        return parsed.value;
      }
    }
  }

  throw new SyntaxError(`Failed to extract JSON from content: ${trimmed.slice(0, 100)}`);
}

function findBalanced(text: string, open: string, close: string): string | undefined {
  const start = text.indexOf(open);
  if (start === -1) {
    return undefined;
  }

  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];

    if (escaped) {
      escaped = false;
    } else if (ch === '\\' && inString) {
      escaped = true;
    } else if (ch === '"') {
      inString = !inString;
    } else if (!inString && ch === open) {
      depth++;
    } else if (!inString && ch === close) {
      depth--;
      if (depth === 0) {
        return text.slice(start, i + 1);
      }
    }
  }

  return undefined;
}
