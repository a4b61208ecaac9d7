/**
 * JSON recovery for LLM replies.
 *
 * Tries, in order: the whole reply, the body of a ```json fence, and the first
 * brace-balanced `{...}` span. Truncated output is never completed.
 */

export type JsonParseResult =
  | { ok: true; value: unknown }
  | { ok: false; error: string };

const FENCED_BLOCK = /```(?:json)?\s*([\s\S]*?)```/i;

/**
 * First `{...}` span whose braces balance outside string literals, or null.
 */
export function firstObjectSpan(text: string): string | null {
  const open = text.indexOf("{");
  if (open < 0) return null;

  let depth = 0;
  let quoted = false;
  for (let i = open; i < text.length; i++) {
    const ch = text[i];
    if (quoted) {
      if (ch === "\\") i++;
      else if (ch === "\"") quoted = false;
    } else if (ch === "\"") {
      quoted = true;
    } else if (ch === "{") {
      depth++;
    } else if (ch === "}" && --depth === 0) {
      return text.slice(open, i + 1);
    }
  }
  return null;
}

function candidatesOf(text: string): string[] {
  const fenced = FENCED_BLOCK.exec(text)?.[1] ?? "";
  const span = firstObjectSpan(text) ?? "";
  const unique = new Set([text.trim(), fenced.trim(), span]);
  return [...unique].filter((c) => c.length > 0);
}

export function parseJsonReply(text: string): JsonParseResult {
  let firstError: string | null = null;
  for (const candidate of candidatesOf(text)) {
    try {
      return { ok: true, value: JSON.parse(candidate) };
    } catch (e) {
      firstError ??= e instanceof Error ? e.message : String(e);
    }
  }
  return { ok: false, error: firstError ?? "empty reply" };
}
