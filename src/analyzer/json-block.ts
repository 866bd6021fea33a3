/**
 * Lenient JSON extraction for payloads the agent pretty-prints into its log.
 */

export type JsonBlockResult = { ok: true; value: unknown } | { ok: false; error: string };

/**
 * Parse the first JSON array or object in a block of log text. Line breaks
 * are dropped first and anything after the closing bracket is ignored.
 */
export function parseJsonBlock(block: string): JsonBlockResult {
  const text = block.replace(/\r?\n/g, '');
  const start = text.search(/[[{]/);
  if (start === -1) {
    return { ok: false, error: 'no JSON value found' };
  }

  const end = closingIndex(text, start);
  if (end === -1) {
    return { ok: false, error: 'unterminated JSON value' };
  }

  try {
    return { ok: true, value: JSON.parse(text.slice(start, end + 1)) };
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error.message : String(error) };
  }
}

/**
 * Index of the bracket closing the value that opens at `start`, or -1.
 */
function closingIndex(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (ch === '\\') {
        escaped = true;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }

    if (ch === '"') {
      inString = true;
    } else if (ch === '[' || ch === '{') {
      depth++;
    } else if (ch === ']' || ch === '}') {
      depth--;
      if (depth === 0) {
        return i;
      }
    }
  }
  return -1;
}
