/**
 * Text markers some replies still carry instead of tool calls:
 * `#ORDER:{...}` and `#USER_DATA:{...}`. Both are cut out of the text the
 * customer sees.
 */

export const ORDER_MARKER = '#ORDER:';
export const USER_DATA_MARKER = '#USER_DATA:';

export interface ExtractedMarkers {
  displayText: string;
  orderPayload?: unknown;
  profileUpdate?: unknown;
}

/**
 * End index (exclusive) of the JSON object starting at `start`, or -1
 */
function objectEnd(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escaped = false;

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
      if (depth === 0) return i + 1;
    }
  }
  return -1;
}

function cutMarker(text: string, marker: string): { text: string; payload?: unknown } {
  const at = text.indexOf(marker);
  if (at === -1) return { text };

  const start = text.indexOf('{', at + marker.length);
  const end = start === -1 ? -1 : objectEnd(text, start);
  if (end === -1) {
    // Unterminated payload: hide it, submit nothing
    return { text: text.slice(0, at) };
  }

  let payload: unknown;
  try {
    payload = JSON.parse(text.slice(start, end));
  } catch {
    payload = undefined;
  }
  return { text: text.slice(0, at) + text.slice(end), payload };
}

export function extractMarkers(text: string): ExtractedMarkers {
  const order = cutMarker(text, ORDER_MARKER);
  const profile = cutMarker(order.text, USER_DATA_MARKER);
  const displayText = profile.text.replace(/\n{3,}/g, '\n\n').trim();

  const result: ExtractedMarkers = { displayText };
  if (order.payload !== undefined) result.orderPayload = order.payload;
  if (profile.payload !== undefined) result.profileUpdate = profile.payload;
  return result;
}
