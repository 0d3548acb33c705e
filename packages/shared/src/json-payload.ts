// =============================================================================
// @dailysync/shared — Locate the JSON payload inside a model response
// =============================================================================
// Models wrap JSON in commentary and markdown fences. This parser accepts:
//   - bare JSON, or bare JSON surrounded by prose
//   - one leading fence (```json ...) or one trailing fence (... ```),
//     with or without commentary around the payload
//   - one fenced block (two markers) with prose around it
// Anything else is rejected with PayloadParseError. There is no repair of
// broken JSON.
// =============================================================================

import { PayloadParseError } from "./errors.js";

const FENCE = "```";

/** Opening fence with an optional language tag and the line break after it */
const LEADING_FENCE = /^```[A-Za-z]*[ \t]*\r?\n?/;

/** An opening fence on its own line after some commentary */
const OPENING_FENCE_LINE = /\n```[A-Za-z]*[ \t]*\r?\n/;

function countFences(text: string): number {
  return text.split(FENCE).length - 1;
}

function parseJson(candidate: string): unknown {
  try {
    return JSON.parse(candidate);
  } catch (err) {
    throw new PayloadParseError(
      `Response payload is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err },
    );
  }
}

/**
 * Returns the span from the first '{' or '[' to the last matching closer, or
 * null when the text holds no such span.
 */
function outermostJsonSpan(text: string): string | null {
  const objectStart = text.indexOf("{");
  const arrayStart = text.indexOf("[");
  const starts = [objectStart, arrayStart].filter((i) => i >= 0);
  if (starts.length === 0) return null;

  const start = Math.min(...starts);
  const closer = text[start] === "{" ? "}" : "]";
  const end = text.lastIndexOf(closer);
  if (end <= start) return null;

  return text.slice(start, end + 1);
}

function unfenced(text: string): string {
  try {
    JSON.parse(text);
    return text;
  } catch {
    const span = outermostJsonSpan(text);
    if (span === null) {
      throw new PayloadParseError("Response contains no JSON object or array");
    }
    return span;
  }
}

/** Text left after removing the fence may still carry commentary. */
function locate(remainder: string): string {
  return remainder.length === 0 ? remainder : unfenced(remainder);
}

function singleFence(text: string): string {
  if (LEADING_FENCE.test(text)) {
    return locate(text.replace(LEADING_FENCE, "").trim());
  }
  if (text.endsWith(FENCE)) {
    return locate(text.slice(0, -FENCE.length).trim());
  }
  const opening = OPENING_FENCE_LINE.exec(text);
  if (opening) {
    return locate(text.slice(opening.index + opening[0].length).trim());
  }
  throw new PayloadParseError(
    "Response has a code fence that neither opens nor closes the payload",
  );
}

function fencedBlock(text: string): string {
  const open = text.indexOf(FENCE);
  const close = text.indexOf(FENCE, open + FENCE.length);
  const inner = text.slice(open, close);
  return inner.replace(LEADING_FENCE, "").trim();
}

/**
 * Extracts and parses the JSON payload of a free-form model response.
 *
 * @throws PayloadParseError when no single well-formed payload is present
 */
export function extractJsonPayload(text: string): unknown {
  const trimmed = text.trim();
  if (trimmed.length === 0) {
    throw new PayloadParseError("Empty response");
  }

  const fences = countFences(trimmed);
  let candidate: string;

  switch (fences) {
    case 0:
      candidate = unfenced(trimmed);
      break;
    case 1:
      candidate = singleFence(trimmed);
      break;
    case 2:
      candidate = fencedBlock(trimmed);
      break;
    default:
      throw new PayloadParseError(
        `Response contains multiple fenced blocks (${fences} fence markers)`,
      );
  }

  if (candidate.length === 0) {
    throw new PayloadParseError("Fenced block is empty");
  }

  return parseJson(candidate);
}
