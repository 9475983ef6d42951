import type { WorkItemReference } from './types.js';

/**
 * `[OP#123]` anywhere, or `#123` not glued to a word (`C#8`), another `#` or an HTML entity (`&#39;`).
 */
const REFERENCE_PATTERN = /\[OP#(\d+)\]|(?<![\w#&])#(\d+)\b/i;

function canonicalize(digits: string): string {
  return digits.replace(/^0+(?=\d)/, '');
}

/**
 * Extract the work-item reference from an entry description.
 * Only the first match counts; later references are ignored.
 * Pure function — no side effects.
 */
export function parseWorkItemReference(description: string): WorkItemReference {
  const text = description.trim();
  const match = REFERENCE_PATTERN.exec(text);
  const digits = match?.[1] ?? match?.[2];

  if (!match || digits === undefined) {
    return { rawToken: '', canonicalId: null, remainder: text };
  }

  const remainder = match.index === 0 ? text.slice(match[0].length).trim() : text;

  return {
    rawToken: match[0],
    canonicalId: canonicalize(digits),
    remainder,
  };
}
