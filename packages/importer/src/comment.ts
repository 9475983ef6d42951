export const COMMENT_SEPARATOR = ' - ';

const MARKER_PATTERN = /^(\S+)(?:\s-(?:\s|$)|$)/;

/**
 * Target comment: the source id, then the description text.
 * The id prefix is what later runs read back for dedup.
 */
export function formatComment(sourceId: string, text: string): string {
  return `${sourceId}${COMMENT_SEPARATOR}${text}`;
}

/**
 * Source id from a comment written by formatComment, or null for comments
 * entered by hand.
 */
export function extractSourceId(comment: string): string | null {
  const match = MARKER_PATTERN.exec(comment.trim());
  return match?.[1] ?? null;
}
