const INLINE_COMMENT = /\s([#;])/;

/**
 * Hint appended to errors about a value that still carries a trailing comment.
 * Empty when the value has none.
 */
export function inlineCommentHint(value: string): string {
  const match = INLINE_COMMENT.exec(value);

  return match
    ? `; it contains an inline "${match[1]}" comment, move the comment to its own line`
    : '';
}
