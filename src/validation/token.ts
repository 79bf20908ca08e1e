const WORD_PATTERN = /^[\p{L}\p{N}]+$/u;

function isAsciiAlphanumeric(code: number): boolean {
  return (
    (code >= 0x30 && code <= 0x39) || (code >= 0x41 && code <= 0x5a) || (code >= 0x61 && code <= 0x7a)
  );
}

/**
 * Returns true when `needle` occurs in `text` as a standalone word: the
 * characters around the match (if any) must not be ASCII letters or digits.
 * Needles that contain punctuation or whitespace fall back to a plain
 * substring search, so "max-age=" matches anywhere.
 */
export function containsToken(text: string, needle: string): boolean {
  if (needle.length === 0) {
    return true;
  }

  if (!WORD_PATTERN.test(needle)) {
    return text.includes(needle);
  }

  let from = 0;

  while (from <= text.length - needle.length) {
    const start = text.indexOf(needle, from);
    if (start === -1) {
      return false;
    }

    const end = start + needle.length;
    const leftOk = start === 0 || !isAsciiAlphanumeric(text.charCodeAt(start - 1));
    const rightOk = end >= text.length || !isAsciiAlphanumeric(text.charCodeAt(end));

    if (leftOk && rightOk) {
      return true;
    }

    from = start + 1;
  }

  return false;
}
