// Character width detection for terminal rendering
// Based on wcwidth algorithm for handling Unicode characters with different display widths

/**
 * Get the display width of a character in terminal cells
 * Returns:
 * - 0 for zero-width characters (combining marks, etc.)
 * - 1 for normal width characters
 * - 2 for wide characters (CJK, emojis, etc.)
 * - -1 for control characters
 */
export function getCharWidth(char: string): number {
  if (char.length === 0) return 0;

  const codePoint = char.codePointAt(0);
  if (codePoint === undefined) return 1;

  // Control characters
  if (codePoint < 32 || (codePoint >= 0x7f && codePoint < 0xa0)) {
    return -1;
  }

  if (isZeroWidth(codePoint)) {
    return 0;
  }

  if (isWideCharacter(codePoint)) {
    return 2;
  }

  return 1;
}

/**
 * Get the total display width of a string
 */
export function getStringWidth(text: string): number {
  let width = 0;
  for (const char of text) {
    width += Math.max(getCharWidth(char), 0);
  }
  return width;
}

/**
 * Longest prefix of `text` that fits in `width` cells. Never splits a code point.
 */
export function sliceToWidth(text: string, width: number): string {
  let used = 0;
  let end = 0;
  for (const char of text) {
    const charWidth = Math.max(getCharWidth(char), 0);
    if (used + charWidth > width) break;
    used += charWidth;
    end += char.length;
  }
  return text.slice(0, end);
}

/**
 * Longest suffix of `text` that fits in `width` cells.
 */
export function sliceEndToWidth(text: string, width: number): string {
  const chars = Array.from(text);
  let used = 0;
  let start = chars.length;
  while (start > 0) {
    const charWidth = Math.max(getCharWidth(chars[start - 1]), 0);
    if (used + charWidth > width) break;
    used += charWidth;
    start--;
  }
  return chars.slice(start).join('');
}

function isZeroWidth(codePoint: number): boolean {
  // Combining marks
  if (codePoint >= 0x0300 && codePoint <= 0x036F) return true;
  if (codePoint >= 0x1AB0 && codePoint <= 0x1AFF) return true;
  if (codePoint >= 0x1DC0 && codePoint <= 0x1DFF) return true;
  if (codePoint >= 0x20D0 && codePoint <= 0x20FF) return true;
  if (codePoint >= 0xFE20 && codePoint <= 0xFE2F) return true;

  if (codePoint === 0x200B) return true; // Zero width space
  if (codePoint === 0x200C) return true; // Zero width non-joiner
  if (codePoint === 0x200D) return true; // Zero width joiner
  if (codePoint === 0xFEFF) return true; // Zero width no-break space

  return false;
}

function isWideCharacter(codePoint: number): boolean {
  // East Asian Full-width and Wide characters
  if (codePoint >= 0x1100 && codePoint <= 0x115F) return true; // Hangul Jamo
  if (codePoint >= 0x2E80 && codePoint <= 0x303E) return true; // CJK Radicals Supplement to CJK Symbols
  if (codePoint >= 0x3040 && codePoint <= 0xA4CF) return true; // Hiragana to Yi
  if (codePoint >= 0xAC00 && codePoint <= 0xD7A3) return true; // Hangul Syllables
  if (codePoint >= 0xF900 && codePoint <= 0xFAFF) return true; // CJK Compatibility Ideographs
  if (codePoint >= 0xFE30 && codePoint <= 0xFE6F) return true; // CJK Compatibility Forms
  if (codePoint >= 0xFF00 && codePoint <= 0xFF60) return true; // Fullwidth ASCII
  if (codePoint >= 0xFFE0 && codePoint <= 0xFFE6) return true; // Fullwidth symbols

  // Emoji ranges (common blocks only)
  if (codePoint >= 0x1F300 && codePoint <= 0x1F64F) return true;
  if (codePoint >= 0x1F680 && codePoint <= 0x1F6FF) return true;
  if (codePoint >= 0x1F900 && codePoint <= 0x1F9FF) return true;
  if (codePoint >= 0x1FA70 && codePoint <= 0x1FAFF) return true;

  return false;
}
