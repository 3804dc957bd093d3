import {AMBIGUOUS_EMOJI_ARE_WIDE, TAB_WIDTH} from '../../constants.js';

export function formatLineNumber(value: number | undefined, width = 4): string {
  if (value === undefined) return ' '.repeat(width);
  return String(value).padStart(width, ' ');
}

// Display width helpers for terminal rendering
function isZeroWidth(codePoint: number): boolean {
  // Combining marks
  if (
    (codePoint >= 0x0300 && codePoint <= 0x036F) ||
    (codePoint >= 0x1AB0 && codePoint <= 0x1AFF) ||
    (codePoint >= 0x1DC0 && codePoint <= 0x1DFF) ||
    (codePoint >= 0x20D0 && codePoint <= 0x20FF) ||
    (codePoint >= 0xFE20 && codePoint <= 0xFE2F)
  ) return true;

  // Variation Selectors and Zero Width characters
  if (
    (codePoint >= 0xFE00 && codePoint <= 0xFE0F) ||
    codePoint === 0x200D || codePoint === 0x200C || codePoint === 0x200B
  ) return true;

  return false;
}

function isWide(codePoint: number): boolean {
  const baseWide = (
    (codePoint >= 0x1100 && codePoint <= 0x115F) ||
    codePoint === 0x2329 || codePoint === 0x232A ||
    (codePoint >= 0x2E80 && codePoint <= 0xA4CF) ||
    (codePoint >= 0xAC00 && codePoint <= 0xD7A3) ||
    (codePoint >= 0xF900 && codePoint <= 0xFAFF) ||
    (codePoint >= 0xFE10 && codePoint <= 0xFE19) ||
    (codePoint >= 0xFE30 && codePoint <= 0xFE6F) ||
    (codePoint >= 0xFF00 && codePoint <= 0xFF60) ||
    (codePoint >= 0xFFE0 && codePoint <= 0xFFE6) ||
    (codePoint >= 0x1F300 && codePoint <= 0x1F64F) ||
    (codePoint >= 0x1F900 && codePoint <= 0x1F9FF) ||
    (codePoint >= 0x1FA70 && codePoint <= 0x1FAFF)
  );

  if (baseWide) return true;

  if (AMBIGUOUS_EMOJI_ARE_WIDE) {
    const ambiguousWideSymbols = [0x26A1, 0x2713, 0x2717, 0x23F3, 0x27EB, 0x2191, 0x2193];
    if (ambiguousWideSymbols.includes(codePoint)) return true;
  }

  return false;
}

function isControl(codePoint: number): boolean {
  return codePoint <= 0x1F || (codePoint >= 0x7F && codePoint <= 0x9F);
}

/**
 * Terminal columns taken by a single code point.
 * Tabs take a fixed TAB_WIDTH, control characters and combining marks take none.
 */
export function codePointWidth(codePoint: number): number {
  if (codePoint === 0x09) return TAB_WIDTH;
  if (isControl(codePoint)) return 0;
  if (isZeroWidth(codePoint)) return 0;
  return isWide(codePoint) ? 2 : 1;
}

export function charDisplayWidth(ch: string): number {
  const codePoint = ch.codePointAt(0);
  return codePoint === undefined ? 0 : codePointWidth(codePoint);
}

export function stringDisplayWidth(str: string): number {
  let width = 0;
  for (const ch of str) {
    width += charDisplayWidth(ch);
  }
  return width;
}

/**
 * Printable form of diff text: tabs become TAB_WIDTH spaces, other control characters are dropped.
 * Keeps the display width equal to stringDisplayWidth of the input.
 */
export function sanitizeForDisplay(str: string): string {
  let result = '';
  for (const ch of str) {
    if (ch === '\t') {
      result += ' '.repeat(TAB_WIDTH);
      continue;
    }
    const codePoint = ch.codePointAt(0);
    if (codePoint === undefined || isControl(codePoint)) continue;
    result += ch;
  }
  return result;
}

export function truncateDisplay(str: string, targetWidth: number): string {
  let width = 0;
  let result = '';

  for (const ch of str) {
    const charWidth = charDisplayWidth(ch);

    if (width + charWidth > targetWidth) break;

    result += ch;
    width += charWidth;
  }

  return result;
}

export function padEndDisplay(str: string, targetWidth: number): string {
  const currentWidth = stringDisplayWidth(str);
  if (currentWidth >= targetWidth) return str;
  return str + ' '.repeat(targetWidth - currentWidth);
}
