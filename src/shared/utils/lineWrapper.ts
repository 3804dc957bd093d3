import {charDisplayWidth, stringDisplayWidth} from './formatting.js';

export interface LineSlice {
  byteOffset: number;
  byteEnd: number;
  text: string;
  width: number;
}

/**
 * Pure utility class for wrapping diff lines with Unicode support.
 * Slices are UTF-8 byte ranges that always start and end on code point boundaries.
 */
export class LineWrapper {
  /**
   * Greedily split a line into slices no wider than maxWidth display columns.
   * A single code point wider than maxWidth gets a slice of its own; zero-width
   * code points stay with the slice they follow. maxWidth <= 0 disables wrapping.
   */
  static sliceLine(text: string, maxWidth: number): LineSlice[] {
    if (maxWidth <= 0 || text === '') {
      return [{byteOffset: 0, byteEnd: Buffer.byteLength(text, 'utf8'), text, width: stringDisplayWidth(text)}];
    }

    const slices: LineSlice[] = [];
    let current = '';
    let currentWidth = 0;
    let sliceStart = 0;
    let byte = 0;

    for (const ch of text) {
      const charWidth = charDisplayWidth(ch);

      if (currentWidth + charWidth > maxWidth && current.length > 0) {
        slices.push({byteOffset: sliceStart, byteEnd: byte, text: current, width: currentWidth});
        sliceStart = byte;
        current = '';
        currentWidth = 0;
      }

      current += ch;
      currentWidth += charWidth;
      byte += Buffer.byteLength(ch, 'utf8');
    }

    slices.push({byteOffset: sliceStart, byteEnd: byte, text: current, width: currentWidth});
    return slices;
  }
}

/**
 * Text of a UTF-8 byte range of a line. Ranges produced by sliceLine never split a code point.
 */
export function sliceBytes(text: string, byteOffset: number, byteEnd: number): string {
  return Buffer.from(text, 'utf8').subarray(byteOffset, byteEnd).toString('utf8');
}
