import {DiffFile, DiffLine, DiffLineRow, DisplayRow} from '../models.js';
import {LineWrapper, sliceBytes} from '../shared/utils/lineWrapper.js';

/**
 * Project the diff model into a flat list of display rows.
 *
 * Collapsed files keep only their header row. Lines wider than wrapWidth columns are split
 * into continuation rows sharing (fileIndex, hunkIndex, lineIndex) with increasing byteOffset.
 * wrapWidth 0 disables wrapping.
 */
export function buildDisplayRows(files: DiffFile[], wrapWidth: number): DisplayRow[] {
  const rows: DisplayRow[] = [];

  files.forEach((file, fileIndex) => {
    rows.push({kind: 'file-header', fileIndex});
    if (file.collapsed) return;

    file.hunks.forEach((hunk, hunkIndex) => {
      rows.push({kind: 'hunk-header', fileIndex, hunkIndex});
      hunk.lines.forEach((line, lineIndex) => {
        for (const slice of LineWrapper.sliceLine(line.text, wrapWidth)) {
          rows.push({
            kind: 'line',
            fileIndex,
            hunkIndex,
            lineIndex,
            byteOffset: slice.byteOffset,
            byteEnd: slice.byteEnd,
          });
        }
      });
    });
  });

  return rows;
}

export function messageRows(text: string): DisplayRow[] {
  return [{kind: 'message', text}];
}

export function isSameLogicalLine(a: DiffLineRow, b: DiffLineRow): boolean {
  return a.fileIndex === b.fileIndex && a.hunkIndex === b.hunkIndex && a.lineIndex === b.lineIndex;
}

/**
 * Index of the last wrap row of the logical line shown at rowIndex.
 * Non-line rows are their own final row.
 */
export function finalWrapRowIndex(rows: DisplayRow[], rowIndex: number): number {
  const row = rows[rowIndex];
  if (!row || row.kind !== 'line') return rowIndex;
  let last = rowIndex;
  for (let i = rowIndex + 1; i < rows.length; i++) {
    const next = rows[i];
    if (next.kind !== 'line' || !isSameLogicalLine(row, next)) break;
    last = i;
  }
  return last;
}

export function lineForRow(files: DiffFile[], row: DiffLineRow): DiffLine | undefined {
  return files[row.fileIndex]?.hunks[row.hunkIndex]?.lines[row.lineIndex];
}

/**
 * Text of the slice a line row displays.
 */
export function rowText(files: DiffFile[], row: DiffLineRow): string {
  const line = lineForRow(files, row);
  if (!line) return '';
  return sliceBytes(line.text, row.byteOffset, row.byteEnd);
}

/**
 * Line number a comment keys on: old side for removed lines, new side otherwise.
 */
export function anchorLineNumber(line: DiffLine): number | undefined {
  return line.kind === 'remove' ? line.oldLineNumber : line.newLineNumber;
}

export type RowAnchor =
  | {kind: 'file'; fileIndex: number}
  | {kind: 'hunk'; fileIndex: number; hunkIndex: number}
  | {kind: 'line'; fileIndex: number; hunkIndex: number; lineIndex: number}
  | {kind: 'message'};

/**
 * Model position a row stands for; survives rebuilds, unlike the row index.
 */
export function rowAnchor(row: DisplayRow): RowAnchor {
  switch (row.kind) {
    case 'file-header':
      return {kind: 'file', fileIndex: row.fileIndex};
    case 'hunk-header':
      return {kind: 'hunk', fileIndex: row.fileIndex, hunkIndex: row.hunkIndex};
    case 'line':
      return {kind: 'line', fileIndex: row.fileIndex, hunkIndex: row.hunkIndex, lineIndex: row.lineIndex};
    case 'message':
      return {kind: 'message'};
  }
}

/**
 * First row showing the anchor. Falls back to the file header when the file is
 * collapsed, and to 0 when nothing matches.
 */
export function findRowIndex(rows: DisplayRow[], anchor: RowAnchor): number {
  let fileHeader = -1;
  for (let i = 0; i < rows.length; i++) {
    const row = rows[i];
    if (anchor.kind === 'message') {
      if (row.kind === 'message') return i;
      continue;
    }
    if (row.kind === 'message' || row.fileIndex !== anchor.fileIndex) continue;
    if (row.kind === 'file-header') {
      if (anchor.kind === 'file') return i;
      fileHeader = i;
      continue;
    }
    if (anchor.kind === 'file' || row.hunkIndex !== anchor.hunkIndex) continue;
    if (anchor.kind === 'hunk' && row.kind === 'hunk-header') return i;
    if (anchor.kind === 'line' && row.kind === 'line' && row.lineIndex === anchor.lineIndex) return i;
  }
  return Math.max(0, fileHeader);
}

export function fileIndexForRow(row: DisplayRow | undefined): number | null {
  if (!row || row.kind === 'message') return null;
  return row.fileIndex;
}
