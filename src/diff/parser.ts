import {DiffFile, DiffHunk, DiffLine} from '../models.js';

const FILE_PREFIX = 'diff --git ';

// Per-file metadata emitted by git between the file header and the first hunk
const METADATA_PREFIXES = [
  'index ',
  '--- ',
  '+++ ',
  'new file',
  'deleted file',
  'old mode',
  'new mode',
  'similarity index',
  'dissimilarity index',
  'rename from',
  'rename to',
  'copy from',
  'copy to',
  'Binary files',
];

export function isMetadataLine(line: string): boolean {
  return METADATA_PREFIXES.some(prefix => line.startsWith(prefix));
}

/**
 * Path of a `diff --git a/<p> b/<p>` header. Uses the b/ side; falls back to the raw remainder.
 */
export function parseFilePath(header: string): string {
  const rest = header.slice(FILE_PREFIX.length);
  const idx = rest.lastIndexOf(' b/');
  if (idx === -1) return rest;
  return rest.slice(idx + 3);
}

export interface HunkRange {
  oldStart: number;
  newStart: number;
  // null when the header carries no usable range; the hunk then runs until the next header
  oldCount: number | null;
  newCount: number | null;
}

const HUNK_RANGE = /^@@ -(\d+)(?:,(\d+))? \+(\d+)(?:,(\d+))? @@/;

function numberAfter(header: string, marker: '-' | '+'): number {
  for (let i = header.indexOf(marker); i !== -1; i = header.indexOf(marker, i + 1)) {
    const match = /^\d+/.exec(header.slice(i + 1));
    if (match) return Number(match[0]);
  }
  return 0;
}

/**
 * Extract the ranges of `@@ -a,b +c,d @@`. Malformed headers yield start 0 and no counts.
 */
export function parseHunkHeader(header: string): HunkRange {
  const match = HUNK_RANGE.exec(header);
  if (match) {
    return {
      oldStart: Number(match[1]),
      oldCount: match[2] === undefined ? 1 : Number(match[2]),
      newStart: Number(match[3]),
      newCount: match[4] === undefined ? 1 : Number(match[4]),
    };
  }
  return {oldStart: numberAfter(header, '-'), newStart: numberAfter(header, '+'), oldCount: null, newCount: null};
}

function splitLines(raw: string): string[] {
  const lines = raw.split('\n');
  if (lines.length > 0 && lines[lines.length - 1] === '') lines.pop();
  return lines.map(line => (line.endsWith('\r') ? line.slice(0, -1) : line));
}

/**
 * Parse unified diff output into an ordered File → Hunk → Line model.
 * Best effort: anything unrecognised is skipped rather than reported.
 */
export function parseDiff(raw: string | Buffer): DiffFile[] {
  const text = Buffer.isBuffer(raw) ? raw.toString('utf8') : raw;
  const files: DiffFile[] = [];
  let file: DiffFile | null = null;
  let hunk: DiffHunk | null = null;
  let range: HunkRange | null = null;
  let oldLine = 0;
  let newLine = 0;

  const hunkExhausted = (): boolean => {
    if (!range || range.oldCount === null || range.newCount === null) return false;
    return oldLine >= range.oldStart + range.oldCount && newLine >= range.newStart + range.newCount;
  };

  for (const line of splitLines(text)) {
    if (line.startsWith(FILE_PREFIX)) {
      file = new DiffFile({path: parseFilePath(line)});
      files.push(file);
      hunk = null;
      continue;
    }

    if (line.startsWith('@@')) {
      if (!file) continue;
      range = parseHunkHeader(line);
      hunk = {header: line, oldStart: range.oldStart, newStart: range.newStart, lines: []};
      file.hunks.push(hunk);
      oldLine = range.oldStart;
      newLine = range.newStart;
      continue;
    }

    if (isMetadataLine(line)) continue;
    if (!hunk) continue;
    if (line.startsWith('\\')) continue;
    // Blank separator between concatenated diffs, once the hunk's ranges are consumed
    if (line === '' && hunkExhausted()) continue;

    let parsed: DiffLine;
    if (line.startsWith('+')) {
      parsed = {kind: 'add', text: line.slice(1), newLineNumber: newLine++};
    } else if (line.startsWith('-')) {
      parsed = {kind: 'remove', text: line.slice(1), oldLineNumber: oldLine++};
    } else {
      const body = line.startsWith(' ') ? line.slice(1) : line;
      parsed = {kind: 'context', text: body, oldLineNumber: oldLine++, newLineNumber: newLine++};
    }
    hunk.lines.push(parsed);
  }

  return files;
}
