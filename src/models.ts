export type DiffLineKind = 'context' | 'add' | 'remove';

export interface DiffLine {
  kind: DiffLineKind;
  text: string;
  oldLineNumber?: number;
  newLineNumber?: number;
}

export interface DiffHunk {
  header: string;
  oldStart: number;
  newStart: number;
  lines: DiffLine[];
}

export class DiffFile {
  path: string;
  collapsed: boolean;
  hunks: DiffHunk[];
  constructor(init: Partial<DiffFile> = {}) {
    this.path = '';
    this.collapsed = false;
    this.hunks = [];
    Object.assign(this, init);
  }

  get lineCount(): number {
    return this.hunks.reduce((total, hunk) => total + hunk.lines.length, 0);
  }
}

export interface FileHeaderRow {
  kind: 'file-header';
  fileIndex: number;
}

export interface HunkHeaderRow {
  kind: 'hunk-header';
  fileIndex: number;
  hunkIndex: number;
}

// byteOffset/byteEnd are UTF-8 byte positions inside the line text
export interface DiffLineRow {
  kind: 'line';
  fileIndex: number;
  hunkIndex: number;
  lineIndex: number;
  byteOffset: number;
  byteEnd: number;
}

export interface MessageRow {
  kind: 'message';
  text: string;
}

export type DisplayRow = FileHeaderRow | HunkHeaderRow | DiffLineRow | MessageRow;

export interface CommentKey {
  filePath: string;
  lineNumber: number;
}

export class DiffComment {
  key: CommentKey;
  text: string;
  sent: boolean;
  // Recomputed after every projection rebuild; never persisted
  displayRowIndex: number | null;
  constructor(init: Partial<DiffComment> = {}) {
    this.key = {filePath: '', lineNumber: 0};
    this.text = '';
    this.sent = false;
    this.displayRowIndex = null;
    Object.assign(this, init);
  }

  matches(key: CommentKey): boolean {
    return this.key.filePath === key.filePath && this.key.lineNumber === key.lineNumber;
  }
}

export type DiffLoadResult =
  | {ok: true; text: string}
  | {ok: false; message: string};

export interface SendResult {
  success: boolean;
  error?: string;
}
