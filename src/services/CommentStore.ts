import {CommentKey, DiffComment, DiffFile, DisplayRow} from '../models.js';
import {anchorLineNumber, finalWrapRowIndex, lineForRow} from '../diff/displayRows.js';
import {CommentPersistence} from './CommentPersistence.js';
import {logDebug} from '../shared/utils/logger.js';

/**
 * Key for the logical line shown at rowIndex, or null for rows that cannot carry a comment.
 */
export function commentKeyForRow(files: DiffFile[], rows: DisplayRow[], rowIndex: number): CommentKey | null {
  const row = rows[rowIndex];
  if (!row || row.kind !== 'line') return null;
  const line = lineForRow(files, row);
  const file = files[row.fileIndex];
  if (!line || !file) return null;
  const lineNumber = anchorLineNumber(line);
  if (lineNumber === undefined) return null;
  return {filePath: file.path, lineNumber};
}

/**
 * Review comments keyed by (file, line number) and anchored to the current display rows.
 *
 * Positions are only valid after resolvePositions() has run against the latest rows.
 * Every mutation is written through to the persistence layer when one is attached.
 */
export class CommentStore {
  private comments: DiffComment[] = [];
  private persistence: CommentPersistence | null;

  constructor(persistence: CommentPersistence | null = null) {
    this.persistence = persistence;
  }

  load(): void {
    this.comments = this.persistence ? this.persistence.load() : [];
    logDebug(`[Comments] Loaded ${this.comments.length} comments`);
  }

  save(): void {
    this.persistence?.save(this.comments);
  }

  addOrUpdate(files: DiffFile[], rows: DisplayRow[], targetRow: number, text: string): DiffComment | null {
    const anchorRow = finalWrapRowIndex(rows, targetRow);
    const key = commentKeyForRow(files, rows, anchorRow);
    if (!key) return null;

    let comment = this.comments.find(c => !c.sent && c.matches(key));
    if (comment) {
      comment.text = text;
    } else {
      comment = new DiffComment({key, text});
      this.comments.push(comment);
    }
    comment.displayRowIndex = anchorRow;
    this.save();
    return comment;
  }

  remove(index: number): boolean {
    if (index < 0 || index >= this.comments.length) return false;
    this.comments.splice(index, 1);
    this.save();
    return true;
  }

  /**
   * Re-anchor every unsent comment to the final wrap row of its line, or null when the
   * line is not in the current rows. Unanchored comments are kept.
   *
   * A removed line and an added line can share a key; the later row in display order wins.
   */
  resolvePositions(files: DiffFile[], rows: DisplayRow[]): void {
    for (const comment of this.comments) {
      if (comment.sent) continue;
      comment.displayRowIndex = null;
      for (let i = 0; i < rows.length; i++) {
        const row = rows[i];
        if (row.kind !== 'line') continue;
        const file = files[row.fileIndex];
        if (!file || file.path !== comment.key.filePath) continue;
        const line = lineForRow(files, row);
        if (!line || anchorLineNumber(line) !== comment.key.lineNumber) continue;
        // Continuation rows follow in increasing byteOffset, so the last hit is the final wrap row
        comment.displayRowIndex = i;
      }
    }
  }

  markSent(): void {
    for (const comment of this.comments) {
      comment.sent = true;
      comment.displayRowIndex = null;
    }
  }

  get all(): DiffComment[] {
    return [...this.comments];
  }

  unsent(): DiffComment[] {
    return this.comments.filter(c => !c.sent);
  }

  get count(): number {
    return this.unsent().length;
  }

  commentAtRow(rowIndex: number): DiffComment | undefined {
    return this.comments.find(c => !c.sent && c.displayRowIndex === rowIndex);
  }

  indexOf(comment: DiffComment): number {
    return this.comments.indexOf(comment);
  }
}
