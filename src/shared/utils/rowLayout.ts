export type CommentHeightFn = (rowIndex: number) => number;

export type RowHit =
  | {kind: 'row'; rowIndex: number}
  | {kind: 'comment'; rowIndex: number}
  | {kind: 'none'};

/**
 * Pure utility class mapping offsets to rows when some rows carry a comment box below them.
 * Offsets are measured from the top of the content, in whatever unit rowHeight uses
 * (terminal lines for the Ink view). Everything here walks the rows, O(rows).
 */
export class RowLayout {
  /**
   * Which target occupies offset y: the row itself in its leading rowHeight span,
   * its comment box in the trailing span, or nothing.
   */
  static hitTest(y: number, rowCount: number, rowHeight: number, commentHeight: CommentHeightFn): RowHit {
    if (y < 0 || rowHeight <= 0) return {kind: 'none'};
    let top = 0;
    for (let i = 0; i < rowCount; i++) {
      const boxHeight = commentHeight(i);
      if (y < top + rowHeight) return {kind: 'row', rowIndex: i};
      if (y < top + rowHeight + boxHeight) return {kind: 'comment', rowIndex: i};
      top += rowHeight + boxHeight;
    }
    return {kind: 'none'};
  }

  /** Offset of the top of a row */
  static rowOffset(rowIndex: number, rowHeight: number, commentHeight: CommentHeightFn): number {
    let top = 0;
    for (let i = 0; i < rowIndex; i++) {
      top += rowHeight + commentHeight(i);
    }
    return top;
  }

  /** Offset of the top of the comment box anchored to a row */
  static commentOffset(rowIndex: number, rowHeight: number, commentHeight: CommentHeightFn): number {
    return this.rowOffset(rowIndex, rowHeight, commentHeight) + rowHeight;
  }

  static totalHeight(rowCount: number, rowHeight: number, commentHeight: CommentHeightFn): number {
    return this.rowOffset(rowCount, rowHeight, commentHeight);
  }

  /**
   * Scroll offset that brings a row and its comment box into view, moving as little as possible.
   * When the pair is taller than the viewport the row itself is kept at the top.
   */
  static scrollToShow(
    rowIndex: number,
    currentScroll: number,
    viewportHeight: number,
    rowHeight: number,
    commentHeight: CommentHeightFn
  ): number {
    const top = this.rowOffset(rowIndex, rowHeight, commentHeight);
    const bottom = top + rowHeight + commentHeight(rowIndex);

    if (top < currentScroll) return top;
    if (bottom > currentScroll + viewportHeight) {
      return Math.min(top, Math.max(0, bottom - viewportHeight));
    }
    return currentScroll;
  }

  static maxScroll(rowCount: number, viewportHeight: number, rowHeight: number, commentHeight: CommentHeightFn): number {
    return Math.max(0, this.totalHeight(rowCount, rowHeight, commentHeight) - viewportHeight);
  }
}
