import React, {useCallback, useEffect, useRef, useState} from 'react';
import {Box, Text, useInput} from 'ink';
import {DiffReviewEngine} from '../../engine/DiffReviewEngine.js';
import {DisplayRow, DiffFile, DiffComment} from '../../models.js';
import {
  RowAnchor,
  findRowIndex,
  fileIndexForRow,
  lineForRow,
  rowAnchor,
  rowText
} from '../../diff/displayRows.js';
import {commentKeyForRow} from '../../services/CommentStore.js';
import {RowLayout} from '../../shared/utils/rowLayout.js';
import {LineWrapper} from '../../shared/utils/lineWrapper.js';
import {formatLineNumber, padEndDisplay, sanitizeForDisplay, truncateDisplay} from '../../shared/utils/formatting.js';
import {MouseEvent, isMouseSequence} from '../../shared/utils/mouse.js';
import {logError} from '../../shared/utils/logger.js';
import {useTerminalDimensions} from '../../hooks/useTerminalDimensions.js';
import {useMouse} from '../../hooks/useMouse.js';
import AnnotatedText from '../common/AnnotatedText.js';
import CommentInputDialog from '../dialogs/CommentInputDialog.js';
import {
  COMMENT_BOX_PADDING,
  FOOTER_ROWS,
  GUTTER_WIDTH,
  HEADER_ROWS,
  SYMBOL_COLLAPSED,
  SYMBOL_COMMENT,
  SYMBOL_EXPANDED
} from '../../constants.js';

const ROW_HEIGHT = 1;
const WHEEL_STEP = 3;
const MIN_WRAP_WIDTH = 10;

export const HELP_TEXT = '[j/k] move  [enter] fold  [z/Z] fold all  [c]omment  [d]elete  [s]end  [r]eload  [q]uit';

type Props = {
  engine: DiffReviewEngine;
  title?: string;
  onClose: () => void;
  // null follows the terminal width
  fixedWrapWidth?: number | null;
};

type DialogState = {
  // Rows may be rebuilt while the dialog is open
  anchor: RowAnchor;
  fileName: string;
  lineNumber: number;
  lineText: string;
  initial: string;
};

/**
 * Comment text split into box lines no wider than innerWidth columns.
 */
export function commentBoxLines(text: string, innerWidth: number): string[] {
  const lines: string[] = [];
  for (const part of text.split('\n')) {
    for (const slice of LineWrapper.sliceLine(sanitizeForDisplay(part), innerWidth)) {
      lines.push(slice.text);
    }
  }
  return lines;
}

export function wrapWidthForColumns(columns: number): number {
  return Math.max(MIN_WRAP_WIDTH, columns - GUTTER_WIDTH - 1);
}

function lineGutter(files: DiffFile[], row: DisplayRow): string {
  if (row.kind !== 'line') return '';
  const line = lineForRow(files, row);
  if (!line || row.byteOffset > 0) return ' '.repeat(GUTTER_WIDTH);
  const sign = line.kind === 'add' ? '+' : line.kind === 'remove' ? '-' : ' ';
  return `${formatLineNumber(line.oldLineNumber)} ${formatLineNumber(line.newLineNumber)} ${sign} `;
}

function rowColor(files: DiffFile[], row: DisplayRow): string | undefined {
  switch (row.kind) {
    case 'file-header':
      return 'cyan';
    case 'hunk-header':
      return 'magenta';
    case 'message':
      return 'gray';
    case 'line': {
      const line = lineForRow(files, row);
      if (line?.kind === 'add') return 'green';
      if (line?.kind === 'remove') return 'red';
      return undefined;
    }
  }
}

function rowLabel(files: DiffFile[], row: DisplayRow): string {
  switch (row.kind) {
    case 'file-header': {
      const file = files[row.fileIndex];
      if (!file) return '';
      return `${file.collapsed ? SYMBOL_COLLAPSED : SYMBOL_EXPANDED} ${file.path}`;
    }
    case 'hunk-header':
      return files[row.fileIndex]?.hunks[row.hunkIndex]?.header ?? '';
    case 'message':
      return row.text;
    case 'line':
      return lineGutter(files, row) + sanitizeForDisplay(rowText(files, row));
  }
}

export default function DiffReviewView({engine, title = 'Diff Review', onClose, fixedWrapWidth = null}: Props) {
  const {columns, rows: terminalRows} = useTerminalDimensions();
  const [version, setVersion] = useState(engine.getVersion());
  const [selected, setSelected] = useState(0);
  const [scroll, setScroll] = useState(0);
  const [dialog, setDialog] = useState<DialogState | null>(null);
  const [status, setStatus] = useState<string | null>(null);
  const anchorRef = useRef<RowAnchor | null>(null);

  const viewportHeight = Math.max(1, terminalRows - HEADER_ROWS - FOOTER_ROWS);
  const boxInnerWidth = Math.max(1, columns - GUTTER_WIDTH - 2);
  const wrapWidth = fixedWrapWidth ?? wrapWidthForColumns(columns);

  const files = engine.getFiles();
  const rows = engine.getRows();

  useEffect(() => {
    const onChange = (next: number) => {
      setVersion(next);
      const anchor = anchorRef.current;
      const current = engine.getRows();
      setSelected(prev => {
        if (anchor) return findRowIndex(current, anchor);
        return Math.min(prev, Math.max(0, current.length - 1));
      });
    };
    engine.on('change', onChange);
    return () => {
      engine.off('change', onChange);
    };
  }, [engine]);

  useEffect(() => {
    engine.setWrapWidth(wrapWidth);
  }, [engine, wrapWidth]);

  useEffect(() => {
    const row = engine.getRows()[selected];
    anchorRef.current = row ? rowAnchor(row) : null;
  }, [engine, selected, version]);

  const commentHeight = useCallback((rowIndex: number): number => {
    const comment = engine.commentAtRow(rowIndex);
    if (!comment) return 0;
    return COMMENT_BOX_PADDING + commentBoxLines(comment.text, boxInnerWidth).length;
  }, [engine, boxInnerWidth, version]);

  const maxScroll = RowLayout.maxScroll(rows.length, viewportHeight, ROW_HEIGHT, commentHeight);

  useEffect(() => {
    setScroll(prev => {
      const next = RowLayout.scrollToShow(selected, prev, viewportHeight, ROW_HEIGHT, commentHeight);
      return Math.min(Math.max(0, next), maxScroll);
    });
  }, [selected, viewportHeight, commentHeight, maxScroll]);

  const openDialog = useCallback((rowIndex: number) => {
    const currentRows = engine.getRows();
    const currentFiles = engine.getFiles();
    const key = commentKeyForRow(currentFiles, currentRows, rowIndex);
    const row = currentRows[rowIndex];
    if (!key || !row || row.kind !== 'line') {
      setStatus('Comments attach to diff lines');
      return;
    }
    const existing = engine.commentForRow(rowIndex);
    setDialog({
      anchor: rowAnchor(row),
      fileName: key.filePath,
      lineNumber: key.lineNumber,
      lineText: lineForRow(currentFiles, row)?.text ?? '',
      initial: existing?.text ?? ''
    });
  }, [engine]);

  const toggleFoldAt = useCallback((rowIndex: number) => {
    const fileIndex = fileIndexForRow(engine.getRows()[rowIndex]);
    if (fileIndex !== null) engine.toggleCollapsed(fileIndex);
  }, [engine]);

  const sendComments = useCallback(() => {
    if (engine.commentCount === 0) {
      setStatus('No comments to send');
      return;
    }
    setStatus('Sending comments...');
    engine.sendComments()
      .then(result => setStatus(result.success ? 'Comments sent' : `Send failed: ${result.error ?? 'unknown error'}`))
      .catch(error => {
        logError('Failed to send comments', error);
        setStatus('Send failed');
      });
  }, [engine]);

  const reload = useCallback(() => {
    setStatus(null);
    engine.load().catch(error => {
      logError('Failed to reload diff', error);
      setStatus('Reload failed');
    });
  }, [engine]);

  useInput((input, key) => {
    if (isMouseSequence(input)) return;
    const last = Math.max(0, engine.getRows().length - 1);

    if (key.escape || input === 'q') {
      engine.hide();
      onClose();
      return;
    }
    if (key.upArrow || input === 'k') {
      setSelected(prev => Math.max(0, prev - 1));
      return;
    }
    if (key.downArrow || input === 'j') {
      setSelected(prev => Math.min(last, prev + 1));
      return;
    }
    if (key.pageUp) {
      setSelected(prev => Math.max(0, prev - viewportHeight));
      return;
    }
    if (key.pageDown) {
      setSelected(prev => Math.min(last, prev + viewportHeight));
      return;
    }
    if (input === 'g') {
      setSelected(0);
      return;
    }
    if (input === 'G') {
      setSelected(last);
      return;
    }
    if (key.return || input === ' ') {
      toggleFoldAt(selected);
      return;
    }
    if (input === 'z') {
      engine.setAllCollapsed(true);
      return;
    }
    if (input === 'Z') {
      engine.setAllCollapsed(false);
      return;
    }
    if (input === 'c') {
      openDialog(selected);
      return;
    }
    if (input === 'd') {
      setStatus(engine.removeCommentAtRow(selected) ? 'Comment deleted' : 'No comment on this line');
      return;
    }
    if (input === 's') {
      sendComments();
      return;
    }
    if (input === 'r') {
      reload();
    }
  }, {isActive: dialog === null});

  const onMouse = useCallback((ev: MouseEvent) => {
    if (dialog) return;
    if (ev.type === 'wheel') {
      const delta = ev.direction === 'up' ? -WHEEL_STEP : WHEEL_STEP;
      setScroll(prev => Math.min(maxScroll, Math.max(0, prev + delta)));
      return;
    }
    const y = ev.y - HEADER_ROWS;
    if (y < 0 || y >= viewportHeight) return;
    const hit = RowLayout.hitTest(scroll + y, engine.getRows().length, ROW_HEIGHT, commentHeight);
    if (hit.kind === 'none') return;
    setSelected(hit.rowIndex);
    if (hit.kind === 'comment') {
      openDialog(hit.rowIndex);
      return;
    }
    if (engine.getRows()[hit.rowIndex]?.kind === 'file-header') toggleFoldAt(hit.rowIndex);
  }, [dialog, maxScroll, viewportHeight, scroll, engine, commentHeight, openDialog, toggleFoldAt]);

  useMouse({enabled: dialog === null, onEvent: onMouse});

  const renderComment = (comment: DiffComment, rowIndex: number): React.ReactNode[] => {
    const indent = ' '.repeat(GUTTER_WIDTH);
    const label = ` ${SYMBOL_COMMENT} ${comment.key.filePath}:${comment.key.lineNumber} `;
    const boxWidth = boxInnerWidth + 2;
    const top = truncateDisplay('┌─' + label + '─'.repeat(boxWidth), boxWidth);
    const body = commentBoxLines(comment.text, boxInnerWidth).map((text, i) => (
      <Text key={`c-${rowIndex}-${i}`} color="yellow">{indent}│ {text}</Text>
    ));
    return [
      <Text key={`c-${rowIndex}-top`} color="yellow">{indent}{top}</Text>,
      ...body,
      <Text key={`c-${rowIndex}-bottom`} color="yellow">{indent}└{'─'.repeat(Math.max(0, boxWidth - 1))}</Text>
    ];
  };

  const renderVisible = (): React.ReactNode[] => {
    const elements: React.ReactNode[] = [];
    const end = scroll + viewportHeight;
    let offset = 0;
    for (let i = 0; i < rows.length && offset < end; i++) {
      const row = rows[i];
      if (offset >= scroll) {
        const isSelected = i === selected;
        const text = padEndDisplay(truncateDisplay(rowLabel(files, row), columns), isSelected ? columns : 0);
        elements.push(
          <Text
            key={`r-${i}`}
            color={rowColor(files, row)}
            bold={isSelected || row.kind === 'file-header'}
            backgroundColor={isSelected ? 'blue' : undefined}
          >
            {text}
          </Text>
        );
      }
      offset += ROW_HEIGHT;

      const comment = engine.commentAtRow(i);
      if (!comment) continue;
      for (const line of renderComment(comment, i)) {
        if (offset >= scroll && offset < end) elements.push(line);
        offset += 1;
      }
    }
    return elements;
  };

  const summary = `${files.length} file${files.length === 1 ? '' : 's'}  ${engine.commentCount} comment${engine.commentCount === 1 ? '' : 's'}`;

  return (
    <Box flexDirection="column">
      <Text bold color="blue">{truncateDisplay(`${title}  ${engine.repoRoot}`, columns)}</Text>
      <Text color="gray">{truncateDisplay(engine.isLoading() ? `${summary}  loading...` : summary, columns)}</Text>
      {dialog ? (
        <CommentInputDialog
          fileName={dialog.fileName}
          lineNumber={dialog.lineNumber}
          lineText={dialog.lineText}
          initialComment={dialog.initial}
          width={Math.min(70, columns)}
          onSave={text => {
            const rowIndex = findRowIndex(engine.getRows(), dialog.anchor);
            const saved = engine.getRows()[rowIndex]?.kind === 'line' && engine.addComment(rowIndex, text) !== null;
            setStatus(saved ? 'Comment saved' : 'Could not attach comment');
            setDialog(null);
          }}
          onCancel={() => setDialog(null)}
        />
      ) : (
        <Box flexDirection="column" height={viewportHeight}>
          {renderVisible()}
        </Box>
      )}
      {status ? (
        <Text color="yellow">{truncateDisplay(status, columns)}</Text>
      ) : (
        <AnnotatedText color="magenta" wrap="truncate" text={truncateDisplay(HELP_TEXT, columns)} />
      )}
    </Box>
  );
}
