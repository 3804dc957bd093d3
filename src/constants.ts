import path from 'node:path';

export const TAB_WIDTH = 4;

export const MAX_DIFF_BYTES = 10 * 1024 * 1024; // 10MB cap on acquired diff text
export const UNTRACKED_MAX_BYTES = 1024 * 1024;
export const BINARY_SNIFF_BYTES = 8 * 1024;

export const SUBPROCESS_TIMEOUT = 15_000;
export const SUBPROCESS_SHORT_TIMEOUT = 3_000;

export const DIFF_CONTEXT_LINES = 3;

export const COMMENTS_DIR = '.architect';
export const COMMENTS_FILE = path.join(COMMENTS_DIR, 'diff_comments.json');

// Messages shown as a single row in place of a diff
export const MESSAGE_NO_CHANGES = 'No changes';
export const MESSAGE_NO_REPO = 'No git diff available (not a git repository)';

// Ink layout
export const GUTTER_WIDTH = 12; // "1234 1234 + "
export const HEADER_ROWS = 2;
export const FOOTER_ROWS = 1;
export const COMMENT_BOX_PADDING = 2; // top + bottom border

// Symbols
export const SYMBOL_COLLAPSED = '▶';
export const SYMBOL_EXPANDED = '▼';
export const SYMBOL_COMMENT = '✎';

// Treat ambiguous-width symbols (✓, ⚡, ...) as two columns; terminal dependent
export const AMBIGUOUS_EMOJI_ARE_WIDE = process.env.DIFF_REVIEW_WIDE_AMBIGUOUS === '1';
