import fs from 'node:fs';
import path from 'node:path';
import {BINARY_SNIFF_BYTES, UNTRACKED_MAX_BYTES} from '../constants.js';
import {logWarn} from '../shared/utils/logger.js';

function fileHeader(relPath: string): string[] {
  return [
    `diff --git a/${relPath} b/${relPath}`,
    'new file mode 100644',
    '--- /dev/null',
    `+++ b/${relPath}`,
  ];
}

function placeholder(relPath: string, note: string): string {
  return [...fileHeader(relPath), '@@ -0,0 +1,1 @@', `+[${note}]`].join('\n') + '\n';
}

export function isBinaryContent(buffer: Buffer): boolean {
  return buffer.subarray(0, BINARY_SNIFF_BYTES).includes(0);
}

/**
 * Render one untracked file as a new-file diff. Returns null when the file cannot be read.
 */
export function synthesizeFileDiff(repoRoot: string, relPath: string, maxBytes = UNTRACKED_MAX_BYTES): string | null {
  const fullPath = path.join(repoRoot, relPath);
  let content: Buffer;
  try {
    const stat = fs.statSync(fullPath);
    if (!stat.isFile()) return null;
    if (stat.size > maxBytes) return placeholder(relPath, `file too large: ${stat.size} bytes`);
    content = fs.readFileSync(fullPath);
  } catch (error) {
    logWarn(`[Untracked] Failed to read ${relPath}`, error instanceof Error ? error.message : error);
    return null;
  }

  if (isBinaryContent(content)) return placeholder(relPath, 'binary file');

  const text = content.toString('utf8');
  if (text === '') return fileHeader(relPath).join('\n') + '\n';

  const lines = text.split('\n');
  const endsWithNewline = lines[lines.length - 1] === '';
  if (endsWithNewline) lines.pop();

  const out = [...fileHeader(relPath), `@@ -0,0 +1,${lines.length} @@`, ...lines.map(line => `+${line}`)];
  if (!endsWithNewline) out.push('\\ No newline at end of file');
  return out.join('\n') + '\n';
}

/**
 * Diff text for every untracked path, ready to be appended to tracked diff output.
 */
export function synthesizeUntrackedDiff(repoRoot: string, relPaths: string[], maxBytes = UNTRACKED_MAX_BYTES): string {
  return relPaths
    .map(relPath => synthesizeFileDiff(repoRoot, relPath, maxBytes))
    .filter((diff): diff is string => diff !== null)
    .join('');
}
