import fs from 'node:fs';
import path from 'node:path';
import {COMMENTS_FILE} from '../constants.js';
import {DiffComment} from '../models.js';
import {ensureDirectory} from '../shared/utils/fileSystem.js';
import {logDebug, logError, logWarn} from '../shared/utils/logger.js';

export interface PersistedComment {
  file: string;
  line: number;
  text: string;
}

function isPersistedComment(value: unknown): value is PersistedComment {
  if (typeof value !== 'object' || value === null) return false;
  if (!('file' in value) || !('line' in value) || !('text' in value)) return false;
  return typeof value.file === 'string' && Number.isInteger(value.line) && typeof value.text === 'string';
}

/**
 * JSON array of {file, line, text}. Sent comments are never written.
 */
export function serializeComments(comments: DiffComment[]): string {
  const entries: PersistedComment[] = comments
    .filter(c => !c.sent)
    .map(c => ({file: c.key.filePath, line: c.key.lineNumber, text: c.text}));
  return JSON.stringify(entries, null, 2) + '\n';
}

/**
 * Permissive parse: unknown keys are ignored and malformed entries skipped.
 */
export function deserializeComments(json: string): DiffComment[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    logWarn('[Comments] Ignoring unreadable comments file', error instanceof Error ? error.message : error);
    return [];
  }
  if (!Array.isArray(parsed)) return [];

  const comments: DiffComment[] = [];
  for (const entry of parsed) {
    if (!isPersistedComment(entry)) {
      logDebug('[Comments] Skipping malformed entry', entry);
      continue;
    }
    comments.push(new DiffComment({key: {filePath: entry.file, lineNumber: entry.line}, text: entry.text}));
  }
  return comments;
}

export class CommentPersistence {
  readonly filePath: string;

  constructor(repoRoot: string) {
    this.filePath = path.join(repoRoot, COMMENTS_FILE);
  }

  load(): DiffComment[] {
    if (!fs.existsSync(this.filePath)) return [];
    try {
      return deserializeComments(fs.readFileSync(this.filePath, 'utf8'));
    } catch (error) {
      logError(`[Comments] Failed to read ${this.filePath}`, error instanceof Error ? error.message : error);
      return [];
    }
  }

  // Full overwrite; failures are logged and never reach the caller
  save(comments: DiffComment[]): boolean {
    try {
      ensureDirectory(path.dirname(this.filePath));
      fs.writeFileSync(this.filePath, serializeComments(comments), 'utf8');
      return true;
    } catch (error) {
      logError(`[Comments] Failed to write ${this.filePath}`, error instanceof Error ? error.message : error);
      return false;
    }
  }
}
