import {describe, beforeEach, afterEach, test, expect} from '@jest/globals';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import {CommentPersistence, deserializeComments, serializeComments} from '../../src/services/CommentPersistence.js';
import {DiffComment} from '../../src/models.js';
import {getLogs} from '../../src/shared/utils/logger.js';

function comment(filePath: string, lineNumber: number, text: string, sent = false): DiffComment {
  return new DiffComment({key: {filePath, lineNumber}, text, sent});
}

describe('serializeComments / deserializeComments', () => {
  test('text with quotes, backslashes, newlines and control characters survives', () => {
    const tricky = 'say "hi"\\n \\ back\nslash\ttab \u0001\u001b[0m end';
    const restored = deserializeComments(serializeComments([comment('src/a "b".ts', 7, tricky)]));

    expect(restored).toHaveLength(1);
    expect(restored[0].key).toEqual({filePath: 'src/a "b".ts', lineNumber: 7});
    expect(restored[0].text).toBe(tricky);
    expect(restored[0].sent).toBe(false);
  });

  test('writes only unsent comments', () => {
    const json = serializeComments([comment('a', 1, 'keep'), comment('b', 2, 'done', true)]);
    expect(JSON.parse(json)).toEqual([{file: 'a', line: 1, text: 'keep'}]);
  });

  test('an empty list serializes to an empty array', () => {
    expect(serializeComments([])).toBe('[]\n');
  });

  test('skips malformed entries and ignores unknown keys', () => {
    const json = JSON.stringify([
      {file: 'a', line: 1, text: 'ok', extra: true},
      {file: 'b', line: '2', text: 'string line'},
      {file: 'c', line: 1.5, text: 'fractional'},
      {line: 3, text: 'no file'},
      null,
      'text',
    ]);
    const restored = deserializeComments(json);
    expect(restored.map(c => [c.key.filePath, c.key.lineNumber, c.text])).toEqual([['a', 1, 'ok']]);
  });

  test('non-array and unreadable input give no comments', () => {
    expect(deserializeComments('{"file":"a"}')).toEqual([]);
    expect(deserializeComments('not json')).toEqual([]);
    expect(getLogs().console.some(entry => entry.includes('Ignoring unreadable comments file'))).toBe(true);
  });
});

describe('CommentPersistence', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'diff-review-comments-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, {recursive: true, force: true});
  });

  test('stores comments under .architect/diff_comments.json', () => {
    const persistence = new CommentPersistence(tmpDir);
    expect(persistence.filePath).toBe(path.join(tmpDir, '.architect', 'diff_comments.json'));
  });

  test('creates the directory and round-trips through disk', () => {
    const persistence = new CommentPersistence(tmpDir);
    expect(persistence.save([comment('x.txt', 2, 'first'), comment('y.txt', 9, 'second')])).toBe(true);

    const loaded = persistence.load();
    expect(loaded.map(c => `${c.key.filePath}:${c.key.lineNumber}:${c.text}`)).toEqual(['x.txt:2:first', 'y.txt:9:second']);
  });

  test('overwrites the whole file on save', () => {
    const persistence = new CommentPersistence(tmpDir);
    persistence.save([comment('x.txt', 2, 'first'), comment('y.txt', 9, 'second')]);
    persistence.save([comment('z.txt', 1, 'only')]);
    expect(persistence.load().map(c => c.text)).toEqual(['only']);
  });

  test('loading without a file gives no comments', () => {
    expect(new CommentPersistence(tmpDir).load()).toEqual([]);
  });

  test('a failed write is logged and reported', () => {
    // A regular file where the directory should be
    fs.writeFileSync(path.join(tmpDir, '.architect'), 'in the way');
    const persistence = new CommentPersistence(tmpDir);

    expect(persistence.save([comment('x.txt', 1, 'lost')])).toBe(false);
    expect(getLogs().errors.some(entry => entry.includes('Failed to write'))).toBe(true);
  });
});
