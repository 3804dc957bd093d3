import {describe, beforeAll, afterAll, test, expect, jest} from '@jest/globals';
import React from 'react';
import {render} from 'ink-testing-library';
import DiffReviewView, {commentBoxLines, wrapWidthForColumns} from '../../src/components/views/DiffReviewView.js';
import {DiffReviewEngine} from '../../src/engine/DiffReviewEngine.js';
import {FakeDiffSource} from '../fakes/FakeDiffSource.js';
import {FakeAgentService} from '../fakes/FakeAgentService.js';

const EXAMPLE_A = 'diff --git a/x.txt b/x.txt\n@@ -1,2 +1,3 @@\n context\n-old\n+new\n+added\n';

const delay = (ms: number) => new Promise(resolve => setTimeout(resolve, ms));

function setup(agent = new FakeAgentService()) {
  const engine = new DiffReviewEngine({repoRoot: '/repo'}, {git: new FakeDiffSource().setDiff(EXAMPLE_A), agent, persistence: null});
  engine.loadText(EXAMPLE_A);
  const onClose = jest.fn();
  const app = render(<DiffReviewView engine={engine} onClose={onClose} />);
  return {engine, onClose, ...app};
}

function lines(frame: string | undefined): string[] {
  return (frame ?? '').split('\n').map(line => line.trimEnd());
}

async function press(stdin: {write: (data: string) => void}, ...keys: string[]) {
  for (const key of keys) {
    stdin.write(key);
    await delay(20);
  }
}

describe('DiffReviewView', () => {
  const savedCols = process.env.DIFF_REVIEW_TTY_COLS;
  const savedRows = process.env.DIFF_REVIEW_TTY_ROWS;

  beforeAll(() => {
    process.env.DIFF_REVIEW_TTY_COLS = '60';
    process.env.DIFF_REVIEW_TTY_ROWS = '14';
  });

  afterAll(() => {
    if (savedCols === undefined) delete process.env.DIFF_REVIEW_TTY_COLS;
    else process.env.DIFF_REVIEW_TTY_COLS = savedCols;
    if (savedRows === undefined) delete process.env.DIFF_REVIEW_TTY_ROWS;
    else process.env.DIFF_REVIEW_TTY_ROWS = savedRows;
  });

  test('draws headers, gutters and diff lines', async () => {
    const {lastFrame, unmount} = setup();
    await delay(50);

    expect(lines(lastFrame()).slice(0, 8)).toEqual([
      'Diff Review  /repo',
      '1 file  0 comments',
      '▼ x.txt',
      '@@ -1,2 +1,3 @@',
      '   1    1   context',
      '   2      - old',
      '        2 + new',
      '        3 + added',
    ]);
    unmount();
  });

  test('enter folds the selected file', async () => {
    const {lastFrame, stdin, engine, unmount} = setup();
    await delay(50);
    await press(stdin, '\r');

    expect(engine.getFiles()[0].collapsed).toBe(true);
    expect(lines(lastFrame())[2]).toBe('▶ x.txt');
    expect(lines(lastFrame())[3]).toBe('');
    unmount();
  });

  test('adds a comment through the dialog and draws it below its line', async () => {
    const {lastFrame, stdin, engine, unmount} = setup();
    await delay(50);
    await press(stdin, 'j', 'j', 'j', 'j', 'c');
    expect(lastFrame()).toContain('Add Comment');
    expect(lastFrame()).toContain('x.txt:2');

    await press(stdin, 'looks good', '\r');

    expect(engine.getComments().map(c => [c.key.lineNumber, c.text])).toEqual([[2, 'looks good']]);
    const frame = lines(lastFrame());
    expect(frame[1]).toBe('1 file  1 comment');
    expect(frame[6]).toBe('        2 + new');
    expect(frame[7].startsWith('            ┌─ ✎ x.txt:2 ─')).toBe(true);
    expect(frame[8]).toBe('            │ looks good');
    expect(frame[9].startsWith('            └─')).toBe(true);
    expect(frame[10]).toBe('        3 + added');
    expect(frame[frame.length - 1]).toBe('Comment saved');
    unmount();
  });

  test('a comment saved after a rewrap lands on the line the dialog was opened for', async () => {
    const raw = 'diff --git a/x b/x\n@@ -1 +1,2 @@\n abcdefghij\n+m\n';
    const engine = new DiffReviewEngine({repoRoot: '/repo'}, {git: new FakeDiffSource().setDiff(raw), agent: new FakeAgentService(), persistence: null});
    engine.loadText(raw);
    const onClose = jest.fn();
    const {stdin, lastFrame, rerender, unmount} = render(<DiffReviewView engine={engine} onClose={onClose} fixedWrapWidth={0} />);
    await delay(50);
    // rows: 0 file, 1 hunk, 2 context, 3 +m
    await press(stdin, 'j', 'j', 'j', 'c');
    expect(lastFrame()).toContain('x:2');

    rerender(<DiffReviewView engine={engine} onClose={onClose} fixedWrapWidth={5} />);
    await delay(50);
    await press(stdin, 'note', '\r');

    expect(engine.getComments().map(c => [c.key.filePath, c.key.lineNumber, c.text])).toEqual([['x', 2, 'note']]);
    unmount();
  });

  test('keeps leading indentation typed into a comment', async () => {
    const {stdin, engine, unmount} = setup();
    await delay(50);
    await press(stdin, 'j', 'j', 'c', '  indented', '\r');

    expect(engine.getComments().map(c => c.text)).toEqual(['  indented']);
    unmount();
  });

  test('a blank comment closes the dialog without saving', async () => {
    const {stdin, engine, lastFrame, unmount} = setup();
    await delay(50);
    await press(stdin, 'j', 'j', 'c', '   ', '\r');

    expect(engine.commentCount).toBe(0);
    expect(lastFrame()).not.toContain('Add Comment');
    unmount();
  });

  test('escape closes the dialog without saving', async () => {
    const {lastFrame, stdin, engine, unmount} = setup();
    await delay(50);
    await press(stdin, 'j', 'j', 'c', 'draft', '\u001b');

    expect(engine.commentCount).toBe(0);
    expect(lastFrame()).not.toContain('Add Comment');
    unmount();
  });

  test('d deletes the comment on the selected line', async () => {
    const {stdin, engine, lastFrame, unmount} = setup();
    engine.addComment(2, 'remove me');
    await delay(50);
    await press(stdin, 'j', 'j', 'd');

    expect(engine.commentCount).toBe(0);
    expect(lines(lastFrame()).pop()).toBe('Comment deleted');
    unmount();
  });

  test('clicking a row selects it', async () => {
    const {stdin, engine, unmount} = setup();
    await delay(50);
    // Screen row 8 (1-based) is the '+added' line below the two header rows
    await press(stdin, '\x1b[<0;3;8M', 'c', 'clicked', '\r');

    expect(engine.getComments().map(c => [c.key.lineNumber, c.text])).toEqual([[3, 'clicked']]);
    unmount();
  });

  test('s sends comments to the agent', async () => {
    const agent = new FakeAgentService();
    const {stdin, engine, lastFrame, unmount} = setup(agent);
    engine.addComment(5, 'ship it');
    await delay(50);
    await press(stdin, 's');
    await delay(20);

    expect(agent.sent).toEqual([{payload: 'x.txt:3: ship it\n', command: 'fake-agent'}]);
    expect(engine.commentCount).toBe(0);
    expect(lines(lastFrame()).pop()).toBe('Comments sent');
    unmount();
  });

  test('q closes the view', async () => {
    const {stdin, onClose, unmount} = setup();
    await delay(50);
    await press(stdin, 'q');
    expect(onClose).toHaveBeenCalledTimes(1);
    unmount();
  });
});

describe('view helpers', () => {
  test('wrap width follows the terminal minus the gutter', () => {
    expect(wrapWidthForColumns(80)).toBe(67);
    expect(wrapWidthForColumns(12)).toBe(10);
  });

  test('comment text is split on newlines and wrapped', () => {
    expect(commentBoxLines('abcdef\nxy', 4)).toEqual(['abcd', 'ef', 'xy']);
  });
});
