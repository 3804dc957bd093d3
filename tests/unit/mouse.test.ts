import {describe, test, expect} from '@jest/globals';
import {isMouseSequence, parseMouseEvents} from '../../src/shared/utils/mouse.js';

describe('parseMouseEvents', () => {
  test('reports left-button presses with 0-based coordinates', () => {
    expect(parseMouseEvents('\x1b[<0;5;3M')).toEqual([{type: 'click', x: 4, y: 2}]);
  });

  test('ignores releases and other buttons', () => {
    expect(parseMouseEvents('\x1b[<0;5;3m\x1b[<2;1;1M')).toEqual([]);
  });

  test('reports wheel steps', () => {
    expect(parseMouseEvents(Buffer.from('\x1b[<64;1;1M\x1b[<65;2;2M'))).toEqual([
      {type: 'wheel', direction: 'up', x: 0, y: 0},
      {type: 'wheel', direction: 'down', x: 1, y: 1},
    ]);
  });

  test('ignores plain input', () => {
    expect(parseMouseEvents('jjk')).toEqual([]);
  });
});

describe('isMouseSequence', () => {
  test('matches with or without the escape prefix', () => {
    expect(isMouseSequence('\x1b[<0;1;1M')).toBe(true);
    expect(isMouseSequence('[<65;10;4M')).toBe(true);
    expect(isMouseSequence('q')).toBe(false);
  });
});
