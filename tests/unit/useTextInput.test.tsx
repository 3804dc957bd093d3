import {describe, test, expect} from '@jest/globals';
import React from 'react';
import {Text, useInput} from 'ink';
import {render} from 'ink-testing-library';
import {useTextInput} from '../../src/components/dialogs/TextInput.js';

const delay = (ms: number) => new Promise(resolve => setTimeout(resolve, ms));

// Shows value and cursor position so keystrokes can be asserted on the frame
function Harness({initial = ''}: {initial?: string}) {
  const input = useTextInput(initial);
  useInput((ch, key) => {
    input.handleKeyInput(ch, key);
  });
  return <Text>{`${JSON.stringify(input.value)}@${input.cursorPos}`}</Text>;
}

async function type(stdin: {write: (data: string) => void}, ...chunks: string[]) {
  for (const chunk of chunks) {
    stdin.write(chunk);
    await delay(10);
  }
}

describe('useTextInput', () => {
  test('starts with the cursor at the end of the initial value', async () => {
    const {lastFrame} = render(<Harness initial="hello" />);
    expect(lastFrame()).toBe('"hello"@5');
  });

  test('inserts typed text at the cursor', async () => {
    const {lastFrame, stdin} = render(<Harness initial="hllo" />);
    await delay(50);
    await type(stdin, '\u001b[D', '\u001b[D', '\u001b[D', 'e');
    expect(lastFrame()).toBe('"hello"@2');
  });

  test('backspace and delete remove the character before the cursor', async () => {
    const {lastFrame, stdin} = render(<Harness initial="abc" />);
    await delay(50);
    await type(stdin, '\u007f', '\u0008');
    expect(lastFrame()).toBe('"a"@1');
  });

  test('ctrl+a and ctrl+e jump to the ends', async () => {
    const {lastFrame, stdin} = render(<Harness initial="abc" />);
    await delay(50);
    await type(stdin, '\u0001', 'x');
    expect(lastFrame()).toBe('"xabc"@1');
    await type(stdin, '\u0005', 'y');
    expect(lastFrame()).toBe('"xabcy"@5');
  });

  test('ctrl+j inserts a newline', async () => {
    const {lastFrame, stdin} = render(<Harness initial="a" />);
    await delay(50);
    await type(stdin, '\n', 'b');
    expect(lastFrame()).toBe('"a\\nb"@3');
  });

  test('enter and escape are left to the caller', async () => {
    const {lastFrame, stdin} = render(<Harness initial="a" />);
    await delay(50);
    await type(stdin, '\r', '\u001b');
    expect(lastFrame()).toBe('"a"@1');
  });
});
