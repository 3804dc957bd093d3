import React, {useCallback, useState} from 'react';
import {Text, Key} from 'ink';

interface TextInputState {
  value: string;
  cursorPos: number;
}

/**
 * Single-source-of-truth text input hook. Positions are UTF-16 indices into value.
 */
export function useTextInput(initialValue = '') {
  const [state, setState] = useState<TextInputState>({
    value: initialValue,
    cursorPos: initialValue.length
  });

  const handleKeyInput = useCallback((input: string, key: Key): boolean => {
    if (key.leftArrow) {
      setState(prev => ({...prev, cursorPos: Math.max(0, prev.cursorPos - 1)}));
      return true;
    }
    if (key.rightArrow) {
      setState(prev => ({...prev, cursorPos: Math.min(prev.value.length, prev.cursorPos + 1)}));
      return true;
    }
    if (key.ctrl && input === 'a') {
      setState(prev => ({...prev, cursorPos: 0}));
      return true;
    }
    if (key.ctrl && input === 'e') {
      setState(prev => ({...prev, cursorPos: prev.value.length}));
      return true;
    }

    // Most terminals send DEL for the backspace key, which Ink reports as delete
    if (key.backspace || key.delete) {
      setState(prev => {
        if (prev.cursorPos === 0) return prev;
        return {
          value: prev.value.slice(0, prev.cursorPos - 1) + prev.value.slice(prev.cursorPos),
          cursorPos: prev.cursorPos - 1
        };
      });
      return true;
    }

    // Ctrl+J inserts a newline; plain enter submits
    if (key.ctrl && input === 'j') {
      setState(prev => ({
        value: prev.value.slice(0, prev.cursorPos) + '\n' + prev.value.slice(prev.cursorPos),
        cursorPos: prev.cursorPos + 1
      }));
      return true;
    }

    if (input && !key.ctrl && !key.meta && !key.return && !key.escape && !key.tab) {
      setState(prev => ({
        value: prev.value.slice(0, prev.cursorPos) + input + prev.value.slice(prev.cursorPos),
        cursorPos: prev.cursorPos + input.length
      }));
      return true;
    }

    return false;
  }, []);

  const renderText = useCallback((placeholder = '', color?: string) => {
    const displayValue = state.value || placeholder;
    const beforeCursor = displayValue.slice(0, state.cursorPos);
    const atCursor = displayValue[state.cursorPos] || ' ';
    const afterCursor = displayValue.slice(state.cursorPos + 1);

    return (
      <Text color={state.value ? color : 'gray'}>
        {beforeCursor}
        <Text inverse>{atCursor === '\n' ? ' \n' : atCursor}</Text>
        {afterCursor}
      </Text>
    );
  }, [state.value, state.cursorPos]);

  return {
    value: state.value,
    cursorPos: state.cursorPos,
    handleKeyInput,
    renderText
  };
}
