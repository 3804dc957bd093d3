import React, {useCallback} from 'react';
import {useApp} from 'ink';
import DiffReviewView from './components/views/DiffReviewView.js';
import {DiffReviewEngine} from './engine/DiffReviewEngine.js';

type Props = {
  engine: DiffReviewEngine;
  fixedWrapWidth?: number | null;
  onClose?: () => void;
};

export default function App({engine, fixedWrapWidth = null, onClose}: Props) {
  const {exit} = useApp();

  const handleClose = useCallback(() => {
    onClose?.();
    exit();
  }, [exit, onClose]);

  return <DiffReviewView engine={engine} onClose={handleClose} fixedWrapWidth={fixedWrapWidth} />;
}
