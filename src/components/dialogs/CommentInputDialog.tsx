import React from 'react';
import {Box, Text, useInput} from 'ink';
import AnnotatedText from '../common/AnnotatedText.js';
import {useTextInput} from './TextInput.js';
import {isMouseSequence} from '../../shared/utils/mouse.js';
import {truncateDisplay, sanitizeForDisplay} from '../../shared/utils/formatting.js';

type Props = {
  fileName: string;
  lineNumber: number;
  lineText: string;
  initialComment?: string;
  width?: number;
  onSave: (comment: string) => void;
  onCancel: () => void;
};

const CommentInputDialog = React.memo(function CommentInputDialog({
  fileName,
  lineNumber,
  lineText,
  initialComment = '',
  width = 70,
  onSave,
  onCancel
}: Props) {
  const input = useTextInput(initialComment);

  useInput((ch, key) => {
    if (isMouseSequence(ch)) return;
    if (key.escape) {
      onCancel();
      return;
    }
    if (key.return) {
      if (input.value.trim()) onSave(input.value);
      else onCancel();
      return;
    }
    input.handleKeyInput(ch, key);
  });

  const innerWidth = Math.max(10, width - 4);

  return (
    <Box
      flexDirection="column"
      borderStyle="round"
      borderColor="blue"
      paddingX={1}
      width={width}
    >
      <Text bold color="blue">{initialComment ? 'Edit Comment' : 'Add Comment'}</Text>
      <Text color="gray">{truncateDisplay(`${fileName}:${lineNumber}`, innerWidth)}</Text>
      <Text color="gray">{truncateDisplay(sanitizeForDisplay(lineText), innerWidth)}</Text>
      <Box borderStyle="single" borderColor="gray" paddingX={1}>
        {input.renderText(' ')}
      </Box>
      <AnnotatedText color="magenta" wrap="truncate" text={'enter save  ctrl+j newline  esc cancel'} />
    </Box>
  );
});

export default CommentInputDialog;
