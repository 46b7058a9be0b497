/**
 * Notice component - one-line feedback for the last operator action.
 */

import React from 'react';
import { Box, Text } from 'ink';

export type NoticeTone = 'info' | 'warning' | 'error';

export interface NoticeMessage {
  text: string;
  tone: NoticeTone;
}

const TONE_STYLE: Record<NoticeTone, { icon: string; color: string }> = {
  info: { icon: '✓', color: 'green' },
  warning: { icon: '⚠', color: 'yellow' },
  error: { icon: '✗', color: 'red' },
};

export function Notice({ notice }: { notice: NoticeMessage }) {
  const style = TONE_STYLE[notice.tone];
  return (
    <Box marginTop={1}>
      <Text color={style.color}>
        {style.icon} {notice.text}
      </Text>
    </Box>
  );
}
