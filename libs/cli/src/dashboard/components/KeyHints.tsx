import React from 'react';
import { Box, Text } from 'ink';

const TABLE_HINTS = '↑/↓ j/k: move | r: refresh | a: acknowledge | c: close | v/Enter: details | q: quit';
const MODAL_HINTS = 'o: open runbook | Esc/q/d/v: back';

export function KeyHints({ modal }: { modal: boolean }) {
  return (
    <Box marginTop={1}>
      <Text color="gray" dimColor>
        {modal ? MODAL_HINTS : TABLE_HINTS}
      </Text>
    </Box>
  );
}
