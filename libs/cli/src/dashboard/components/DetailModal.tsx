/**
 * DetailModal component - full record of the selected alert.
 */

import React from 'react';
import { Box, Text } from 'ink';
import Spinner from 'ink-spinner';
import type { Alert } from '@opsdeck/core';
import { detailFields } from '../../format';

interface DetailModalProps {
  alert: Alert;
  loading: boolean;
  now: Date;
}

export function DetailModal({ alert, loading, now }: DetailModalProps) {
  const fields = detailFields(alert, now);
  const labelWidth = Math.max(...fields.map(([label]) => label.length)) + 1;

  return (
    <Box flexDirection="column" borderStyle="round" borderColor="cyan" paddingX={1}>
      <Box marginBottom={1}>
        <Text bold color="cyan">
          Alert {alert.id}
        </Text>
        {loading && (
          <Text color="gray">
            {' '}
            <Spinner type="dots" /> loading details
          </Text>
        )}
      </Box>
      {fields.map(([label, value]) => (
        <Text key={label}>
          <Text color="gray">{`${label}:`.padEnd(labelWidth)}</Text> {value}
        </Text>
      ))}
      <Box marginTop={1} flexDirection="column">
        <Text bold>Description</Text>
        <Text>{alert.description}</Text>
      </Box>
    </Box>
  );
}
