/**
 * StatusBar component - refresh state, last refresh time, open count and errors.
 */

import React from 'react';
import { Box, Text } from 'ink';
import Spinner from 'ink-spinner';
import { format, parseISO } from 'date-fns';
import type { SchedulerState } from '@opsdeck/core';

export interface RefreshStatus {
  state: SchedulerState;
  lastRefreshAt: string | null;
  lastError: string | null;
  halted: string | null;
}

interface StatusBarProps {
  status: RefreshStatus;
  openCount: number;
  total: number;
}

const STATE_LABEL: Record<SchedulerState, string> = {
  stopped: 'Stopped',
  idle: 'Auto-refresh on',
  fetching: 'Refreshing',
  backoff: 'Retrying',
  halted: 'Halted',
};

const STATE_COLOR: Record<SchedulerState, string> = {
  stopped: 'gray',
  idle: 'green',
  fetching: 'cyan',
  backoff: 'yellow',
  halted: 'red',
};

export function StatusBar({ status, openCount, total }: StatusBarProps) {
  return (
    <Box flexDirection="column" marginBottom={1}>
      <Box flexDirection="column" borderStyle="round" borderColor="cyan" paddingX={1}>
        <Text bold color="cyan">
          opsdeck - JSM Ops alerts
        </Text>
        <Box marginTop={1}>
          {status.state === 'fetching' && (
            <Text color="cyan">
              <Spinner type="dots" />{' '}
            </Text>
          )}
          <Text>
            Refresh: <Text color={STATE_COLOR[status.state]}>{STATE_LABEL[status.state]}</Text>
            {status.lastRefreshAt && (
              <Text color="gray"> (last {format(parseISO(status.lastRefreshAt), 'HH:mm:ss')})</Text>
            )}
          </Text>
        </Box>
        <Text>
          Open alerts: {openCount}
          <Text color="gray"> ({total} loaded)</Text>
        </Text>
        {status.lastError && <Text color="yellow">{status.lastError}</Text>}
      </Box>
      {status.halted && (
        <Box borderStyle="double" borderColor="red" paddingX={1}>
          <Text bold color="red">
            {status.halted}
          </Text>
        </Box>
      )}
    </Box>
  );
}
