/**
 * AlertTable component - one row per alert, selected row highlighted.
 */

import React from 'react';
import { Box, Text } from 'ink';
import type { Alert } from '@opsdeck/core';
import { alertCells, columnWidth, COLUMNS, headerLine, padCell, statusColor } from '../../format';

// Status is drawn separately so it can be coloured
const TAIL_COLUMNS = COLUMNS.filter((column) => column.key !== 'prio' && column.key !== 'status');

interface AlertTableProps {
  alerts: readonly Alert[];
  pendingIds: readonly string[];
  selectedIndex: number;
  now: Date;
}

export function AlertTable({ alerts, pendingIds, selectedIndex, now }: AlertTableProps) {
  return (
    <Box flexDirection="column">
      <Text bold>{`   ${headerLine()}`}</Text>
      {alerts.length === 0 ? (
        <Text color="gray">   No alerts.</Text>
      ) : (
        alerts.map((alert, i) => (
          <AlertRow
            key={alert.id}
            alert={alert}
            selected={i === selectedIndex}
            pending={pendingIds.includes(alert.id)}
            now={now}
          />
        ))
      )}
    </Box>
  );
}

interface AlertRowProps {
  alert: Alert;
  selected: boolean;
  pending: boolean;
  now: Date;
}

function AlertRow({ alert, selected, pending, now }: AlertRowProps) {
  const cells = alertCells(alert, now);
  const marker = `${selected ? '>' : ' '}${pending ? '*' : ' '}`;
  const tail = TAIL_COLUMNS.map((column) => padCell(cells[column.key], column.width)).join(' ');

  return (
    <Text inverse={selected}>
      {`${marker} ${padCell(cells.prio, columnWidth('prio'))} `}
      <Text color={statusColor(alert.status)}>{padCell(cells.status, columnWidth('status'))}</Text>
      {` ${tail}`}
    </Text>
  );
}
