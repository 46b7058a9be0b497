/**
 * DashboardApp - Root TUI component for the alert dashboard.
 *
 * Renders whatever snapshot the deck last pushed and turns keypresses into
 * deck intents. Phases: table → details.
 */

import React, { useCallback, useEffect, useState } from 'react';
import { Box, useApp, useInput } from 'ink';
import open from 'open';
import { DECK_EVENT, SNAPSHOT_EVENT } from '@opsdeck/core';
import type { ActionKind, Alert, AlertDeck, DeckEvent, Snapshot } from '@opsdeck/core';
import { AlertTable } from './components/AlertTable';
import { DetailModal } from './components/DetailModal';
import { KeyHints } from './components/KeyHints';
import { Notice } from './components/Notice';
import type { NoticeMessage } from './components/Notice';
import { StatusBar } from './components/StatusBar';
import type { RefreshStatus } from './components/StatusBar';
import { followCursor, INITIAL_CURSOR, moveCursor } from './selection';
import type { Cursor } from './selection';
import { openAlertCount } from '../format';

const ACTION_LABEL: Record<ActionKind, string> = {
  acknowledge: 'Acknowledge',
  close: 'Close',
};

interface ModalState {
  alert: Alert;
  loading: boolean;
}

export interface DashboardAppProps {
  deck: AlertDeck;
  /** Opens runbook links (default: the system browser) */
  openUrl?: (url: string) => Promise<unknown>;
  now?: () => Date;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function DashboardApp({ deck, openUrl = open, now = () => new Date() }: DashboardAppProps) {
  const { exit } = useApp();
  const [snapshot, setSnapshot] = useState<Snapshot>(() => deck.currentSnapshot());
  const [cursor, setCursor] = useState<Cursor>(INITIAL_CURSOR);
  const [status, setStatus] = useState<RefreshStatus>(() => ({
    state: deck.schedulerState,
    lastRefreshAt: null,
    lastError: null,
    halted: null,
  }));
  const [notice, setNotice] = useState<NoticeMessage | null>(null);
  const [modal, setModal] = useState<ModalState | null>(null);

  useEffect(() => {
    const onSnapshot = (next: Snapshot) => {
      setSnapshot(next);
      setCursor((prev) => followCursor(prev, next.alerts));
    };

    const onEvent = (event: DeckEvent) => {
      switch (event.type) {
        case 'refresh:state':
          setStatus((prev) => ({ ...prev, state: event.state }));
          break;
        case 'refresh:completed':
          setStatus((prev) => ({ ...prev, lastRefreshAt: event.at, lastError: null }));
          break;
        case 'refresh:failed':
          setStatus((prev) => ({
            ...prev,
            lastError: `Refresh failed (${event.kind}): ${event.error}. Retrying in ${Math.ceil(event.retryInMs / 1000)}s (attempt ${event.attempt})`,
          }));
          break;
        case 'refresh:halted':
          setStatus((prev) => ({
            ...prev,
            halted: `Authentication failed: ${event.error}. Polling stopped; fix the credentials and restart.`,
          }));
          break;
        case 'action:succeeded':
          setNotice({ text: `${ACTION_LABEL[event.action]} accepted for ${event.alertId}`, tone: 'info' });
          break;
        case 'action:failed':
          setNotice({ text: `${ACTION_LABEL[event.action]} failed for ${event.alertId}: ${event.error}`, tone: 'error' });
          break;
        default:
          break;
      }
    };

    deck.on(SNAPSHOT_EVENT, onSnapshot);
    deck.on(DECK_EVENT, onEvent);
    // Catch up with anything pushed before the listeners were attached
    onSnapshot(deck.currentSnapshot());
    setStatus((prev) => ({ ...prev, state: deck.schedulerState }));

    return () => {
      deck.off(SNAPSHOT_EVENT, onSnapshot);
      deck.off(DECK_EVENT, onEvent);
    };
  }, [deck]);

  const selection = followCursor(cursor, snapshot.alerts);
  const selected = snapshot.alerts.at(selection.index);

  const requestAction = useCallback(
    (action: ActionKind) => {
      if (!selected) return;
      try {
        deck.requestAction(selected.id, action);
        setNotice(null);
      } catch (err) {
        setNotice({ text: errorMessage(err), tone: 'warning' });
      }
    },
    [deck, selected],
  );

  const showDetails = useCallback(() => {
    if (!selected) return;
    const alertId = selected.id;
    setModal({ alert: selected, loading: true });

    deck
      .requestDetails(alertId)
      .then((result) => {
        setModal((prev) =>
          prev && prev.alert.id === alertId
            ? { alert: result.success ? result.alert : prev.alert, loading: false }
            : prev,
        );
        if (!result.success) {
          setNotice({ text: `Could not load details for ${alertId}: ${result.error.message}`, tone: 'error' });
        }
      })
      .catch((err: unknown) => {
        setNotice({ text: `Could not load details for ${alertId}: ${errorMessage(err)}`, tone: 'error' });
      });
  }, [deck, selected]);

  const openRunbook = useCallback(
    (alert: Alert) => {
      const url = alert.runbookUrl;
      if (!url) {
        setNotice({ text: 'No runbook link for this alert', tone: 'warning' });
        return;
      }
      openUrl(url)
        .then(() => setNotice({ text: `Opened runbook ${url}`, tone: 'info' }))
        .catch((err: unknown) => setNotice({ text: `Could not open runbook: ${errorMessage(err)}`, tone: 'error' }));
    },
    [openUrl],
  );

  useInput((input, key) => {
    if (modal) {
      if (input === 'o') {
        openRunbook(modal.alert);
      } else if (key.escape || input === 'q' || input === 'd' || input === 'v') {
        setModal(null);
      }
      return;
    }

    if (key.upArrow || input === 'k') {
      setCursor((prev) => moveCursor(prev, snapshot.alerts, -1));
    } else if (key.downArrow || input === 'j') {
      setCursor((prev) => moveCursor(prev, snapshot.alerts, 1));
    } else if (input === 'r') {
      deck.requestManualRefresh().catch((err: unknown) => {
        setNotice({ text: `Refresh failed: ${errorMessage(err)}`, tone: 'error' });
      });
    } else if (input === 'a') {
      requestAction('acknowledge');
    } else if (input === 'c') {
      requestAction('close');
    } else if (input === 'v' || key.return) {
      showDetails();
    } else if (input === 'q') {
      exit();
    }
  });

  const current = now();

  return (
    <Box flexDirection="column" padding={1}>
      <StatusBar status={status} openCount={openAlertCount(snapshot.alerts)} total={snapshot.alerts.length} />

      {modal ? (
        <DetailModal alert={modal.alert} loading={modal.loading} now={current} />
      ) : (
        <AlertTable
          alerts={snapshot.alerts}
          pendingIds={snapshot.pendingIds}
          selectedIndex={selection.index}
          now={current}
        />
      )}

      {notice && <Notice notice={notice} />}

      <KeyHints modal={modal !== null} />
    </Box>
  );
}
