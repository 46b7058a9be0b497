/**
 * AlertStore tests
 */

import { AlertStore } from '../store/alert-store';
import type { PatchResolution } from '../store/types';
import { DeckError, InvalidTransitionError, PatchConflictError, UnknownAlertError } from '../errors';
import { makeAlert } from './helpers';

const NOW = new Date('2026-03-01T12:00:00.000Z');

function statusOf(store: AlertStore, id: string) {
  return store.currentSnapshot().alerts.find((alert) => alert.id === id)?.status;
}

describe('AlertStore', () => {
  let store: AlertStore;
  let resolutions: PatchResolution[];

  beforeEach(() => {
    resolutions = [];
    store = new AlertStore({ now: () => NOW, onResolved: (r) => resolutions.push(r) });
  });

  describe('applyRefresh', () => {
    it('starts empty', () => {
      expect(store.currentSnapshot()).toEqual({ alerts: [], pendingIds: [], failures: [] });
    });

    it('is idempotent for the same page', () => {
      const page = [makeAlert('a'), makeAlert('b', { status: 'acknowledged' })];
      const first = store.applyRefresh(page);
      const second = store.applyRefresh(page);
      expect(second).toEqual(first);
    });

    it('keeps the first occurrence of a duplicated id', () => {
      const snapshot = store.applyRefresh([
        makeAlert('a', { message: 'first' }),
        makeAlert('b'),
        makeAlert('a', { message: 'second' }),
      ]);
      expect(snapshot.alerts.map((alert) => alert.id)).toEqual(['a', 'b']);
      expect(snapshot.alerts[0]?.message).toBe('first');
    });

    it('produces frozen snapshots', () => {
      const snapshot = store.applyRefresh([makeAlert('a', { tags: ['db'] })]);
      expect(Object.isFrozen(snapshot)).toBe(true);
      expect(Object.isFrozen(snapshot.alerts)).toBe(true);
      expect(Object.isFrozen(snapshot.alerts[0])).toBe(true);
      expect(Object.isFrozen(snapshot.alerts[0]?.tags)).toBe(true);
    });

    it('does not let later mutations of the input leak into the snapshot', () => {
      const page = [makeAlert('a')];
      const snapshot = store.applyRefresh(page);
      page.push(makeAlert('b'));
      expect(snapshot.alerts).toHaveLength(1);
    });
  });

  describe('applyOptimistic', () => {
    beforeEach(() => {
      store.applyRefresh([makeAlert('a'), makeAlert('b', { status: 'acknowledged', ackedBy: 'sam' })]);
    });

    it('overlays the intended status immediately', () => {
      const { patch, snapshot } = store.applyOptimistic('a', 'acknowledged', 'riley');
      expect(patch).toEqual({ alertId: 'a', version: 1 });
      expect(snapshot.alerts[0]).toMatchObject({ id: 'a', status: 'acknowledged', ackedBy: 'riley' });
      expect(snapshot.pendingIds).toEqual(['a']);
      expect(store.currentSnapshot()).toBe(snapshot);
    });

    it('keeps the existing acknowledger when none is given', () => {
      const { snapshot } = store.applyOptimistic('b', 'closed');
      expect(snapshot.alerts[1]).toMatchObject({ id: 'b', status: 'closed', ackedBy: 'sam' });
    });

    it('numbers patches with a store-wide counter', () => {
      store.applyOptimistic('a', 'acknowledged');
      const { patch } = store.applyOptimistic('b', 'closed');
      expect(patch.version).toBe(2);
    });

    it('tracks the newest issued version', () => {
      expect(store.issuedVersion).toBe(0);
      store.applyOptimistic('a', 'closed');
      expect(store.issuedVersion).toBe(1);
      expect(store.hasPending('a')).toBe(true);
    });

    it('rejects a second patch for the same alert and leaves the snapshot alone', () => {
      const { snapshot } = store.applyOptimistic('a', 'acknowledged');
      expect(() => store.applyOptimistic('a', 'closed')).toThrow(PatchConflictError);
      expect(store.currentSnapshot()).toBe(snapshot);
    });

    it('rejects alerts that are not loaded', () => {
      expect(() => store.applyOptimistic('zzz', 'closed')).toThrow(UnknownAlertError);
    });

    it('rejects intents the alert already reached', () => {
      expect(() => store.applyOptimistic('b', 'acknowledged')).toThrow(InvalidTransitionError);
      expect(() => store.applyOptimistic('a', 'open')).toThrow('Cannot acknowledge alert a while it is open');
    });
  });

  describe('confirmOrFail', () => {
    beforeEach(() => {
      store.applyRefresh([makeAlert('a', { status: 'acknowledged' })]);
    });

    it('reverts to the authoritative status on failure', () => {
      const { patch, snapshot } = store.applyOptimistic('a', 'closed');
      expect(snapshot.alerts[0]?.status).toBe('closed');

      const reverted = store.confirmOrFail(patch, { type: 'failure', reason: 'POST failed with 500' });
      expect(reverted.alerts[0]?.status).toBe('acknowledged');
      expect(reverted.pendingIds).toEqual([]);
      expect(reverted.failures).toEqual([
        { alertId: 'a', action: 'close', reason: 'POST failed with 500', at: '2026-03-01T12:00:00.000Z' },
      ]);
      expect(resolutions).toEqual([{ alertId: 'a', version: 1, state: 'failed' }]);
    });

    it('keeps the patch pending on success without an echo', () => {
      const { patch, snapshot } = store.applyOptimistic('a', 'closed');
      const after = store.confirmOrFail(patch, { type: 'success', alert: null });
      expect(after).toBe(snapshot);
      expect(store.hasPending('a')).toBe(true);
    });

    it('confirms immediately when the echoed alert reached the intent', () => {
      const { patch } = store.applyOptimistic('a', 'closed');
      const after = store.confirmOrFail(patch, {
        type: 'success',
        alert: makeAlert('a', { status: 'closed', message: 'echoed' }),
      });
      expect(after.alerts[0]).toMatchObject({ status: 'closed', message: 'echoed' });
      expect(after.pendingIds).toEqual([]);
      expect(resolutions).toEqual([{ alertId: 'a', version: 1, state: 'confirmed' }]);
    });

    it('ignores an echo that has not reached the intent', () => {
      const { patch } = store.applyOptimistic('a', 'closed');
      store.confirmOrFail(patch, { type: 'success', alert: makeAlert('a', { status: 'acknowledged' }) });
      expect(store.hasPending('a')).toBe(true);
    });

    it('ignores refs whose version is no longer pending', () => {
      const { patch } = store.applyOptimistic('a', 'closed');
      store.confirmOrFail(patch, { type: 'failure', reason: 'first' });
      const before = store.currentSnapshot();

      const after = store.confirmOrFail(patch, { type: 'failure', reason: 'second' });
      expect(after).toBe(before);
      expect(after.failures).toHaveLength(1);
    });

    it('keeps only the most recent failures, newest first', () => {
      store = new AlertStore({ failureHistory: 2, now: () => NOW });
      store.applyRefresh([makeAlert('a')]);
      for (const reason of ['one', 'two', 'three']) {
        const { patch } = store.applyOptimistic('a', 'closed');
        store.confirmOrFail(patch, { type: 'failure', reason });
      }
      expect(store.currentSnapshot().failures.map((f) => f.reason)).toEqual(['three', 'two']);
    });
  });

  describe('reconciliation', () => {
    it('confirms a patch once a refresh reports the intended status', () => {
      store.applyRefresh([makeAlert('a')]);
      store.applyOptimistic('a', 'acknowledged');

      const snapshot = store.applyRefresh([makeAlert('a', { status: 'acknowledged' })]);
      expect(snapshot.alerts[0]?.status).toBe('acknowledged');
      expect(snapshot.pendingIds).toEqual([]);
      expect(resolutions).toEqual([{ alertId: 'a', version: 1, state: 'confirmed' }]);
    });

    it('treats a status beyond the intent as confirmation', () => {
      store.applyRefresh([makeAlert('a')]);
      store.applyOptimistic('a', 'acknowledged');
      const snapshot = store.applyRefresh([makeAlert('a', { status: 'closed' })]);
      expect(snapshot.alerts[0]?.status).toBe('closed');
      expect(resolutions[0]?.state).toBe('confirmed');
    });

    it('survives exactly three conflicting refreshes before being superseded', () => {
      store.applyRefresh([makeAlert('a')]);
      store.applyOptimistic('a', 'closed');

      for (let i = 1; i <= 3; i++) {
        store.applyRefresh([makeAlert('a')]);
        expect(statusOf(store, 'a')).toBe('closed');
        expect(store.currentSnapshot().pendingIds).toEqual(['a']);
        expect(resolutions).toHaveLength(0);
      }

      const snapshot = store.applyRefresh([makeAlert('a')]);
      expect(snapshot.alerts[0]?.status).toBe('open');
      expect(snapshot.pendingIds).toEqual([]);
      expect(resolutions).toEqual([{ alertId: 'a', version: 1, state: 'superseded' }]);
    });

    it('does not count a page requested before the patch as a conflict', () => {
      store = new AlertStore({ stalenessLimit: 1, onResolved: (r) => resolutions.push(r) });
      store.applyRefresh([makeAlert('a')]);
      const issuedAtVersion = store.issuedVersion;
      store.applyOptimistic('a', 'acknowledged');

      let snapshot = store.applyRefresh([makeAlert('a')], { issuedAtVersion });
      expect(snapshot.alerts[0]?.status).toBe('acknowledged');
      expect(snapshot.pendingIds).toEqual(['a']);

      snapshot = store.applyRefresh([makeAlert('a')], { issuedAtVersion: store.issuedVersion });
      expect(snapshot.alerts[0]?.status).toBe('acknowledged');
      expect(snapshot.pendingIds).toEqual(['a']);

      snapshot = store.applyRefresh([makeAlert('a')], { issuedAtVersion: store.issuedVersion });
      expect(snapshot.alerts[0]?.status).toBe('open');
      expect(resolutions).toEqual([{ alertId: 'a', version: 1, state: 'superseded' }]);
    });

    it('still confirms a patch from a page requested before it', () => {
      store.applyRefresh([makeAlert('a')]);
      const issuedAtVersion = store.issuedVersion;
      store.applyOptimistic('a', 'acknowledged');

      const snapshot = store.applyRefresh([makeAlert('a', { status: 'acknowledged' })], { issuedAtVersion });
      expect(snapshot.pendingIds).toEqual([]);
      expect(resolutions).toEqual([{ alertId: 'a', version: 1, state: 'confirmed' }]);
    });

    it('keeps a patch whose alert is missing from a page requested before it', () => {
      store.applyRefresh([makeAlert('a'), makeAlert('b')]);
      const issuedAtVersion = store.issuedVersion;
      store.applyOptimistic('a', 'acknowledged');

      store.applyRefresh([makeAlert('b')], { issuedAtVersion });
      expect(store.hasPending('a')).toBe(true);
      expect(resolutions).toEqual([]);
    });

    it('honours a custom staleness limit', () => {
      store = new AlertStore({ stalenessLimit: 0 });
      store.applyRefresh([makeAlert('a')]);
      store.applyOptimistic('a', 'closed');
      expect(store.applyRefresh([makeAlert('a')]).alerts[0]?.status).toBe('open');
    });

    it('confirms a close whose alert dropped out of the page', () => {
      store.applyRefresh([makeAlert('a'), makeAlert('b')]);
      store.applyOptimistic('a', 'closed');
      const snapshot = store.applyRefresh([makeAlert('b')]);
      expect(snapshot.alerts.map((alert) => alert.id)).toEqual(['b']);
      expect(resolutions).toEqual([{ alertId: 'a', version: 1, state: 'confirmed' }]);
    });

    it('supersedes an acknowledge whose alert dropped out of the page', () => {
      store.applyRefresh([makeAlert('a')]);
      store.applyOptimistic('a', 'acknowledged');
      store.applyRefresh([]);
      expect(resolutions).toEqual([{ alertId: 'a', version: 1, state: 'superseded' }]);
    });

    it('applies authoritative data directly to alerts without a patch', () => {
      store.applyRefresh([makeAlert('a'), makeAlert('b', { status: 'acknowledged' })]);
      store.applyOptimistic('a', 'acknowledged');

      const snapshot = store.applyRefresh([
        makeAlert('a', { status: 'acknowledged' }),
        makeAlert('b', { status: 'closed' }),
      ]);
      expect(snapshot.alerts.map((alert) => [alert.id, alert.status])).toEqual([
        ['a', 'acknowledged'],
        ['b', 'closed'],
      ]);
      expect(snapshot.pendingIds).toEqual([]);
    });
  });

  describe('dispose', () => {
    it('turns refreshes and completions into no-ops', () => {
      const snapshot = store.applyRefresh([makeAlert('a')]);
      const { patch } = store.applyOptimistic('a', 'closed');
      const pending = store.currentSnapshot();
      store.dispose();

      expect(store.applyRefresh([])).toBe(pending);
      expect(store.confirmOrFail(patch, { type: 'failure', reason: 'late' })).toBe(pending);
      expect(snapshot.alerts[0]?.status).toBe('open');
      expect(store.isDisposed).toBe(true);
    });

    it('refuses new patches', () => {
      store.applyRefresh([makeAlert('a')]);
      store.dispose();
      expect(() => store.applyOptimistic('a', 'closed')).toThrow(DeckError);
    });
  });
});
