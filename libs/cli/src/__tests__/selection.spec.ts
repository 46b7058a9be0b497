/**
 * Dashboard cursor tests
 */

import { followCursor, INITIAL_CURSOR, moveCursor } from '../dashboard/selection';
import { makeAlert } from './helpers';

const page = (...ids: string[]) => ids.map((id) => makeAlert(id));

describe('followCursor', () => {
  it('selects the first row initially', () => {
    expect(followCursor(INITIAL_CURSOR, page('a', 'b'))).toEqual({ id: 'a', index: 0 });
  });

  it('follows the selected alert when rows move', () => {
    expect(followCursor({ id: 'b', index: 1 }, page('new', 'a', 'b'))).toEqual({ id: 'b', index: 2 });
  });

  it('keeps the row index when the selected alert disappears', () => {
    expect(followCursor({ id: 'b', index: 1 }, page('a', 'c', 'd'))).toEqual({ id: 'c', index: 1 });
  });

  it('clamps the index to a shorter list', () => {
    expect(followCursor({ id: 'z', index: 5 }, page('a', 'b'))).toEqual({ id: 'b', index: 1 });
  });

  it('resets on an empty list', () => {
    expect(followCursor({ id: 'a', index: 3 }, [])).toEqual({ id: null, index: 0 });
  });
});

describe('moveCursor', () => {
  it('moves within bounds', () => {
    const alerts = page('a', 'b', 'c');
    expect(moveCursor({ id: 'a', index: 0 }, alerts, 1)).toEqual({ id: 'b', index: 1 });
    expect(moveCursor({ id: 'c', index: 2 }, alerts, 1)).toEqual({ id: 'c', index: 2 });
    expect(moveCursor({ id: 'a', index: 0 }, alerts, -1)).toEqual({ id: 'a', index: 0 });
  });

  it('moves relative to where the selected alert is now', () => {
    expect(moveCursor({ id: 'b', index: 0 }, page('a', 'b', 'c'), 1)).toEqual({ id: 'c', index: 2 });
  });

  it('stays empty on an empty list', () => {
    expect(moveCursor(INITIAL_CURSOR, [], 1)).toEqual({ id: null, index: 0 });
  });
});
