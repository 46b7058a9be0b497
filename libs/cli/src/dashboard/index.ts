export { DashboardApp } from './DashboardApp';
export type { DashboardAppProps } from './DashboardApp';
export { followCursor, moveCursor, INITIAL_CURSOR } from './selection';
export type { Cursor } from './selection';
