/**
 * CLI Commands
 *
 * Exports all command creator functions for registration in the main CLI.
 */

export { createDashboardCommand } from './dashboard';
export { createListCommand, runList } from './list';
export { createShowCommand, runShow } from './show';
export { createAckCommand, createCloseCommand, runAction } from './action';
