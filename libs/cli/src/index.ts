/**
 * @opsdeck/cli - Command-line interface and terminal dashboard
 *
 * @packageDocumentation
 */

export { createProgram, VERSION } from './program';
export {
  createDashboardCommand,
  createListCommand,
  createShowCommand,
  createAckCommand,
  createCloseCommand,
  runList,
  runShow,
  runAction,
} from './commands';
export { DashboardApp } from './dashboard';
export type { DashboardAppProps } from './dashboard';
export { createCommandContext, addDeckOptions } from './context';
export type { CommandContext, ContextOptions, DeckOptions } from './context';
