/**
 * Root commander program
 */

import { Command } from 'commander';
import {
  createAckCommand,
  createCloseCommand,
  createDashboardCommand,
  createListCommand,
  createShowCommand,
} from './commands';

// Keep in step with package.json
export const VERSION = '0.1.0';

/**
 * Create and configure the main CLI program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('opsdeck')
    .description('opsdeck - Terminal dashboard for JSM Ops alerts')
    .version(VERSION, '-V, --version', 'Output the version number')
    .addHelpText(
      'after',
      `
Configuration is read from JSM_* environment variables
(JSM_CLOUD_ID plus JSM_BEARER_TOKEN, or JSM_API_EMAIL + JSM_API_TOKEN).

Examples:
  $ opsdeck                         Open the dashboard
  $ opsdeck --interval 10           Refresh every 10 seconds
  $ opsdeck list --json             Print open alerts as JSON
  $ opsdeck show 6f2c1a             Show one alert
  $ opsdeck ack 6f2c1a              Acknowledge an alert
  $ opsdeck close 6f2c1a            Close an alert
`
    );

  // Register commands
  program.addCommand(createDashboardCommand(), { isDefault: true });
  program.addCommand(createListCommand());
  program.addCommand(createShowCommand());
  program.addCommand(createAckCommand());
  program.addCommand(createCloseCommand());

  return program;
}
