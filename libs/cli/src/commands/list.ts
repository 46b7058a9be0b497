/**
 * List command
 *
 * Fetches one page of alerts and prints it as a table or JSON.
 */

import { Command } from 'commander';
import type { CommandContext, DeckOptions } from '../context';
import { addDeckOptions, createCommandContext } from '../context';
import { formatAlertTable } from '../format';

interface ListOptions extends DeckOptions {
  json?: boolean;
}

/**
 * Fetch the current alerts and render them for the terminal
 */
export async function runList(ctx: CommandContext, options: { json?: boolean; now?: Date }): Promise<string> {
  const alerts = await ctx.gateway.listAlerts(ctx.config.pageSize);
  ctx.logger.info({ count: alerts.length }, 'Listed alerts');

  if (options.json) {
    return JSON.stringify(alerts, null, 2);
  }
  return formatAlertTable(alerts, options.now);
}

/**
 * Create the list command
 */
export function createListCommand(): Command {
  const cmd = new Command('list')
    .description('Print the current alerts once and exit')
    .option('-j, --json', 'Output as JSON');

  addDeckOptions(cmd).action(async (options: ListOptions) => {
    const ctx = createCommandContext(options, process.env, { syncLogs: true });
    console.log(await runList(ctx, { json: options.json }));
  });

  return cmd;
}
