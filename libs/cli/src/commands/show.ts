/**
 * Show command
 *
 * Prints the full record of one alert.
 */

import { Command } from 'commander';
import type { CommandContext, DeckOptions } from '../context';
import { addDeckOptions, createCommandContext } from '../context';
import { formatAlertDetails } from '../format';

interface ShowOptions extends DeckOptions {
  json?: boolean;
}

export async function runShow(
  ctx: CommandContext,
  alertId: string,
  options: { json?: boolean; now?: Date },
): Promise<string> {
  const alert = await ctx.gateway.getDetails(alertId);
  if (options.json) {
    return JSON.stringify(alert, null, 2);
  }
  return formatAlertDetails(alert, options.now);
}

/**
 * Create the show command
 */
export function createShowCommand(): Command {
  const cmd = new Command('show')
    .description('Show the details of one alert')
    .argument('<id>', 'Alert id')
    .option('-j, --json', 'Output as JSON');

  addDeckOptions(cmd).action(async (alertId: string, options: ShowOptions) => {
    const ctx = createCommandContext(options, process.env, { syncLogs: true });
    console.log(await runShow(ctx, alertId, { json: options.json }));
  });

  return cmd;
}
