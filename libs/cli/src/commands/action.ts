/**
 * Ack and close commands
 *
 * Send a single action to the alert API without starting the dashboard.
 */

import { Command } from 'commander';
import type { ActionKind } from '@opsdeck/core';
import type { CommandContext, DeckOptions } from '../context';
import { addDeckOptions, createCommandContext } from '../context';

const DONE: Record<ActionKind, string> = {
  acknowledge: 'Acknowledged',
  close: 'Closed',
};

export async function runAction(ctx: CommandContext, alertId: string, action: ActionKind): Promise<string> {
  ctx.logger.info({ alertId, action }, 'Sending one-shot action');
  const echoed =
    action === 'acknowledge' ? await ctx.gateway.acknowledge(alertId) : await ctx.gateway.close(alertId);

  const status = echoed ? ` (status: ${echoed.status})` : '';
  return `${DONE[action]} alert ${alertId}${status}`;
}

function createActionCommand(name: string, action: ActionKind, description: string): Command {
  const cmd = new Command(name).description(description).argument('<id>', 'Alert id');

  addDeckOptions(cmd).action(async (alertId: string, options: DeckOptions) => {
    const ctx = createCommandContext(options, process.env, { syncLogs: true });
    console.log(await runAction(ctx, alertId, action));
  });

  return cmd;
}

/**
 * Create the ack command
 */
export function createAckCommand(): Command {
  return createActionCommand('ack', 'acknowledge', 'Acknowledge an alert');
}

/**
 * Create the close command
 */
export function createCloseCommand(): Command {
  return createActionCommand('close', 'close', 'Close an alert');
}
