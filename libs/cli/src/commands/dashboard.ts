/**
 * Dashboard command
 *
 * Opens the interactive alert dashboard. This is the default command, so a
 * bare `opsdeck` lands here.
 */

import { Command } from 'commander';
import React from 'react';
import { render } from 'ink';
import { createAlertDeck } from '@opsdeck/core';
import type { DeckOptions } from '../context';
import { addDeckOptions, createCommandContext } from '../context';
import { DashboardApp } from '../dashboard';

async function runDashboard(options: DeckOptions): Promise<void> {
  const ctx = createCommandContext(options);
  const deck = createAlertDeck(ctx.config, ctx.logger, ctx.gateway);

  const { waitUntilExit } = render(React.createElement(DashboardApp, { deck }));
  deck.start().catch((err: unknown) => {
    ctx.logger.error({ err }, 'Initial refresh crashed');
  });

  try {
    await waitUntilExit();
  } finally {
    deck.stop();
    ctx.logger.info('Dashboard closed');
    await new Promise<void>((resolve) => ctx.logger.flush(() => resolve()));
  }

  // In-flight requests would otherwise hold the process until their timeout
  process.exit(0);
}

/**
 * Create the dashboard command
 */
export function createDashboardCommand(): Command {
  const cmd = new Command('dashboard').description('Open the interactive alert dashboard');

  addDeckOptions(cmd, { interval: true }).action(async (options: DeckOptions) => {
    await runDashboard(options);
  });

  return cmd;
}
