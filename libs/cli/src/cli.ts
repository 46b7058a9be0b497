#!/usr/bin/env node
/**
 * opsdeck CLI
 *
 * Terminal dashboard for Jira Service Management Ops alerts.
 *
 * @example
 * ```bash
 * # Open the dashboard
 * JSM_CLOUD_ID=... JSM_BEARER_TOKEN=... opsdeck
 *
 * # Print the current alerts once
 * opsdeck list
 *
 * # Acknowledge an alert without the dashboard
 * opsdeck ack <id>
 * ```
 */

import { createProgram } from './program';

/**
 * Main entry point
 */
async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    console.error('Error:', err instanceof Error ? err.message : String(err));
    process.exit(1);
  }
}

main().catch((err: unknown) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
