#!/usr/bin/env node

/**
 * CLI entry point for browser-bridge.
 *
 * Usage:
 *   browser-bridge                 # REST transport
 *   browser-bridge --mcp           # MCP server (stdio transport)
 *   browser-bridge --mcp-http      # MCP server (HTTP transport)
 *   browser-bridge --config x.json # listener config file
 */

import { HELP_TEXT, parseCliArgs } from './cli-args.js';
import { config, loadListenerConfig } from './config.js';
import { EXIT_OK, exitCodeFor, runMcp, runRest } from './main.js';
import { logger } from './utils/logger.js';

async function main(): Promise<void> {
  const options = parseCliArgs(process.argv.slice(2));

  if (options.mode === 'help') {
    // stdout is free here; no MCP transport is running.
    process.stdout.write(`${HELP_TEXT}\n`);
    process.exit(EXIT_OK);
  }

  const listener = loadListenerConfig(options.configFile ?? config.configFile);

  if (options.mode === 'rest') {
    await runRest(listener);
  } else {
    await runMcp(listener, options.mode === 'mcp-http' ? 'http' : 'stdio');
  }
}

main().catch((err: unknown) => {
  logger.fatal({ err }, 'Failed to start browser-bridge');
  process.exit(exitCodeFor(err));
});
