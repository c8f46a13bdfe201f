#!/usr/bin/env node
/**
 * mcp-chat-bridge
 *
 * Chat with an OpenAI-compatible model that can call the tools and read the
 * resources of an MCP server.
 *
 * Usage: mcp-chat-bridge [server-script | command args...]
 */

import { run } from './app.js';
import { loadConfig, loadDotenv, type Config } from './config.js';
import { errorMessage } from './errors.js';

async function main(): Promise<void> {
  loadDotenv();

  let config: Readonly<Config>;
  try {
    config = loadConfig(process.env, process.argv.slice(2));
  } catch (err) {
    console.error(`Critical Error: ${errorMessage(err)}`);
    console.error('The application cannot start without a valid configuration.');
    process.exit(1);
  }

  const code = await run(config);
  process.exit(code);
}

main().catch((err: unknown) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
