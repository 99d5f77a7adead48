#!/usr/bin/env node
import { startMcpServer, TOOL_NAMES } from './mcp/server.js';
import { Session } from './session.js';
import { isLogLevel, setLogLevel } from './util/logger.js';

async function main() {
  const level = process.env.X402_LOG_LEVEL;
  if (level && isLogLevel(level)) setLogLevel(level);

  const session = new Session();
  session.store.ensureDir();

  await startMcpServer(session);
  console.error('[mcp] x402-llm MCP server started');
  console.error(`[mcp] Tools available: ${TOOL_NAMES.join(', ')}`);
}

main().catch((err) => {
  console.error('[error]', err);
  process.exit(1);
});
