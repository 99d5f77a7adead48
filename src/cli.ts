#!/usr/bin/env node
/**
 * x402-llm CLI
 * Prints one JSON result per command on stdout; logs go to stderr.
 */

import { parseArgs, runCommand, USAGE, type CommandResult } from './commands.js';
import { Session } from './session.js';

function output(result: CommandResult) {
  console.log(JSON.stringify(result, null, 2));
}

async function main() {
  const { command, options } = parseArgs(process.argv.slice(2));

  if (command === 'help' || command === '--help' || command === '-h') {
    console.log(USAGE);
    process.exit(0);
  }

  const result = await runCommand(new Session(), command, options);
  if (!result) {
    console.error(`Unknown command: ${command}`);
    console.log(USAGE);
    process.exit(1);
  }

  output(result);
  process.exit(result.success ? 0 : 1);
}

main().catch((err) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
