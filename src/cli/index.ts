#!/usr/bin/env node
/**
 * docsearch command-line interface
 *
 * Usage: docsearch <command> [options]
 */

import 'dotenv/config';

import type { Command } from './types.js';
import { searchCommand } from './commands/search.js';
import { serveCommand } from './commands/serve.js';
import { configCommand } from './commands/config.js';
import { DocSearchError } from '../utils/errors.js';

const VERSION = '0.1.0';

const commands: Command[] = [searchCommand, serveCommand, configCommand];

function showHelp(): void {
  console.log('docsearch - hybrid retrieval over a documentation corpus');
  console.log('');
  console.log('Usage: docsearch <command> [options]');
  console.log('');
  console.log('Commands:');
  for (const cmd of commands) {
    console.log(`  ${cmd.name.padEnd(16)} ${cmd.description}`);
  }
  console.log('');
  console.log('Options:');
  console.log('  --version        Show version');
  console.log('  --help           Show help');
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  // Handle global flags
  if (args.includes('--version') || args.includes('-v')) {
    console.log(`docsearch ${VERSION}`);
    return;
  }

  if (args.length === 0 || args.includes('--help') || args.includes('-h')) {
    showHelp();
    return;
  }

  const commandName = args[0];
  const command = commands.find((c) => c.name === commandName);

  if (!command) {
    console.error(`Unknown command: ${commandName}`);
    console.log('Run "docsearch --help" for available commands.');
    process.exit(2);
  }

  try {
    await command.handler(args.slice(1));
  } catch (error) {
    const message =
      error instanceof DocSearchError
        ? error.toDetailedString()
        : error instanceof Error
          ? error.message
          : String(error);
    console.error(`Error: ${message}`);
    process.exit(1);
  }
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
