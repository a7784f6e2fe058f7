#!/usr/bin/env node
/**
 * @fileoverview lineage CLI
 *
 * Commands:
 *   lineage ask <question>   - Investigate a lineage question
 *   lineage seed             - Load the sample lineage
 *   lineage tools            - List the investigation tools
 *   lineage help [command]   - Show help
 *
 * @packageDocumentation
 */

import { parseArgs } from 'node:util';
import { loadConfig } from '../config/index.js';
import { setLogLevel } from '../telemetry/logger.js';
import { showHelp } from './help.js';
import { askCommand } from './commands/ask.js';
import { seedCommand } from './commands/seed.js';
import { toolsCommand } from './commands/tools.js';
import { EXIT_FAILURE, createError, formatError, formatErrorJson, toCliError } from './errors.js';

const COMMANDS = ['ask', 'seed', 'tools', 'help'] as const;
type Command = (typeof COMMANDS)[number];

function isCommand(value: string): value is Command {
  return COMMANDS.some((command) => command === value);
}

async function main(args: string[]): Promise<void> {
  const { values, positionals } = parseArgs({
    args,
    options: {
      help: { type: 'boolean', short: 'h', default: false },
      json: { type: 'boolean', default: false },
    },
    allowPositionals: true,
    strict: false,
  });

  const command = positionals[0];
  const json = values.json === true;

  if (values.help === true || !command || command === 'help') {
    showHelp(command === 'help' ? positionals[1] : command);
    return;
  }
  if (!isCommand(command)) {
    throw createError('INVALID_ARGUMENT', `Unknown command: ${command}`, { available: COMMANDS.join(', ') });
  }

  const config = loadConfig(process.env);
  setLogLevel(config.logLevel);

  switch (command) {
    case 'ask':
      await askCommand({ config, json, args: args.slice(args.indexOf('ask') + 1) });
      break;
    case 'seed':
      await seedCommand({ config, json });
      break;
    case 'tools':
      toolsCommand({ config, json });
      break;
  }
}

const argv = process.argv.slice(2);
main(argv).catch((error: unknown) => {
  const cliError = toCliError(error);
  console.error(argv.includes('--json') ? formatErrorJson(cliError) : formatError(cliError));
  process.exitCode = EXIT_FAILURE;
});
