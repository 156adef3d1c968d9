#!/usr/bin/env tsx
/**
 * muse — Telegram bot for image and text generation.
 *
 * Entry point: commander-based CLI with subcommands.
 */

import { createRequire } from 'node:module';
import { readFile } from 'node:fs/promises';
import { Command, InvalidArgumentError } from 'commander';
import { loadConfig } from './config/config.js';
import { runGateway } from './commands/gateway.js';
import { runGenerate } from './commands/generate.js';
import { isOperationKind, type OperationKind } from './pipeline/types.js';
import * as log from './utils/logger.js';

const require = createRequire(import.meta.url);
const { version }: { version: string } = require('../package.json');

const program = new Command();

program
  .name('muse')
  .description('Telegram bot that turns chat messages into image and text generation jobs')
  .version(version)
  .option('-d, --debug', 'Enable debug logging')
  .hook('preAction', (cmd) => {
    if (cmd.opts<{ debug?: boolean }>().debug) log.setLogLevel('debug');
  });

program
  .command('gateway', { isDefault: true })
  .description('Long-poll Telegram and answer updates')
  .action(async () => {
    await runGateway(await loadConfig());
  });

program
  .command('generate <operation> <request...>')
  .description('Run one generation job (image, image_variation, text_completion, text_edit)')
  .option('-u, --user <name>', 'Requester recorded in the audit files', 'cli')
  .option('-i, --input <file>', 'Payload for image_variation / text_edit')
  .action(async (operation: string, words: string[], opts: { user: string; input?: string }) => {
    const kind = parseOperation(operation);
    const payload = opts.input ? new Uint8Array(await readFile(opts.input)) : undefined;

    const result = await runGenerate(await loadConfig(), {
      operation: kind,
      requestText: words.join(' '),
      requester: opts.user,
      payload,
    });
    if (result === null) {
      process.exitCode = 1;
      return;
    }
    console.log(result);
  });

function parseOperation(value: string): OperationKind {
  if (!isOperationKind(value)) {
    throw new InvalidArgumentError(`Unknown operation "${value}"`);
  }
  return value;
}

program.parseAsync().catch((err) => {
  console.error('Fatal:', err instanceof Error ? err.message : String(err));
  process.exit(1);
});
