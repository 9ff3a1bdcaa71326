#!/usr/bin/env node

/**
 * doc-translator
 *
 * Incrementally translates a documentation tree through a streaming
 * chat-messages service. Only files whose content changed since their last
 * successful translation are sent again.
 */

import dotenv from 'dotenv';
import { Command } from 'commander';
import { CliOptions, Settings, resolveSettings } from './config/settings';
import { ConfigurationError } from './core/errors';
import { configureLogging, log, errorMessage } from './logging/logger';
import { formatSummary, runPipeline } from './pipeline';

const VERSION = '1.0.0';

export function buildProgram(): Command {
  return new Command()
    .name('doc-translator')
    .description('Translate a documentation tree, re-translating only what changed')
    .version(VERSION)
    .option('-s, --source <dir>', 'source document directory')
    .option('-t, --target <dir>', 'target translation directory')
    .option('-l, --target-language <code>', 'target language code')
    .option('--api-key <key>', 'API key (default: $DIFY_API_KEY)')
    .option('--api-url <url>', 'chat-messages endpoint (default: $DIFY_API_URL)')
    .option('--user <name>', 'end-user identifier sent with each request')
    .option('--query <text>', 'instruction sent with the first turn')
    .option('--continue-query <text>', 'instruction sent with continuation turns')
    .option('--response-mode <mode>', 'streaming or blocking')
    .option('-w, --workers <n>', 'number of concurrent workers')
    .option('--max-output-tokens <n>', 'per-turn completion ceiling; replies reaching it are continued')
    .option('--max-turns <n>', 'give up on a file after this many turns')
    .option('-b, --blacklist <file>', 'file of paths to skip, one per line')
    .option('--state-dir <dir>', 'directory for the ledgers (default: the source directory)')
    .option('--extensions <list>', 'comma-separated translatable extensions (default: .md,.pages)')
    .option('--log-file <file>', 'log file path')
    .option('-c, --config <file>', 'JSON config file (default: ./translator.config.json)');
}

/**
 * Configuration errors end the process before any work starts
 */
function loadSettings(program: Command, options: CliOptions): Settings {
  try {
    return resolveSettings(options);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      program.error(`Error: ${error.message}`);
    }
    throw error;
  }
}

export async function main(argv: string[] = process.argv): Promise<void> {
  dotenv.config();

  const program = buildProgram();
  program.parse(argv);
  const options = program.opts<CliOptions>();

  const settings = loadSettings(program, options);

  configureLogging({ file: settings.logFile });
  log(`[CLI] Translating ${settings.source} -> ${settings.target} (${settings.targetLanguage}), ${settings.workers} workers`);

  const result = await runPipeline(settings);
  console.log(`\n${formatSummary(result)}`);
}

if (require.main === module) {
  main().catch(error => {
    log(`[CLI] Fatal: ${errorMessage(error)}`);
    console.error(`\nAn unexpected error occurred: ${errorMessage(error)}`);
    process.exit(1);
  });
}
