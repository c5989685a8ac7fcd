#!/usr/bin/env node

import { createRequire } from 'node:module';
import { Command, CommanderError } from 'commander';
import { DEFAULT_CONFIG_FILE } from '../config/defaults.js';
import { registerBootstrapCommand } from './commands/bootstrap.js';
import { registerDeletionSyncCommand } from './commands/deletionSync.js';
import { registerPermissionSyncCommand } from './commands/permissionSync.js';
import { registerSyncCommands } from './commands/sync.js';
import { Logger, errorMessage } from '../shared/Logger.js';

// 從 package.json 讀取版本號
const require = createRequire(import.meta.url);
const packageJson: unknown = require('../../package.json');
const version = typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson
  ? String(packageJson.version)
  : '0.0.0';

const program = new Command();

program
  .name('zoom-connector')
  .description('Sync Zoom users, meetings, recordings and chats into Workplace Search')
  .version(version)
  .option('-c, --config-file <path>', 'Path to the connector configuration file', DEFAULT_CONFIG_FILE);

registerBootstrapCommand(program);
registerSyncCommands(program);
registerDeletionSyncCommand(program);
registerPermissionSyncCommand(program);

/** 全域錯誤處理 */
program.exitOverride();

async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    if (err instanceof CommanderError) {
      process.exit(err.code === 'commander.helpDisplayed' || err.code === 'commander.version' ? 0 : err.exitCode);
    }
    new Logger('cli').error('Command failed', {
      error: errorMessage(err),
      stack: err instanceof Error ? err.stack : undefined,
    });
    process.stderr.write(`Error: ${errorMessage(err)}\n`);
    process.exit(1);
  }
}

void main();
