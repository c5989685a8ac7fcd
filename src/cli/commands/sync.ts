import type { Command } from 'commander';
import { withContext } from '../container.js';
import { formatOption, printSummary, resolveOptions } from './shared.js';

/** 註冊 full-sync 與 incremental-sync 指令 */
export function registerSyncCommands(program: Command): void {
  program
    .command('full-sync')
    .description('Index every configured Zoom object between startTime and endTime')
    .addOption(formatOption())
    .action(async (_opts: object, command: Command) => {
      const { configFile, format } = resolveOptions(command);
      const stats = await withContext(configFile, (ctx) => ctx.sync.fullSync());
      printSummary('Full sync completed', stats, format);
    });

  program
    .command('incremental-sync')
    .description('Index Zoom objects changed since the last checkpoint')
    .addOption(formatOption())
    .action(async (_opts: object, command: Command) => {
      const { configFile, format } = resolveOptions(command);
      const stats = await withContext(configFile, (ctx) => ctx.sync.incrementalSync());
      printSummary('Incremental sync completed', stats, format);
    });
}
