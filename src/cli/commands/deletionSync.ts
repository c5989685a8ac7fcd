import type { Command } from 'commander';
import { withContext } from '../container.js';
import { formatOption, printSummary, resolveOptions } from './shared.js';

/** 註冊 deletion-sync 指令 */
export function registerDeletionSyncCommand(program: Command): void {
  program
    .command('deletion-sync')
    .description('Remove documents whose Zoom objects no longer exist')
    .addOption(formatOption())
    .action(async (_opts: object, command: Command) => {
      const { configFile, format } = resolveOptions(command);
      const stats = await withContext(configFile, (ctx) => ctx.deletionSync.execute());
      printSummary('Deletion sync completed', stats, format);
    });
}
