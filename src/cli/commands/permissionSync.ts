import type { Command } from 'commander';
import { withContext } from '../container.js';
import { formatOption, printSummary, resolveOptions } from './shared.js';

/** 註冊 permission-sync 指令 */
export function registerPermissionSyncCommand(program: Command): void {
  program
    .command('permission-sync')
    .description('Rebuild Workplace Search user permissions from Zoom roles')
    .addOption(formatOption())
    .action(async (_opts: object, command: Command) => {
      const { configFile, format } = resolveOptions(command);
      const stats = await withContext(configFile, (ctx) => ctx.permissionSync.execute());
      printSummary('Permission sync completed', stats, format);
    });
}
