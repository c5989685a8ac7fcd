import type { Command } from 'commander';
import { withContext } from '../container.js';
import { formatOption, printSummary, resolveOptions } from './shared.js';

/** 註冊 bootstrap 指令 */
export function registerBootstrapCommand(program: Command): void {
  program
    .command('bootstrap')
    .description('Create a custom content source in Workplace Search')
    .requiredOption('-n, --name <name>', 'Name of the content source to create')
    .addOption(formatOption())
    .action(async (opts: { name: string }, command: Command) => {
      const { configFile, format } = resolveOptions(command);
      const result = await withContext(configFile, (ctx) => ctx.bootstrap.execute(opts.name));
      printSummary('Content source created', result, format);
    });
}
