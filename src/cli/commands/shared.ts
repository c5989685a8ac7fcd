import { Option, type Command } from 'commander';
import { DEFAULT_CONFIG_FILE } from '../../config/defaults.js';
import { isOutputFormat, SummaryFormatter, type OutputFormat } from '../formatters/SummaryFormatter.js';

export interface GlobalOptions {
  configFile?: string;
  format?: string;
}

export function formatOption(): Option {
  return new Option('--format <format>', 'Output format').choices(['json', 'text']).default('text');
}

/** 合併全域選項；未指定設定檔時使用預設路徑 */
export function resolveOptions(command: Command): { configFile: string; format: OutputFormat } {
  const opts = command.optsWithGlobals<GlobalOptions>();
  return {
    configFile: opts.configFile ?? DEFAULT_CONFIG_FILE,
    format: isOutputFormat(opts.format) ? opts.format : 'text',
  };
}

export function printSummary(title: string, data: object, format: OutputFormat): void {
  process.stdout.write(new SummaryFormatter().format(title, data, format) + '\n');
}
