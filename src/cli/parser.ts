import { Command } from 'commander';
import { DEFAULT_POLL_INTERVAL_MS } from '../core/file-watcher.ts';
import type { CliOptions } from '../core/types.ts';

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function createProgram(): Command {
  return new Command()
    .name('logsplash')
    .description('Tail a log file (or stdin) and highlight it in the terminal')
    .version('0.1.0')
    .option('-m, --mode <mode>', 'Log parsing mode: clf, or anything else for ad-hoc highlighting')
    .option('-p, --path <path>', 'Path to the log file (reads stdin when omitted)')
    .option('-i, --poll-interval <ms>', 'Poll interval in milliseconds', String(DEFAULT_POLL_INTERVAL_MS))
    .option('--plugin-dir <dir>', 'Additional plugin search directory (repeatable)', collect, [])
    .option('--list-plugins', 'List registered plugins and discovered plugin files', false)
    .option('-v, --verbose', 'Enable debug logging', false);
}

/**
 * 解析 CLI 參數
 */
export function parseArgs(args: string[]): CliOptions {
  const program = createProgram();
  program.parse(args);

  const opts = program.opts<{
    mode?: string;
    path?: string;
    pollInterval: string;
    pluginDir: string[];
    listPlugins: boolean;
    verbose: boolean;
  }>();

  // 驗證 poll interval
  const pollInterval = Number(opts.pollInterval);
  if (!Number.isInteger(pollInterval) || pollInterval <= 0) {
    console.error(`Error: Invalid poll interval "${opts.pollInterval}". Use a positive integer (ms).`);
    process.exit(1);
  }

  return {
    mode: opts.mode,
    path: opts.path,
    pollInterval,
    pluginDirs: opts.pluginDir,
    listPlugins: opts.listPlugins,
    verbose: opts.verbose,
  };
}
