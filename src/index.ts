import chalk from 'chalk';
import { parseArgs } from './cli/parser.ts';
import type { Tailer } from './core/tailer.ts';
import { run } from './run.ts';
import { logger } from './utils/logger.ts';

async function main(): Promise<void> {
  const options = parseArgs(process.argv);
  if (options.verbose) {
    logger.setLevel('debug');
  }

  let tailer: Tailer | null = null;

  // 處理中斷信號
  process.on('SIGINT', () => {
    console.error(chalk.gray('\nStopping...'));
    tailer?.stop();
    process.exit(0);
  });

  const exitCode = await run(options, {
    onTailer: (created) => {
      tailer = created;
    },
  });
  process.exit(exitCode);
}

main().catch((error: unknown) => {
  console.error(chalk.red(`Fatal error: ${error instanceof Error ? error.message : String(error)}`));
  process.exit(1);
});
