import chalk from 'chalk';
import { renderBatch, selectParser, STRUCTURED_MODE } from './core/dispatch.ts';
import { readLines } from './core/line-reader.ts';
import { Tailer } from './core/tailer.ts';
import type { CliOptions } from './core/types.ts';
import { createBuiltinRegistry } from './plugins/builtins.ts';
import { PluginDiscovery } from './plugins/discovery.ts';
import type { LogPlugin } from './plugins/plugin.interface.ts';
import type { PluginRegistry } from './plugins/registry.ts';
import { HIGHLIGHT_PLUGIN_NAME } from './plugins/builtin/highlight-plugin.ts';
import { logger } from './utils/logger.ts';

export interface RunContext {
  registry?: PluginRegistry;
  discovery?: PluginDiscovery;
  input?: NodeJS.ReadableStream;
  /** 渲染後的輸出，預設 stdout */
  output?: (line: string) => void;
  /** 讓呼叫端（SIGINT handler）可以停止 tailer */
  onTailer?: (tailer: Tailer) => void;
}

/**
 * 執行 CLI，回傳 exit code
 * 檔案模式只有在 tailer 發生致命錯誤時才會結束
 */
export async function run(options: CliOptions, context: RunContext = {}): Promise<number> {
  const registry = context.registry ?? createBuiltinRegistry();
  const output = context.output ?? ((line: string) => console.log(line));

  const discovery = context.discovery ?? new PluginDiscovery();
  for (const dir of options.pluginDirs) {
    discovery.addPath(dir);
  }

  if (options.listPlugins) {
    return listPlugins(registry, discovery, output);
  }

  warnUnloadablePlugin(options.mode, registry, discovery);
  const plugin = selectParser(registry, options.mode);
  logger.debug(`Using parser: ${plugin.metadata().name} ${plugin.metadata().version.toString()}`);

  const emit = (batch: string): void => {
    for (const rendered of render(batch, plugin)) {
      output(rendered);
    }
  };

  if (!options.path) {
    await readLines(context.input ?? process.stdin, emit);
    return 0;
  }

  const path = options.path;
  const tailer = new Tailer();
  context.onTailer?.(tailer);

  let reportFailure: (exitCode: number) => void = () => undefined;
  const failure = new Promise<number>((resolve) => {
    reportFailure = resolve;
  });

  try {
    await tailer.start(path, {
      pollInterval: options.pollInterval,
      onBatch: emit,
      onError: (error) => {
        logger.error(error.message);
        reportFailure(1);
      },
    });
  } catch (error) {
    logger.error(error instanceof Error ? error.message : String(error));
    return 1;
  }

  logger.info(`Watching ${path} for changes... (Ctrl+C to stop)`);
  return failure;
}

function render(batch: string, plugin: LogPlugin): string[] {
  return renderBatch(batch, plugin, (message, line) => {
    logger.warn(`${plugin.metadata().name} failed to parse line: ${message} (${line})`);
  });
}

/**
 * mode 不是內建 plugin 但找到同名候選檔時提示：不支援動態載入
 */
function warnUnloadablePlugin(
  mode: string | undefined,
  registry: PluginRegistry,
  discovery: PluginDiscovery
): void {
  if (!mode || mode === STRUCTURED_MODE || registry.contains(mode)) return;

  try {
    const candidate = discovery.findByName(mode);
    if (candidate) {
      logger.warn(
        `Found plugin file ${candidate} for mode "${mode}", but dynamic loading is not supported; using ${HIGHLIGHT_PLUGIN_NAME}`
      );
    }
  } catch (error) {
    logger.warn(error instanceof Error ? error.message : String(error));
  }
}

function listPlugins(
  registry: PluginRegistry,
  discovery: PluginDiscovery,
  output: (line: string) => void
): number {
  output(chalk.bold('Registered plugins:'));
  for (const name of registry.list().sort()) {
    const meta = registry.get(name).metadata();
    const status = registry.isDisabled(name) ? chalk.yellow(' (disabled)') : '';
    output(`  ${chalk.green(meta.name)} ${meta.version.toString()}${status} - ${meta.description}`);
  }

  let candidates: string[];
  try {
    candidates = discovery.discoverCandidates();
  } catch (error) {
    logger.error(error instanceof Error ? error.message : String(error));
    return 1;
  }

  output(chalk.bold('Plugin files:'));
  if (candidates.length === 0) {
    output(chalk.gray('  (none found)'));
  }
  for (const candidate of candidates) {
    output(`  ${candidate}`);
  }
  output(chalk.gray(`Searched: ${discovery.getSearchPaths().join(', ') || '(no search paths)'}`));
  return 0;
}
