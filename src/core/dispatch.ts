import type { LogPlugin } from '../plugins/plugin.interface.ts';
import type { PluginRegistry } from '../plugins/registry.ts';
import { CLF_PLUGIN_NAME } from '../plugins/builtin/clf-plugin.ts';
import { HIGHLIGHT_PLUGIN_NAME } from '../plugins/builtin/highlight-plugin.ts';
import { splitLines } from '../utils/text.ts';

export const STRUCTURED_MODE = 'clf';

/**
 * mode 對應的 plugin 名稱："clf" 以外（含未指定）一律使用 ad-hoc highlighter
 */
export function pluginNameForMode(mode?: string): string {
  return mode === STRUCTURED_MODE ? CLF_PLUGIN_NAME : HIGHLIGHT_PLUGIN_NAME;
}

/**
 * 每次執行只選一次 parser
 */
export function selectParser(registry: PluginRegistry, mode?: string): LogPlugin {
  return registry.get(pluginNameForMode(mode));
}

/**
 * 將一批文字拆行並交給 plugin，回傳有輸出的結果
 * 空行略過；plugin 回傳的 error 交給 onParseError
 */
export function renderBatch(
  batch: string,
  plugin: LogPlugin,
  onParseError?: (message: string, line: string) => void
): string[] {
  const output: string[] = [];

  for (const line of splitLines(batch)) {
    if (!line) continue;

    const result = plugin.parseLine(line);
    switch (result.kind) {
      case 'parsed':
        output.push(result.output);
        break;
      case 'error':
        onParseError?.(result.message, line);
        break;
      case 'no-match':
        break;
    }
  }

  return output;
}
