import type { ChalkInstance } from 'chalk';
import { ClfFormatter } from '../formatters/clf-formatter.ts';
import { HighlightFormatter } from '../formatters/highlight-formatter.ts';
import { createHighlightPatterns, type HighlightPatterns } from '../parsers/patterns.ts';
import { ClfPlugin } from './builtin/clf-plugin.ts';
import { HighlightPlugin } from './builtin/highlight-plugin.ts';
import { PluginRegistry } from './registry.ts';

export interface BuiltinRegistryOptions {
  /** 測試時可固定顏色等級 */
  colors?: ChalkInstance;
  patterns?: HighlightPatterns;
}

/**
 * 建立已註冊內建 plugin（clf、ad-hoc）的 registry
 */
export function createBuiltinRegistry(options: BuiltinRegistryOptions = {}): PluginRegistry {
  const registry = new PluginRegistry();

  registry.register(new ClfPlugin(new ClfFormatter(options.colors)));
  registry.register(
    new HighlightPlugin({
      patterns: options.patterns ?? createHighlightPatterns(),
      formatter: new HighlightFormatter(options.colors),
    })
  );

  return registry;
}
