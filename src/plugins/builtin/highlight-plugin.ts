import { HighlightFormatter } from '../../formatters/highlight-formatter.ts';
import { createHighlightPatterns, type HighlightPatterns } from '../../parsers/patterns.ts';
import { TokenHighlighter } from '../../parsers/token-highlighter.ts';
import { BasePlugin } from '../base-plugin.ts';
import { NO_MATCH, parsed, type ParseResult } from '../plugin.interface.ts';
import { PluginVersion } from '../version.ts';

export const HIGHLIGHT_PLUGIN_NAME = 'ad-hoc';

export interface HighlightPluginOptions {
  patterns?: HighlightPatterns;
  formatter?: HighlightFormatter;
}

/**
 * 內建 ad-hoc highlighter plugin，任何非空白行都能處理
 */
export class HighlightPlugin extends BasePlugin {
  private readonly highlighter: TokenHighlighter;
  private readonly formatter: HighlightFormatter;

  constructor(options: HighlightPluginOptions = {}) {
    super({
      name: HIGHLIGHT_PLUGIN_NAME,
      version: new PluginVersion(1, 0, 0),
      description: 'Highlights numbers, IP addresses, HTTP verbs, quotes and brackets',
      author: 'logsplash contributors',
    });
    this.highlighter = new TokenHighlighter(options.patterns ?? createHighlightPatterns());
    this.formatter = options.formatter ?? new HighlightFormatter();
  }

  parseLine(line: string): ParseResult {
    if (!line.trim()) return NO_MATCH;
    return parsed(this.formatter.format(this.highlighter.highlight(line)));
  }
}
