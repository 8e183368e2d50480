import { ClfFormatter } from '../../formatters/clf-formatter.ts';
import { ClfParser } from '../../parsers/clf-parser.ts';
import { BasePlugin } from '../base-plugin.ts';
import { NO_MATCH, parsed, type ParseResult } from '../plugin.interface.ts';
import { PluginVersion } from '../version.ts';

export const CLF_PLUGIN_NAME = 'clf';

/**
 * 內建 Common Log Format plugin
 */
export class ClfPlugin extends BasePlugin {
  private readonly parser: ClfParser;
  private readonly formatter: ClfFormatter;

  constructor(formatter: ClfFormatter = new ClfFormatter()) {
    super({
      name: CLF_PLUGIN_NAME,
      version: new PluginVersion(1, 0, 0),
      description: 'Common Log Format (web access log) field extractor',
      author: 'logsplash contributors',
    });
    this.parser = new ClfParser();
    this.formatter = formatter;
  }

  parseLine(line: string): ParseResult {
    const records = this.parser.parse(line);
    if (records.length === 0) return NO_MATCH;

    return parsed(records.map((record) => this.formatter.format(record)).join('\n'));
  }
}
