import chalk, { type ChalkInstance } from 'chalk';
import type { HighlightedLine, HighlightStyle } from '../core/types.ts';
import type { Formatter } from './formatter.interface.ts';

/**
 * 將 highlighted segments 轉為 ANSI 字串
 */
export class HighlightFormatter implements Formatter<HighlightedLine> {
  private readonly colors: ChalkInstance;

  constructor(colors: ChalkInstance = chalk) {
    this.colors = colors;
  }

  format(line: HighlightedLine): string {
    return line.map((segment) => this.style(segment.style, segment.text)).join('');
  }

  private style(style: HighlightStyle, text: string): string {
    switch (style) {
      case 'number':
        return this.colors.blue(text);
      case 'ip':
        return this.colors.red.bgWhite(text);
      case 'verb':
        return this.colors.greenBright(text);
      case 'quote':
        return this.colors.cyanBright(text);
      case 'bracket':
        return this.colors.greenBright(text);
      case 'plain':
        return text;
    }
  }
}
