import type { HighlightedLine, HighlightSegment, HighlightStyle } from '../core/types.ts';
import type { HighlightPatterns } from './patterns.ts';

/**
 * Token highlighter
 *
 * 先以原始 token 做單字分類（數字 → IP → HTTP verb），
 * 再對分類未上色的部分做字元樣式（引號、方括號）。
 * 字元樣式不會干擾單字分類：`[10.0.0.1]` 仍會被辨識為 IP。
 */
export class TokenHighlighter {
  private readonly patterns: HighlightPatterns;

  constructor(patterns: HighlightPatterns) {
    this.patterns = patterns;
  }

  highlight(line: string): HighlightedLine {
    const tokens = line.split(/\s+/).filter(Boolean);
    const segments: HighlightedLine = [];

    tokens.forEach((token, index) => {
      if (index > 0) segments.push({ text: ' ', style: 'plain' });
      segments.push(...this.highlightWord(token));
    });

    return segments;
  }

  /**
   * 單字分類，只套用第一個符合的規則
   */
  highlightWord(word: string): HighlightSegment[] {
    if (this.patterns.number.test(word)) {
      return [{ text: word, style: 'number' }];
    }

    return (
      this.highlightMatch(word, this.patterns.ipAddress, 'ip') ??
      this.highlightMatch(word, this.patterns.httpVerb, 'verb') ??
      this.highlightChars(word)
    );
  }

  /**
   * 字元樣式：引號與方括號各自上色，其餘字元合併為 plain segment
   */
  highlightChars(text: string): HighlightSegment[] {
    const segments: HighlightSegment[] = [];
    let plain = '';

    for (const char of text) {
      const style = this.charStyle(char);
      if (style === 'plain') {
        plain += char;
        continue;
      }
      if (plain) {
        segments.push({ text: plain, style: 'plain' });
        plain = '';
      }
      segments.push({ text: char, style });
    }

    if (plain) segments.push({ text: plain, style: 'plain' });
    return segments;
  }

  private highlightMatch(
    word: string,
    pattern: RegExp,
    style: HighlightStyle
  ): HighlightSegment[] | null {
    const match = pattern.exec(word);
    if (!match) return null;

    const start = match.index;
    const end = start + match[0].length;
    return [
      ...this.highlightChars(word.slice(0, start)),
      { text: match[0], style },
      ...this.highlightChars(word.slice(end)),
    ];
  }

  private charStyle(char: string): HighlightStyle {
    if (this.patterns.quote.test(char)) return 'quote';
    if (this.patterns.squareBracket.test(char)) return 'bracket';
    return 'plain';
  }
}
