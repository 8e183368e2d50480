/**
 * Highlighter 使用的比對規則表
 */
export interface HighlightPatterns {
  readonly number: RegExp;
  readonly ipAddress: RegExp;
  readonly httpVerb: RegExp;
  readonly quote: RegExp;
  readonly squareBracket: RegExp;
}

/**
 * 建立規則表；在啟動時建立一次，再以參照傳給 TokenHighlighter
 *
 * 所有 pattern 都不帶 g flag，避免 lastIndex 狀態在多次呼叫間殘留。
 */
export function createHighlightPatterns(): HighlightPatterns {
  return Object.freeze({
    number: /^\d+$/,
    ipAddress: /\d{1,3}\.\d{1,3}\.\d{1,3}\.\d{1,3}/,
    httpVerb: /GET|POST/,
    quote: /^"$/,
    squareBracket: /^[[\]]$/,
  });
}
