import type { PluginVersion } from './version.ts';

/**
 * Plugin 描述資訊，name 為 registry 中的識別鍵
 */
export interface PluginMetadata {
  readonly name: string;
  readonly version: PluginVersion;
  readonly description: string;
  readonly author: string;
}

/**
 * 單行解析結果
 */
export type ParseResult =
  | { kind: 'parsed'; output: string }
  | { kind: 'no-match' }
  | { kind: 'error'; message: string };

export const NO_MATCH: ParseResult = { kind: 'no-match' };

export function parsed(output: string): ParseResult {
  return { kind: 'parsed', output };
}

export function parseError(message: string): ParseResult {
  return { kind: 'error', message };
}

/**
 * Log 格式 plugin 介面
 */
export interface LogPlugin {
  metadata(): PluginMetadata;

  /**
   * 解析單行，回傳渲染後文字、no-match 或錯誤
   */
  parseLine(line: string): ParseResult;

  canParse(line: string): boolean;

  /**
   * 回傳 0.0 ~ 1.0 的信心分數，用於格式偵測
   */
  detectFormat(sampleLines: readonly string[]): number;
}
