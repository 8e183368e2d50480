/**
 * CLI 選項
 */
export interface CliOptions {
  mode?: string;
  path?: string;
  pollInterval: number;
  pluginDirs: string[];
  listPlugins: boolean;
  verbose: boolean;
}

/**
 * Tailer 狀態（位元組計算）
 */
export interface TailState {
  path: string;
  byteOffset: number;
  lastKnownLength: number;
}

/**
 * Common Log Format 解析結果，各欄位皆為原始行的子字串
 */
export interface LineRecord {
  client: string;
  userIdentifier: string;
  userid: string;
  datetime: string;
  method: string;
  request: string;
  protocol: string;
  status: string;
  size: string;
}

export type HighlightStyle = 'plain' | 'quote' | 'bracket' | 'number' | 'ip' | 'verb';

export interface HighlightSegment {
  text: string;
  style: HighlightStyle;
}

/**
 * 重建後的一行：segment 文字串接即為去除樣式後的輸出
 */
export type HighlightedLine = HighlightSegment[];
