import type { LogPlugin, ParseResult, PluginMetadata } from './plugin.interface.ts';
import type { PluginVersion } from './version.ts';

/**
 * Plugin 基底類別 - 提供 canParse / detectFormat 的預設實作
 *
 * 子類別只需實作 parseLine。metadata 建構後即凍結，
 * 讓 registry 與持有 get() 結果的呼叫端可安全共用同一個實例。
 */
export abstract class BasePlugin implements LogPlugin {
  private readonly meta: PluginMetadata;

  protected constructor(metadata: PluginMetadata) {
    this.meta = Object.freeze({ ...metadata });
  }

  metadata(): PluginMetadata {
    return this.meta;
  }

  get name(): string {
    return this.meta.name;
  }

  get version(): PluginVersion {
    return this.meta.version;
  }

  abstract parseLine(line: string): ParseResult;

  canParse(line: string): boolean {
    return this.parseLine(line).kind === 'parsed';
  }

  detectFormat(sampleLines: readonly string[]): number {
    if (sampleLines.length === 0) return 0;

    const matches = sampleLines.filter((line) => this.canParse(line)).length;
    return matches / sampleLines.length;
  }
}
