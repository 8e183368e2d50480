import { createHash } from 'node:crypto';
import { readFile } from 'node:fs/promises';

export const DEFAULT_POLL_INTERVAL_MS = 2000;

export interface WatchOptions {
  /** Polling 間隔（毫秒），預設 2000 */
  pollInterval?: number;
  /** 呼叫端已讀取的內容，作為第一次比對的基準 */
  initialContent?: Buffer;
  /** 檔案內容實際改變時呼叫，完成前不會進行下一次 polling */
  onChange: () => void | Promise<void>;
  /** 致命錯誤，呼叫後 watcher 已停止 */
  onError: (error: Error) => void;
}

function hash(content: Buffer): string {
  return createHash('sha1').update(content).digest('hex');
}

/**
 * 檔案監控器 - 以 polling 比對內容 hash
 *
 * 只有內容真的不同時才觸發 onChange（單純 touch 不算）。
 * 每次 polling 依序執行，上一輪結束後才排下一輪。
 */
export class FileWatcher {
  private timer: ReturnType<typeof setTimeout> | null = null;
  private isWatching = false;
  private lastContentHash = '';

  /**
   * 開始監控；讀不到檔案時直接 reject
   */
  async start(filePath: string, options: WatchOptions): Promise<void> {
    this.lastContentHash = options.initialContent
      ? hash(options.initialContent)
      : await this.hashFile(filePath);
    this.isWatching = true;
    this.schedule(filePath, options);
  }

  private schedule(filePath: string, options: WatchOptions): void {
    if (!this.isWatching) return;

    this.timer = setTimeout(() => {
      this.timer = null;
      void this.poll(filePath, options).then(
        () => this.schedule(filePath, options),
        (error: unknown) => this.fail(error, options)
      );
    }, options.pollInterval ?? DEFAULT_POLL_INTERVAL_MS);
  }

  private async poll(filePath: string, options: WatchOptions): Promise<void> {
    const contentHash = await this.hashFile(filePath);
    if (!this.isWatching || contentHash === this.lastContentHash) return;

    this.lastContentHash = contentHash;
    await options.onChange();
  }

  private fail(error: unknown, options: WatchOptions): void {
    if (!this.isWatching) return;

    this.stop();
    options.onError(error instanceof Error ? error : new Error(String(error)));
  }

  private async hashFile(filePath: string): Promise<string> {
    return hash(await readFile(filePath));
  }

  /**
   * 停止監控
   */
  stop(): void {
    this.isWatching = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }
}
