import { open, readFile } from 'node:fs/promises';
import { StringDecoder } from 'node:string_decoder';
import { logger } from '../utils/logger.ts';
import { FileWatcher } from './file-watcher.ts';
import type { TailState } from './types.ts';

export interface TailOptions {
  pollInterval?: number;
  /** 每次變化讀到的新增內容 */
  onBatch: (batch: string) => void;
  /** 致命錯誤，呼叫後 tailer 已停止 */
  onError: (error: Error) => void;
}

/**
 * Tailer - 實作 tail -f 效果，只輸出啟動後新增的 bytes
 *
 * 檔案縮小（被 rotate 或 truncate）時 offset 歸零，重新輸出整個檔案。
 */
export class Tailer {
  private state: TailState | null = null;
  private decoder = new StringDecoder('utf8');
  private readonly watcher: FileWatcher;

  constructor(watcher: FileWatcher = new FileWatcher()) {
    this.watcher = watcher;
  }

  /**
   * 開始 tail；既有內容不輸出，offset 設在檔尾
   */
  async start(filePath: string, options: TailOptions): Promise<void> {
    const content = await readFile(filePath);
    this.state = {
      path: filePath,
      byteOffset: content.length,
      lastKnownLength: content.length,
    };
    this.decoder = new StringDecoder('utf8');

    await this.watcher.start(filePath, {
      pollInterval: options.pollInterval,
      initialContent: content,
      onChange: async () => {
        const batch = await this.readDelta();
        if (batch) options.onBatch(batch);
      },
      onError: options.onError,
    });
  }

  getState(): Readonly<TailState> | null {
    return this.state ? { ...this.state } : null;
  }

  /**
   * 從 byteOffset 讀到檔尾，回傳新增內容並更新狀態
   */
  async readDelta(): Promise<string> {
    const state = this.state;
    if (!state) {
      throw new Error('Tailer has not been started');
    }

    const handle = await open(state.path, 'r');
    try {
      const { size } = await handle.stat();

      if (size < state.byteOffset) {
        logger.debug(`${state.path} shrank from ${state.byteOffset} to ${size} bytes, reading from start`);
        state.byteOffset = 0;
        this.decoder = new StringDecoder('utf8');
      }

      const buffer = Buffer.alloc(size - state.byteOffset);
      let bytesRead = 0;
      while (bytesRead < buffer.length) {
        const result = await handle.read(buffer, bytesRead, buffer.length - bytesRead, state.byteOffset + bytesRead);
        if (result.bytesRead === 0) break;
        bytesRead += result.bytesRead;
      }

      state.byteOffset += bytesRead;
      state.lastKnownLength = Math.max(size, state.byteOffset);

      // 拆在兩次寫入之間的多位元組字元會留到下一批
      return this.decoder.write(buffer.subarray(0, bytesRead));
    } finally {
      await handle.close();
    }
  }

  stop(): void {
    this.watcher.stop();
  }
}
