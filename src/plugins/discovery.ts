import { readdirSync, statSync, type Dirent, type Stats } from 'node:fs';
import { homedir } from 'node:os';
import { extname, join, parse, posix, win32 } from 'node:path';
import { logger } from '../utils/logger.ts';

/** 視為原生模組 plugin 的副檔名（不分大小寫） */
export const NATIVE_MODULE_EXTENSIONS: readonly string[] = ['so', 'dylib', 'dll'];

export type DiscoveryErrorCode = 'DIRECTORY_NOT_FOUND' | 'PERMISSION_DENIED' | 'IO_ERROR';

export class DiscoveryError extends Error {
  readonly code: DiscoveryErrorCode;
  readonly path: string;

  constructor(code: DiscoveryErrorCode, path: string, cause?: unknown) {
    super(DiscoveryError.describe(code, path, cause), { cause });
    this.name = 'DiscoveryError';
    this.code = code;
    this.path = path;
  }

  private static describe(code: DiscoveryErrorCode, path: string, cause: unknown): string {
    switch (code) {
      case 'DIRECTORY_NOT_FOUND':
        return `Plugin directory not found: ${path}`;
      case 'PERMISSION_DENIED':
        return `Permission denied accessing: ${path}`;
      case 'IO_ERROR': {
        const reason = cause instanceof Error ? cause.message : String(cause);
        return `IO error during discovery of ${path}: ${reason}`;
      }
    }
  }
}

export interface DefaultPathsOptions {
  platform?: NodeJS.Platform;
  env?: NodeJS.ProcessEnv;
  /** 無法解析家目錄時為空字串 */
  homeDir?: string;
}

/**
 * 預設搜尋路徑
 * - ~/.logsplash/plugins
 * - Unix: /usr/local/lib/logsplash/plugins, /usr/lib/logsplash/plugins
 * - Windows: %ProgramFiles%\logsplash\plugins
 */
export function defaultSearchPaths(options: DefaultPathsOptions = {}): string[] {
  const platform = options.platform ?? process.platform;
  const env = options.env ?? process.env;
  const home = options.homeDir ?? resolveHomeDir();
  const path = platform === 'win32' ? win32 : posix;
  const paths: string[] = [];

  if (home) {
    paths.push(path.join(home, '.logsplash', 'plugins'));
  }

  if (platform === 'win32') {
    const programFiles = env['ProgramFiles'];
    if (programFiles) {
      paths.push(path.join(programFiles, 'logsplash', 'plugins'));
    }
  } else {
    paths.push('/usr/local/lib/logsplash/plugins', '/usr/lib/logsplash/plugins');
  }

  return paths;
}

function resolveHomeDir(): string {
  try {
    return homedir();
  } catch {
    // 某些容器環境沒有使用者資訊
    return '';
  }
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function isAccessDenied(error: unknown): boolean {
  const code = errorCode(error);
  return code === 'EACCES' || code === 'EPERM';
}

function isMissing(error: unknown): boolean {
  const code = errorCode(error);
  return code === 'ENOENT' || code === 'ENOTDIR';
}

/**
 * stat 失敗（不存在、上層是檔案、symlink 循環、無權限）時回傳 null
 */
function statOrNull(path: string): Stats | null {
  try {
    return statSync(path);
  } catch {
    return null;
  }
}

/**
 * Plugin 探索器 - 依副檔名在搜尋路徑中找出候選檔案，不做載入
 */
export class PluginDiscovery {
  private searchPaths: string[];
  private extensions: readonly string[];

  constructor(searchPaths: readonly string[] = defaultSearchPaths(), extensions = NATIVE_MODULE_EXTENSIONS) {
    this.searchPaths = [...searchPaths];
    this.extensions = extensions.map((ext) => ext.toLowerCase());
  }

  static withPaths(paths: readonly string[]): PluginDiscovery {
    return new PluginDiscovery(paths);
  }

  addPath(path: string): void {
    this.searchPaths.push(path);
  }

  getSearchPaths(): readonly string[] {
    return this.searchPaths;
  }

  /**
   * 無法 stat 的項目（斷掉或循環的 symlink、無權限）一律視為非 plugin
   */
  isPluginFile(path: string): boolean {
    const stats = statOrNull(path);
    if (!stats?.isFile()) return false;

    const ext = extname(path).slice(1).toLowerCase();
    return ext !== '' && this.extensions.includes(ext);
  }

  /**
   * 掃描所有搜尋路徑
   * 無法 stat、非目錄或列目錄時無權限的路徑直接略過；列目錄的其他錯誤中止並丟出 DiscoveryError
   */
  discoverCandidates(): string[] {
    const candidates: string[] = [];

    for (const searchPath of this.searchPaths) {
      if (!statOrNull(searchPath)?.isDirectory()) {
        logger.debug(`Skipping plugin path (not a directory): ${searchPath}`);
        continue;
      }

      let entries: Dirent[];
      try {
        entries = readdirSync(searchPath, { withFileTypes: true });
      } catch (error) {
        if (isAccessDenied(error)) {
          logger.debug(`Skipping plugin path (permission denied): ${searchPath}`);
          continue;
        }
        throw new DiscoveryError('IO_ERROR', searchPath, error);
      }
      candidates.push(...this.collect(searchPath, entries));
    }

    return candidates;
  }

  /**
   * 掃描單一指定目錄；與 discoverCandidates 不同，找不到或無權限時會丟錯
   */
  discoverIn(dir: string): string[] {
    let entries: Dirent[];
    try {
      if (!statSync(dir).isDirectory()) {
        throw new DiscoveryError('DIRECTORY_NOT_FOUND', dir);
      }
      entries = readdirSync(dir, { withFileTypes: true });
    } catch (error) {
      if (error instanceof DiscoveryError) throw error;
      if (isAccessDenied(error)) {
        throw new DiscoveryError('PERMISSION_DENIED', dir, error);
      }
      if (isMissing(error)) {
        throw new DiscoveryError('DIRECTORY_NOT_FOUND', dir, error);
      }
      throw new DiscoveryError('IO_ERROR', dir, error);
    }
    return this.collect(dir, entries);
  }

  /**
   * 依檔名 stem 尋找，"apache" 可匹配 apache.so 或 libapache.dylib
   */
  findByName(name: string): string | null {
    for (const candidate of this.discoverCandidates()) {
      const stem = parse(candidate).name;
      if (stem === name || stem === `lib${name}`) {
        return candidate;
      }
    }
    return null;
  }

  private collect(dir: string, entries: Dirent[]): string[] {
    return entries
      .map((entry) => entry.name)
      .sort()
      .map((name) => join(dir, name))
      .filter((path) => this.isPluginFile(path));
  }
}
