import type { LogPlugin } from './plugin.interface.ts';
import type { PluginVersion } from './version.ts';

export type RegistryErrorCode =
  | 'PLUGIN_NOT_FOUND'
  | 'PLUGIN_ALREADY_REGISTERED'
  | 'INCOMPATIBLE_VERSION'
  | 'REGISTRY_LOCKED';

export class RegistryError extends Error {
  readonly code: RegistryErrorCode;

  constructor(code: RegistryErrorCode, message: string) {
    super(message);
    this.name = 'RegistryError';
    this.code = code;
  }
}

export class PluginNotFoundError extends RegistryError {
  readonly pluginName: string;

  constructor(pluginName: string) {
    super('PLUGIN_NOT_FOUND', `Plugin '${pluginName}' not found`);
    this.name = 'PluginNotFoundError';
    this.pluginName = pluginName;
  }
}

export class PluginAlreadyRegisteredError extends RegistryError {
  readonly pluginName: string;

  constructor(pluginName: string) {
    super('PLUGIN_ALREADY_REGISTERED', `Plugin '${pluginName}' is already registered`);
    this.name = 'PluginAlreadyRegisteredError';
    this.pluginName = pluginName;
  }
}

export class IncompatibleVersionError extends RegistryError {
  readonly pluginName: string;
  readonly required: string;

  constructor(pluginName: string, required: string) {
    super(
      'INCOMPATIBLE_VERSION',
      `Plugin '${pluginName}' has incompatible version (required: ${required})`
    );
    this.name = 'IncompatibleVersionError';
    this.pluginName = pluginName;
    this.required = required;
  }
}

export class RegistryLockedError extends RegistryError {
  constructor() {
    super('REGISTRY_LOCKED', 'Registry is locked for modifications');
    this.name = 'RegistryLockedError';
  }
}

/**
 * Plugin Registry - 以名稱管理 plugin 實例
 *
 * 寫入操作持有獨佔 guard；讀取不上鎖、彼此不互斥。
 * guard 持有期間（例如 plugin 的 metadata() 反向呼叫 registry）
 * 任何讀寫都會丟出 RegistryLockedError，狀態維持不變。
 */
export class PluginRegistry {
  private plugins: Map<string, LogPlugin> = new Map();
  private disabled: Set<string> = new Set();
  private writing = false;

  register(plugin: LogPlugin): void {
    this.write(() => {
      const name = plugin.metadata().name;
      if (this.plugins.has(name)) {
        throw new PluginAlreadyRegisteredError(name);
      }
      this.plugins.set(name, plugin);
    });
  }

  unregister(name: string): void {
    this.write(() => {
      if (!this.plugins.delete(name)) {
        throw new PluginNotFoundError(name);
      }
    });
  }

  /**
   * 取得共用的 plugin 實例；之後的 unregister 不影響已取得的參照
   */
  get(name: string): LogPlugin {
    return this.read(() => {
      const plugin = this.plugins.get(name);
      if (!plugin) throw new PluginNotFoundError(name);
      return plugin;
    });
  }

  list(): string[] {
    return this.read(() => [...this.plugins.keys()]);
  }

  count(): number {
    return this.read(() => this.plugins.size);
  }

  contains(name: string): boolean {
    return this.read(() => this.plugins.has(name));
  }

  /**
   * 停用 plugin（仍保留註冊）
   */
  disable(name: string): void {
    this.write(() => {
      if (!this.plugins.has(name)) {
        throw new PluginNotFoundError(name);
      }
      this.disabled.add(name);
    });
  }

  enable(name: string): void {
    this.write(() => {
      this.disabled.delete(name);
    });
  }

  isDisabled(name: string): boolean {
    return this.read(() => this.disabled.has(name));
  }

  listEnabled(): string[] {
    return this.read(() => [...this.plugins.keys()].filter((name) => !this.disabled.has(name)));
  }

  verifyVersion(name: string, required: PluginVersion): void {
    const plugin = this.get(name);
    if (!plugin.metadata().version.isCompatibleWith(required)) {
      throw new IncompatibleVersionError(name, required.toString());
    }
  }

  private write<T>(mutate: () => T): T {
    if (this.writing) throw new RegistryLockedError();

    this.writing = true;
    try {
      return mutate();
    } finally {
      this.writing = false;
    }
  }

  private read<T>(query: () => T): T {
    if (this.writing) throw new RegistryLockedError();
    return query();
  }
}
