/**
 * Plugin 版本（major.minor.patch）
 */
export class PluginVersion {
  readonly major: number;
  readonly minor: number;
  readonly patch: number;

  constructor(major: number, minor: number, patch: number) {
    for (const part of [major, minor, patch]) {
      if (!Number.isInteger(part) || part < 0) {
        throw new RangeError(`Invalid version component: ${part}`);
      }
    }
    this.major = major;
    this.minor = minor;
    this.patch = patch;
  }

  /**
   * 判斷此版本是否滿足 required
   * major 必須相同，且 minor.patch 不低於 required
   */
  isCompatibleWith(required: PluginVersion): boolean {
    if (this.major !== required.major) return false;
    if (this.minor > required.minor) return true;
    return this.minor === required.minor && this.patch >= required.patch;
  }

  toString(): string {
    return `${this.major}.${this.minor}.${this.patch}`;
  }
}
