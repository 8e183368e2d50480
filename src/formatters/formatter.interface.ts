/**
 * 格式化器介面
 */
export interface Formatter<T> {
  format(value: T): string;
}
