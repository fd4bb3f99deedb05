/**
 * 标点配置错误
 * 只在构建 MarkMatcher / 加载配置时抛出，preserve/restore/remove 本身不抛错
 */

export class InvalidConfigurationError extends Error {
  constructor(
    message: string,
    public readonly received: string
  ) {
    super(`Invalid punctuation configuration: ${message} (received ${received})`);
    this.name = 'InvalidConfigurationError';
  }
}

/**
 * 描述被拒绝值的类型，null 与数组单独标出
 */
export function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}
