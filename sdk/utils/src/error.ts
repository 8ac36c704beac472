import type { ConsoleLevel } from '@lantern-monitor/types';

/**
 * SDK 内部错误的基类。它继承自内置的 Error，并添加了 logLevel，用于控制这个错误被记录时的日志级别
 */
export class LanternError extends Error {
  /** 日志级别 */
  public logLevel: ConsoleLevel;

  public constructor(
    message: string,
    logLevel: ConsoleLevel = 'warn',
    options?: { cause?: unknown },
  ) {
    super(message, options);

    this.name = new.target.prototype.constructor.name;

    // 确保 instanceof 在编译到旧目标时也能正确识别子类
    Object.setPrototypeOf(this, new.target.prototype);
    this.logLevel = logLevel;
  }
}

/**
 * 标识符（trace id / span id）的字符串长度或字符集不正确
 */
export class InvalidIdentifierFormat extends LanternError {
  public constructor(
    public readonly kind: 'trace' | 'span',
    public readonly value: string,
  ) {
    super(`Invalid ${kind} id: ${JSON.stringify(value)}`);
  }
}

/**
 * sentry-trace 头部不符合 `<traceId>-<spanId>[-<sampled>]` 的格式
 */
export class MalformedTraceHeader extends LanternError {
  public constructor(
    public readonly header: string,
    reason: string,
    cause?: unknown,
  ) {
    super(
      `Malformed trace header ${JSON.stringify(header)}: ${reason}`,
      'warn',
      { cause },
    );
  }
}

/**
 * 采样配置无效，例如采样率不在 [0, 1] 之间。
 * 这是唯一一个会抛给调用方的错误，并且只会在初始化时抛出
 */
export class SamplingConfigurationError extends LanternError {
  public constructor(message: string) {
    super(message, 'error');
  }
}

/**
 * span 或事务结束之后还在被修改。只记录日志，不会抛出
 */
export class LateMutationIgnored extends LanternError {
  public constructor(operation: string, target: string) {
    super(
      `${operation} was called on ${target} after it finished, ignoring.`,
      'warn',
    );
  }
}
