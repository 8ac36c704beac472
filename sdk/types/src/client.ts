import type { Event, EventHint } from './event';
import type { ClientOptions } from './options';
import type { Scope } from './scope';
import type { SeverityLevel } from './severity';
import type { Transport } from './transport';

/**
 * 客户端：负责把事件加工完整并交给 transport
 */
export interface Client<O extends ClientOptions = ClientOptions> {
  /**
   * 捕获异常，返回事件 ID
   */
  captureException(
    exception: unknown,
    hint?: EventHint,
    currentScope?: Scope,
  ): string;

  /**
   * 捕获一条消息，返回事件 ID
   */
  captureMessage(
    message: string,
    level?: SeverityLevel,
    hint?: EventHint,
    currentScope?: Scope,
  ): string;

  /**
   * 发送一个已经构建好的事件（错误事件或事务事件），返回事件 ID
   */
  captureEvent(event: Event, hint?: EventHint, currentScope?: Scope): string;

  /** 客户端是否可用：enabled 没有关闭并且还没有 close */
  isEnabled(): boolean;

  getOptions(): O;

  getTransport(): Transport | undefined;

  /**
   * 等待所有事件发送完成
   *
   * @param timeout 最长等待时间（毫秒）
   */
  flush(timeout?: number): PromiseLike<boolean>;

  /**
   * 等待发送完成后禁用客户端
   */
  close(timeout?: number): PromiseLike<boolean>;
}
