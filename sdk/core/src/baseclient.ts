import type {
  Client,
  ClientOptions,
  ErrorEvent,
  Event,
  EventHint,
  Scope,
  SeverityLevel,
  Transport,
} from '@lantern-monitor/types';
import {
  DEBUG_BUILD,
  LanternError,
  getEventDescription,
  isPrimitive,
  logger,
  uuid4,
} from '@lantern-monitor/utils';

import { validateSampleRate } from './tracing/sampling';
import { prepareEvent } from './utils/prepareEvent';

/**
 * client 的基类，各平台的 client 继承它并实现 eventFromException 和 eventFromMessage
 *
 * 事件的处理流程：
 * 1. 平台 client 把异常或消息转换为事件
 * 2. prepareEvent 补全事件：事件 ID、时间戳、client 配置、作用域数据、事件处理器
 * 3. beforeSend / beforeSendTransaction 最后修改一次，返回 null 则丢弃
 * 4. 交给 transport 发送
 *
 * 处理过程中的任何错误都只会记录日志，不会抛给调用方
 *
 * @example
 * class NodeClient extends BaseClient<NodeClientOptions> {
 *   public constructor(options: NodeClientOptions) {
 *     super(options);
 *   }
 *
 *   // ...
 * }
 */
export abstract class BaseClient<O extends ClientOptions> implements Client<O> {
  /** 创建 client 时传入的配置 */
  protected readonly _options: O;

  /** 用于发送事件的 transport */
  protected readonly _transport: Transport;

  /**
   * @throws {SamplingConfigurationError} tracesSampleRate 不是 [0, 1] 之间的数字
   */
  protected constructor(options: O) {
    validateSampleRate(options.tracesSampleRate);

    this._options = options;
    this._transport = options.transport(options.transportOptions);
  }

  /**
   * 捕获异常，返回事件 ID
   * @inheritDoc
   */
  public captureException(
    exception: unknown,
    hint?: EventHint,
    scope?: Scope,
  ): string {
    const hintWithEventId = {
      event_id: uuid4(),
      ...hint,
    };

    this._captureEvent(
      this.eventFromException(exception, hintWithEventId),
      hintWithEventId,
      scope,
    );

    return hintWithEventId.event_id;
  }

  /**
   * 捕获消息，返回事件 ID
   * @inheritDoc
   */
  public captureMessage(
    message: unknown,
    level?: SeverityLevel,
    hint?: EventHint,
    scope?: Scope,
  ): string {
    const hintWithEventId = {
      event_id: uuid4(),
      ...hint,
    };

    // 不是原始值的消息（例如 Error 对象）按异常处理
    const event = isPrimitive(message)
      ? this.eventFromMessage(String(message), level, hintWithEventId)
      : this.eventFromException(message, hintWithEventId);

    this._captureEvent(event, hintWithEventId, scope);

    return hintWithEventId.event_id;
  }

  /**
   * 捕获一个已经构建好的事件（错误事件或事务事件）
   * @inheritDoc
   */
  public captureEvent(event: Event, hint?: EventHint, scope?: Scope): string {
    const hintWithEventId = {
      event_id: event.event_id || uuid4(),
      ...hint,
    };

    this._captureEvent(event, hintWithEventId, scope);

    return hintWithEventId.event_id;
  }

  /** @inheritDoc */
  public isEnabled(): boolean {
    return this._options.enabled !== false;
  }

  /** @inheritDoc */
  public getOptions(): O {
    return this._options;
  }

  /** @inheritDoc */
  public getTransport(): Transport {
    return this._transport;
  }

  /**
   * 等待 transport 中所有在途的请求完成
   * @inheritDoc
   */
  public flush(timeout?: number): PromiseLike<boolean> {
    return this._transport.flush(timeout);
  }

  /**
   * 等待发送完成后禁用 client，之后的事件都会被丢弃
   * @inheritDoc
   */
  public close(timeout?: number): PromiseLike<boolean> {
    return this.flush(timeout).then((result) => {
      this._options.enabled = false;
      return result;
    });
  }

  /**
   * 处理事件，出现错误时只记录日志
   */
  protected _captureEvent(event: Event, hint: EventHint, scope?: Scope): void {
    try {
      const finalEvent = this._processEvent(event, hint, scope);
      this._sendEvent(finalEvent);
    } catch (reason) {
      if (DEBUG_BUILD) {
        // 控制流中使用的 LanternError 只记录消息，不记录堆栈
        if (reason instanceof LanternError && reason.logLevel === 'log') {
          logger.log(reason.message);
        } else {
          logger.warn(reason);
        }
      }
    }
  }

  /**
   * 加工事件并执行 beforeSend 系列回调
   *
   * @throws {LanternError} 事件被丢弃或者回调出错
   */
  protected _processEvent(event: Event, hint: EventHint, scope?: Scope): Event {
    if (!this.isEnabled()) {
      throw new LanternError('SDK not enabled, will not capture event.', 'log');
    }

    const prepared = this._prepareEvent(event, hint, scope);
    if (prepared === null) {
      throw new LanternError(
        'An event processor returned `null`, will not send event.',
        'log',
      );
    }

    const processed = this._applyBeforeSend(prepared, hint);
    if (processed === null) {
      throw new LanternError(
        `before send for type \`${prepared.type}\` returned \`null\`, will not send event.`,
        'log',
      );
    }

    return processed;
  }

  /**
   * 在发送之前补全事件，平台 client 可以重写它来添加平台相关的数据
   *
   * @returns 补全后的新事件，被事件处理器丢弃时为 null
   */
  protected _prepareEvent(
    event: Event,
    hint: EventHint,
    scope?: Scope,
  ): Event | null {
    return prepareEvent(this._options, event, hint, scope);
  }

  /**
   * 把事件交给 transport，发送失败只记录日志
   */
  protected _sendEvent(event: Event): void {
    void this._transport.send(event).then(null, (reason: unknown) => {
      DEBUG_BUILD &&
        logger.error(
          `Error while sending ${getEventDescription(event)}:`,
          reason,
        );
    });
  }

  /**
   * 按事件类型执行 beforeSend 或 beforeSendTransaction
   */
  private _applyBeforeSend(event: Event, hint: EventHint): Event | null {
    const { beforeSend, beforeSendTransaction } = this._options;

    if (event.type === 'transaction') {
      return beforeSendTransaction ? beforeSendTransaction(event, hint) : event;
    }

    return beforeSend ? beforeSend(event, hint) : event;
  }

  /**
   * 把异常转换为错误事件，由各平台实现
   */
  public abstract eventFromException(
    exception: unknown,
    hint?: EventHint,
  ): ErrorEvent;

  /**
   * 把消息转换为错误事件，由各平台实现
   */
  public abstract eventFromMessage(
    message: string,
    level?: SeverityLevel,
    hint?: EventHint,
  ): ErrorEvent;
}
