import type {
  Breadcrumb,
  BreadcrumbHint,
  Client,
  CustomSamplingContext,
  Event,
  EventHint,
  SamplingContext,
  SeverityLevel,
  Transaction,
  TransactionContext,
  TraceparentData,
} from '@lantern-monitor/types';
import {
  DEBUG_BUILD,
  SENTRY_TRACE_HEADER,
  dateTimestampInSeconds,
  decodeTraceHeader,
  generateTraceId,
  logger,
  parseSpanId,
  parseTraceId,
  uuid4,
} from '@lantern-monitor/utils';

import { DEFAULT_MAX_BREADCRUMBS, Scope } from './scope';
import { NoOpSpan } from './tracing/noopSpan';
import { sampleTransaction } from './tracing/sampling';
import { LanternTransaction } from './tracing/transaction';
import type { TransactionOwner } from './tracing/transaction';

/**
 * Hub：创建事务、修改作用域、把结束的事务和事件交给 client 的唯一入口
 *
 * Hub 不是全局单例。每个工作单元（一次请求、一个后台任务）开始时通过 fork() 得到自己的 Hub，
 * 然后通过参数或者请求对象把它传递下去，这样并发的请求之间不会共享作用域
 *
 * client 不可用时，所有入口都是空操作：startTransaction 返回 NoOp span，capture 系列方法返回 undefined。
 * 追踪过程中的错误（格式错误的头部、采样函数抛出异常）都会被记录下来，不会抛给应用代码
 */
export class Hub implements TransactionOwner {
  private readonly _client?: Client | undefined;
  private readonly _scope: Scope;
  private _lastEventId?: string | undefined;

  public constructor(client?: Client, scope: Scope = new Scope()) {
    this._client = client;
    this._scope = scope;
  }

  /** client 存在、没有被禁用并且没有关闭 */
  public isEnabled(): boolean {
    return !!this._client && this._client.isEnabled();
  }

  public getClient(): Client | undefined {
    return this._client;
  }

  public getScope(): Scope {
    return this._scope;
  }

  /**
   * 为新的工作单元创建一个 Hub：共用同一个 client，作用域是当前作用域的副本，但不带当前绑定的事务
   */
  public fork(): Hub {
    const scope = this._scope.clone();
    scope.clearTransaction();
    return new Hub(this._client, scope);
  }

  /**
   * 开始一个新的事务
   *
   * @param name 事务名称，例如 "POST /product/12"
   * @param op 操作类型，例如 http.server
   * @param customSamplingContext 传给 tracesSampler 的额外数据
   * @param bindToScope 为 true 时绑定到作用域上（作用域已经有事务时不会覆盖）
   */
  public startTransaction(
    name: string,
    op: string,
    customSamplingContext?: CustomSamplingContext,
    bindToScope?: boolean,
  ): Transaction;
  /**
   * 以给定的上下文开始一个新的事务。上下文可以带上从 sentry-trace 头部解码出来的
   * traceId、parentSpanId 和 parentSampled，这样事务会接续上游的链路，上游的采样决策优先
   */
  public startTransaction(
    transactionContext: TransactionContext,
    customSamplingContext?: CustomSamplingContext,
    bindToScope?: boolean,
  ): Transaction;
  public startTransaction(
    nameOrContext: string | TransactionContext,
    opOrCustomSamplingContext?: string | CustomSamplingContext,
    customSamplingContextOrBind?: CustomSamplingContext | boolean,
    bindToScope?: boolean,
  ): Transaction {
    if (typeof nameOrContext === 'string') {
      return this._startTransaction(
        {
          name: nameOrContext,
          op:
            typeof opOrCustomSamplingContext === 'string'
              ? opOrCustomSamplingContext
              : 'default',
        },
        typeof customSamplingContextOrBind === 'object'
          ? customSamplingContextOrBind
          : undefined,
        bindToScope === true,
      );
    }

    return this._startTransaction(
      nameOrContext,
      typeof opOrCustomSamplingContext === 'object'
        ? opOrCustomSamplingContext
        : undefined,
      customSamplingContextOrBind === true,
    );
  }

  /**
   * 接续上游的链路开始一个事务
   *
   * 头部格式错误时记录警告，然后按本地的采样配置开始一条新的链路
   *
   * @param sentryTrace 请求中 sentry-trace 头部的值
   */
  public continueTrace(
    sentryTrace: string | undefined,
    name: string,
    op: string,
    customSamplingContext?: CustomSamplingContext,
    bindToScope?: boolean,
  ): Transaction {
    if (!this.isEnabled()) {
      return new NoOpSpan();
    }

    let traceparentData: TraceparentData | undefined;
    if (sentryTrace !== undefined) {
      try {
        traceparentData = decodeTraceHeader(sentryTrace);
      } catch (error) {
        DEBUG_BUILD &&
          logger.warn(
            '[Tracing] Starting a new trace because the incoming header is invalid:',
            error instanceof Error ? error.message : error,
          );
      }
    }

    return this.startTransaction(
      { name, op, ...traceparentData },
      customSamplingContext,
      bindToScope,
    );
  }

  /**
   * 把结束的事务交给 client。
   * 由事务在 finish 时调用，每个事务只会调用一次，应用代码不需要直接调用
   *
   * 未被采样的事务同样会被上报，上报数据中 contexts.trace.sampled 为 false
   *
   * @returns 事件 ID，Hub 被禁用时为 undefined
   */
  public captureTransaction(transaction: Transaction): string | undefined {
    const client = this._client;
    if (!client || !client.isEnabled()) {
      return undefined;
    }

    try {
      return client.captureEvent(transaction.toEvent(), {}, this._scope);
    } catch (error) {
      DEBUG_BUILD && logger.error('Error while capturing transaction:', error);
      return undefined;
    }
  }

  /**
   * 捕获异常
   *
   * @returns 事件 ID，Hub 被禁用时为 undefined
   */
  public captureException(
    exception: unknown,
    hint?: EventHint,
  ): string | undefined {
    const client = this._client;
    if (!client || !client.isEnabled()) {
      return undefined;
    }

    const eventId = (hint && hint.event_id) || uuid4();
    // 传入的不是 Error 时，用这个合成的异常提供堆栈
    const syntheticException = new Error('Lantern syntheticException');

    try {
      this._lastEventId = client.captureException(
        exception,
        {
          originalException: exception,
          syntheticException,
          ...hint,
          event_id: eventId,
        },
        this._scope,
      );
    } catch (error) {
      DEBUG_BUILD && logger.error('Error while capturing exception:', error);
      return undefined;
    }

    return this._lastEventId;
  }

  /**
   * 捕获一条消息
   *
   * @returns 事件 ID，Hub 被禁用时为 undefined
   */
  public captureMessage(
    message: string,
    level?: SeverityLevel,
    hint?: EventHint,
  ): string | undefined {
    const client = this._client;
    if (!client || !client.isEnabled()) {
      return undefined;
    }

    const eventId = (hint && hint.event_id) || uuid4();
    const syntheticException = new Error(message);

    try {
      this._lastEventId = client.captureMessage(
        message,
        level,
        {
          originalException: message,
          syntheticException,
          ...hint,
          event_id: eventId,
        },
        this._scope,
      );
    } catch (error) {
      DEBUG_BUILD && logger.error('Error while capturing message:', error);
      return undefined;
    }

    return this._lastEventId;
  }

  /**
   * 捕获一个已经构建好的事件
   *
   * @returns 事件 ID，Hub 被禁用时为 undefined
   */
  public captureEvent(event: Event, hint?: EventHint): string | undefined {
    const client = this._client;
    if (!client || !client.isEnabled()) {
      return undefined;
    }

    try {
      const eventId = client.captureEvent(event, hint, this._scope);
      // 事务事件不算作最后一个事件
      if (event.type === 'event') {
        this._lastEventId = eventId;
      }
      return eventId;
    } catch (error) {
      DEBUG_BUILD && logger.error('Error while capturing event:', error);
      return undefined;
    }
  }

  /** 最后一次捕获的错误事件的 ID */
  public lastEventId(): string | undefined {
    return this._lastEventId;
  }

  /**
   * 向作用域中添加面包屑，会先经过 beforeBreadcrumb，数量受 maxBreadcrumbs 限制
   */
  public addBreadcrumb(breadcrumb: Breadcrumb, hint?: BreadcrumbHint): void {
    const client = this._client;
    if (!client || !client.isEnabled()) {
      return;
    }

    const { beforeBreadcrumb, maxBreadcrumbs = DEFAULT_MAX_BREADCRUMBS } =
      client.getOptions();

    if (maxBreadcrumbs <= 0) {
      return;
    }

    const mergedBreadcrumb = {
      timestamp: dateTimestampInSeconds(),
      ...breadcrumb,
    };

    let finalBreadcrumb: Breadcrumb | null = mergedBreadcrumb;
    if (beforeBreadcrumb) {
      try {
        finalBreadcrumb = beforeBreadcrumb(mergedBreadcrumb, hint);
      } catch (error) {
        DEBUG_BUILD && logger.error('Error in beforeBreadcrumb:', error);
        return;
      }
    }

    if (finalBreadcrumb === null) {
      return;
    }

    this._scope.addBreadcrumb(finalBreadcrumb, maxBreadcrumbs);
  }

  /**
   * 修改作用域。同一个作用域上的修改会排队依次执行，不会看到修改了一半的作用域
   */
  public configureScope(mutator: (scope: Scope) => void): void {
    if (!this.isEnabled()) {
      return;
    }
    this._scope.runExclusive(mutator);
  }

  /**
   * 只读地访问当前绑定的事务
   */
  public withTransaction<T>(
    reader: (transaction: Transaction | undefined) => T,
  ): T {
    if (!this.isEnabled()) {
      return reader(undefined);
    }
    return this._scope.withTransaction(reader);
  }

  /**
   * 返回发往下游服务的追踪头部，作用域上没有绑定事务时返回空对象
   */
  public traceHeaders(): { [key: string]: string } {
    const transaction = this._scope.getTransaction();
    if (!transaction) {
      return {};
    }
    return { [SENTRY_TRACE_HEADER]: transaction.toTraceHeader() };
  }

  /**
   * 等待所有事件发送完成
   *
   * @param timeout 最长等待时间（毫秒）
   */
  public flush(timeout?: number): PromiseLike<boolean> {
    if (!this._client) {
      DEBUG_BUILD && logger.warn('Cannot flush events. No client defined.');
      return Promise.resolve(false);
    }
    return this._client.flush(timeout);
  }

  /**
   * 等待发送完成后关闭 client，之后 Hub 的所有入口都是空操作
   */
  public close(timeout?: number): PromiseLike<boolean> {
    if (!this._client) {
      DEBUG_BUILD &&
        logger.warn('Cannot flush events and disable SDK. No client defined.');
      return Promise.resolve(false);
    }
    return this._client.close(timeout);
  }

  private _startTransaction(
    transactionContext: TransactionContext,
    customSamplingContext: CustomSamplingContext | undefined,
    bindToScope: boolean,
  ): Transaction {
    const client = this._client;
    if (!client || !client.isEnabled()) {
      return new NoOpSpan(canonicalTraceId(transactionContext.traceId));
    }

    const options = client.getOptions();
    const context = normalizeTraceContext(transactionContext);

    const samplingContext: SamplingContext = {
      ...customSamplingContext,
      transactionContext: context,
      parentSampled: context.parentSampled,
    };

    const [sampled, sampleRate] = sampleTransaction(options, samplingContext);

    const transaction = new LanternTransaction(
      { ...context, sampled },
      this,
      { maxSpans: options.maxSpans, sampleRate },
    );

    if (bindToScope) {
      this._scope.setTransaction(transaction);
    }

    return transaction;
  }
}

function canonicalTraceId(traceId: string | undefined): string | undefined {
  if (traceId === undefined) {
    return undefined;
  }
  try {
    return parseTraceId(traceId);
  } catch {
    return undefined;
  }
}

/**
 * 校验调用方传入的 traceId、parentSpanId 和 spanId，并统一为小写
 *
 * 任何一个格式错误时记录警告，丢弃上游的身份和采样决策，开始一条新的链路
 */
function normalizeTraceContext(
  transactionContext: TransactionContext,
): TransactionContext {
  const { traceId, parentSpanId, spanId } = transactionContext;
  try {
    return {
      ...transactionContext,
      traceId: traceId === undefined ? generateTraceId() : parseTraceId(traceId),
      parentSpanId:
        parentSpanId === undefined ? undefined : parseSpanId(parentSpanId),
      spanId: spanId === undefined ? undefined : parseSpanId(spanId),
    };
  } catch (error) {
    DEBUG_BUILD &&
      logger.warn(
        '[Tracing] Starting a new trace because the transaction context has an invalid identifier:',
        error instanceof Error ? error.message : error,
      );
    return {
      ...transactionContext,
      traceId: generateTraceId(),
      parentSpanId: undefined,
      spanId: undefined,
      parentSampled: undefined,
    };
  }
}
