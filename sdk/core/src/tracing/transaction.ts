import type {
  Scope,
  Span,
  TraceContext,
  Transaction,
  TransactionContext,
  TransactionEvent,
  TransactionSource,
} from '@lantern-monitor/types';
import {
  DEBUG_BUILD,
  LateMutationIgnored,
  dropUndefinedKeys,
  logger,
  timestampInSeconds,
} from '@lantern-monitor/utils';

import { NoOpSpan } from './noopSpan';
import { LanternSpan } from './span';
import type { SpanRecorder } from './span';

/** 单个事务默认最多记录的子 span 数量 */
export const DEFAULT_MAX_SPANS = 1000;

/**
 * 创建事务的一方（Hub）。事务结束时通过它解除作用域绑定并交给上报管道
 */
export interface TransactionOwner {
  getScope(): Scope;
  captureTransaction(transaction: Transaction): string | undefined;
}

export interface TransactionOptions {
  /** 子 span 数量上限 */
  maxSpans?: number | undefined;
  /** 做出采样决策时使用的采样率 */
  sampleRate?: number | undefined;
}

/**
 * 事务：根 span 加上按开始顺序排列的子 span
 *
 * 状态机为 Created → Running → Finished。
 * startChild 在同一个同步步骤里检查是否已结束并追加子 span，所以不会有子 span 被追加到已经上报的事务上
 *
 * 子 span 的错误状态不会自动传递给事务，事务的状态由调用方决定
 */
export class LanternTransaction
  extends LanternSpan
  implements Transaction, SpanRecorder
{
  private _name: string;
  private _source: TransactionSource;
  private readonly _spans: Span[];
  private readonly _maxSpans: number;
  private readonly _sampleRate: number | undefined;
  private readonly _owner: TransactionOwner;

  /**
   * @internal
   * @hideconstructor
   */
  public constructor(
    transactionContext: TransactionContext,
    owner: TransactionOwner,
    options: TransactionOptions = {},
  ) {
    super({
      traceId: transactionContext.traceId,
      spanId: transactionContext.spanId,
      parentSpanId: transactionContext.parentSpanId,
      op: transactionContext.op,
      description: transactionContext.description,
      sampled: transactionContext.sampled,
      startTimestamp: transactionContext.startTimestamp,
      tags: transactionContext.tags,
      data: transactionContext.data,
    });

    this._name = transactionContext.name;
    this._source = transactionContext.source || 'custom';
    this._spans = [];
    this._maxSpans = options.maxSpans ?? DEFAULT_MAX_SPANS;
    this._sampleRate = options.sampleRate;
    this._owner = owner;
  }

  /** @inheritdoc */
  public getName(): string {
    return this._name;
  }

  /**
   * 修改事务名称，只影响上报数据里的 transaction 字段，不影响 traceId
   */
  public setName(name: string, source: TransactionSource = 'custom'): this {
    if (this.isFinished()) {
      DEBUG_BUILD &&
        logger.warn(new LateMutationIgnored('setName', this._describe()).message);
      return this;
    }
    this._name = name;
    this._source = source;
    return this;
  }

  /** @inheritdoc */
  public getSpans(): readonly Span[] {
    return this._spans;
  }

  /** @inheritdoc */
  public getSampleRate(): number | undefined {
    return this._sampleRate;
  }

  /** @inheritdoc */
  public startChild(op: string, description?: string): Span {
    return this.recordChild(this, op, description);
  }

  /**
   * 检查事务是否结束和追加子 span 在同一个同步步骤中完成：
   * 事务结束之后调用会返回 NoOp span，子 span 列表长度不变
   */
  public recordChild(parent: Span, op: string, description?: string): Span {
    if (this.isFinished()) {
      DEBUG_BUILD &&
        logger.warn(
          new LateMutationIgnored(`startChild("${op}")`, this._describe())
            .message,
        );
      return new NoOpSpan(this._traceId, this._sampled);
    }

    const child = new LanternSpan(
      {
        traceId: this._traceId,
        parentSpanId: parent.spanContext().spanId,
        op,
        description,
        sampled: this._sampled,
      },
      this,
    );

    if (this._spans.length >= this._maxSpans) {
      DEBUG_BUILD &&
        logger.warn(
          `[Tracing] Transaction "${this._name}" reached the limit of ${this._maxSpans} spans, "${op}" is not recorded.`,
        );
      return child;
    }

    this._spans.push(child);
    return child;
  }

  /**
   * 事务结束后交给上报管道的数据，只包含已经结束的子 span
   */
  public toEvent(): TransactionEvent {
    const finishedSpans = this._spans
      .filter((span) => span.isFinished())
      .map((span) => span.toJSON());

    return dropUndefinedKeys<TransactionEvent>({
      type: 'transaction',
      transaction: this._name,
      start_timestamp: this._startTime,
      timestamp: this._endTime ?? timestampInSeconds(),
      contexts: {
        trace: this._getTraceContext(),
      },
      spans: finishedSpans,
      tags: Object.keys(this._tags).length > 0 ? { ...this._tags } : undefined,
      transaction_info: {
        source: this._source,
      },
      sample_rate: this._sampleRate,
    });
  }

  /**
   * 事务只上报一次：先从 Hub 的作用域上解绑，再交给 Hub
   */
  protected _onSpanEnded(): void {
    const scope = this._owner.getScope();
    if (scope.getTransaction() === this) {
      scope.clearTransaction();
    }

    this._owner.captureTransaction(this);
  }

  protected _describe(): string {
    return `transaction "${this._name}" (${this._spanId})`;
  }

  private _getTraceContext(): TraceContext {
    return {
      trace_id: this._traceId,
      span_id: this._spanId,
      parent_span_id: this._parentSpanId,
      op: this._op,
      description: this._description,
      status: this._status,
      sampled: this._sampled,
      tags: Object.keys(this._tags).length > 0 ? { ...this._tags } : undefined,
      data: Object.keys(this._data).length > 0 ? { ...this._data } : undefined,
    };
  }
}

