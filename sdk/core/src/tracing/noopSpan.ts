import type {
  SpanContext,
  SpanJSON,
  Transaction,
  TransactionEvent,
} from '@lantern-monitor/types';
import {
  EMPTY_SPAN_ID,
  EMPTY_TRACE_ID,
  encodeTraceHeader,
} from '@lantern-monitor/utils';

/**
 * 不会被记录的 span
 *
 * 以下场景会返回它：
 * - 在已经结束的事务上调用 startChild
 * - Hub 被禁用时调用 startTransaction
 *
 * 它保留调用方的 traceId，这样发出去的 sentry-trace 头部依然属于同一条链路，spanId 则是全 0
 */
export class NoOpSpan implements Transaction {
  private readonly _traceId: string;
  private readonly _sampled: boolean | undefined;

  public constructor(
    traceId: string = EMPTY_TRACE_ID,
    sampled?: boolean | undefined,
  ) {
    this._traceId = traceId;
    this._sampled = sampled;
  }

  /** @inheritdoc */
  public spanContext(): SpanContext {
    return {
      traceId: this._traceId,
      spanId: EMPTY_SPAN_ID,
      op: '',
      sampled: this._sampled,
    };
  }

  /** @inheritdoc */
  public getStartTimestamp(): number {
    return 0;
  }

  /** @inheritdoc */
  public getEndTimestamp(): number | undefined {
    return undefined;
  }

  /** @inheritdoc */
  public getStatus(): undefined {
    return undefined;
  }

  /** @inheritdoc */
  public setStatus(): this {
    return this;
  }

  /** @inheritdoc */
  public setHttpStatus(): this {
    return this;
  }

  /** @inheritdoc */
  public setTag(): this {
    return this;
  }

  /** @inheritdoc */
  public setData(): this {
    return this;
  }

  /** 返回自身，子 span 同样不会被记录 */
  public startChild(): this {
    return this;
  }

  /** @inheritdoc */
  public finish(): void {
    // noop
  }

  /** NoOp span 从一开始就视为已结束 */
  public isFinished(): boolean {
    return true;
  }

  /** @inheritdoc */
  public toTraceHeader(): string {
    return encodeTraceHeader({
      traceId: this._traceId,
      spanId: EMPTY_SPAN_ID,
      sampled: this._sampled,
    });
  }

  /** @inheritdoc */
  public toJSON(): SpanJSON {
    return {
      trace_id: this._traceId,
      span_id: EMPTY_SPAN_ID,
      start_timestamp: 0,
    };
  }

  /** @inheritdoc */
  public getName(): string {
    return '';
  }

  /** @inheritdoc */
  public setName(): this {
    return this;
  }

  /** @inheritdoc */
  public getSpans(): readonly [] {
    return [];
  }

  /** @inheritdoc */
  public getSampleRate(): undefined {
    return undefined;
  }

  /** @inheritdoc */
  public toEvent(): TransactionEvent {
    return {
      type: 'transaction',
      transaction: '',
      start_timestamp: 0,
      timestamp: 0,
      spans: [],
      contexts: {
        trace: {
          trace_id: this._traceId,
          span_id: EMPTY_SPAN_ID,
          sampled: false,
        },
      },
    };
  }
}
