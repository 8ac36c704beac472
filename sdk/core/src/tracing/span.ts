import type {
  Span,
  SpanContext,
  SpanJSON,
  SpanStatusType,
} from '@lantern-monitor/types';
import {
  DEBUG_BUILD,
  LateMutationIgnored,
  dropUndefinedKeys,
  encodeTraceHeader,
  generateSpanId,
  generateTraceId,
  logger,
  timestampInSeconds,
} from '@lantern-monitor/utils';

import { NoOpSpan } from './noopSpan';
import { getSpanStatusFromHttpCode } from './spanstatus';

/**
 * 创建 span 时可以传入的参数
 */
export interface LanternSpanArguments extends Partial<SpanContext> {
  startTimestamp?: number;
  tags?: { [key: string]: string };
  data?: { [key: string]: unknown };
}

/**
 * 负责记录子 span 的对象，也就是 span 所属的事务
 */
export interface SpanRecorder {
  /**
   * 以 parent 为父 span 创建并记录一个子 span
   */
  recordChild(parent: Span, op: string, description?: string): Span;
}

/**
 * 一个有起止时间的工作单元
 *
 * span 只属于一个事务，子 span 都是通过所属事务的 recordChild 创建和记录的。
 * 结束是终态，结束之后的修改会被忽略并记录一条警告
 */
export class LanternSpan implements Span {
  /** 整条链路的 ID */
  protected _traceId: string;
  /** 当前 span 的 ID */
  protected _spanId: string;
  /** 父 span 的 ID */
  protected _parentSpanId?: string | undefined;
  /** 采样决策，三态 */
  protected _sampled: boolean | undefined;
  protected _op: string;
  protected _description?: string | undefined;
  /** 开始时间，单位秒 */
  protected _startTime: number;
  /** 结束时间，设置之后不再改变 */
  protected _endTime?: number | undefined;
  protected _status?: SpanStatusType | undefined;
  protected _tags: { [key: string]: string };
  protected _data: { [key: string]: unknown };

  /** 所属的事务，事务本身没有 */
  private readonly _recorder?: SpanRecorder | undefined;

  /**
   * 不要直接调用构造函数，事务通过 Hub.startTransaction 创建，子 span 通过 startChild 创建
   *
   * @internal
   * @hideconstructor
   */
  public constructor(
    spanArguments: LanternSpanArguments = {},
    recorder?: SpanRecorder,
  ) {
    this._traceId = spanArguments.traceId || generateTraceId();
    this._spanId = spanArguments.spanId || generateSpanId();
    this._parentSpanId = spanArguments.parentSpanId;
    this._sampled = spanArguments.sampled;
    this._op = spanArguments.op || 'default';
    this._description = spanArguments.description;
    this._startTime = spanArguments.startTimestamp || timestampInSeconds();
    this._tags = { ...spanArguments.tags };
    this._data = { ...spanArguments.data };
    this._recorder = recorder;
  }

  /** @inheritdoc */
  public spanContext(): SpanContext {
    return {
      traceId: this._traceId,
      spanId: this._spanId,
      parentSpanId: this._parentSpanId,
      op: this._op,
      description: this._description,
      sampled: this._sampled,
    };
  }

  /** @inheritdoc */
  public getStartTimestamp(): number {
    return this._startTime;
  }

  /** @inheritdoc */
  public getEndTimestamp(): number | undefined {
    return this._endTime;
  }

  /** @inheritdoc */
  public getStatus(): SpanStatusType | undefined {
    return this._status;
  }

  /** @inheritdoc */
  public setStatus(status: SpanStatusType): this {
    if (this._ignoreLateMutation('setStatus')) {
      return this;
    }
    this._status = status;
    return this;
  }

  /**
   * 写入 http.status_code 标签，并根据状态码更新状态。
   * 无法识别的状态码只写标签，不改变状态
   */
  public setHttpStatus(httpStatus: number): this {
    if (this._ignoreLateMutation('setHttpStatus')) {
      return this;
    }
    this._tags['http.status_code'] = String(httpStatus);
    this._data['http.response.status_code'] = httpStatus;

    const spanStatus = getSpanStatusFromHttpCode(httpStatus);
    if (spanStatus !== 'unknown_error') {
      this._status = spanStatus;
    }
    return this;
  }

  /** @inheritdoc */
  public setTag(key: string, value: string): this {
    if (this._ignoreLateMutation('setTag')) {
      return this;
    }
    this._tags[key] = value;
    return this;
  }

  /** @inheritdoc */
  public setData(key: string, value: unknown): this {
    if (this._ignoreLateMutation('setData')) {
      return this;
    }
    this._data[key] = value;
    return this;
  }

  /** @inheritdoc */
  public startChild(op: string, description?: string): Span {
    if (!this._recorder) {
      DEBUG_BUILD &&
        logger.warn(
          `[Tracing] Span "${this._op}" does not belong to a transaction, child "${op}" is not recorded.`,
        );
      return new NoOpSpan(this._traceId, this._sampled);
    }
    return this._recorder.recordChild(this, op, description);
  }

  /**
   * 结束 span
   *
   * @param status 没有传入时沿用之前设置的状态，从未设置则为 ok
   * @param endTimestamp 结束时间（秒），默认为当前时间
   */
  public finish(status?: SpanStatusType, endTimestamp?: number): void {
    if (this._endTime !== undefined) {
      DEBUG_BUILD &&
        logger.debug(new LateMutationIgnored('finish', this._describe()).message);
      return;
    }

    this._status = status || this._status || 'ok';
    this._endTime = endTimestamp || timestampInSeconds();

    this._onSpanEnded();
  }

  /** @inheritdoc */
  public isFinished(): boolean {
    return this._endTime !== undefined;
  }

  /** @inheritdoc */
  public toTraceHeader(): string {
    return encodeTraceHeader({
      traceId: this._traceId,
      spanId: this._spanId,
      sampled: this._sampled,
    });
  }

  /** @inheritdoc */
  public toJSON(): SpanJSON {
    return dropUndefinedKeys({
      trace_id: this._traceId,
      span_id: this._spanId,
      parent_span_id: this._parentSpanId,
      op: this._op,
      description: this._description,
      status: this._status,
      tags: Object.keys(this._tags).length > 0 ? { ...this._tags } : undefined,
      data: Object.keys(this._data).length > 0 ? { ...this._data } : undefined,
      start_timestamp: this._startTime,
      timestamp: this._endTime,
    });
  }

  /**
   * span 结束之后调用一次，子类用它来处理结束之后的逻辑
   */
  protected _onSpanEnded(): void {
    // noop
  }

  /** 日志里用来指代当前 span 的描述 */
  protected _describe(): string {
    return `span "${this._op}" (${this._spanId})`;
  }

  /**
   * span 已经结束时记录一条警告并返回 true，调用方应当放弃这次修改
   */
  private _ignoreLateMutation(operation: string): boolean {
    if (this._endTime === undefined) {
      return false;
    }
    DEBUG_BUILD &&
      logger.warn(new LateMutationIgnored(operation, this._describe()).message);
    return true;
  }
}
