/**
 * span 的状态，字符串取值与 http / grpc 的状态语义对应
 *
 * @link https://develop.sentry.dev/sdk/event-payloads/span/
 */
export type SpanStatusType =
  /** 操作成功完成 */
  | 'ok'
  /** 操作被调用方取消 */
  | 'cancelled'
  /** 未知错误 */
  | 'unknown_error'
  /** 客户端传入了无效的参数 */
  | 'invalid_argument'
  /** 操作在完成之前超时 */
  | 'deadline_exceeded'
  /** 找不到请求的实体 */
  | 'not_found'
  /** 要创建的实体已经存在 */
  | 'already_exists'
  /** 调用方没有权限执行该操作 */
  | 'permission_denied'
  /** 资源耗尽，例如配额用完 */
  | 'resource_exhausted'
  /** 系统不处于执行该操作所需的状态 */
  | 'failed_precondition'
  /** 操作被中止，通常是因为并发问题 */
  | 'aborted'
  /** 操作超出了有效范围 */
  | 'out_of_range'
  /** 操作未实现或不被支持 */
  | 'unimplemented'
  /** 内部错误 */
  | 'internal_error'
  /** 服务不可用 */
  | 'unavailable'
  /** 不可恢复的数据丢失或损坏 */
  | 'data_loss'
  /** 请求没有有效的身份凭证 */
  | 'unauthenticated';

/**
 * span 的身份信息，创建之后不会再变化
 */
export interface SpanContext {
  /** 32 位十六进制，标识整个分布式链路 */
  traceId: string;
  /** 16 位十六进制，在链路内标识这个 span */
  spanId: string;
  /** 父 span 的 ID，根 span 没有或者指向另一个进程中的 span */
  parentSpanId?: string | undefined;
  /** 操作类型，例如 http.server、db.query */
  op: string;
  /** 对这次操作的描述 */
  description?: string | undefined;
  /**
   * 采样决策，三态：true / false / undefined（未知）
   */
  sampled?: boolean | undefined;
}

/**
 * span 上报时的 json 结构
 */
export interface SpanJSON {
  trace_id: string;
  span_id: string;
  parent_span_id?: string;
  op?: string;
  description?: string;
  status?: SpanStatusType;
  tags?: { [key: string]: string };
  data?: { [key: string]: unknown };
  start_timestamp: number;
  timestamp?: number;
}

/**
 * 一个有起止时间的工作单元，隶属于某个事务
 *
 * 结束（finish）是终态：结束时间一旦写入就不会再变，结束之后的修改会被忽略并记录日志，不会抛出异常
 */
export interface Span {
  /** 返回 span 的身份信息 */
  spanContext(): SpanContext;

  /** 开始时间，单位秒 */
  getStartTimestamp(): number;

  /** 结束时间，未结束时为 undefined */
  getEndTimestamp(): number | undefined;

  /** 当前状态，未设置时为 undefined */
  getStatus(): SpanStatusType | undefined;

  setStatus(status: SpanStatusType): this;

  /**
   * 根据 http 状态码设置状态，并写入 http.status_code 标签
   */
  setHttpStatus(httpStatus: number): this;

  setTag(key: string, value: string): this;

  setData(key: string, value: unknown): this;

  /**
   * 在同一个事务下创建一个子 span，父 span 就是当前 span
   *
   * 所属事务已经结束时返回一个不会被记录的 NoOp span
   */
  startChild(op: string, description?: string): Span;

  /**
   * 结束 span。没有传入状态时沿用之前设置的状态，从未设置则为 ok。
   * 重复调用不会产生任何影响
   */
  finish(status?: SpanStatusType, endTimestamp?: number): void;

  isFinished(): boolean;

  /** 返回用于跨进程传播的 sentry-trace 头部的值 */
  toTraceHeader(): string;

  toJSON(): SpanJSON;
}
