import type { SpanContext, Span, SpanStatusType } from './span';
import type { TransactionEvent } from './event';

/**
 * 从 sentry-trace 头部解码出来的数据
 */
export interface TraceparentData {
  /**
   * 追踪 ID，在分布式系统中标识请求的完整路径
   */
  traceId: string;

  /**
   * 调用方 span 的 ID，会成为新事务的 parentSpanId
   */
  parentSpanId: string;

  /**
   * 上游的采样决策，头部没有携带第三段时为 undefined
   */
  parentSampled?: boolean | undefined;
}

/**
 * 事务名称的来源，决定服务端是否需要对名称做清理（例如把 id 替换为占位符）
 */
export type TransactionSource =
  /** 用户自定义名称 */
  | 'custom'
  /** 原始 URL，可能包含标识符 */
  | 'url'
  /** 参数化的路由，例如 /product/:id */
  | 'route'
  /** 处理请求的视图名称 */
  | 'view'
  /** 以组件（函数或类）命名 */
  | 'component'
  /** 后台任务的名称 */
  | 'task';

/**
 * 创建事务时使用的上下文
 */
export interface TransactionContext
  extends Omit<Partial<SpanContext>, 'op'> {
  /** 事务名称，例如 "POST /product/12" */
  name: string;
  /** 操作类型，例如 http.server、navigation */
  op: string;
  /**
   * 上游传来的采样决策，已知时优先于本地的采样配置
   */
  parentSampled?: boolean | undefined;
  /** 名称的来源，默认为 custom */
  source?: TransactionSource;
  tags?: { [key: string]: string };
  data?: { [key: string]: unknown };
  /** 开始时间，单位秒，默认为当前时间 */
  startTimestamp?: number;
}

/**
 * 由调用方提供、只在采样时使用的任意数据，例如当前的 http 请求对象
 */
export interface CustomSamplingContext {
  [key: string]: unknown;
}

/**
 * 传给 tracesSampler 的上下文
 */
export interface SamplingContext extends CustomSamplingContext {
  /** 即将创建的事务的上下文 */
  transactionContext: TransactionContext;
  /** 上游的采样决策 */
  parentSampled?: boolean | undefined;
}

/**
 * 事务：一个根 span 加上它下面的子 span，代表一次完整的逻辑操作
 */
export interface Transaction extends Span {
  /** 事务名称，与 op 相互独立 */
  getName(): string;

  /**
   * 修改事务名称，只在事务结束前生效
   */
  setName(name: string, source?: TransactionSource): this;

  /** 已记录的子 span，按开始顺序排列 */
  getSpans(): readonly Span[];

  /** 采样时使用的采样率，没有经过随机采样时为 undefined */
  getSampleRate(): number | undefined;

  /** 事务结束后交给上报管道的数据 */
  toEvent(): TransactionEvent;

  finish(status?: SpanStatusType, endTimestamp?: number): void;
}
