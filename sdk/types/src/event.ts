import type { Breadcrumb } from './breadcrumb';
import type { Contexts } from './context';
import type { Exception } from './exception';
import type { Mechanism } from './mechanism';
import type { Extras } from './misc';
import type { Request } from './request';
import type { SdkInfo } from './sdkinfo';
import type { SeverityLevel } from './severity';
import type { SpanJSON } from './span';
import type { TransactionSource } from './transaction';
import type { User } from './user';

/**
 * 错误事件和事务事件共有的字段
 */
interface BaseEvent {
  event_id?: string;
  message?: string;
  timestamp?: number;
  start_timestamp?: number;
  level?: SeverityLevel;
  platform?: string;
  server_name?: string;
  release?: string;
  dist?: string;
  environment?: string;
  sdk?: SdkInfo;
  request?: Request;
  transaction?: string;
  exception?: {
    values?: Exception[];
  };
  breadcrumbs?: Breadcrumb[];
  contexts?: Contexts;
  tags?: { [key: string]: string };
  extra?: Extras;
  user?: User;
  fingerprint?: string[];
}

/**
 * 异常或消息产生的事件
 */
export interface ErrorEvent extends BaseEvent {
  type: 'event';
}

/**
 * 一个结束的事务连同它的 span 树
 */
export interface TransactionEvent extends BaseEvent {
  type: 'transaction';
  transaction: string;
  start_timestamp: number;
  timestamp: number;
  spans: SpanJSON[];
  transaction_info?: {
    source: TransactionSource;
  };
  sample_rate?: number;
}

/**
 * 上报管道处理的事件。
 * 通过 type 字段区分是错误事件还是事务事件，而不是依赖运行时的类型判断
 */
export type Event = ErrorEvent | TransactionEvent;

export type EventType = Event['type'];

/**
 * 事件的附加信息，不会上报
 */
export interface EventHint {
  event_id?: string;
  /** 调用方传入的原始异常 */
  originalException?: unknown;
  /** 传入的不是 Error 时用来生成堆栈的合成异常 */
  syntheticException?: Error | null;
  mechanism?: Partial<Mechanism>;
  data?: unknown;
}

/**
 * 事件处理器，返回 null 表示丢弃这个事件
 */
export type EventProcessor = (event: Event, hint: EventHint) => Event | null;
