import type { Breadcrumb, BreadcrumbHint } from './breadcrumb';
import type { ErrorEvent, EventHint, TransactionEvent } from './event';
import type { SdkInfo } from './sdkinfo';
import type { SamplingContext } from './transaction';
import type { BaseTransportOptions, Transport } from './transport';

/**
 * 自定义的采样函数
 *
 * 返回 true / false 直接决定是否采样，返回 0~1 的数字作为采样率，返回 undefined 则交给 tracesSampleRate 决定
 */
export type TracesSampler = (
  samplingContext: SamplingContext,
) => number | boolean | undefined;

export interface ClientOptions<
  TO extends BaseTransportOptions = BaseTransportOptions,
> {
  /**
   * 是否启用 SDK，为 false 时所有入口都是空操作
   * @default true
   */
  enabled?: boolean;

  /**
   * 开启后 SDK 会把调试信息输出到控制台
   * @default false
   */
  debug?: boolean;

  /** 应用的版本 */
  release?: string;

  /** 与 release 配合使用的构建号 */
  dist?: string;

  /**
   * 部署环境
   * @default "production"
   */
  environment?: string;

  /** 服务器名称 */
  serverName?: string;

  /** 平台标识，由各平台的 client 填写 */
  platform?: string;

  /**
   * 每个作用域保留的面包屑数量上限，超出后最旧的会被丢弃
   * @default 100
   */
  maxBreadcrumbs?: number;

  /**
   * 事件中 message、异常描述和请求 url 的最大长度，超出部分会被截断
   * @default 250
   */
  maxValueLength?: number;

  /**
   * 每个事务最多记录的子 span 数量
   * @default 1000
   */
  maxSpans?: number;

  /**
   * 事务的采样率，0 到 1 之间。超出范围会在初始化时抛出 SamplingConfigurationError
   */
  tracesSampleRate?: number;

  /**
   * 自定义的采样函数，配置之后优先于 tracesSampleRate
   */
  tracesSampler?: TracesSampler;

  /**
   * SDK 自身的元数据，由各平台的 client 在初始化时写入
   * @hidden
   */
  _metadata?: {
    sdk?: SdkInfo;
  };

  /** 创建 transport 的函数 */
  transport(transportOptions: TO): Transport;

  /** 传给 transport 的选项 */
  transportOptions: TO;

  /**
   * 错误事件发送之前的最后一次修改机会，返回 null 则丢弃
   */
  beforeSend?: (event: ErrorEvent, hint: EventHint) => ErrorEvent | null;

  /**
   * 事务事件发送之前的最后一次修改机会，返回 null 则丢弃
   */
  beforeSendTransaction?: (
    event: TransactionEvent,
    hint: EventHint,
  ) => TransactionEvent | null;

  /**
   * 面包屑加入作用域之前调用，返回 null 则丢弃
   */
  beforeBreadcrumb?: (
    breadcrumb: Breadcrumb,
    hint?: BreadcrumbHint,
  ) => Breadcrumb | null;
}
