export type { Breadcrumb, BreadcrumbHint } from './breadcrumb';
export type { Client } from './client';
export type {
  Context,
  Contexts,
  RuntimeContext,
  TraceContext,
} from './context';
export type {
  Event,
  EventHint,
  EventProcessor,
  EventType,
  ErrorEvent,
  TransactionEvent,
} from './event';
export type { Exception } from './exception';
export type { Mechanism } from './mechanism';
export type { Extra, Extras, Primitive } from './misc';
export type { ClientOptions, TracesSampler } from './options';
export type { QueryParams, Request } from './request';
export type { Scope, ScopeData } from './scope';
export type { SdkInfo } from './sdkinfo';
export type { ConsoleLevel, SeverityLevel } from './severity';
export type { Span, SpanContext, SpanJSON, SpanStatusType } from './span';
export type {
  CustomSamplingContext,
  SamplingContext,
  TraceparentData,
  Transaction,
  TransactionContext,
  TransactionSource,
} from './transaction';
export type {
  BaseTransportOptions,
  Transport,
  TransportMakeRequestResponse,
  TransportRequest,
  TransportRequestExecutor,
} from './transport';
export type { User } from './user';
