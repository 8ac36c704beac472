export { NodeClient } from './client';
export type { NodeClientOptions } from './client';
export { eventFromException, eventFromMessage } from './eventbuilder';
export { extractRequestData, tracingHandler } from './handlers/tracing';
export type {
  LanternRequest,
  NextFunction,
  TracingHandlerOptions,
} from './handlers/tracing';
export { init } from './sdk';
export type { NodeOptions } from './sdk';
export { makeFetchTransport } from './transports/fetch';
export type { FetchImpl, NodeTransportOptions } from './transports/types';
export { wrapInTransaction } from './wrap';
export type { WrapContext } from './wrap';

export {
  Hub,
  LifecycleTracker,
  NoOpSpan,
  Scope,
  getSpanStatusFromHttpCode,
} from '@lantern-monitor/core';
export type { LifecycleTrackerOptions } from '@lantern-monitor/core';
export {
  MalformedTraceHeader,
  InvalidIdentifierFormat,
  LanternError,
  LateMutationIgnored,
  SENTRY_TRACE_HEADER,
  SamplingConfigurationError,
  decodeTraceHeader,
  encodeTraceHeader,
} from '@lantern-monitor/utils';
export type {
  Breadcrumb,
  Event,
  ErrorEvent,
  Span,
  SpanStatusType,
  Transaction,
  TransactionContext,
  TransactionEvent,
} from '@lantern-monitor/types';
