export { BaseClient } from './baseclient';
export { Hub } from './hub';
export { LifecycleTracker } from './lifecycle';
export type { LifecycleTrackerOptions } from './lifecycle';
export { DEFAULT_MAX_BREADCRUMBS, Scope } from './scope';
export { NoOpSpan } from './tracing/noopSpan';
export { sampleTransaction, validateSampleRate } from './tracing/sampling';
export { LanternSpan } from './tracing/span';
export type { LanternSpanArguments, SpanRecorder } from './tracing/span';
export { getSpanStatusFromHttpCode } from './tracing/spanstatus';
export { DEFAULT_MAX_SPANS, LanternTransaction } from './tracing/transaction';
export type {
  TransactionOptions,
  TransactionOwner,
} from './tracing/transaction';
export {
  createTransport,
  DEFAULT_TRANSPORT_BUFFER_SIZE,
} from './transports/base';
export { hasTracingEnabled } from './utils/hasTracingEnabled';
export { parseSampleRate } from './utils/parseSampleRate';
export { DEFAULT_ENVIRONMENT, prepareEvent } from './utils/prepareEvent';
export { applySdkMetadata } from './utils/sdkMetadata';
