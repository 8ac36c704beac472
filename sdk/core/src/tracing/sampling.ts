import type { ClientOptions, SamplingContext } from '@lantern-monitor/types';
import {
  DEBUG_BUILD,
  SamplingConfigurationError,
  logger,
} from '@lantern-monitor/utils';

import { hasTracingEnabled } from '../utils/hasTracingEnabled';
import { parseSampleRate } from '../utils/parseSampleRate';

/**
 * 校验配置中的采样率，在创建 client 时调用
 * 这是唯一一个会抛给调用方的错误：无效的采样率是部署错误，应该在启动时就暴露出来
 *
 * @throws {SamplingConfigurationError} 采样率不是 [0, 1] 之间的有限数字
 */
export function validateSampleRate(
  sampleRate: unknown,
  optionName: string = 'tracesSampleRate',
): void {
  if (sampleRate === undefined) {
    return;
  }

  if (
    typeof sampleRate !== 'number' ||
    !Number.isFinite(sampleRate) ||
    sampleRate < 0 ||
    sampleRate > 1
  ) {
    throw new SamplingConfigurationError(
      `Invalid ${optionName}: expected a number between 0 and 1, got ${JSON.stringify(
        sampleRate,
      )}.`,
    );
  }
}

/**
 * 为新的事务做出采样决策，决策顺序：
 * 1. 事务上下文里明确的 sampled，或者上游 sentry-trace 头部里的决策
 * 2. tracesSampler 的返回值：布尔值直接决定，数字作为采样率，undefined 交给下一步
 * 3. tracesSampleRate
 * 4. 都没有配置时不采样
 *
 * 未被采样的事务依然会被创建和上报，采样只决定上报数据里的 sampled 标记
 *
 * @returns [是否采样，随机采样时使用的采样率]
 */
export function sampleTransaction(
  options: Pick<ClientOptions, 'tracesSampleRate' | 'tracesSampler'>,
  samplingContext: SamplingContext,
): [sampled: boolean, sampleRate?: number] {
  const { transactionContext, parentSampled } = samplingContext;

  // 上游的决策优先，保证整条链路的采样结果一致
  const inheritedSampled =
    transactionContext.sampled !== undefined
      ? transactionContext.sampled
      : parentSampled;
  if (inheritedSampled !== undefined) {
    return [inheritedSampled];
  }

  if (!hasTracingEnabled(options)) {
    return [false];
  }

  let sampleRate: unknown;

  if (typeof options.tracesSampler === 'function') {
    try {
      sampleRate = options.tracesSampler(samplingContext);
    } catch (error) {
      DEBUG_BUILD &&
        logger.warn(
          '[Tracing] Discarding transaction because tracesSampler threw:',
          error,
        );
      return [false];
    }

    if (typeof sampleRate === 'boolean') {
      if (!sampleRate) {
        DEBUG_BUILD &&
          logger.log(
            '[Tracing] Discarding transaction because tracesSampler returned false',
          );
      }
      return [sampleRate];
    }
  }

  // tracesSampler 没有配置或者返回了 undefined，使用全局采样率
  if (sampleRate === undefined) {
    sampleRate = options.tracesSampleRate;
  }

  if (sampleRate === undefined) {
    return [false];
  }

  const parsedSampleRate = parseSampleRate(sampleRate);

  if (parsedSampleRate === undefined) {
    DEBUG_BUILD &&
      logger.warn(
        '[Tracing] Discarding transaction because of invalid sample rate.',
      );
    return [false];
  }

  if (!parsedSampleRate) {
    DEBUG_BUILD &&
      logger.log(
        '[Tracing] Discarding transaction because the sample rate is 0',
      );
    return [false, parsedSampleRate];
  }

  // Math.random() 包含 0 不包含 1，所以采样率为 1 时一定会被采样
  const shouldSample = Math.random() < parsedSampleRate;

  if (!shouldSample) {
    DEBUG_BUILD &&
      logger.log(
        `[Tracing] Discarding transaction because it's not included in the random sample (sampling rate = ${parsedSampleRate})`,
      );
    return [false, parsedSampleRate];
  }

  return [true, parsedSampleRate];
}
