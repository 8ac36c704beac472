import { DEBUG_BUILD, logger } from '@lantern-monitor/utils';

/**
 * 从给定的值中解析出一个有效的采样率
 * 布尔值会转为 1 或 0，字符串会尝试转换为数字
 *
 * 任何无效的采样率都会返回 undefined
 */
export function parseSampleRate(sampleRate: unknown): number | undefined {
  if (typeof sampleRate === 'boolean') {
    return Number(sampleRate);
  }

  const rate =
    typeof sampleRate === 'string' ? parseFloat(sampleRate) : sampleRate;

  if (typeof rate !== 'number' || isNaN(rate) || rate < 0 || rate > 1) {
    DEBUG_BUILD &&
      logger.warn(
        `[Tracing] Given sample rate is invalid. Sample rate must be a boolean or a number between 0 and 1. Got ${JSON.stringify(
          sampleRate,
        )} of type ${JSON.stringify(typeof sampleRate)}.`,
      );
    return undefined;
  }

  return rate;
}
