import { GLOBAL_OBJ } from './worldwide';

const ONE_SECOND_IN_MS = 1000;

/**
 * 返回自 UNIX 纪元以来的时间戳，单位为秒
 */
export function dateTimestampInSeconds(): number {
  return Date.now() / ONE_SECOND_IN_MS;
}

/**
 * 返回一个生成当前 UNIX 时间戳（秒）的函数，优先使用精度更高的 performance API
 */
function createUnixTimestampInSecondsFunc(): () => number {
  const { performance } = GLOBAL_OBJ;
  // performance 不可用时回退到 Date
  if (!performance || !performance.now) {
    return dateTimestampInSeconds;
  }

  /**
   * performance.now() 是从计时起点开始的单调时钟，
   * 加上计时起点（timeOrigin）才是真实的时间。
   * 没有 timeOrigin 的环境用 Date.now() - performance.now() 近似
   */
  const approxStartingTimeOrigin = Date.now() - performance.now();
  const timeOrigin =
    performance.timeOrigin == undefined
      ? approxStartingTimeOrigin
      : performance.timeOrigin;

  return () => {
    return (timeOrigin + performance.now()) / ONE_SECOND_IN_MS;
  };
}

/**
 * 返回当前时间戳（秒），span 的开始和结束时间都用它
 */
export const timestampInSeconds = createUnixTimestampInSecondsFunc();
