import type { ConsoleLevel } from '@lantern-monitor/types';

import { DEBUG_BUILD } from './debug-build';
import { GLOBAL_OBJ } from './worldwide';

/** 日志输出的前缀 */
const PREFIX = 'Lantern Logger ';

/**
 * 日志函数类型，接受不定数量的参数
 */
type LoggerMethod = (...args: unknown[]) => void;
/**
 * 每个日志级别映射一个日志处理函数
 */
type LoggerConsoleMethods = Record<ConsoleLevel, LoggerMethod>;

/** SDK 的 logger：默认关闭，开启 debug 选项后输出到控制台 */
interface Logger extends LoggerConsoleMethods {
  disable(): void;
  enable(): void;
  isEnabled(): boolean;
}

function makeLogger(): Logger {
  let enabled = false;

  // 非调试构建中所有日志方法都是空函数
  const method = (name: ConsoleLevel): LoggerMethod =>
    DEBUG_BUILD
      ? (...args: unknown[]) => {
          if (enabled) {
            GLOBAL_OBJ.console[name](`${PREFIX}[${name}]:`, ...args);
          }
        }
      : () => undefined;

  return {
    enable: () => {
      enabled = true;
    },
    disable: () => {
      enabled = false;
    },
    isEnabled: () => enabled,
    debug: method('debug'),
    info: method('info'),
    warn: method('warn'),
    error: method('error'),
    log: method('log'),
    trace: method('trace'),
  };
}

export const logger = makeLogger();
