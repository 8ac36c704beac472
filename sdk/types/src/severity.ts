/**
 * 事件和面包屑的严重级别，从高到低依次为 fatal、error、warning、log、info、debug
 */
export type SeverityLevel =
  | 'fatal'
  | 'error'
  | 'warning'
  | 'log'
  | 'info'
  | 'debug';

/** 控制台支持的输出级别，logger 只会包装这些方法 */
export type ConsoleLevel =
  | 'debug'
  | 'info'
  | 'warn'
  | 'error'
  | 'log'
  | 'trace';
