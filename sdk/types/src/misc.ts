/** js 的原始值类型 */
export type Primitive =
  | number
  | string
  | boolean
  | bigint
  | symbol
  | null
  | undefined;

/** 附加数据，不做结构约束 */
export type Extra = unknown;
export type Extras = Record<string, Extra>;
