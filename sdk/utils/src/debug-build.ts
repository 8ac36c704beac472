// 构建工具（如 Rollup、esbuild）可以把这个常量替换为 false，从而在生产构建中去掉调试代码
declare const __DEBUG_BUILD__: boolean | undefined;

/**
 * 是否是调试构建，没有注入 __DEBUG_BUILD__ 时视为调试构建
 */
export const DEBUG_BUILD =
  typeof __DEBUG_BUILD__ === 'undefined' || __DEBUG_BUILD__;
