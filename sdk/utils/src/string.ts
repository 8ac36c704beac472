/**
 * 将给定字符串截断为最大字符数
 *
 * @param max 截断后的最大长度，0 表示不限制
 */
export function truncate(str: string, max: number = 0): string {
  if (typeof str !== 'string' || max === 0) {
    return str;
  }
  return str.length <= max ? str : `${str.slice(0, max)}...`;
}
