import type { ClientOptions } from '@lantern-monitor/types';
import { SDK_VERSION } from '@lantern-monitor/utils';

/**
 * 把 SDK 的名称和版本写入选项的元数据，之后每个事件都会带上它
 *
 * @param options 会被修改的 SDK 选项
 * @param name 平台名称，例如 node
 */
export function applySdkMetadata(options: ClientOptions, name: string): void {
  const metadata = options._metadata || {};

  if (!metadata.sdk) {
    metadata.sdk = {
      name: `lantern.javascript.${name}`,
      version: SDK_VERSION,
    };
  }

  options._metadata = metadata;
}
